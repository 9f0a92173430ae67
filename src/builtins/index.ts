/**
 * Builtins module exports.
 */

export {
  BuiltinRegistry,
  createBuiltins,
  signatureKey,
  type BuiltinTarget,
  type NativeFn,
  type NativeInfo,
  type NativeValue,
  type Vec3,
} from "./builtins.js";
