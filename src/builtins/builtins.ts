/**
 * Built-in operators and functions for the shading language.
 *
 * Entries are keyed by name (or operator symbol) plus operand types. Each
 * resolves either to an inline opcode or to a native function handle that
 * the VM calls through `CallNative`.
 */

import { Op } from "../bytecode/opcode.js";
import type { TypeKind } from "../ast/nodes.js";

/**
 * Three-component vector value.
 */
export interface Vec3 {
  x: number;
  y: number;
  z: number;
}

/**
 * Value passed to and returned by native functions.
 */
export type NativeValue = number | Vec3;

export type NativeFn = (args: NativeValue[]) => NativeValue;

/**
 * Native function descriptor. `handle` is the `CallNative` immediate.
 */
export interface NativeInfo {
  readonly handle: number;
  readonly name: string;
  readonly params: readonly TypeKind[];
  readonly returnType: TypeKind;
  readonly impl: NativeFn;
}

/**
 * What a builtin name resolves to for a given signature.
 */
export type BuiltinTarget =
  | { kind: "opcode"; op: Op; returnType: TypeKind }
  | { kind: "native"; handle: number; returnType: TypeKind };

/**
 * Key of an overload, e.g. `*(vec3,f32)`.
 */
export function signatureKey(name: string, params: readonly TypeKind[]): string {
  return `${name}(${params.join(",")})`;
}

/**
 * Registry of builtin overloads.
 */
export class BuiltinRegistry {
  private targets: Map<string, BuiltinTarget> = new Map();
  private natives: NativeInfo[] = [];
  private names: Set<string> = new Set();

  /**
   * Register an overload lowered to a single opcode.
   */
  registerOpcode(name: string, params: TypeKind[], returnType: TypeKind, op: Op): void {
    this.add(name, params, { kind: "opcode", op, returnType });
  }

  /**
   * Register a native overload. Returns its handle.
   */
  registerNative(name: string, params: TypeKind[], returnType: TypeKind, impl: NativeFn): number {
    const handle = this.natives.length;
    this.add(name, params, { kind: "native", handle, returnType });
    this.natives.push(Object.freeze({ handle, name, params: Object.freeze([...params]), returnType, impl }));
    return handle;
  }

  private add(name: string, params: TypeKind[], target: BuiltinTarget): void {
    const key = signatureKey(name, params);
    if (this.targets.has(key)) {
      throw new Error(`builtin already registered: ${key}`);
    }
    this.targets.set(key, target);
    this.names.add(name);
  }

  /**
   * Find the overload of `name` matching the operand types exactly.
   */
  resolve(name: string, argTypes: readonly TypeKind[]): BuiltinTarget | undefined {
    return this.targets.get(signatureKey(name, argTypes));
  }

  /**
   * Whether any overload is registered under `name`.
   */
  has(name: string): boolean {
    return this.names.has(name);
  }

  native(handle: number): NativeInfo | undefined {
    return this.natives[handle];
  }

  nativeTable(): NativeInfo[] {
    return [...this.natives];
  }
}

function asF32(value: NativeValue): number {
  if (typeof value !== "number") {
    throw new TypeError("expected f32 argument");
  }
  return value;
}

function asVec3(value: NativeValue): Vec3 {
  if (typeof value === "number") {
    throw new TypeError("expected vec3 argument");
  }
  return value;
}

function vec3(x: number, y: number, z: number): Vec3 {
  return { x: Math.fround(x), y: Math.fround(y), z: Math.fround(z) };
}

/**
 * Create the standard builtin registry.
 */
export function createBuiltins(): BuiltinRegistry {
  const builtins = new BuiltinRegistry();

  // Scalar arithmetic stays inline.
  builtins.registerOpcode("+", ["f32", "f32"], "f32", Op.AddF32);
  builtins.registerOpcode("-", ["f32", "f32"], "f32", Op.SubF32);
  builtins.registerOpcode("*", ["f32", "f32"], "f32", Op.MulF32);
  builtins.registerOpcode("/", ["f32", "f32"], "f32", Op.DivF32);

  builtins.registerNative("*", ["f32", "vec3"], "vec3", (args) => {
    const a = asF32(args[0]);
    const v = asVec3(args[1]);
    return vec3(v.x * a, v.y * a, v.z * a);
  });

  builtins.registerNative("*", ["vec3", "f32"], "vec3", (args) => {
    const v = asVec3(args[0]);
    const a = asF32(args[1]);
    return vec3(v.x * a, v.y * a, v.z * a);
  });

  builtins.registerNative("+", ["vec3", "vec3"], "vec3", (args) => {
    const a = asVec3(args[0]);
    const b = asVec3(args[1]);
    return vec3(a.x + b.x, a.y + b.y, a.z + b.z);
  });

  // Vec3(x, y, z) - construct a vector
  builtins.registerNative("Vec3", ["f32", "f32", "f32"], "vec3", (args) =>
    vec3(asF32(args[0]), asF32(args[1]), asF32(args[2]))
  );

  // normalize(v) - scale to unit length
  builtins.registerNative("normalize", ["vec3"], "vec3", (args) => {
    const a = asVec3(args[0]);
    const len = Math.sqrt(a.x * a.x + a.y * a.y + a.z * a.z);
    return vec3(a.x / len, a.y / len, a.z / len);
  });

  // dot(a, b) - scalar product
  builtins.registerNative("dot", ["vec3", "vec3"], "f32", (args) => {
    const a = asVec3(args[0]);
    const b = asVec3(args[1]);
    return Math.fround(a.x * b.x + a.y * b.y + a.z * b.z);
  });

  return builtins;
}
