import { describe, it, expect } from "vitest";
import { BuiltinRegistry, createBuiltins, signatureKey } from "./builtins.js";
import { Op } from "../bytecode/opcode.js";

describe("builtins", () => {
  it("should key overloads by name and operand types", () => {
    expect(signatureKey("*", ["vec3", "f32"])).toBe("*(vec3,f32)");
    expect(signatureKey("ambient", [])).toBe("ambient()");
  });

  it("should resolve scalar operators to opcodes", () => {
    const builtins = createBuiltins();
    expect(builtins.resolve("+", ["f32", "f32"])).toEqual({ kind: "opcode", op: Op.AddF32, returnType: "f32" });
    expect(builtins.resolve("/", ["f32", "f32"])).toEqual({ kind: "opcode", op: Op.DivF32, returnType: "f32" });
  });

  it("should assign native handles in registration order", () => {
    const builtins = createBuiltins();
    expect(builtins.resolve("*", ["f32", "vec3"])).toEqual({ kind: "native", handle: 0, returnType: "vec3" });
    expect(builtins.resolve("*", ["vec3", "f32"])).toEqual({ kind: "native", handle: 1, returnType: "vec3" });
    expect(builtins.resolve("+", ["vec3", "vec3"])).toEqual({ kind: "native", handle: 2, returnType: "vec3" });
    expect(builtins.resolve("Vec3", ["f32", "f32", "f32"])).toEqual({ kind: "native", handle: 3, returnType: "vec3" });
    expect(builtins.resolve("normalize", ["vec3"])).toEqual({ kind: "native", handle: 4, returnType: "vec3" });
    expect(builtins.resolve("dot", ["vec3", "vec3"])).toEqual({ kind: "native", handle: 5, returnType: "f32" });
    expect(builtins.nativeTable().map((n) => n.name)).toEqual(["*", "*", "+", "Vec3", "normalize", "dot"]);
  });

  it("should not resolve missing overloads", () => {
    const builtins = createBuiltins();
    expect(builtins.resolve("-", ["vec3", "vec3"])).toBeUndefined();
    expect(builtins.resolve("dot", ["vec3"])).toBeUndefined();
    expect(builtins.has("dot")).toBe(true);
    expect(builtins.has("cross")).toBe(false);
  });

  it("should evaluate natives in single precision", () => {
    const builtins = createBuiltins();
    const dot = builtins.native(5);
    expect(dot?.impl([{ x: 1, y: 2, z: 3 }, { x: 4, y: 5, z: 6 }])).toBe(32);

    const normalize = builtins.native(4);
    expect(normalize?.impl([{ x: 0, y: 3, z: 4 }])).toEqual({ x: 0, y: Math.fround(0.6), z: Math.fround(0.8) });

    const scale = builtins.native(1);
    expect(scale?.impl([{ x: 1, y: 2, z: 3 }, 0.5])).toEqual({ x: 0.5, y: 1, z: 1.5 });

    const make = builtins.native(3);
    expect(make?.impl([0.1, 1, 2])).toEqual({ x: Math.fround(0.1), y: 1, z: 2 });
  });

  it("should reject arguments of the wrong shape", () => {
    const add = createBuiltins().native(2);
    expect(() => add?.impl([1, { x: 0, y: 0, z: 0 }])).toThrow("expected vec3 argument");
  });

  it("should reject duplicate registrations", () => {
    const builtins = new BuiltinRegistry();
    builtins.registerOpcode("+", ["f32", "f32"], "f32", Op.AddF32);
    expect(() => builtins.registerOpcode("+", ["f32", "f32"], "f32", Op.AddF32)).toThrow(
      "builtin already registered: +(f32,f32)"
    );
  });

  it("should accept custom natives", () => {
    const builtins = new BuiltinRegistry();
    const handle = builtins.registerNative("luma", ["vec3"], "f32", () => 0.5);
    expect(handle).toBe(0);
    expect(builtins.native(0)?.name).toBe("luma");
    expect(builtins.native(1)).toBeUndefined();
  });
});
