/**
 * Shader VM opcode definitions.
 *
 * Each instruction is one 32-bit word: the opcode tag in the low 16 bits and
 * an immediate in the high 16 bits. Some opcodes are followed by raw operand
 * words that carry no tag (see `trailingWords`).
 */

/**
 * Opcode tags. The numeric values are part of the binary format.
 */
export enum Op {
  // =========================================================================
  // Integer arithmetic (reserved)
  // =========================================================================
  AddI32 = 0,
  SubI32 = 1,
  MulI32 = 2,
  DivI32 = 3,

  // =========================================================================
  // Float arithmetic
  // =========================================================================
  AddF32 = 4,
  SubF32 = 5,
  MulF32 = 6,
  DivF32 = 7,

  // =========================================================================
  // Constants
  // =========================================================================
  ConstF32 = 8, // Push float; the next word holds its bit pattern
  Void = 9, // Push the empty value

  // =========================================================================
  // Memory
  // =========================================================================
  StoreLocal = 10, // Pop into frame offset imm
  LoadLocal = 11, // Push frame offset imm
  StoreGlobal = 12, // Pop into static offset imm
  LoadGlobal = 13, // Push static offset imm

  // =========================================================================
  // Control
  // =========================================================================
  Ret = 14, // Return; imm = frame size to reclaim
  Call = 15, // Call function at instruction index imm
  Jmp = 16, // Reserved
  JmpIf = 17, // Reserved
  CallNative = 18, // Call native handle imm
}

/**
 * Largest value an immediate can hold.
 */
export const MAX_IMMEDIATE = 0xffff;

/**
 * Check whether a 16-bit tag names a known opcode.
 */
export function isOp(tag: number): tag is Op {
  return Number.isInteger(tag) && tag >= Op.AddI32 && tag <= Op.CallNative;
}

/**
 * Number of raw operand words that follow an opcode word.
 */
export function trailingWords(op: Op): number {
  switch (op) {
    case Op.ConstF32:
      return 1;
    default:
      return 0;
  }
}

/**
 * Whether an opcode's immediate carries meaning.
 */
export function usesImmediate(op: Op): boolean {
  switch (op) {
    case Op.StoreLocal:
    case Op.LoadLocal:
    case Op.StoreGlobal:
    case Op.LoadGlobal:
    case Op.Ret:
    case Op.Call:
    case Op.Jmp:
    case Op.JmpIf:
    case Op.CallNative:
      return true;
    default:
      return false;
  }
}

/**
 * Get opcode name for debugging.
 */
export function opName(op: Op): string {
  return Op[op] ?? `Unknown(${op})`;
}
