/**
 * Instruction word encoding and decoding.
 */

import { Op, MAX_IMMEDIATE, isOp, opName, trailingWords } from "./opcode.js";

/**
 * Bytecode encoding or decoding violation.
 */
export class BytecodeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "BytecodeError";
  }
}

const MAX_WORD = 0xffffffff;

// Scratch buffer for float <-> bit pattern conversion.
const scratch = new DataView(new ArrayBuffer(4));

/**
 * Pack an opcode and a 16-bit immediate into one instruction word.
 */
export function encodeWord(op: Op, imm: number = 0): number {
  if (!isOp(op)) {
    throw new BytecodeError(`invalid opcode tag: ${op}`);
  }
  if (!Number.isInteger(imm) || imm < 0 || imm > MAX_IMMEDIATE) {
    throw new BytecodeError(`immediate out of range for ${opName(op)}: ${imm}`);
  }
  return (op | (imm << 16)) >>> 0;
}

/**
 * Split an instruction word into its opcode and immediate.
 */
export function decodeWord(word: number): { op: Op; imm: number } {
  if (!Number.isInteger(word) || word < 0 || word > MAX_WORD) {
    throw new BytecodeError(`not a 32-bit word: ${word}`);
  }
  const tag = word & 0xffff;
  if (!isOp(tag)) {
    throw new BytecodeError(`unknown opcode tag: ${tag}`);
  }
  return { op: tag, imm: word >>> 16 };
}

/**
 * IEEE-754 single-precision bit pattern of a number.
 */
export function floatToBits(value: number): number {
  scratch.setFloat32(0, value);
  return scratch.getUint32(0);
}

/**
 * Number held by an IEEE-754 single-precision bit pattern.
 */
export function bitsToFloat(bits: number): number {
  scratch.setUint32(0, bits >>> 0);
  return scratch.getFloat32(0);
}

/**
 * A decoded instruction. `offset` is the index of its opcode word.
 */
export type Instruction =
  | { op: Op.ConstF32; offset: number; imm: number; bits: number; value: number }
  | { op: Exclude<Op, Op.ConstF32>; offset: number; imm: number };

/**
 * Decode a whole instruction stream, consuming trailing operand words.
 */
export function decodeInstructions(words: readonly number[]): Instruction[] {
  const result: Instruction[] = [];
  let i = 0;
  while (i < words.length) {
    const { op, imm } = decodeWord(words[i]);
    const extra = trailingWords(op);
    if (i + extra >= words.length) {
      throw new BytecodeError(`truncated ${opName(op)} at offset ${i}`);
    }
    if (op === Op.ConstF32) {
      const bits = words[i + 1] >>> 0;
      result.push({ op, offset: i, imm, bits, value: bitsToFloat(bits) });
    } else {
      result.push({ op, offset: i, imm });
    }
    i += 1 + extra;
  }
  return result;
}
