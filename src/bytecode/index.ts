/**
 * Bytecode module exports.
 */

export { Op, MAX_IMMEDIATE, isOp, trailingWords, usesImmediate, opName } from "./opcode.js";

export {
  BytecodeError,
  encodeWord,
  decodeWord,
  floatToBits,
  bitsToFloat,
  decodeInstructions,
  type Instruction,
} from "./word.js";

export { CompiledProgram, ProgramBuilder, STACK_MARGIN } from "./code.js";

export { disassemble, type DisassembleOptions } from "./disasm.js";
