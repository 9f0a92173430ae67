/**
 * Compiled program container and the builder used during code generation.
 */

import { Op, opName, trailingWords } from "./opcode.js";
import { BytecodeError, decodeWord, encodeWord, floatToBits } from "./word.js";
import type { FuncMeta, SymbolMeta } from "../compiler/symbol-table.js";
import type { NativeInfo } from "../builtins/builtins.js";

/**
 * Extra stack space the VM needs beyond the static section.
 */
export const STACK_MARGIN = 1024;

/**
 * Immutable compiled program handed to the virtual machine.
 */
export class CompiledProgram {
  /** Instruction words (opcode words and raw operand words). */
  readonly instructions: readonly number[];

  /** In/out parameters by name. */
  readonly globals: ReadonlyMap<string, SymbolMeta>;

  /** Functions by name. */
  readonly functions: ReadonlyMap<string, FuncMeta>;

  /** Native functions referenced by `CallNative`, indexed by handle. */
  readonly natives: readonly NativeInfo[];

  /** Bytes taken by in/out parameters. */
  readonly staticSectionSize: number;

  /** Smallest stack the VM must allocate. */
  readonly minStackSize: number;

  constructor(
    instructions: number[],
    globals: Map<string, SymbolMeta>,
    functions: Map<string, FuncMeta>,
    natives: NativeInfo[],
    staticSectionSize: number
  ) {
    this.instructions = Object.freeze([...instructions]);
    this.globals = new Map(globals);
    this.functions = new Map(functions);
    this.natives = Object.freeze([...natives]);
    this.staticSectionSize = staticSectionSize;
    this.minStackSize = staticSectionSize + STACK_MARGIN;
    Object.freeze(this);
  }

  /**
   * Entry address of a function, if it exists.
   */
  functionAddress(name: string): number | undefined {
    return this.functions.get(name)?.address;
  }

  /**
   * Serialize the instruction stream in host byte order.
   */
  toBytes(): Uint8Array {
    return new Uint8Array(Uint32Array.from(this.instructions).buffer);
  }
}

/**
 * Append-only instruction stream used during compilation.
 */
export class ProgramBuilder {
  private words: number[] = [];

  /**
   * Emit an instruction word. Returns its offset.
   */
  emit(op: Op, imm: number = 0): number {
    if (trailingWords(op) !== 0) {
      throw new BytecodeError(`${opName(op)} needs operand words`);
    }
    const offset = this.words.length;
    this.words.push(encodeWord(op, imm));
    return offset;
  }

  /**
   * Emit a float constant push followed by its bit pattern.
   */
  emitFloat(value: number): number {
    const offset = this.words.length;
    this.words.push(encodeWord(Op.ConstF32), floatToBits(value));
    return offset;
  }

  /**
   * Replace the immediate of the instruction at `offset`.
   */
  patchImmediate(offset: number, imm: number): void {
    const { op } = decodeWord(this.words[offset]);
    this.words[offset] = encodeWord(op, imm);
  }

  /**
   * Drop everything emitted after `length` words.
   */
  truncate(length: number): void {
    this.words.length = Math.min(length, this.words.length);
  }

  /**
   * Get current instruction offset.
   */
  offset(): number {
    return this.words.length;
  }

  /**
   * Copy of the words emitted so far.
   */
  snapshot(): number[] {
    return [...this.words];
  }
}
