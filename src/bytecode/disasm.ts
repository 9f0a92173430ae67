/**
 * Human-readable listing of an instruction stream.
 */

import { Op, opName, usesImmediate } from "./opcode.js";
import { decodeInstructions } from "./word.js";

export interface DisassembleOptions {
  /** Function name -> entry address, printed as labels. */
  labels?: ReadonlyMap<string, number>;
  /** Native handle -> name, printed after `CallNative`. */
  natives?: readonly string[];
}

/**
 * Disassemble words into one line per instruction, e.g. `0002  LoadGlobal 4`.
 */
export function disassemble(words: readonly number[], options: DisassembleOptions = {}): string[] {
  const labelsAt = new Map<number, string[]>();
  for (const [name, address] of options.labels ?? []) {
    const names = labelsAt.get(address) ?? [];
    names.push(name);
    labelsAt.set(address, names);
  }

  const lines: string[] = [];
  for (const instr of decodeInstructions(words)) {
    for (const name of labelsAt.get(instr.offset) ?? []) {
      lines.push(`${name}:`);
    }

    let text = `${String(instr.offset).padStart(4, "0")}  ${opName(instr.op)}`;
    if (instr.op === Op.ConstF32) {
      text += ` ${formatFloat(instr.value)}`;
    } else if (usesImmediate(instr.op)) {
      text += ` ${instr.imm}`;
      if (instr.op === Op.CallNative) {
        const native = options.natives?.[instr.imm];
        if (native !== undefined) {
          text += ` (${native})`;
        }
      }
    }
    lines.push(text);
  }
  return lines;
}

function formatFloat(value: number): string {
  return Number.isInteger(value) ? value.toFixed(1) : String(value);
}
