/**
 * Storage allocation for in/out parameters and function locals.
 *
 * Every name takes one 4-byte slot, whatever its type.
 */

import type * as ast from "../ast/nodes.js";

/**
 * Bytes per storage slot.
 */
export const SLOT_SIZE = 4;

/**
 * Where a symbol lives.
 */
export type Storage = "static" | "local";

/**
 * Resolved storage of a name.
 */
export interface SymbolMeta {
  /** Byte offset into the static section or the function frame. */
  readonly offset: number;
  readonly storage: Storage;
  readonly type: ast.TypeKind;
}

/**
 * Parameter of a compiled function.
 */
export interface FuncParamInfo {
  readonly name: string;
  readonly type: ast.TypeKind;
}

function newSymbol(offset: number, storage: Storage, type: ast.TypeKind): SymbolMeta {
  return Object.freeze({ offset, storage, type });
}

/**
 * Static section layout: in-parameters first, then out-parameters, in
 * declaration order.
 */
export class GlobalTable {
  private symbols: Map<string, SymbolMeta> = new Map();
  private size: number = 0;

  /**
   * Lay out the in/out parameters of a program.
   */
  static fromProgram(program: ast.Program): GlobalTable {
    const table = new GlobalTable();
    for (const param of program.inParameters) {
      table.insert(param.name.name, param.type);
    }
    for (const param of program.outParameters) {
      table.insert(param.name.name, param.type);
    }
    return table;
  }

  private insert(name: string, type: ast.TypeKind): void {
    this.symbols.set(name, newSymbol(this.size, "static", type));
    this.size += SLOT_SIZE;
  }

  lookup(name: string): SymbolMeta | undefined {
    return this.symbols.get(name);
  }

  /**
   * Total bytes of the static section.
   */
  staticSectionSize(): number {
    return this.size;
  }

  entries(): Map<string, SymbolMeta> {
    return new Map(this.symbols);
  }
}

/**
 * Per-function metadata: entry address and local frame layout.
 */
export class FuncMeta {
  /** Session-unique identifier (e.g. "fn.0"). */
  readonly id: string;

  readonly name: string;

  /** Instruction index of the function's first word. */
  readonly address: number;

  readonly params: readonly FuncParamInfo[];

  readonly returnType: ast.TypeKind;

  private symbols: Map<string, SymbolMeta> = new Map();
  private sealed: boolean = false;

  constructor(
    id: string,
    name: string,
    address: number,
    params: FuncParamInfo[],
    returnType: ast.TypeKind
  ) {
    this.id = id;
    this.name = name;
    this.address = address;
    this.params = Object.freeze([...params]);
    this.returnType = returnType;

    // Parameters are bound to the first frame slots.
    for (const param of params) {
      this.allocateLocal(param.name, param.type);
    }
  }

  /**
   * Assign the next frame slot to a name.
   */
  allocateLocal(name: string, type: ast.TypeKind): SymbolMeta {
    if (this.sealed) {
      throw new Error(`frame of ${this.name} is sealed`);
    }
    const symbol = newSymbol(this.frameSize(), "local", type);
    this.symbols.set(name, symbol);
    return symbol;
  }

  lookupLocal(name: string): SymbolMeta | undefined {
    return this.symbols.get(name);
  }

  /**
   * Bytes of frame storage allocated so far.
   */
  frameSize(): number {
    return this.symbols.size * SLOT_SIZE;
  }

  /**
   * Locals by name, parameters included.
   */
  get locals(): ReadonlyMap<string, SymbolMeta> {
    return new Map(this.symbols);
  }

  /**
   * Fix the frame layout once the function's code is complete.
   */
  seal(): void {
    this.sealed = true;
    Object.freeze(this);
  }

  isSealed(): boolean {
    return this.sealed;
  }
}

/**
 * Resolve a symbol reference: function locals first, then globals.
 */
export function resolveSymbol(
  name: string,
  func: FuncMeta,
  globals: GlobalTable
): SymbolMeta | undefined {
  return func.lookupLocal(name) ?? globals.lookup(name);
}
