#!/usr/bin/env node
/**
 * shadec - command-line interface for the shader compiler.
 */

import * as fs from "fs";
import { compileFile, formatError, type CompiledFile } from "./runner.js";
import { disassemble } from "./bytecode/disasm.js";

const VERSION = "0.1.0";

function printUsage(): void {
  console.log(`
shadec v${VERSION} - Shader bytecode compiler

Usage:
  shadec [options] <file>

Options:
  -h, --help       Show this help message
  -v, --version    Show version
  -o, --output     Write bytecode to a file
  -d, --disasm     Print the instruction listing
  --no-fold        Skip constant folding

Examples:
  shadec lighting.shade                 Check a file and print its layout
  shadec -o lighting.bin lighting.shade Compile to bytecode
  shadec -d lighting.shade              Show the generated instructions
`);
}

function printVersion(): void {
  console.log(`shadec ${VERSION}`);
}

function printSummary({ filename, program }: CompiledFile): void {
  console.log(`${filename}: ${program.instructions.length} words`);
  console.log(`  static section: ${program.staticSectionSize} bytes`);
  console.log(`  min stack:      ${program.minStackSize} bytes`);
  for (const [name, symbol] of program.globals) {
    console.log(`  global ${name}: ${symbol.type} @ ${symbol.offset}`);
  }
  for (const [name, func] of program.functions) {
    console.log(`  fn ${name} @ ${func.address} (frame ${func.frameSize()} bytes)`);
  }
}

function main(args: string[]): number {
  let output: string | null = null;
  let showDisasm = false;
  let runFold = true;
  let file: string | null = null;

  let i = 0;
  while (i < args.length) {
    const arg = args[i];

    if (arg === "-h" || arg === "--help") {
      printUsage();
      return 0;
    } else if (arg === "-v" || arg === "--version") {
      printVersion();
      return 0;
    } else if (arg === "-o" || arg === "--output") {
      i++;
      if (i >= args.length) {
        console.error("Error: -o requires an argument");
        return 1;
      }
      output = args[i];
    } else if (arg === "-d" || arg === "--disasm") {
      showDisasm = true;
    } else if (arg === "--no-fold") {
      runFold = false;
    } else if (arg.startsWith("-")) {
      console.error(`Error: Unknown option: ${arg}`);
      printUsage();
      return 1;
    } else if (file === null) {
      file = arg;
    } else {
      console.error(`Error: Unexpected argument: ${arg}`);
      return 1;
    }
    i++;
  }

  if (file === null) {
    printUsage();
    return 1;
  }

  let compiled: CompiledFile;
  try {
    compiled = compileFile(file, { fold: runFold });
  } catch (err) {
    const source = fs.existsSync(file) ? fs.readFileSync(file, "utf-8") : undefined;
    console.error(formatError(err, source));
    return 1;
  }

  const { program } = compiled;
  if (showDisasm) {
    const labels = new Map([...program.functions].map(([name, func]): [string, number] => [name, func.address]));
    const natives = program.natives.map((n) => `${n.name}(${n.params.join(", ")})`);
    for (const line of disassemble(program.instructions, { labels, natives })) {
      console.log(line);
    }
  }

  if (output !== null) {
    fs.writeFileSync(output, program.toBytes());
  } else if (!showDisasm) {
    printSummary(compiled);
  }
  return 0;
}

process.exitCode = main(process.argv.slice(2));
