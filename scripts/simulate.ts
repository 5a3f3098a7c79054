#!/usr/bin/env node
import { readFileSync } from "node:fs";
import path from "node:path";

import {
  createEngine,
  describeFailure,
  formatSummary,
  formatTimingTable,
  loadRunOptions,
} from "../src/core";

interface CliArguments {
  programPath: string;
  configPath: string | null;
  trace: boolean;
}

const USAGE = "usage: simulate <program.asm> [--config file.json] [--trace]";

function parseArguments(argv: string[]): CliArguments {
  let programPath: string | null = null;
  let configPath: string | null = null;
  let trace = false;

  for (let i = 0; i < argv.length; i++) {
    const argument = argv[i];
    if (argument === "--trace") {
      trace = true;
    } else if (argument === "--config") {
      configPath = argv[++i] ?? null;
      if (configPath === null) throw new Error("--config needs a file");
    } else if (argument.startsWith("--")) {
      throw new Error(`Unknown option ${argument}`);
    } else if (programPath === null) {
      programPath = argument;
    } else {
      throw new Error(`Unexpected argument ${argument}`);
    }
  }

  if (programPath === null) throw new Error(USAGE);
  return { programPath, configPath, trace };
}

function main(): void {
  try {
    const args = parseArguments(process.argv.slice(2));
    const source = readFileSync(path.resolve(args.programPath), "utf8");
    const options = args.configPath ? loadRunOptions(path.resolve(args.configPath)) : {};

    const engine = createEngine(source, {
      ...options,
      log: args.trace ? (message) => console.log(message) : () => {},
    });
    const result = engine.run();

    console.log(formatTimingTable(result.records));
    console.log("");
    console.log(formatSummary(result));
    console.log(`Registers: ${result.registers.map((value, index) => `R${index}=${value}`).join(" ")}`);
  } catch (error) {
    console.error(`error: ${describeFailure(error)}`);
    process.exitCode = 1;
  }
}

main();
