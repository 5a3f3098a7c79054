import { readFileSync } from "node:fs";

import { parseConfigOverrides } from "../config/SimulatorConfig";
import { ConfigError } from "../exceptions/SimulationExceptions";
import type { SchedulingEngineOptions } from "../scheduler/SchedulingEngine";

export type RunOptions = Omit<SchedulingEngineOptions, "log">;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function numberMap(value: unknown, field: string): Record<number, number> {
  if (value === undefined) return {};
  if (!isRecord(value)) throw new ConfigError(field, "expected an object of index to value");

  const entries: Record<number, number> = {};
  for (const [key, raw] of Object.entries(value)) {
    if (typeof raw !== "number") throw new ConfigError(`${field}.${key}`, "expected a number");
    entries[Number(key)] = raw;
  }
  return entries;
}

/**
 * Run files hold the simulator settings plus optional `registers` and
 * `memory` maps for the initial machine state.
 */
export function parseRunOptions(value: unknown): RunOptions {
  if (!isRecord(value)) throw new ConfigError("config", "expected an object");

  const { registers, memory, ...settings } = value;
  return {
    config: parseConfigOverrides(settings),
    initialRegisters: numberMap(registers, "registers"),
    initialMemory: numberMap(memory, "memory"),
  };
}

export function loadRunOptions(configPath: string): RunOptions {
  const parsed: unknown = JSON.parse(readFileSync(configPath, "utf8"));
  return parseRunOptions(parsed);
}
