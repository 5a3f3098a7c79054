import { ConfigError } from "../exceptions/SimulationExceptions";
import { UNIT_KINDS, type UnitKind } from "../isa/Opcodes";
import { DEFAULT_MEMORY_SIZE } from "../memory/DataMemory";
import { DEFAULT_REGISTER_COUNT } from "../state/RegisterFile";

export interface UnitShape {
  slots: number;
  latency: number;
}

export type BranchResolution = "execute" | "issue";
export type MemoryOrdering = "in-order" | "relaxed";

export interface SimulatorConfig {
  units: Record<UnitKind, UnitShape>;
  robCapacity: number;
  registerCount: number;
  memorySize: number;
  issueWidth: number;
  commitWidth: number;
  branchResolution: BranchResolution;
  memoryOrdering: MemoryOrdering;
  cycleLimit: number;
}

export type SimulatorConfigOverrides = Partial<Omit<SimulatorConfig, "units">> & {
  units?: Partial<Record<UnitKind, Partial<UnitShape>>>;
};

export const DEFAULT_CONFIG: SimulatorConfig = {
  units: {
    add: { slots: 4, latency: 2 },
    load: { slots: 2, latency: 6 },
    store: { slots: 1, latency: 6 },
    nand: { slots: 2, latency: 2 },
    mul: { slots: 1, latency: 8 },
    branch: { slots: 2, latency: 1 },
    call: { slots: 2, latency: 4 },
  },
  robCapacity: 32,
  registerCount: DEFAULT_REGISTER_COUNT,
  memorySize: DEFAULT_MEMORY_SIZE,
  issueWidth: 1,
  commitWidth: 1,
  branchResolution: "execute",
  memoryOrdering: "in-order",
  cycleLimit: 100_000,
};

export function resolveConfig(overrides: SimulatorConfigOverrides = {}): SimulatorConfig {
  const merge = (kind: UnitKind): UnitShape => ({ ...DEFAULT_CONFIG.units[kind], ...overrides.units?.[kind] });
  const units: Record<UnitKind, UnitShape> = {
    add: merge("add"),
    load: merge("load"),
    store: merge("store"),
    nand: merge("nand"),
    mul: merge("mul"),
    branch: merge("branch"),
    call: merge("call"),
  };

  const config: SimulatorConfig = { ...DEFAULT_CONFIG, ...overrides, units };
  validateConfig(config);
  return config;
}

export function validateConfig(config: SimulatorConfig): void {
  for (const kind of UNIT_KINDS) {
    requirePositiveInteger(`units.${kind}.slots`, config.units[kind].slots);
    requirePositiveInteger(`units.${kind}.latency`, config.units[kind].latency);
  }
  requirePositiveInteger("robCapacity", config.robCapacity);
  requirePositiveInteger("memorySize", config.memorySize);
  requirePositiveInteger("issueWidth", config.issueWidth);
  requirePositiveInteger("commitWidth", config.commitWidth);
  requirePositiveInteger("cycleLimit", config.cycleLimit);
  requirePositiveInteger("registerCount", config.registerCount);
  if (config.registerCount < 2) {
    throw new ConfigError("registerCount", "CALL and RET need at least R0 and R1");
  }
  if (config.branchResolution !== "execute" && config.branchResolution !== "issue") {
    throw new ConfigError("branchResolution", `unknown mode "${String(config.branchResolution)}"`);
  }
  if (config.memoryOrdering !== "in-order" && config.memoryOrdering !== "relaxed") {
    throw new ConfigError("memoryOrdering", `unknown mode "${String(config.memoryOrdering)}"`);
  }
}

function requirePositiveInteger(field: string, value: unknown): void {
  if (typeof value !== "number" || !Number.isInteger(value) || value <= 0) {
    throw new ConfigError(field, `expected a positive integer, got ${String(value)}`);
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function expectNumber(field: string, value: unknown): number {
  if (typeof value !== "number") {
    throw new ConfigError(field, `expected a number, got ${JSON.stringify(value)}`);
  }
  return value;
}

function parseUnits(value: unknown): Partial<Record<UnitKind, Partial<UnitShape>>> {
  if (!isRecord(value)) throw new ConfigError("units", "expected an object keyed by unit kind");

  const units: Partial<Record<UnitKind, Partial<UnitShape>>> = {};
  for (const [key, raw] of Object.entries(value)) {
    const kind = UNIT_KINDS.find((candidate) => candidate === key);
    if (!kind) throw new ConfigError(`units.${key}`, "unknown unit kind");
    if (!isRecord(raw)) throw new ConfigError(`units.${key}`, "expected { slots, latency }");

    const shape: Partial<UnitShape> = {};
    for (const [field, setting] of Object.entries(raw)) {
      if (field !== "slots" && field !== "latency") {
        throw new ConfigError(`units.${key}.${field}`, "unknown setting");
      }
      shape[field] = expectNumber(`units.${key}.${field}`, setting);
    }
    units[kind] = shape;
  }
  return units;
}

/** Checks the shape of untyped settings, such as a parsed JSON file. */
export function parseConfigOverrides(value: unknown): SimulatorConfigOverrides {
  if (!isRecord(value)) throw new ConfigError("config", "expected an object");

  const overrides: SimulatorConfigOverrides = {};
  for (const [key, raw] of Object.entries(value)) {
    switch (key) {
      case "robCapacity":
      case "registerCount":
      case "memorySize":
      case "issueWidth":
      case "commitWidth":
      case "cycleLimit":
        overrides[key] = expectNumber(key, raw);
        break;
      case "branchResolution":
        if (raw !== "execute" && raw !== "issue") {
          throw new ConfigError(key, `unknown mode ${JSON.stringify(raw)}`);
        }
        overrides.branchResolution = raw;
        break;
      case "memoryOrdering":
        if (raw !== "in-order" && raw !== "relaxed") {
          throw new ConfigError(key, `unknown mode ${JSON.stringify(raw)}`);
        }
        overrides.memoryOrdering = raw;
        break;
      case "units":
        overrides.units = parseUnits(raw);
        break;
      default:
        throw new ConfigError(key, "unknown setting");
    }
  }
  return overrides;
}
