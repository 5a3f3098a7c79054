export class SimulationException extends Error {
  cycle: number | null;
  instructionIndex: number | null;

  constructor(message: string, cycle: number | null = null, instructionIndex: number | null = null) {
    super(message);
    this.cycle = cycle;
    this.instructionIndex = instructionIndex;
    this.name = "SimulationException";
  }

  withContext(cycle: number, instructionIndex: number | null): this {
    if (this.cycle === null) {
      this.cycle = cycle;
    }
    if (this.instructionIndex === null) {
      this.instructionIndex = instructionIndex;
    }
    return this;
  }
}

export class OperandError extends SimulationException {
  constructor(message: string, instructionIndex: number | null = null, cycle: number | null = null) {
    super(message, cycle, instructionIndex);
    this.name = "OperandError";
  }
}

export class MemoryBoundsError extends SimulationException {
  readonly address: number;
  readonly size: number;

  constructor(address: number, size: number, message?: string) {
    super(message ?? `Address ${address} outside memory of ${size} words`);
    this.address = address;
    this.size = size;
    this.name = "MemoryBoundsError";
  }
}

export class CycleLimitExceeded extends SimulationException {
  readonly limit: number;

  constructor(limit: number) {
    super(`Simulation did not quiesce within ${limit} cycles`, limit);
    this.limit = limit;
    this.name = "CycleLimitExceeded";
  }
}

export class ConfigError extends Error {
  readonly field: string;

  constructor(field: string, message: string) {
    super(`Invalid configuration for ${field}: ${message}`);
    this.field = field;
    this.name = "ConfigError";
  }
}

export class ProgramParseError extends Error {
  readonly line: number;

  constructor(line: number, message: string) {
    super(`Line ${line}: ${message}`);
    this.line = line;
    this.name = "ProgramParseError";
  }
}

export function normalizeSimulationException(error: unknown, cycle: number, instructionIndex: number | null): Error {
  if (error instanceof SimulationException) {
    return error.withContext(cycle, instructionIndex);
  }

  if (error instanceof Error) {
    return error;
  }

  return new SimulationException("Unknown simulation failure", cycle, instructionIndex);
}

export function describeFailure(error: unknown): string {
  if (!(error instanceof Error)) return String(error);
  if (!(error instanceof SimulationException)) return error.message;

  const context: string[] = [];
  if (error.cycle !== null) context.push(`cycle ${error.cycle}`);
  if (error.instructionIndex !== null) context.push(`instruction ${error.instructionIndex}`);
  return context.length > 0 ? `${error.message} (${context.join(", ")})` : error.message;
}
