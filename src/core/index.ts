import { parseProgram } from "./loader/ProgramParser";
import type { InstructionStream } from "./isa/Instruction";
import { SchedulingEngine, type SchedulingEngineOptions, type SimulationResult } from "./scheduler/SchedulingEngine";

export * from "./isa/Word";
export * from "./isa/Opcodes";
export * from "./isa/Instruction";
export * from "./loader/ProgramLexer";
export * from "./loader/ProgramParser";
export * from "./loader/RunConfigFile";
export * from "./config/SimulatorConfig";
export * from "./exceptions/SimulationExceptions";
export * from "./memory/DataMemory";
export * from "./state/RegisterFile";
export * from "./scheduler/SchedulerTypes";
export * from "./scheduler/CircularBuffer";
export * from "./scheduler/ReorderBuffer";
export * from "./scheduler/OperandResolver";
export * from "./scheduler/ReservationStationPool";
export * from "./scheduler/CommonDataBus";
export * from "./scheduler/SchedulerStatistics";
export * from "./scheduler/SchedulingEngine";
export * from "./report/TimingReport";
export * from "./tools/schedulerEvents";

export function createEngine(program: string | InstructionStream, options: SchedulingEngineOptions = {}): SchedulingEngine {
  const instructions = typeof program === "string" ? parseProgram(program) : program;
  return new SchedulingEngine(instructions, options);
}

/** Parses (when given text) and runs a program to quiescence. */
export function simulate(program: string | InstructionStream, options: SchedulingEngineOptions = {}): SimulationResult {
  return createEngine(program, options).run();
}
