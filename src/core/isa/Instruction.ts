import { Opcode } from "./Opcodes";

export type SourceOperand =
  | { kind: "register"; register: number }
  | { kind: "immediate"; value: number }
  | { kind: "memory"; base: number; offset: number }
  | { kind: "target"; index: number };

/**
 * A decoded instruction. Records are produced once by the loader and never
 * mutated; the scheduler refers to them by `index`, their position in program
 * order.
 */
export interface Instruction {
  readonly index: number;
  readonly opcode: Opcode;
  readonly text: string;
  readonly destination: number | null;
  readonly sources: readonly SourceOperand[];
}

export type InstructionStream = readonly Instruction[];

export const register = (index: number): SourceOperand => ({ kind: "register", register: index });
export const immediate = (value: number): SourceOperand => ({ kind: "immediate", value });
export const memoryRef = (offset: number, base: number): SourceOperand => ({ kind: "memory", base, offset });
export const target = (index: number): SourceOperand => ({ kind: "target", index });

export function formatOperand(operand: SourceOperand): string {
  switch (operand.kind) {
    case "register":
      return `R${operand.register}`;
    case "immediate":
      return String(operand.value);
    case "memory":
      return `${operand.offset}(R${operand.base})`;
    case "target":
      return `@${operand.index}`;
  }
}

export function formatInstruction(opcode: Opcode, destination: number | null, sources: readonly SourceOperand[]): string {
  const operands: string[] = [];
  if (destination !== null && opcode !== Opcode.CALL) {
    operands.push(`R${destination}`);
  }
  // RET reads R1 implicitly.
  if (opcode !== Opcode.RET) {
    operands.push(...sources.map(formatOperand));
  }
  return operands.length > 0 ? `${opcode} ${operands.join(", ")}` : opcode;
}

/**
 * Builds an instruction record without going through the text loader. Handy for
 * callers that already hold decoded programs.
 */
export function createInstruction(
  index: number,
  opcode: Opcode,
  destination: number | null,
  sources: readonly SourceOperand[],
  text?: string,
): Instruction {
  return {
    index,
    opcode,
    destination,
    sources: [...sources],
    text: text ?? formatInstruction(opcode, destination, sources),
  };
}
