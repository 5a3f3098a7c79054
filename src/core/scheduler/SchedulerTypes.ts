import type { Instruction } from "../isa/Instruction";
import type { Opcode, UnitKind } from "../isa/Opcodes";
import type { MemoryBoundsError } from "../exceptions/SimulationExceptions";

/**
 * Identifies an in-flight instruction. Tags are ROB allocation sequence numbers:
 * unique among live entries, increasing with program order, and mapped to a
 * physical ROB slot by `tag % capacity`.
 */
export type ProducerTag = number;

export type Operand = { kind: "value"; value: number } | { kind: "tag"; tag: ProducerTag };

export type AddressOperand =
  | { kind: "resolved"; address: number }
  | { kind: "pending"; tag: ProducerTag; offset: number };

export const valueOf = (value: number): Operand => ({ kind: "value", value });
export const tagOf = (tag: ProducerTag): Operand => ({ kind: "tag", tag });

export function isResolved(operand: Operand | AddressOperand | null): boolean {
  return operand === null || operand.kind === "value" || operand.kind === "resolved";
}

export type ExecutionOutcome =
  | { kind: "register"; value: number }
  | { kind: "store"; address: number; value: number }
  | { kind: "branch"; taken: boolean; nextIndex: number }
  | { kind: "call"; returnAddress: number; nextIndex: number }
  | { kind: "return"; nextIndex: number }
  | { kind: "fault"; error: MemoryBoundsError };

/** Value a completed producer hands to its consumers, if it produces one. */
export function producedValue(outcome: ExecutionOutcome): number | null {
  switch (outcome.kind) {
    case "register":
      return outcome.value;
    case "call":
      return outcome.returnAddress;
    default:
      return null;
  }
}

/** Next instruction index a control outcome resolved to. */
export function resolvedNext(outcome: ExecutionOutcome): number | null {
  switch (outcome.kind) {
    case "branch":
    case "call":
    case "return":
      return outcome.nextIndex;
    default:
      return null;
  }
}

export interface BusySlot {
  state: "busy";
  instruction: Instruction;
  opcode: Opcode;
  j: Operand | null;
  k: Operand | null;
  address: AddressOperand | null;
  target: number | null;
  cyclesRemaining: number;
  owner: ProducerTag;
  started: boolean;
  outcome: ExecutionOutcome | null;
}

export type StationSlot = { state: "idle" } | BusySlot;

export interface SlotHandle {
  unit: UnitKind;
  slot: number;
}

export interface CompletedResult {
  owner: ProducerTag;
  unit: UnitKind;
  outcome: ExecutionOutcome;
}

/** `blocked` marks a load held back by an older store. */
export type ExecutionEvent = { kind: "started" | "finished" | "blocked"; owner: ProducerTag };
