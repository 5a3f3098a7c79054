import { MemoryBoundsError } from "../exceptions/SimulationExceptions";
import type { Instruction } from "../isa/Instruction";
import { Opcode, type UnitKind } from "../isa/Opcodes";
import { addWords, mulWords, nandWords } from "../isa/Word";
import type { DataMemory } from "../memory/DataMemory";
import type { ResolvedOperands } from "./OperandResolver";
import {
  isResolved,
  type AddressOperand,
  type BusySlot,
  type CompletedResult,
  type ExecutionEvent,
  type ExecutionOutcome,
  type Operand,
  type ProducerTag,
  type SlotHandle,
  type StationSlot,
} from "./SchedulerTypes";

export interface ExecutionContext {
  memory: DataMemory;
  /** Whether the load owned by `owner` may read `address` this cycle. */
  mayLoad(owner: ProducerTag, address: number): boolean;
}

/**
 * The reservation stations in front of one functional unit. Every busy slot
 * whose operands are ready counts down independently, so a pool with several
 * slots behaves like a fully pipelined unit.
 */
export class ReservationStationPool {
  private readonly stations: StationSlot[];

  constructor(
    readonly unit: UnitKind,
    readonly size: number,
    readonly latency: number,
  ) {
    this.stations = Array.from({ length: size }, (): StationSlot => ({ state: "idle" }));
  }

  hasFreeSlot(): boolean {
    return this.stations.some((slot) => slot.state === "idle");
  }

  busyCount(): number {
    return this.stations.filter((slot) => slot.state === "busy").length;
  }

  allocate(instruction: Instruction, operands: ResolvedOperands, owner: ProducerTag): SlotHandle | null {
    const index = this.stations.findIndex((slot) => slot.state === "idle");
    if (index < 0) return null;

    this.stations[index] = {
      state: "busy",
      instruction,
      opcode: instruction.opcode,
      j: operands.j,
      k: operands.k,
      address: operands.address,
      target: operands.target,
      cyclesRemaining: this.latency,
      owner,
      started: false,
      outcome: null,
    };
    return { unit: this.unit, slot: index };
  }

  /** Advances every ready slot by one cycle. */
  tick(context: ExecutionContext): ExecutionEvent[] {
    const events: ExecutionEvent[] = [];

    for (const slot of this.stations) {
      if (slot.state !== "busy" || slot.outcome !== null) continue;
      if (!isResolved(slot.j) || !isResolved(slot.k) || !isResolved(slot.address)) continue;

      if (slot.opcode === Opcode.LOAD && !slot.started && slot.address?.kind === "resolved") {
        if (!context.mayLoad(slot.owner, slot.address.address)) {
          events.push({ kind: "blocked", owner: slot.owner });
          continue;
        }
      }

      if (!slot.started) {
        slot.started = true;
        events.push({ kind: "started", owner: slot.owner });
      }

      slot.cyclesRemaining -= 1;
      if (slot.cyclesRemaining === 0) {
        slot.outcome = execute(slot, context.memory);
        events.push({ kind: "finished", owner: slot.owner });
      }
    }

    return events;
  }

  /** Frees every finished slot and hands back its result. */
  drainCompleted(): CompletedResult[] {
    const completed: CompletedResult[] = [];
    this.stations.forEach((slot, index) => {
      if (slot.state === "busy" && slot.outcome !== null) {
        completed.push({ owner: slot.owner, unit: this.unit, outcome: slot.outcome });
        this.stations[index] = { state: "idle" };
      }
    });
    return completed;
  }

  /** Wakes every operand and pending address waiting on `tag`. */
  deliver(tag: ProducerTag, value: number): void {
    for (const slot of this.stations) {
      if (slot.state !== "busy") continue;
      slot.j = capture(slot.j, tag, value);
      slot.k = capture(slot.k, tag, value);
      if (slot.address?.kind === "pending" && slot.address.tag === tag) {
        slot.address = { kind: "resolved", address: value + slot.address.offset };
      }
    }
  }

  release(owner: ProducerTag): boolean {
    const index = this.stations.findIndex((slot) => slot.state === "busy" && slot.owner === owner);
    if (index < 0) return false;
    this.stations[index] = { state: "idle" };
    return true;
  }

  addressOf(owner: ProducerTag): AddressOperand | null {
    const slot = this.find(owner);
    return slot ? slot.address : null;
  }

  slots(): StationSlot[] {
    return this.stations.map((slot) => (slot.state === "busy" ? { ...slot } : slot));
  }

  private find(owner: ProducerTag): BusySlot | null {
    for (const slot of this.stations) {
      if (slot.state === "busy" && slot.owner === owner) return slot;
    }
    return null;
  }
}

function capture(operand: Operand | null, tag: ProducerTag, value: number): Operand | null {
  if (operand?.kind === "tag" && operand.tag === tag) {
    return { kind: "value", value };
  }
  return operand;
}

function operandValue(operand: Operand | null): number {
  return operand?.kind === "value" ? operand.value : 0;
}

function execute(slot: BusySlot, memory: DataMemory): ExecutionOutcome {
  const j = operandValue(slot.j);
  const k = operandValue(slot.k);
  const address = slot.address?.kind === "resolved" ? slot.address.address : 0;
  const index = slot.instruction.index;

  switch (slot.opcode) {
    case Opcode.ADD:
    case Opcode.ADDI:
      return { kind: "register", value: addWords(j, k) };
    case Opcode.NAND:
      return { kind: "register", value: nandWords(j, k) };
    case Opcode.MUL:
      return { kind: "register", value: mulWords(j, k) };
    case Opcode.LOAD:
      try {
        return { kind: "register", value: memory.load(address) };
      } catch (error) {
        if (error instanceof MemoryBoundsError) return { kind: "fault", error };
        throw error;
      }
    case Opcode.STORE:
      return { kind: "store", address, value: j };
    case Opcode.BEQ: {
      const taken = j === k;
      return { kind: "branch", taken, nextIndex: taken ? (slot.target ?? index + 1) : index + 1 };
    }
    case Opcode.CALL:
      return { kind: "call", returnAddress: index + 1, nextIndex: slot.target ?? index + 1 };
    case Opcode.RET:
      return { kind: "return", nextIndex: j };
  }
}
