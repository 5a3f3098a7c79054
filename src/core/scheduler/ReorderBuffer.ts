import type { Instruction } from "../isa/Instruction";
import { Opcode } from "../isa/Opcodes";
import type { DataMemory } from "../memory/DataMemory";
import type { RegisterFile } from "../state/RegisterFile";
import { CircularBuffer } from "./CircularBuffer";
import { producedValue, type ExecutionOutcome, type ProducerTag, type SlotHandle } from "./SchedulerTypes";

export type RobState = "issued" | "executing" | "written" | "committed";

export interface RobEntry {
  readonly tag: ProducerTag;
  readonly instruction: Instruction;
  readonly destination: number | null;
  /** Next fetch index assumed at issue; null for non-control instructions. */
  readonly predictedNext: number | null;
  station: SlotHandle | null;
  state: RobState;
  outcome: ExecutionOutcome | null;
}

export class ReorderBuffer {
  private readonly entries: CircularBuffer<RobEntry>;
  private nextTag: ProducerTag = 0;

  constructor(readonly capacity: number) {
    this.entries = new CircularBuffer<RobEntry>(capacity);
  }

  get size(): number {
    return this.entries.size;
  }

  isFull(): boolean {
    return this.entries.isFull();
  }

  isEmpty(): boolean {
    return this.entries.isEmpty();
  }

  /** Returns the new entry's tag, or null when every slot is taken. */
  allocate(instruction: Instruction, destination: number | null, predictedNext: number | null = null): ProducerTag | null {
    if (this.isFull()) return null;

    const tag = this.nextTag;
    this.entries.push({
      tag,
      instruction,
      destination,
      predictedNext,
      station: null,
      state: "issued",
      outcome: null,
    });
    this.nextTag += 1;
    return tag;
  }

  get(tag: ProducerTag): RobEntry | null {
    const head = this.entries.peek();
    if (!head) return null;
    return this.entries.at(tag - head.tag);
  }

  isLive(tag: ProducerTag): boolean {
    return this.get(tag) !== null;
  }

  head(): RobEntry | null {
    return this.entries.peek();
  }

  attachStation(tag: ProducerTag, station: SlotHandle): void {
    this.require(tag).station = station;
  }

  markExecuting(tag: ProducerTag): void {
    const entry = this.require(tag);
    if (entry.state === "issued") entry.state = "executing";
  }

  markWritten(tag: ProducerTag, outcome: ExecutionOutcome): void {
    const entry = this.require(tag);
    entry.outcome = outcome;
    entry.state = "written";
  }

  /** Value of a written entry that produces one; null while it is still in flight. */
  readyValue(tag: ProducerTag): number | null {
    const entry = this.get(tag);
    if (!entry || entry.state !== "written" || !entry.outcome) return null;
    return producedValue(entry.outcome);
  }

  /**
   * Retires the head entry if its result has been written. Register and memory
   * updates happen here and nowhere else. A store or a faulted load that
   * cannot complete throws, leaving the head in place.
   */
  commitReady(registers: RegisterFile, memory: DataMemory): RobEntry | null {
    const head = this.entries.peek();
    if (!head || head.state !== "written" || !head.outcome) return null;

    const outcome = head.outcome;
    switch (outcome.kind) {
      case "fault":
        throw outcome.error;
      case "store":
        memory.store(outcome.address, outcome.value);
        break;
      case "register":
      case "call": {
        const value = producedValue(outcome);
        if (head.destination !== null && value !== null) {
          registers.write(head.destination, value);
          registers.retireTag(head.destination, head.tag);
        }
        break;
      }
      case "branch":
      case "return":
        break;
    }

    head.state = "committed";
    this.entries.pop();
    return head;
  }

  /**
   * Removes `tag` and every younger entry. Each removed entry is handed to
   * `release` so its station slot can be freed, and registers that named a
   * removed entry are pointed back at the youngest surviving writer.
   */
  squashFrom(tag: ProducerTag, registers: RegisterFile, release: (entry: RobEntry) => void = () => {}): RobEntry[] {
    const head = this.entries.peek();
    if (!head || tag >= this.nextTag) return [];

    const keep = Math.max(0, tag - head.tag);
    const squashed = this.entries.truncate(keep);
    this.nextTag = head.tag + keep;
    squashed.forEach(release);

    for (const index of registers.taggedWhere((owner) => owner >= this.nextTag)) {
      const survivor = this.youngestWriterOf(index);
      if (survivor) {
        registers.setTag(index, survivor.tag);
      } else {
        registers.clearTag(index);
      }
    }

    return squashed;
  }

  /** Live stores allocated before `tag`, oldest first. */
  olderStores(tag: ProducerTag): RobEntry[] {
    const stores: RobEntry[] = [];
    for (const entry of this.entries) {
      if (entry.tag >= tag) break;
      if (entry.instruction.opcode === Opcode.STORE) stores.push(entry);
    }
    return stores;
  }

  toArray(): RobEntry[] {
    return [...this.entries];
  }

  private youngestWriterOf(register: number): RobEntry | null {
    for (const entry of this.entries.reverse()) {
      if (entry.destination === register) return entry;
    }
    return null;
  }

  private require(tag: ProducerTag): RobEntry {
    const entry = this.get(tag);
    if (!entry) {
      throw new Error(`No live reorder buffer entry for tag ${tag}`);
    }
    return entry;
  }
}
