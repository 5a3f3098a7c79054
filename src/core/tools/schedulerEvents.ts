import type { UnitKind } from "../isa/Opcodes";
import type { RobState } from "../scheduler/ReorderBuffer";
import type { SchedulerStatisticsSnapshot } from "../scheduler/SchedulerStatistics";
import type { ExecutionOutcome, ProducerTag, StationSlot } from "../scheduler/SchedulerTypes";
import type { RegisterFileSnapshot } from "../state/RegisterFile";

export type SchedulerStatus = "running" | "finished" | "faulted";

export interface RobEntryView {
  tag: ProducerTag;
  index: number;
  text: string;
  state: RobState;
  destination: number | null;
  outcome: ExecutionOutcome | null;
}

export interface SchedulerSnapshot {
  cycle: number;
  status: SchedulerStatus;
  fetchIndex: number;
  rob: RobEntryView[];
  stations: Record<UnitKind, StationSlot[]>;
  registers: RegisterFileSnapshot;
  statistics: SchedulerStatisticsSnapshot;
  /** Tags removed by a misprediction during this cycle. */
  squashed: ProducerTag[];
}

type SchedulerListener = (snapshot: SchedulerSnapshot) => void;

/**
 * Per-engine snapshot channel. Subscribers receive the latest snapshot
 * immediately and then one per simulated cycle.
 */
export class SchedulerEventHub {
  private readonly listeners = new Set<SchedulerListener>();

  constructor(private latestSnapshot: SchedulerSnapshot) {}

  publish(snapshot: SchedulerSnapshot): void {
    this.latestSnapshot = snapshot;
    this.listeners.forEach((listener) => listener(snapshot));
  }

  subscribe(listener: SchedulerListener): () => void {
    this.listeners.add(listener);
    listener(this.latestSnapshot);
    return () => this.listeners.delete(listener);
  }

  latest(): SchedulerSnapshot {
    return this.latestSnapshot;
  }

  hasListeners(): boolean {
    return this.listeners.size > 0;
  }
}
