import type { ReorderBuffer, RobEntry } from "./ReorderBuffer";
import type { ReservationStationPool } from "./ReservationStationPool";
import { producedValue, type CompletedResult } from "./SchedulerTypes";

export interface BroadcastSummary {
  written: number;
  discarded: number;
}

/**
 * Carries finished results back to the reorder buffer and to every waiting
 * station. Results go out oldest producer first, so a mispredicted branch can
 * squash younger results from the same cycle before they are written.
 */
export class CommonDataBus {
  constructor(
    private readonly pools: readonly ReservationStationPool[],
    private readonly rob: ReorderBuffer,
  ) {}

  broadcast(onWritten: (entry: RobEntry, result: CompletedResult) => void = () => {}): BroadcastSummary {
    const completed = this.pools.flatMap((pool) => pool.drainCompleted()).sort((a, b) => a.owner - b.owner);
    const summary: BroadcastSummary = { written: 0, discarded: 0 };

    for (const result of completed) {
      const entry = this.rob.get(result.owner);
      if (!entry) {
        summary.discarded += 1;
        continue;
      }

      this.rob.markWritten(result.owner, result.outcome);
      entry.station = null;
      const value = producedValue(result.outcome);
      if (value !== null) {
        this.pools.forEach((pool) => pool.deliver(result.owner, value));
      }
      summary.written += 1;
      onWritten(entry, result);
    }

    return summary;
  }
}
