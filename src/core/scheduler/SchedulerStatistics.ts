export interface SchedulerStatisticsSnapshot {
  cycleCount: number;
  issuedCount: number;
  committedCount: number;
  squashedCount: number;
  mispredictionCount: number;
  robFullStalls: number;
  stationFullStalls: number;
  memoryOrderWaits: number;
  ipc: number;
}

export type IssueStall = "rob" | "station";

export class SchedulerStatistics {
  private cycleCount = 0;
  private issuedCount = 0;
  private committedCount = 0;
  private squashedCount = 0;
  private mispredictionCount = 0;
  private robFullStalls = 0;
  private stationFullStalls = 0;
  private memoryOrderWaits = 0;

  beginCycle(): void {
    this.cycleCount += 1;
  }

  recordIssue(): void {
    this.issuedCount += 1;
  }

  recordCommit(): void {
    this.committedCount += 1;
  }

  recordStall(reason: IssueStall): void {
    if (reason === "rob") this.robFullStalls += 1;
    else this.stationFullStalls += 1;
  }

  recordMisprediction(squashed: number): void {
    this.mispredictionCount += 1;
    this.squashedCount += squashed;
  }

  recordMemoryOrderWait(): void {
    this.memoryOrderWaits += 1;
  }

  reset(): void {
    this.cycleCount = 0;
    this.issuedCount = 0;
    this.committedCount = 0;
    this.squashedCount = 0;
    this.mispredictionCount = 0;
    this.robFullStalls = 0;
    this.stationFullStalls = 0;
    this.memoryOrderWaits = 0;
  }

  getCycleCount(): number {
    return this.cycleCount;
  }

  getSnapshot(): SchedulerStatisticsSnapshot {
    const ipc = this.cycleCount === 0 ? 0 : this.committedCount / this.cycleCount;

    return {
      cycleCount: this.cycleCount,
      issuedCount: this.issuedCount,
      committedCount: this.committedCount,
      squashedCount: this.squashedCount,
      mispredictionCount: this.mispredictionCount,
      robFullStalls: this.robFullStalls,
      stationFullStalls: this.stationFullStalls,
      memoryOrderWaits: this.memoryOrderWaits,
      ipc,
    };
  }
}
