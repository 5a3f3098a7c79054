import type { SchedulerStatisticsSnapshot } from "../scheduler/SchedulerStatistics";

/**
 * Cycle timestamps for one issued instance of an instruction. A loop issues
 * the same static instruction many times, so `sequence` (issue order) is the
 * identity, not `instructionIndex`.
 */
export interface TimingRecord {
  sequence: number;
  instructionIndex: number;
  text: string;
  issue: number;
  startExec: number | null;
  finishExec: number | null;
  writeResult: number | null;
  commit: number | null;
  squashed: boolean;
}

const CYCLE_COLUMNS = [
  ["Issue", "issue"],
  ["Start", "startExec"],
  ["Finish", "finishExec"],
  ["Write", "writeResult"],
  ["Commit", "commit"],
] as const;

const CELL_WIDTH = 7;

export function formatTimingTable(records: readonly TimingRecord[]): string {
  const textWidth = Math.max("Instruction".length, ...records.map((record) => record.text.length));
  const header = [
    "Seq".padEnd(4),
    "Idx".padEnd(4),
    "Instruction".padEnd(textWidth),
    ...CYCLE_COLUMNS.map(([title]) => title.padStart(CELL_WIDTH)),
  ].join(" ");

  const rows = records.map((record) => {
    const cells = CYCLE_COLUMNS.map(([, field]) => {
      const cycle = record[field];
      return (cycle === null ? "-" : String(cycle)).padStart(CELL_WIDTH);
    });
    const row = [
      String(record.sequence).padEnd(4),
      String(record.instructionIndex).padEnd(4),
      record.text.padEnd(textWidth),
      ...cells,
    ].join(" ");
    return record.squashed ? `${row}  squashed` : row;
  });

  return [header, ...rows].join("\n");
}

export function formatSummary(result: { cycles: number; statistics: SchedulerStatisticsSnapshot }): string {
  const { statistics } = result;
  const ipc = result.cycles === 0 ? 0 : statistics.committedCount / result.cycles;

  return [
    `Cycles: ${result.cycles}`,
    `Committed: ${statistics.committedCount}`,
    `IPC: ${ipc.toFixed(2)}`,
    `Mispredictions: ${statistics.mispredictionCount} (${statistics.squashedCount} squashed)`,
  ].join("\n");
}
