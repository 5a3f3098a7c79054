import { resolveConfig, type SimulatorConfig, type SimulatorConfigOverrides } from "../config/SimulatorConfig";
import {
  ConfigError,
  CycleLimitExceeded,
  OperandError,
  describeFailure,
  normalizeSimulationException,
} from "../exceptions/SimulationExceptions";
import type { Instruction, InstructionStream } from "../isa/Instruction";
import { Opcode, UNIT_KINDS, isControl, unitFor, type UnitKind } from "../isa/Opcodes";
import { DataMemory } from "../memory/DataMemory";
import type { TimingRecord } from "../report/TimingReport";
import { RegisterFile } from "../state/RegisterFile";
import { SchedulerEventHub, type SchedulerSnapshot, type SchedulerStatus } from "../tools/schedulerEvents";
import { CommonDataBus } from "./CommonDataBus";
import { OperandResolver, type ResolvedOperands } from "./OperandResolver";
import { ReorderBuffer, type RobEntry } from "./ReorderBuffer";
import { ReservationStationPool, type ExecutionContext } from "./ReservationStationPool";
import { SchedulerStatistics, type SchedulerStatisticsSnapshot } from "./SchedulerStatistics";
import { resolvedNext, type ExecutionEvent, type ProducerTag, type StationSlot } from "./SchedulerTypes";

export interface SchedulingEngineOptions {
  config?: SimulatorConfigOverrides;
  initialRegisters?: Record<number, number>;
  initialMemory?: Record<number, number>;
  /** Trace sink. Defaults to console.debug. */
  log?: (message: string) => void;
}

export interface SimulationResult {
  cycles: number;
  records: TimingRecord[];
  registers: number[];
  memory: DataMemory;
  statistics: SchedulerStatisticsSnapshot;
}

/**
 * Cycle-stepped Tomasulo scheduler with a reorder buffer. Each `step()` runs
 * commit, broadcast, execute and issue in that order; branches and returns are
 * predicted to fall through and squash younger work when they resolve
 * elsewhere.
 */
export class SchedulingEngine {
  readonly config: SimulatorConfig;

  private readonly program: InstructionStream;
  private readonly registers: RegisterFile;
  private readonly memory: DataMemory;
  private readonly rob: ReorderBuffer;
  private readonly pools: Record<UnitKind, ReservationStationPool>;
  private readonly bus: CommonDataBus;
  private readonly resolver: OperandResolver;
  private readonly statistics = new SchedulerStatistics();
  private readonly events: SchedulerEventHub;
  private readonly log: (message: string) => void;

  private readonly records: TimingRecord[] = [];
  private readonly liveRecords = new Map<ProducerTag, TimingRecord>();

  private cycle = 0;
  private fetchIndex = 0;
  private status: SchedulerStatus = "running";
  private failure: Error | null = null;
  private activeIndex: number | null = null;
  private squashedThisCycle: ProducerTag[] = [];

  constructor(program: InstructionStream, options: SchedulingEngineOptions = {}) {
    this.config = resolveConfig(options.config);
    this.log = options.log ?? ((message) => console.debug(message));

    program.forEach((instruction, position) => {
      if (instruction.index !== position) {
        throw new OperandError(`Instruction at position ${position} carries index ${instruction.index}`, position);
      }
    });
    this.program = program;

    this.registers = new RegisterFile(this.config.registerCount);
    for (const [key, value] of Object.entries(options.initialRegisters ?? {})) {
      const index = Number(key);
      if (!this.registers.isValid(index)) {
        throw new ConfigError("initialRegisters", `register R${key} out of range`);
      }
      this.registers.write(index, value);
    }

    this.memory = new DataMemory(this.config.memorySize);
    for (const [key, value] of Object.entries(options.initialMemory ?? {})) {
      const address = Number(key);
      if (!this.memory.contains(address)) {
        throw new ConfigError("initialMemory", `address ${key} outside memory of ${this.config.memorySize} words`);
      }
      this.memory.store(address, value);
    }

    this.rob = new ReorderBuffer(this.config.robCapacity);
    const pool = (kind: UnitKind): ReservationStationPool =>
      new ReservationStationPool(kind, this.config.units[kind].slots, this.config.units[kind].latency);
    this.pools = {
      add: pool("add"),
      load: pool("load"),
      store: pool("store"),
      nand: pool("nand"),
      mul: pool("mul"),
      branch: pool("branch"),
      call: pool("call"),
    };
    this.bus = new CommonDataBus(
      UNIT_KINDS.map((kind) => this.pools[kind]),
      this.rob,
    );
    this.resolver = new OperandResolver(this.registers, this.rob);

    if (this.isFinished()) this.status = "finished";
    this.events = new SchedulerEventHub(this.snapshot());
  }

  isFinished(): boolean {
    return !this.canFetch() && this.rob.isEmpty();
  }

  step(): SchedulerStatus {
    if (this.status !== "running") return this.status;

    this.cycle += 1;
    this.statistics.beginCycle();
    this.squashedThisCycle = [];

    try {
      this.commitStage();
      this.broadcastStage();
      this.executeStage();
      this.issueStage();
    } catch (error) {
      throw this.fail(normalizeSimulationException(error, this.cycle, this.activeIndex));
    }

    if (this.isFinished()) this.status = "finished";
    this.events.publish(this.snapshot());
    return this.status;
  }

  run(): SimulationResult {
    if (this.failure) throw this.failure;

    while (this.step() === "running") {
      if (this.cycle >= this.config.cycleLimit) {
        throw this.fail(new CycleLimitExceeded(this.config.cycleLimit));
      }
    }

    return this.getResult();
  }

  getResult(): SimulationResult {
    return {
      cycles: this.cycle,
      records: this.getRecords(),
      registers: this.getRegisters(),
      memory: this.memory,
      statistics: this.getStatistics(),
    };
  }

  getCycle(): number {
    return this.cycle;
  }

  getStatus(): SchedulerStatus {
    return this.status;
  }

  getRecords(): TimingRecord[] {
    return this.records.map((record) => ({ ...record }));
  }

  getRegisters(): number[] {
    return this.registers.toArray();
  }

  getMemory(): DataMemory {
    return this.memory;
  }

  getStatistics(): SchedulerStatisticsSnapshot {
    return this.statistics.getSnapshot();
  }

  subscribe(listener: (snapshot: SchedulerSnapshot) => void): () => void {
    return this.events.subscribe(listener);
  }

  private commitStage(): void {
    for (let port = 0; port < this.config.commitWidth; port++) {
      const head = this.rob.head();
      if (!head) return;

      this.activeIndex = head.instruction.index;
      const committed = this.rob.commitReady(this.registers, this.memory);
      if (!committed) return;

      this.statistics.recordCommit();
      const record = this.liveRecords.get(committed.tag);
      if (record) {
        record.commit = this.cycle;
        this.liveRecords.delete(committed.tag);
      }
      this.trace(`commit ${committed.instruction.text} (@${committed.instruction.index})`);
    }
    this.activeIndex = null;
  }

  private broadcastStage(): void {
    this.bus.broadcast((entry) => {
      this.activeIndex = entry.instruction.index;
      const record = this.liveRecords.get(entry.tag);
      if (record) record.writeResult = this.cycle;

      const actual = entry.outcome ? resolvedNext(entry.outcome) : null;
      if (actual !== null && entry.predictedNext !== null && actual !== entry.predictedNext) {
        this.squashYoungerThan(entry, actual);
      }
    });
    this.activeIndex = null;
  }

  private squashYoungerThan(branch: RobEntry, target: number): void {
    const squashed = this.rob.squashFrom(branch.tag + 1, this.registers, (victim) => {
      if (victim.station) this.pools[victim.station.unit].release(victim.tag);
      const record = this.liveRecords.get(victim.tag);
      if (record) {
        record.squashed = true;
        this.liveRecords.delete(victim.tag);
      }
    });

    this.fetchIndex = target;
    this.statistics.recordMisprediction(squashed.length);
    this.squashedThisCycle.push(...squashed.map((entry) => entry.tag));
    this.trace(
      `mispredict ${branch.instruction.text} (@${branch.instruction.index}) resolved to ${target}; ` +
        `squashed ${squashed.length} younger ${squashed.length === 1 ? "entry" : "entries"}`,
    );
  }

  private executeStage(): void {
    const context: ExecutionContext = {
      memory: this.memory,
      mayLoad: (owner, address) => this.mayLoad(owner, address),
    };

    for (const kind of UNIT_KINDS) {
      for (const event of this.pools[kind].tick(context)) {
        this.observe(event);
      }
    }
  }

  private observe(event: ExecutionEvent): void {
    const record = this.liveRecords.get(event.owner);
    switch (event.kind) {
      case "started":
        this.rob.markExecuting(event.owner);
        if (record) record.startExec = this.cycle;
        break;
      case "finished":
        if (record) record.finishExec = this.cycle;
        break;
      case "blocked":
        this.statistics.recordMemoryOrderWait();
        break;
    }
  }

  /**
   * Under in-order memory access a load may not start while an older store
   * has an unknown address or targets the same word.
   */
  private mayLoad(owner: ProducerTag, address: number): boolean {
    if (this.config.memoryOrdering === "relaxed") return true;

    return this.rob.olderStores(owner).every((store) => {
      const storeAddress = this.storeAddress(store);
      return storeAddress !== null && storeAddress !== address;
    });
  }

  private storeAddress(store: RobEntry): number | null {
    if (store.outcome?.kind === "store") return store.outcome.address;
    const pending = this.pools.store.addressOf(store.tag);
    return pending?.kind === "resolved" ? pending.address : null;
  }

  private issueStage(): void {
    for (let port = 0; port < this.config.issueWidth; port++) {
      if (!this.canFetch()) break;
      const instruction = this.program[this.fetchIndex];
      this.activeIndex = instruction.index;
      if (!this.issue(instruction)) break;
    }
    this.activeIndex = null;
  }

  /** Issues one instruction, or records the stall and returns false. */
  private issue(instruction: Instruction): boolean {
    const pool = this.pools[unitFor(instruction.opcode)];
    if (this.rob.isFull()) {
      this.statistics.recordStall("rob");
      return false;
    }
    if (!pool.hasFreeSlot()) {
      this.statistics.recordStall("station");
      return false;
    }

    const operands = this.resolver.resolve(instruction);
    const next = this.predictNext(instruction, operands);

    const tag = this.rob.allocate(instruction, instruction.destination, isControl(instruction.opcode) ? next : null);
    if (tag === null) return false;
    const station = pool.allocate(instruction, operands, tag);
    if (!station) {
      throw new Error(`${pool.unit} station refused ${instruction.text} after reporting a free slot`);
    }
    this.rob.attachStation(tag, station);

    // Sources were read above, so an instruction that reads its own destination sees the older producer.
    if (instruction.destination !== null) {
      this.registers.setTag(instruction.destination, tag);
    }

    const record: TimingRecord = {
      sequence: this.records.length,
      instructionIndex: instruction.index,
      text: instruction.text,
      issue: this.cycle,
      startExec: null,
      finishExec: null,
      writeResult: null,
      commit: null,
      squashed: false,
    };
    this.records.push(record);
    this.liveRecords.set(tag, record);
    this.statistics.recordIssue();
    this.fetchIndex = next;
    this.trace(`issue ${instruction.text} (@${instruction.index}) as #${tag}`);
    return true;
  }

  private predictNext(instruction: Instruction, operands: ResolvedOperands): number {
    const fallThrough = instruction.index + 1;

    switch (instruction.opcode) {
      case Opcode.CALL:
        return operands.target ?? fallThrough;
      case Opcode.BEQ: {
        if (this.config.branchResolution !== "issue") return fallThrough;
        const { j, k } = operands;
        if (j?.kind !== "value" || k?.kind !== "value") return fallThrough;
        return j.value === k.value ? (operands.target ?? fallThrough) : fallThrough;
      }
      default:
        return fallThrough;
    }
  }

  private canFetch(): boolean {
    return this.fetchIndex >= 0 && this.fetchIndex < this.program.length;
  }

  private fail(error: Error): Error {
    this.status = "faulted";
    this.failure = error;
    this.log(`[Scheduler] cycle ${this.cycle}: ${describeFailure(error)}`);
    this.events.publish(this.snapshot());
    return error;
  }

  private trace(message: string): void {
    this.log(`[Scheduler] cycle ${this.cycle}: ${message}`);
  }

  private snapshot(): SchedulerSnapshot {
    const stations = (kind: UnitKind): StationSlot[] => this.pools[kind].slots();

    return {
      cycle: this.cycle,
      status: this.status,
      fetchIndex: this.fetchIndex,
      rob: this.rob.toArray().map((entry) => ({
        tag: entry.tag,
        index: entry.instruction.index,
        text: entry.instruction.text,
        state: entry.state,
        destination: entry.destination,
        outcome: entry.outcome,
      })),
      stations: {
        add: stations("add"),
        load: stations("load"),
        store: stations("store"),
        nand: stations("nand"),
        mul: stations("mul"),
        branch: stations("branch"),
        call: stations("call"),
      },
      registers: this.registers.snapshot(),
      statistics: this.statistics.getSnapshot(),
      squashed: [...this.squashedThisCycle],
    };
  }
}
