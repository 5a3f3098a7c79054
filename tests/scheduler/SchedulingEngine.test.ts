import assert from "node:assert";
import { describe, test } from "node:test";

import {
  ConfigError,
  CycleLimitExceeded,
  MemoryBoundsError,
  OperandError,
  describeFailure,
} from "../../src/core/exceptions/SimulationExceptions";
import { createInstruction, register } from "../../src/core/isa/Instruction";
import { Opcode } from "../../src/core/isa/Opcodes";
import { parseProgram } from "../../src/core/loader/ProgramParser";
import { SchedulingEngine, type SchedulingEngineOptions } from "../../src/core/scheduler/SchedulingEngine";
import type { SchedulerSnapshot } from "../../src/core/tools/schedulerEvents";

const quiet = () => {};

function engineFor(source: string, options: SchedulingEngineOptions = {}): SchedulingEngine {
  return new SchedulingEngine(parseProgram(source), { log: quiet, ...options });
}

function timings(engine: SchedulingEngine) {
  return engine
    .getRecords()
    .map(({ instructionIndex, issue, startExec, finishExec, writeResult, commit, squashed }) => ({
      instructionIndex,
      issue,
      startExec,
      finishExec,
      writeResult,
      commit,
      squashed,
    }));
}

describe("SchedulingEngine", () => {
  test("two independent adds issue together and commit in order", () => {
    const engine = engineFor("ADD R1, R2, R3\nADD R4, R5, R6", {
      config: { issueWidth: 2, commitWidth: 2 },
      initialRegisters: { 2: 1, 3: 2, 5: 3, 6: 4 },
    });
    const result = engine.run();

    assert.strictEqual(result.cycles, 5);
    assert.deepStrictEqual(result.records, [
      {
        sequence: 0,
        instructionIndex: 0,
        text: "ADD R1, R2, R3",
        issue: 1,
        startExec: 2,
        finishExec: 3,
        writeResult: 4,
        commit: 5,
        squashed: false,
      },
      {
        sequence: 1,
        instructionIndex: 1,
        text: "ADD R4, R5, R6",
        issue: 1,
        startExec: 2,
        finishExec: 3,
        writeResult: 4,
        commit: 5,
        squashed: false,
      },
    ]);
    assert.deepStrictEqual(result.registers, [0, 3, 1, 2, 7, 3, 4, 0]);
    assert.strictEqual(engine.isFinished(), true);
    assert.strictEqual(engine.step(), "finished");
    assert.strictEqual(engine.getCycle(), 5);
  });

  test("a single commit port retires one instruction per cycle", () => {
    const engine = engineFor("ADD R1, R2, R3\nADD R4, R5, R6");
    const result = engine.run();

    assert.strictEqual(result.cycles, 6);
    assert.deepStrictEqual(
      result.records.map((record) => [record.issue, record.startExec, record.finishExec, record.writeResult, record.commit]),
      [
        [1, 2, 3, 4, 5],
        [2, 3, 4, 5, 6],
      ],
    );
    assert.strictEqual(result.statistics.committedCount, 2);
    assert.strictEqual(result.statistics.ipc, 2 / 6);
  });

  test("a dependent add waits on the producer tag until the broadcast", () => {
    const engine = engineFor("ADD R1, R2, R3\nADD R4, R1, R5", { initialRegisters: { 2: 1, 3: 2, 5: 10 } });
    const snapshots: SchedulerSnapshot[] = [];
    engine.subscribe((snapshot) => snapshots.push(snapshot));

    const result = engine.run();

    const afterIssue = snapshots.find((snapshot) => snapshot.cycle === 2);
    assert.ok(afterIssue);
    const consumer = afterIssue.stations.add[1];
    assert.strictEqual(consumer.state, "busy");
    if (consumer.state === "busy") {
      assert.deepStrictEqual(consumer.j, { kind: "tag", tag: 0 });
      assert.deepStrictEqual(consumer.k, { kind: "value", value: 10 });
    }
    assert.deepStrictEqual(afterIssue.registers.tags, [null, 0, null, null, 1, null, null, null]);

    assert.deepStrictEqual(timings(engine)[1], {
      instructionIndex: 1,
      issue: 2,
      startExec: 4,
      finishExec: 5,
      writeResult: 6,
      commit: 7,
      squashed: false,
    });
    assert.strictEqual(result.cycles, 7);
    assert.strictEqual(result.registers[4], 13);
  });

  test("a reader issued after its producer wrote takes the value from the reorder buffer", () => {
    const engine = engineFor(["MUL R5, R6, R6", "ADD R1, R2, R3", "MUL R7, R6, R6", "ADD R4, R1, R1"].join("\n"), {
      initialRegisters: { 2: 1, 3: 2, 6: 2 },
    });
    const result = engine.run();

    const reader = timings(engine)[3];
    assert.strictEqual(reader.issue, 11);
    assert.strictEqual(reader.startExec, 12);
    assert.strictEqual(result.registers[4], 6);
    assert.strictEqual(result.registers[5], 4);
    assert.strictEqual(result.registers[7], 4);
    assert.strictEqual(result.statistics.stationFullStalls, 7);
    assert.strictEqual(result.cycles, 21);
  });

  test("a full reorder buffer stalls issue", () => {
    const engine = engineFor("ADD R1, R2, R3\nADD R4, R5, R6", { config: { robCapacity: 1 } });
    const result = engine.run();

    assert.strictEqual(result.records[1].issue, 5);
    assert.strictEqual(result.statistics.robFullStalls, 3);
  });

  test("replaying a program reproduces identical timings", () => {
    const source = ["ADDI R1, R0, 3", "loop: ADDI R1, R1, -1", "MUL R2, R1, R1", "BEQ R1, R0, 1", "BEQ R0, R0, loop", "STORE R2, 4(R0)"].join(
      "\n",
    );
    const options: SchedulingEngineOptions = { config: { issueWidth: 2 } };

    const first = engineFor(source, options).run();
    const second = engineFor(source, options).run();

    assert.deepStrictEqual(second.records, first.records);
    assert.strictEqual(second.cycles, first.cycles);
    assert.deepStrictEqual(second.memory.entries(), first.memory.entries());
  });

  test("commits in allocation order", () => {
    const source = ["MUL R1, R2, R3", "ADD R4, R0, R0", "NAND R5, R0, R0", "ADDI R6, R0, 2"].join("\n");
    const result = engineFor(source, { config: { issueWidth: 4, commitWidth: 4 } }).run();

    const commits = result.records.map((record) => record.commit);
    assert.deepStrictEqual(commits, [11, 11, 11, 11]);
    assert.deepStrictEqual(
      result.records.map((record) => record.finishExec),
      [9, 3, 3, 3],
    );
  });

  test("an empty program is finished before the first cycle", () => {
    const engine = new SchedulingEngine([], { log: quiet });
    assert.strictEqual(engine.isFinished(), true);
    assert.strictEqual(engine.step(), "finished");

    const result = engine.run();
    assert.strictEqual(result.cycles, 0);
    assert.deepStrictEqual(result.records, []);
  });

  test("aborts on a malformed operand with cycle and instruction", () => {
    const messages: string[] = [];
    const engine = new SchedulingEngine([createInstruction(0, Opcode.ADD, 9, [register(1), register(2)])], {
      log: (message) => messages.push(message),
    });

    assert.throws(
      () => engine.run(),
      (error: unknown) => {
        assert.ok(error instanceof OperandError);
        assert.strictEqual(describeFailure(error), "ADD: register R9 out of range (R0-R7) (cycle 1, instruction 0)");
        return true;
      },
    );
    assert.deepStrictEqual(messages, ["[Scheduler] cycle 1: ADD: register R9 out of range (R0-R7) (cycle 1, instruction 0)"]);
    assert.strictEqual(engine.getStatus(), "faulted");
    assert.strictEqual(engine.step(), "faulted");
    assert.strictEqual(engine.getCycle(), 1);
    assert.throws(() => engine.run(), OperandError);
  });

  test("a store outside memory fails when it commits", () => {
    const engine = engineFor("STORE R1, 0(R2)", { config: { memorySize: 64 }, initialRegisters: { 2: 70 } });

    assert.throws(
      () => engine.run(),
      (error: unknown) => {
        assert.ok(error instanceof MemoryBoundsError);
        assert.strictEqual(describeFailure(error), "Address 70 outside memory of 64 words (cycle 9, instruction 0)");
        return true;
      },
    );
  });

  test("a faulting load on the committed path fails at its commit", () => {
    const engine = engineFor("LOAD R1, 100(R0)", { config: { memorySize: 64 } });

    assert.throws(
      () => engine.run(),
      (error: unknown) => {
        assert.ok(error instanceof MemoryBoundsError);
        assert.strictEqual(error.cycle, 9);
        assert.strictEqual(error.instructionIndex, 0);
        return true;
      },
    );
  });

  test("stops a run that never quiesces", () => {
    const engine = engineFor("loop: BEQ R0, R0, loop", { config: { cycleLimit: 20 } });

    assert.throws(
      () => engine.run(),
      (error: unknown) => {
        assert.ok(error instanceof CycleLimitExceeded);
        assert.strictEqual(describeFailure(error), "Simulation did not quiesce within 20 cycles (cycle 20)");
        return true;
      },
    );
    assert.strictEqual(engine.getStatus(), "faulted");
  });

  test("validates the initial machine state", () => {
    assert.throws(
      () => engineFor("ADD R1, R1, R1", { initialRegisters: { 9: 1 } }),
      (error: unknown) =>
        error instanceof ConfigError && error.message === "Invalid configuration for initialRegisters: register R9 out of range",
    );
    assert.throws(
      () => engineFor("ADD R1, R1, R1", { config: { memorySize: 64 }, initialMemory: { 70: 1 } }),
      (error: unknown) =>
        error instanceof ConfigError &&
        error.message === "Invalid configuration for initialMemory: address 70 outside memory of 64 words",
    );
    assert.throws(
      () => new SchedulingEngine([createInstruction(1, Opcode.RET, null, [register(1)])], { log: quiet }),
      /Instruction at position 0 carries index 1/,
    );
  });
});
