import assert from "node:assert";
import { describe, test } from "node:test";

import { parseProgram } from "../../src/core/loader/ProgramParser";
import { DataMemory } from "../../src/core/memory/DataMemory";
import type { ResolvedOperands } from "../../src/core/scheduler/OperandResolver";
import { CommonDataBus } from "../../src/core/scheduler/CommonDataBus";
import { ReorderBuffer } from "../../src/core/scheduler/ReorderBuffer";
import { ReservationStationPool } from "../../src/core/scheduler/ReservationStationPool";
import { tagOf, valueOf } from "../../src/core/scheduler/SchedulerTypes";
import { RegisterFile } from "../../src/core/state/RegisterFile";

const [first, consumer, second] = parseProgram("ADD R1, R2, R3\nADD R4, R1, R0\nADD R5, R2, R2");

function operands(overrides: Partial<ResolvedOperands>): ResolvedOperands {
  return { j: null, k: null, address: null, target: null, ...overrides };
}

/** Tags 0 and 2 finish together; tag 1 waits on tag 0. Tag 2 sits in the lower slot. */
function setup() {
  const rob = new ReorderBuffer(4);
  const pool = new ReservationStationPool("add", 3, 1);
  rob.allocate(first, 1);
  rob.allocate(consumer, 4);
  rob.allocate(second, 5);
  pool.allocate(second, operands({ j: valueOf(1), k: valueOf(1) }), 2);
  pool.allocate(first, operands({ j: valueOf(2), k: valueOf(3) }), 0);
  pool.allocate(consumer, operands({ j: tagOf(0), k: valueOf(0) }), 1);
  pool.tick({ memory: new DataMemory(4), mayLoad: () => true });
  return { rob, pool, bus: new CommonDataBus([pool], rob) };
}

describe("CommonDataBus", () => {
  test("broadcasts oldest producer first and wakes consumers", () => {
    const { rob, pool, bus } = setup();
    const order: number[] = [];

    const summary = bus.broadcast((entry) => order.push(entry.tag));

    assert.deepStrictEqual(order, [0, 2]);
    assert.deepStrictEqual(summary, { written: 2, discarded: 0 });
    assert.strictEqual(rob.get(0)?.state, "written");
    assert.deepStrictEqual(rob.get(0)?.outcome, { kind: "register", value: 5 });
    assert.strictEqual(rob.readyValue(2), 2);

    const waiting = pool.slots()[2];
    assert.strictEqual(waiting.state, "busy");
    if (waiting.state === "busy") {
      assert.deepStrictEqual(waiting.j, { kind: "value", value: 5 });
    }
  });

  test("discards results squashed earlier in the same broadcast", () => {
    const { rob, pool, bus } = setup();
    const registers = new RegisterFile();

    const summary = bus.broadcast((entry) => {
      if (entry.tag === 0) rob.squashFrom(1, registers, (victim) => pool.release(victim.tag));
    });

    assert.deepStrictEqual(summary, { written: 1, discarded: 1 });
    assert.strictEqual(rob.size, 1);
    assert.strictEqual(pool.busyCount(), 0);
  });
});
