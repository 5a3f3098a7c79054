import assert from "node:assert";
import { describe, test } from "node:test";

import { DEFAULT_CONFIG, parseConfigOverrides, resolveConfig } from "../../src/core/config/SimulatorConfig";
import { ConfigError } from "../../src/core/exceptions/SimulationExceptions";

function assertConfigError(action: () => unknown, message: string): void {
  assert.throws(action, (error: unknown) => {
    assert.ok(error instanceof ConfigError);
    assert.strictEqual(error.message, message);
    return true;
  });
}

describe("SimulatorConfig", () => {
  test("defaults to the reference machine", () => {
    const config = resolveConfig();
    assert.deepStrictEqual(config, DEFAULT_CONFIG);
    assert.deepStrictEqual(config.units.load, { slots: 2, latency: 6 });
    assert.strictEqual(config.robCapacity, 32);
    assert.strictEqual(config.branchResolution, "execute");
    assert.strictEqual(config.memoryOrdering, "in-order");
  });

  test("merges unit overrides field by field", () => {
    const config = resolveConfig({ issueWidth: 2, units: { add: { latency: 3 } } });
    assert.deepStrictEqual(config.units.add, { slots: 4, latency: 3 });
    assert.deepStrictEqual(config.units.mul, { slots: 1, latency: 8 });
    assert.strictEqual(config.issueWidth, 2);
    assert.deepStrictEqual(DEFAULT_CONFIG.units.add, { slots: 4, latency: 2 });
  });

  test("rejects invalid values", () => {
    assertConfigError(
      () => resolveConfig({ robCapacity: 0 }),
      "Invalid configuration for robCapacity: expected a positive integer, got 0",
    );
    assertConfigError(
      () => resolveConfig({ units: { mul: { latency: 1.5 } } }),
      "Invalid configuration for units.mul.latency: expected a positive integer, got 1.5",
    );
    assertConfigError(
      () => resolveConfig({ registerCount: 1 }),
      "Invalid configuration for registerCount: CALL and RET need at least R0 and R1",
    );
  });

  test("parses untyped settings", () => {
    const overrides = parseConfigOverrides({
      robCapacity: 8,
      memoryOrdering: "relaxed",
      units: { load: { slots: 3 } },
    });
    assert.deepStrictEqual(overrides, { robCapacity: 8, memoryOrdering: "relaxed", units: { load: { slots: 3 } } });
    assert.strictEqual(resolveConfig(overrides).units.load.latency, 6);
  });

  test("rejects unknown or mistyped settings", () => {
    assertConfigError(() => parseConfigOverrides([]), "Invalid configuration for config: expected an object");
    assertConfigError(() => parseConfigOverrides({ speed: 1 }), "Invalid configuration for speed: unknown setting");
    assertConfigError(
      () => parseConfigOverrides({ robCapacity: "8" }),
      'Invalid configuration for robCapacity: expected a number, got "8"',
    );
    assertConfigError(
      () => parseConfigOverrides({ branchResolution: "guess" }),
      'Invalid configuration for branchResolution: unknown mode "guess"',
    );
    assertConfigError(
      () => parseConfigOverrides({ units: { fpu: { slots: 1 } } }),
      "Invalid configuration for units.fpu: unknown unit kind",
    );
    assertConfigError(
      () => parseConfigOverrides({ units: { add: { width: 1 } } }),
      "Invalid configuration for units.add.width: unknown setting",
    );
  });
});
