import assert from "node:assert";
import { describe, test } from "node:test";

import { WORD_MAX, WORD_MIN, addWords, mulWords, nandWords, toWord } from "../../src/core/isa/Word";

describe("16-bit word arithmetic", () => {
  test("wraps values into the signed range", () => {
    assert.strictEqual(WORD_MIN, -32768);
    assert.strictEqual(WORD_MAX, 32767);
    assert.strictEqual(toWord(32767), 32767);
    assert.strictEqual(toWord(32768), -32768);
    assert.strictEqual(toWord(-32769), 32767);
    assert.strictEqual(toWord(65536), 0);
  });

  test("adds with overflow wrap", () => {
    assert.strictEqual(addWords(2, 3), 5);
    assert.strictEqual(addWords(32767, 1), -32768);
    assert.strictEqual(addWords(-5, 3), -2);
  });

  test("computes NAND bitwise", () => {
    assert.strictEqual(nandWords(0b1100, 0b1010), -9);
    assert.strictEqual(nandWords(-1, -1), 0);
    assert.strictEqual(nandWords(0, 0), -1);
  });

  test("keeps only the low half of a product", () => {
    assert.strictEqual(mulWords(6, 7), 42);
    assert.strictEqual(mulWords(-2, 3), -6);
    assert.strictEqual(mulWords(300, 300), 24464);
    assert.strictEqual(mulWords(256, 256), 0);
  });
});
