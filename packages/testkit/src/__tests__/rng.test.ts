import { assert, describe, test } from "../index.js";
import { createRng } from "../rng.js";

describe("createRng", () => {
  test("same seed yields the same sequence", () => {
    const a = createRng(1234);
    const b = createRng(1234);
    for (let i = 0; i < 16; i++) {
      assert.equal(a.u32(), b.u32());
    }
  });

  test("first xorshift32 step from seed 1", () => {
    // 1 ^ (1 << 13) = 8193; 8193 ^ (8193 >>> 17) = 8193; 8193 ^ (8193 << 5) = 270369
    assert.equal(createRng(1).u32(), 270369);
  });

  test("zero seed still produces values", () => {
    assert.notEqual(createRng(0).u32(), 0);
  });

  test("int stays within inclusive bounds", () => {
    const rng = createRng(99);
    for (let i = 0; i < 256; i++) {
      const v = rng.int(3, 7);
      assert.ok(v >= 3 && v <= 7, `value ${String(v)} out of range`);
    }
    assert.equal(rng.int(5, 5), 5);
  });

  test("pick returns an element of the list", () => {
    const rng = createRng(7);
    const values = ["a", "b", "c"] as const;
    for (let i = 0; i < 32; i++) {
      assert.ok(values.includes(rng.pick(values)));
    }
  });
});
