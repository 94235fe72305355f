import { bench, describe } from "vitest";
import { GrowableArray } from "../collections/growable_array";
import { zero } from "../collections/element";
import { as_position } from "../collections/position";
import { reserve } from "../collections/reservation";

const TIERS = [1_000, 10_000, 100_000] as const;

// ============================================================
// 1. Append
// ============================================================

describe("push_back from empty", () => {
  for (const N of TIERS) {
    bench(`${N.toLocaleString()} elements`, () => {
      const v = new GrowableArray(zero);
      for (let i = 0; i < N; i++) v.push_back(i);
    });
  }
});

describe("push_back into reserved capacity", () => {
  for (const N of TIERS) {
    bench(`${N.toLocaleString()} elements`, () => {
      const v = new GrowableArray(zero, reserve(N));
      for (let i = 0; i < N; i++) v.push_back(i);
    });
  }
});

// ============================================================
// 2. Front insert / erase (worst-case shifting)
// ============================================================

describe("insert at begin()", () => {
  for (const N of [1_000, 10_000] as const) {
    bench(`${N.toLocaleString()} elements`, () => {
      const v = new GrowableArray(zero);
      for (let i = 0; i < N; i++) v.insert(v.begin(), i);
    });
  }
});

describe("erase at begin()", () => {
  for (const N of [1_000, 10_000] as const) {
    bench(`${N.toLocaleString()} elements`, () => {
      const v = new GrowableArray(zero, N);
      const front = as_position(0);
      while (!v.is_empty) v.erase(front);
    });
  }
});

// ============================================================
// 3. Traversal
// ============================================================

describe("iterate visible elements", () => {
  for (const N of TIERS) {
    const v = new GrowableArray(zero, N, 1);
    bench(`${N.toLocaleString()} elements`, () => {
      let total = 0;
      for (const x of v) total += x;
      if (total !== N) throw new Error("unexpected sum");
    });
  }
});
