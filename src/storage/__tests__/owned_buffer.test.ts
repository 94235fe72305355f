import { describe, expect, it } from "vitest";
import { TypeError, TYPE_ERROR } from "type_primitives";
import { no_default_slot, OwnedBuffer } from "../owned_buffer";

describe("OwnedBuffer", () => {
  //=========================================================
  // construction
  //=========================================================

  it("allocates the requested number of default slots", () => {
    const b = new OwnedBuffer(3, () => 7);
    expect(b.length).toBe(3);
    expect(b.raw).toEqual([7, 7, 7]);
  });

  it("calls the default factory once per slot", () => {
    let calls = 0;
    const b = new OwnedBuffer(4, () => ({ n: calls++ }));
    expect(calls).toBe(4);
    expect(b.get(0)).not.toBe(b.get(1));
    expect(b.get(3)).toEqual({ n: 3 });
  });

  it("empty() has no slots", () => {
    const b = OwnedBuffer.empty<string>();
    expect(b.length).toBe(0);
    expect(b.raw).toEqual([]);
  });

  it("empty() default factory fails as an assertion if ever called", () => {
    let caught: unknown;
    try {
      no_default_slot();
    } catch (e) {
      caught = e;
    }
    expect(caught).toBeInstanceOf(TypeError);
    const err = caught as TypeError;
    expect(err.category).toBe(TYPE_ERROR.ASSERTION_FAIL_CONDITION);
    expect(err.message).toBe("empty OwnedBuffer has no slots to fill");
  });

  it("rejects a negative length in dev", () => {
    expect(() => new OwnedBuffer(-1, () => 0)).toThrow(TypeError);
  });

  //=========================================================
  // get / set
  //=========================================================

  it("set then get returns the stored value", () => {
    const b = new OwnedBuffer(2, () => "");
    b.set(1, "x");
    expect(b.get(1)).toBe("x");
    expect(b.get(0)).toBe("");
  });

  it("slot access past the end fails in dev", () => {
    const b = new OwnedBuffer(2, () => 0);
    expect(() => b.get(2)).toThrow(TypeError);
    expect(() => b.set(5, 1)).toThrow(TypeError);
  });

  //=========================================================
  // raw / swap
  //=========================================================

  it("raw exposes the live backing array", () => {
    const b = new OwnedBuffer(2, () => 0);
    b.set(0, 5);
    expect(b.raw[0]).toBe(5);
  });

  it("swap exchanges storage and lengths", () => {
    const a = new OwnedBuffer(1, () => 1);
    const b = new OwnedBuffer(3, () => 2);
    const a_raw = a.raw;
    a.swap(b);
    expect(a.length).toBe(3);
    expect(b.length).toBe(1);
    expect(a.raw).toEqual([2, 2, 2]);
    expect(b.raw).toBe(a_raw);
  });
});
