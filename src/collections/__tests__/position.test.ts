import { describe, expect, it } from "vitest";
import { TypeError, TYPE_ERROR } from "type_primitives";
import { advance, as_position, distance } from "../position";

describe("Position", () => {
  it("as_position accepts zero and positive integers", () => {
    expect(as_position(0)).toBe(0);
    expect(as_position(12)).toBe(12);
  });

  it("as_position rejects negative and fractional offsets in dev", () => {
    expect(() => as_position(-1)).toThrow(TypeError);
    expect(() => as_position(0.5)).toThrow(TypeError);
  });

  it("as_position failures are validation errors", () => {
    let caught: unknown;
    try {
      as_position(-3);
    } catch (e) {
      caught = e;
    }
    expect((caught as TypeError).category).toBe(
      TYPE_ERROR.VALIDATION_FAIL_CONDITION,
    );
  });

  it("advance moves forward by one by default", () => {
    expect(advance(as_position(2))).toBe(3);
  });

  it("advance accepts an explicit step", () => {
    expect(advance(as_position(2), 3)).toBe(5);
    expect(advance(as_position(4), -4)).toBe(0);
  });

  it("advance cannot move before the start", () => {
    expect(() => advance(as_position(1), -2)).toThrow(TypeError);
  });

  it("distance is the signed offset between two positions", () => {
    expect(distance(as_position(1), as_position(4))).toBe(3);
    expect(distance(as_position(4), as_position(1))).toBe(-3);
  });

  //=========================================================
  // brand
  //=========================================================

  it("a position is a plain number at runtime", () => {
    const pos = as_position(7);
    expect(typeof pos).toBe("number");
    expect(pos === 7).toBe(true);
  });

  it("positions take part in arithmetic like plain numbers", () => {
    const pos = as_position(10);
    expect(pos + 1).toBe(11);
    expect(pos * 2).toBe(20);
  });
});
