import { describe, expect, it } from "vitest";
import { clamp, getBoxCenter, getDistance, isPointInBox, roundTo } from "./geometry";

describe("geometry", () => {
  it("finds the centre of a box", () => {
    expect(getBoxCenter({ x1: 10, y1: 20, x2: 30, y2: 60 })).toEqual({ x: 20, y: 40 });
  });

  it("measures straight-line distance", () => {
    expect(getDistance({ x: 0, y: 0 }, { x: 3, y: 4 })).toBe(5);
  });

  it("includes rectangle edges", () => {
    const box = { x1: 0, y1: 0, x2: 10, y2: 10 };
    expect(isPointInBox({ x: 10, y: 0 }, box)).toBe(true);
    expect(isPointInBox({ x: 10.01, y: 5 }, box)).toBe(false);
  });

  it("clamps and rounds", () => {
    expect(clamp(120, 15, 90)).toBe(90);
    expect(clamp(3, 15, 90)).toBe(15);
    expect(roundTo(12.345)).toBe(12.3);
    expect(roundTo(2.5, 0)).toBe(3);
  });
});
