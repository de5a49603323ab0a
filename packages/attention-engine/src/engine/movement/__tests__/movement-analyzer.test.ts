import { beforeEach, describe, expect, it } from "vitest";
import {
  type EyePupils,
  MOVEMENT_HISTORY_CAPACITY,
  MovementAnalyzer,
  type MovementState,
  createInitialMovementState,
} from "../movement-analyzer";

describe("MovementAnalyzer", () => {
  let analyzer: MovementAnalyzer;
  let state: MovementState;

  const step = (pupils: EyePupils) => {
    const result = analyzer.step(state, pupils);
    state = result.state;
    return result.output;
  };

  beforeEach(() => {
    analyzer = new MovementAnalyzer({ movementThreshold: 10 });
    state = createInitialMovementState();
  });

  it("reports no movement on the first frame", () => {
    const output = step({ left: { x: 40, y: 40 }, right: { x: 90, y: 40 } });

    expect(output).toEqual({ movementMagnitude: 0, suspicious: false });
    expect(state.previousPupils).toEqual({
      left: { x: 40, y: 40 },
      right: { x: 90, y: 40 },
    });
    expect(state.movementHistory.size).toBe(0);
  });

  it("averages the displacement of both eyes", () => {
    step({ left: { x: 0, y: 0 }, right: { x: 10, y: 0 } });
    const output = step({ left: { x: 3, y: 4 }, right: { x: 10, y: 0 } });

    expect(output.movementMagnitude).toBe(2.5);
    expect(state.movementHistory.toArray()).toEqual([2.5]);
  });

  it("leaves out an eye missing from the current frame", () => {
    step({ left: { x: 0, y: 0 }, right: { x: 10, y: 0 } });
    const output = step({ left: null, right: { x: 16, y: 8 } });

    expect(output.movementMagnitude).toBe(10);
  });

  it("keeps re-seeding until both pupils are seen together", () => {
    step({ left: null, right: null });
    const reseeded = step({ left: { x: 0, y: 0 }, right: null });

    expect(reseeded).toEqual({ movementMagnitude: 0, suspicious: false });
    expect(state.previousPupils).toEqual({ left: { x: 0, y: 0 }, right: null });

    step({ left: { x: 0, y: 0 }, right: { x: 10, y: 0 } });
    const output = step({ left: { x: 3, y: 4 }, right: { x: 10, y: 0 } });

    expect(output.movementMagnitude).toBe(2.5);
    expect(state.movementHistory.toArray()).toEqual([2.5]);
  });

  it("tracks movement after a first frame without pupils", () => {
    step({ left: null, right: null });
    const outputs = Array.from({ length: 40 }, (_, index) => {
      const offset = index % 2 === 0 ? 0 : 50;
      return step({
        left: { x: offset, y: 0 },
        right: { x: 100 + offset, y: 0 },
      });
    });

    expect(outputs[0]).toEqual({ movementMagnitude: 0, suspicious: false });
    expect(outputs[1].movementMagnitude).toBe(50);
    expect(state.movementHistory.size).toBe(39);
    expect(state.suspicious).toBe(true);
  });

  it("leaves the state alone when no eye can be compared", () => {
    step({ left: { x: 0, y: 0 }, right: { x: 10, y: 0 } });
    const before = state;

    const output = step({ left: null, right: null });

    expect(output).toEqual({ movementMagnitude: 0, suspicious: false });
    expect(state).toBe(before);
  });

  const swing = (offset: number): EyePupils => ({
    left: { x: offset, y: 0 },
    right: { x: 50 + offset, y: 0 },
  });

  it("flags sustained movement once thirty samples exist", () => {
    step(swing(0));
    const outputs = Array.from({ length: 30 }, (_, index) =>
      step(swing(index % 2 === 0 ? 25 : 0)),
    );

    expect(outputs[28]).toEqual({ movementMagnitude: 25, suspicious: false });
    expect(outputs[29]).toEqual({ movementMagnitude: 25, suspicious: true });
    expect(state.suspicious).toBe(true);
  });

  it("does not flag movement at exactly twice the threshold", () => {
    step(swing(0));
    Array.from({ length: 30 }, (_, index) =>
      step(swing(index % 2 === 0 ? 20 : 0)),
    );

    expect(state.suspicious).toBe(false);
  });

  it("caps the movement history", () => {
    step(swing(0));
    for (let i = 1; i <= 100; i += 1) {
      step(swing(i));
    }

    expect(state.movementHistory.size).toBe(MOVEMENT_HISTORY_CAPACITY);
  });
});
