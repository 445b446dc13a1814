import { describe, expect, it } from "vitest";
import { SessionClosedError } from "../utils/errors";
import { SessionAggregator } from "./sessionAggregator";

describe("SessionAggregator", () => {
  it("folds frames into running totals", () => {
    const session = new SessionAggregator(100);
    session.fold({ now: 101, activeIds: [1, 2], occupancy: 2, incidentOnsets: 0, violations: 1 });
    session.fold({ now: 102, activeIds: [2, 3, 4], occupancy: 3, incidentOnsets: 1, violations: 0 });
    session.fold({ now: 103, activeIds: [4], occupancy: 3, incidentOnsets: 0, violations: 2 });

    expect(session.totals).toEqual({
      startedAt: 100,
      endedAt: null,
      uniqueVehicles: 4,
      peakOccupancy: 3,
      peakAt: 102,
      incidents: 1,
      violations: 3,
    });
  });

  it("freezes totals at shutdown", () => {
    const session = new SessionAggregator(0);
    session.fold({ now: 1, activeIds: [9], occupancy: 1, incidentOnsets: 0, violations: 0 });

    const totals = session.close(5);
    expect(totals.endedAt).toBe(5);
    expect(Object.isFrozen(totals)).toBe(true);
    expect(session.close(9).endedAt).toBe(5);
    expect(() =>
      session.fold({ now: 6, activeIds: [10], occupancy: 1, incidentOnsets: 0, violations: 0 })
    ).toThrow(SessionClosedError);
    expect(session.totals.uniqueVehicles).toBe(1);
  });
});
