import type { CongestionStatus, LevelOfService } from "../types/analytics";

const LOS_BANDS: ReadonlyArray<{ max: number } & LevelOfService> = [
  { max: 3, grade: "A", color: "#4ade80", description: "Free flow" },
  { max: 6, grade: "B", color: "#a3e635", description: "Reasonable free flow" },
  { max: 10, grade: "C", color: "#facc15", description: "Stable flow" },
  { max: 15, grade: "D", color: "#fb923c", description: "Approaching unstable" },
  { max: 22, grade: "E", color: "#f87171", description: "Unstable flow" },
];

const LOS_BREAKDOWN: LevelOfService = {
  grade: "F",
  color: "#dc2626",
  description: "Forced / breakdown",
};

// Simplified Highway Capacity Manual bands; upper bounds inclusive.
export function gradeLevelOfService(occupancy: number): LevelOfService {
  const band = LOS_BANDS.find((item) => occupancy <= item.max);
  if (!band) {
    return { ...LOS_BREAKDOWN };
  }
  return { grade: band.grade, color: band.color, description: band.description };
}

export function congestionStatus(occupancy: number): CongestionStatus {
  if (occupancy < 5) {
    return "CLEAR";
  }
  return occupancy < 15 ? "MODERATE" : "CONGESTED";
}
