export type VehicleClass = "car" | "bus" | "truck" | "motorbike";

export const VEHICLE_CLASSES: readonly VehicleClass[] = ["car", "bus", "truck", "motorbike"];

export interface Point {
  x: number;
  y: number;
}

/** Pixel-space box in x1/y1 (top-left) to x2/y2 (bottom-right) form. */
export interface BoundingBox {
  x1: number;
  y1: number;
  x2: number;
  y2: number;
}

export interface LaneRect extends BoundingBox {
  /** 1-based, unique, ascending index */
  id: number;
  name?: string;
}

export interface VehicleObservation {
  trackId: number;
  vehicleClass: VehicleClass;
  bbox: BoundingBox;
}

export type ClassBreakdown = Record<VehicleClass, number>;

export type LosGrade = "A" | "B" | "C" | "D" | "E" | "F";

export interface LevelOfService {
  grade: LosGrade;
  color: string;
  description: string;
}

export type TrendDirection = "rising" | "falling" | "stable";

export interface TrendReading {
  slope: number;
  direction: TrendDirection;
  sign: 1 | 0 | -1;
  glyph: "↑" | "↓" | "→";
  asciiGlyph: "^" | "v" | "-";
}

export type CongestionStatus = "CLEAR" | "MODERATE" | "CONGESTED";

export interface LaneAnalytics {
  lane: number;
  classBreakdown: ClassBreakdown;
  total: number;
  los: LevelOfService;
  trend: TrendReading;
  flowPerMinute: number;
  status: CongestionStatus;
}

export interface IncidentReport {
  trackId: number;
  lane: number;
  position: Point;
  /** seconds stationary, rounded to 0.1 */
  duration: number;
}

export interface SpeedViolation {
  timestamp: string;
  frameId: number;
  trackId: number;
  lane: number | null;
  speedKmh: number;
  vehicleClass: VehicleClass;
}

export interface EmergencyState {
  active: boolean;
  lane: number | null;
}
