import type { LaneRect, VehicleClass, VehicleObservation } from "../types/analytics";

export const DEMO_LANES: LaneRect[] = [
  { id: 1, name: "north_bound", x1: 40, y1: 0, x2: 300, y2: 720 },
  { id: 2, name: "south_bound", x1: 320, y1: 0, x2: 600, y2: 720 },
  { id: 3, name: "east_turn", x1: 620, y1: 0, x2: 900, y2: 720 },
  { id: 4, name: "west_turn", x1: 920, y1: 0, x2: 1240, y2: 720 },
];

export interface SimulatedFeedOptions {
  seed?: number;
  /** per-lane spawn probability per frame, cycled over lanes */
  spawnRates?: number[];
  stallChance?: number;
  maxVehicles?: number;
}

interface SimulatedVehicle {
  trackId: number;
  vehicleClass: VehicleClass;
  lane: LaneRect;
  x: number;
  y: number;
  step: number;
  stalledFor: number;
}

const CLASS_WEIGHTS: ReadonlyArray<[VehicleClass, number]> = [
  ["car", 0.6],
  ["motorbike", 0.2],
  ["bus", 0.1],
  ["truck", 0.1],
];

const BOX_SIZE: Record<VehicleClass, { width: number; height: number }> = {
  car: { width: 60, height: 90 },
  motorbike: { width: 24, height: 50 },
  bus: { width: 80, height: 180 },
  truck: { width: 80, height: 160 },
};

function mulberry32(seed: number): () => number {
  let a = seed >>> 0;
  return () => {
    a = (a + 0x6d2b79f5) >>> 0;
    let t = a;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

function pickClass(roll: number): VehicleClass {
  let cumulative = 0;
  for (const [vehicleClass, weight] of CLASS_WEIGHTS) {
    cumulative += weight;
    if (roll < cumulative) {
      return vehicleClass;
    }
  }
  return "car";
}

/**
 * Deterministic stand-in for the upstream tracker: vehicles enter at the top
 * of a lane, drive down it in pixel steps, occasionally stall and sometimes
 * come through fast enough to trip the speed and emergency checks.
 */
export function createSimulatedFeed(lanes: readonly LaneRect[], options: SimulatedFeedOptions = {}) {
  const random = mulberry32(options.seed ?? 7);
  const spawnRates = options.spawnRates ?? [0.12, 0.05, 0.02, 0.08];
  const stallChance = options.stallChance ?? 0.002;
  const maxVehicles = options.maxVehicles ?? 80;
  let vehicles: SimulatedVehicle[] = [];
  let nextTrackId = 1;

  function spawn(lane: LaneRect, rate: number) {
    if (vehicles.length >= maxVehicles || random() >= rate) {
      return;
    }
    const vehicleClass = pickClass(random());
    const fast = random() < 0.08;
    vehicles.push({
      trackId: nextTrackId++,
      vehicleClass,
      lane,
      x: lane.x1 + (lane.x2 - lane.x1) * (0.3 + random() * 0.4),
      y: lane.y1 + 5,
      step: fast ? 18 + random() * 6 : 2 + random() * 5,
      stalledFor: 0,
    });
  }

  function advance(vehicle: SimulatedVehicle): SimulatedVehicle {
    if (vehicle.stalledFor > 0) {
      return { ...vehicle, stalledFor: vehicle.stalledFor - 1 };
    }
    const stalledFor = random() < stallChance ? 60 + Math.floor(random() * 120) : 0;
    return { ...vehicle, y: vehicle.y + vehicle.step, stalledFor };
  }

  function nextFrame(): VehicleObservation[] {
    lanes.forEach((lane, index) => spawn(lane, spawnRates[index % spawnRates.length] ?? 0));
    vehicles = vehicles.map(advance).filter((vehicle) => vehicle.y < vehicle.lane.y2 + 40);
    return vehicles.map((vehicle) => {
      const size = BOX_SIZE[vehicle.vehicleClass];
      return {
        trackId: vehicle.trackId,
        vehicleClass: vehicle.vehicleClass,
        bbox: {
          x1: vehicle.x - size.width / 2,
          y1: vehicle.y - size.height / 2,
          x2: vehicle.x + size.width / 2,
          y2: vehicle.y + size.height / 2,
        },
      } satisfies VehicleObservation;
    });
  }

  return { nextFrame };
}
