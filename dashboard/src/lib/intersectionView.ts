import type { LaneDetail, LaneNumber, RunStats, VehicleClass } from '../../shared/types';

export const CANVAS_SIZE = 360;
export const ROAD_WIDTH = 70;
export const SPAWN_PER_VEHICLE = 3;
export const MAX_VEHICLES = 240;

const LANE_OFFSET = 15;
const FRAME_MS = 16.67;
const VEHICLE_CLASSES: readonly VehicleClass[] = ['car', 'bus', 'truck', 'rickshaw', 'bike'];
const LANE_NUMBERS: readonly LaneNumber[] = [1, 2, 3, 4];

export const SIGNAL_IDLE = '#4b5563';
export const SIGNAL_GREEN = '#22c55e';
export const SIGNAL_YELLOW = '#eab308';

export const VEHICLE_COLORS: Record<VehicleClass, string> = {
  car: '#38bdf8',
  bus: '#a855f7',
  truck: '#f97316',
  rickshaw: '#22c55e',
  bike: '#facc15'
};

// Pixels per 60 fps frame.
const VEHICLE_SPEEDS: Record<VehicleClass, number> = {
  car: 1.575,
  bus: 1.26,
  truck: 1.26,
  rickshaw: 1.4,
  bike: 1.75
};

export interface CanvasVehicle {
  lane: LaneNumber;
  vehicleClass: VehicleClass;
  x: number;
  y: number;
  dx: number;
  dy: number;
  size: number;
}

export interface SignalLamp {
  lane: LaneNumber;
  x: number;
  y: number;
  color: string;
}

function phaseLane(phase: string, marker: string): LaneNumber | null {
  const index = phase.indexOf(marker);
  if (index < 0) {
    return null;
  }
  const lane = Number.parseInt(phase.slice(index + marker.length).trim(), 10);
  return LANE_NUMBERS.find((candidate) => candidate === lane) ?? 1;
}

/**
 * Lamp colours for lanes 1 to 4. A green or yellow phase lights its lane,
 * falling back to lane 1 when the phase names no valid lane.
 */
export function signalColors(phase: string): [string, string, string, string] {
  const colors: [string, string, string, string] = [SIGNAL_IDLE, SIGNAL_IDLE, SIGNAL_IDLE, SIGNAL_IDLE];
  const green = phaseLane(phase, 'GREEN TS');
  if (green !== null) {
    colors[green - 1] = SIGNAL_GREEN;
    return colors;
  }
  const yellow = phaseLane(phase, 'YELLOW TS');
  if (yellow !== null) {
    colors[yellow - 1] = SIGNAL_YELLOW;
  }
  return colors;
}

export function signalLamps(phase: string, size = CANVAS_SIZE): SignalLamp[] {
  const colors = signalColors(phase);
  const c = size / 2;
  const positions: Record<LaneNumber, { x: number; y: number }> = {
    1: { x: c + 70, y: c - 20 },
    2: { x: c + 20, y: c + 70 },
    3: { x: c - 70, y: c + 20 },
    4: { x: c - 20, y: c - 70 }
  };
  return LANE_NUMBERS.map((lane) => ({ lane, ...positions[lane], color: colors[lane - 1] }));
}

// Lane 1 enters from the left, 2 from the top, 3 from the right and 4 from the bottom.
export function createVehicle(lane: LaneNumber, vehicleClass: VehicleClass, size = CANVAS_SIZE): CanvasVehicle {
  const speed = VEHICLE_SPEEDS[vehicleClass];
  const vehicleSize = vehicleClass === 'bus' || vehicleClass === 'truck' ? 16 : 12;
  const c = size / 2;
  switch (lane) {
    case 1:
      return { lane, vehicleClass, x: 0, y: c + LANE_OFFSET, dx: speed, dy: 0, size: vehicleSize };
    case 2:
      return { lane, vehicleClass, x: c + LANE_OFFSET, y: 0, dx: 0, dy: speed, size: vehicleSize };
    case 3:
      return { lane, vehicleClass, x: size, y: c - LANE_OFFSET, dx: -speed, dy: 0, size: vehicleSize };
    case 4:
      return { lane, vehicleClass, x: c - LANE_OFFSET, y: size, dx: 0, dy: -speed, size: vehicleSize };
  }
}

/**
 * Vehicles to add after a stats update: {@link SPAWN_PER_VEHICLE} per newly
 * counted vehicle of each class on each lane. Counts that fall add nothing.
 */
export function spawnFromLaneDetails(
  current: RunStats['laneDetails'],
  previous: RunStats['laneDetails'] | null,
  size = CANVAS_SIZE
): CanvasVehicle[] {
  if (!previous) {
    return [];
  }

  const spawned: CanvasVehicle[] = [];
  for (const lane of LANE_NUMBERS) {
    const now: LaneDetail = current[lane];
    const before: LaneDetail = previous[lane];
    for (const vehicleClass of VEHICLE_CLASSES) {
      const delta = Math.max(0, now[vehicleClass] - before[vehicleClass]);
      for (let n = 0; n < delta * SPAWN_PER_VEHICLE; n += 1) {
        spawned.push(createVehicle(lane, vehicleClass, size));
      }
    }
  }
  return spawned;
}

/** Moves every vehicle by the elapsed time and drops the ones that left the canvas. */
export function advanceVehicles(vehicles: CanvasVehicle[], deltaMs: number, size = CANVAS_SIZE): CanvasVehicle[] {
  const steps = deltaMs / FRAME_MS;
  const moved: CanvasVehicle[] = [];
  for (const vehicle of vehicles) {
    const x = vehicle.x + vehicle.dx * steps;
    const y = vehicle.y + vehicle.dy * steps;
    if (x < -vehicle.size || y < -vehicle.size || x > size + vehicle.size || y > size + vehicle.size) {
      continue;
    }
    moved.push({ ...vehicle, x, y });
  }
  return moved.slice(-MAX_VEHICLES);
}
