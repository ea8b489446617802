import type { LaneNumber, RunStats, VehicleClass } from '../../shared/types';

export const THROUGHPUT_HISTORY_LIMIT = 30;
export const DEFAULT_TIP = 'Monitor lane flow to keep the intersection balanced.';

const STABLE_DELTA = 0.05;
const VEHICLE_CLASSES: readonly VehicleClass[] = ['car', 'bus', 'truck', 'rickshaw', 'bike'];
const LANE_NUMBERS: readonly LaneNumber[] = [1, 2, 3, 4];

export const VEHICLE_LABELS: Record<VehicleClass, string> = {
  car: 'Car',
  bus: 'Bus',
  truck: 'Truck',
  rickshaw: 'Rickshaw',
  bike: 'Bike'
};

export interface RunInsights {
  busiestLane: { lane: LaneNumber; count: number } | null;
  dominantClass: { vehicleClass: VehicleClass; count: number } | null;
  throughputLabel: string;
  tip: string;
}

export function pushThroughputSample(history: number[], throughput: number): number[] {
  if (!Number.isFinite(throughput)) {
    return history;
  }
  return [...history, throughput].slice(-THROUGHPUT_HISTORY_LIMIT);
}

export function describeThroughputTrend(history: number[]): string {
  if (history.length === 0) {
    return '—';
  }
  const current = history[history.length - 1];
  if (history.length === 1) {
    return `${current.toFixed(2)} veh/unit`;
  }

  const delta = current - history[history.length - 2];
  if (Math.abs(delta) < STABLE_DELTA) {
    return `Stable (${current.toFixed(2)})`;
  }
  return delta > 0 ? `Rising ↑ (${current.toFixed(2)})` : `Falling ↓ (${current.toFixed(2)})`;
}

function findBusiestLane(stats: RunStats): RunInsights['busiestLane'] {
  let busiest: RunInsights['busiestLane'] = null;
  for (const lane of LANE_NUMBERS) {
    const count = stats.laneTotals[lane];
    if (count > 0 && (busiest === null || count > busiest.count)) {
      busiest = { lane, count };
    }
  }
  return busiest;
}

function findDominantClass(stats: RunStats): RunInsights['dominantClass'] {
  let dominant: RunInsights['dominantClass'] = null;
  for (const vehicleClass of VEHICLE_CLASSES) {
    const count = LANE_NUMBERS.reduce((total, lane) => total + stats.laneDetails[lane][vehicleClass], 0);
    if (count > 0 && (dominant === null || count > dominant.count)) {
      dominant = { vehicleClass, count };
    }
  }
  return dominant;
}

export function buildRunInsights(stats: RunStats, throughputHistory: number[]): RunInsights {
  const busiestLane = findBusiestLane(stats);
  const dominantClass = findDominantClass(stats);

  let tip = DEFAULT_TIP;
  if (stats.trafficDensity >= 80) {
    tip = 'Trigger congestion management: extend relief phases and publish detours.';
  } else if (stats.averageWait >= 20) {
    tip = 'Average wait is high. Tighten cycle length and bias towards the busiest lane.';
  } else if (dominantClass?.vehicleClass === 'bus') {
    tip = 'Transit-heavy demand detected. Enable bus priority for smoother headways.';
  } else if (dominantClass?.vehicleClass === 'truck') {
    tip = 'Freight surge in progress. Schedule freight-friendly greens to clear queues.';
  } else if (busiestLane) {
    tip = `Balance flow: Lane ${busiestLane.lane} is leading counts right now.`;
  }

  return {
    busiestLane,
    dominantClass,
    throughputLabel: describeThroughputTrend(throughputHistory),
    tip
  };
}
