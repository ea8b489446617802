import type { LaneDetail, LaneNumber, RunStats, SimulationParams } from '../../shared/types';
import { roundHalfEven } from './rounding';

export const LANE_NUMBERS: readonly LaneNumber[] = [1, 2, 3, 4];

const LANE_DETAIL_KEYS = ['total', 'car', 'bus', 'truck', 'rickshaw', 'bike'] as const;

const LANE_STATS_PREFIX = 'LANE_STATS';
const SUMMARY_PREFIX = 'SUMMARY';
const COMPLETE_PREFIX = 'SIMULATION_COMPLETE';
const TOTAL_VEHICLES_PREFIX = 'Total vehicles passed';
const TOTAL_TIME_PREFIX = 'Total time passed';
const THROUGHPUT_PREFIX = 'No. of vehicles passed per unit time';

type ParseResult<T> = { ok: true; value: T } | { ok: false };

export interface TelemetryUpdate {
  stats: RunStats;
  complete: boolean;
}

function parsed<T>(value: T): ParseResult<T> {
  return { ok: true, value };
}

const FAILED: ParseResult<never> = { ok: false };

function emptyLaneDetail(): LaneDetail {
  return { total: 0, car: 0, bus: 0, truck: 0, rickshaw: 0, bike: 0 };
}

export function createEmptyStats(): RunStats {
  return {
    phase: '',
    laneTotals: { 1: 0, 2: 0, 3: 0, 4: 0 },
    laneDetails: {
      1: emptyLaneDetail(),
      2: emptyLaneDetail(),
      3: emptyLaneDetail(),
      4: emptyLaneDetail()
    },
    totalVehicles: 0,
    totalTime: 0,
    throughput: 0,
    averageWait: 0,
    trafficDensity: 0,
    congestionLevel: 0
  };
}

export function cloneStats(stats: RunStats): RunStats {
  return {
    ...stats,
    laneTotals: { ...stats.laneTotals },
    laneDetails: {
      1: { ...stats.laneDetails[1] },
      2: { ...stats.laneDetails[2] },
      3: { ...stats.laneDetails[3] },
      4: { ...stats.laneDetails[4] }
    }
  };
}

export function toLaneNumber(value: number): LaneNumber | null {
  return LANE_NUMBERS.find((lane) => lane === value) ?? null;
}

function parseInteger(raw: string): ParseResult<number> {
  const trimmed = raw.trim();
  if (!/^[+-]?\d+$/.test(trimmed)) {
    return FAILED;
  }
  const value = Number.parseInt(trimmed, 10);
  return value >= 0 ? parsed(value) : FAILED;
}

function parseDecimal(raw: string): ParseResult<number> {
  const trimmed = raw.trim();
  if (!/^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/.test(trimmed)) {
    return FAILED;
  }
  const value = Number(trimmed);
  if (!Number.isFinite(value) || value < 0) {
    return FAILED;
  }
  return parsed(value);
}

function parseTruncatedDecimal(raw: string): ParseResult<number> {
  const result = parseDecimal(raw);
  return result.ok ? parsed(Math.trunc(result.value)) : FAILED;
}

function parseKeyValueTokens(line: string): ParseResult<Map<string, string>> {
  const values = new Map<string, string>();
  for (const token of line.split(/\s+/).slice(1)) {
    const parts = token.split('=');
    if (parts.length !== 2) {
      return FAILED;
    }
    values.set(parts[0], parts[1]);
  }
  return parsed(values);
}

// Value after the first colon, up to the next one.
function parseColonValue(line: string): ParseResult<string> {
  const parts = line.split(':');
  return parts.length > 1 ? parsed(parts[1]) : FAILED;
}

function parseLaneStatsLine(line: string): ParseResult<{ lane: number; detail: LaneDetail }> {
  const tokens = parseKeyValueTokens(line);
  if (!tokens.ok) {
    return FAILED;
  }

  const lane = parseInteger(tokens.value.get('lane') ?? '0');
  if (!lane.ok) {
    return FAILED;
  }

  const detail = emptyLaneDetail();
  for (const key of LANE_DETAIL_KEYS) {
    const value = parseInteger(tokens.value.get(key) ?? '0');
    if (!value.ok) {
      return FAILED;
    }
    detail[key] = value.value;
  }

  return parsed({ lane: lane.value, detail });
}

function parseLaneTotalLine(line: string): ParseResult<{ lane: number; total: number }> {
  // "Lane 1: Total: 38"
  const parts = line.split(':');
  const laneWord = parts[0].trim().split(/\s+/)[1] ?? '';
  const lane = parseInteger(laneWord);
  const total = parseInteger(parts[2] ?? '');
  if (!lane.ok || !total.ok) {
    return FAILED;
  }
  return parsed({ lane: lane.value, total: total.value });
}

interface SummaryValues {
  totalVehicles?: number;
  totalTime?: number;
  throughput?: number;
}

function parseSummaryLine(line: string): ParseResult<SummaryValues> {
  const tokens = parseKeyValueTokens(line);
  if (!tokens.ok) {
    return FAILED;
  }

  const values: SummaryValues = {};
  const total = tokens.value.get('total');
  if (total !== undefined) {
    const result = parseTruncatedDecimal(total);
    if (!result.ok) {
      return FAILED;
    }
    values.totalVehicles = result.value;
  }
  const time = tokens.value.get('time');
  if (time !== undefined) {
    const result = parseTruncatedDecimal(time);
    if (!result.ok) {
      return FAILED;
    }
    values.totalTime = result.value;
  }
  const throughput = tokens.value.get('throughput');
  if (throughput !== undefined) {
    const result = parseDecimal(throughput);
    if (!result.ok) {
      return FAILED;
    }
    values.throughput = result.value;
  }
  return parsed(values);
}

export function theoreticalCapacity(simTime: number): number {
  return Math.max(1, simTime * 4);
}

export function recomputeDerivedMetrics(stats: RunStats, params: SimulationParams): RunStats {
  const averageWait = stats.totalVehicles > 0 ? roundHalfEven(Math.max(0, stats.totalTime / stats.totalVehicles), 2) : 0;
  const densityRatio = Math.min(1, stats.totalVehicles / theoreticalCapacity(params.simTime));
  const trafficDensity = roundHalfEven(densityRatio * 100, 1);

  return {
    ...stats,
    averageWait,
    trafficDensity,
    congestionLevel: trafficDensity
  };
}

/**
 * Folds one line of worker output into the statistics. Unknown or malformed lines
 * leave the statistics as they were; the input snapshot is never mutated.
 */
export function applyTelemetryLine(rawLine: string, current: RunStats, params: SimulationParams): TelemetryUpdate {
  const line = rawLine.trim();
  if (!line) {
    return { stats: current, complete: false };
  }

  let stats = cloneStats(current);

  // Red phases are skipped so the displayed phase does not flicker between cycles.
  if (line.includes('GREEN TS') || line.includes('YELLOW TS')) {
    stats.phase = line;
  }

  if (line.startsWith(LANE_STATS_PREFIX)) {
    const result = parseLaneStatsLine(line);
    const lane = result.ok ? toLaneNumber(result.value.lane) : null;
    if (result.ok && lane !== null) {
      stats.laneTotals[lane] = result.value.detail.total;
      stats.laneDetails[lane] = result.value.detail;
    }
  }

  if (line.startsWith('Lane ') && line.includes('Total:')) {
    const result = parseLaneTotalLine(line);
    const lane = result.ok ? toLaneNumber(result.value.lane) : null;
    if (result.ok && lane !== null) {
      stats.laneTotals[lane] = result.value.total;
    }
  }

  if (line.startsWith(TOTAL_VEHICLES_PREFIX)) {
    const raw = parseColonValue(line);
    const result = raw.ok ? parseTruncatedDecimal(raw.value) : FAILED;
    if (result.ok) {
      stats.totalVehicles = result.value;
    }
  }

  if (line.startsWith(TOTAL_TIME_PREFIX)) {
    const raw = parseColonValue(line);
    const result = raw.ok ? parseTruncatedDecimal(raw.value) : FAILED;
    if (result.ok) {
      stats.totalTime = result.value;
    }
    stats = recomputeDerivedMetrics(stats, params);
  }

  if (line.startsWith(THROUGHPUT_PREFIX)) {
    const raw = parseColonValue(line);
    const result = raw.ok ? parseDecimal(raw.value) : FAILED;
    if (result.ok) {
      stats.throughput = result.value;
    }
    stats = recomputeDerivedMetrics(stats, params);
  }

  if (line.startsWith(SUMMARY_PREFIX)) {
    const result = parseSummaryLine(line);
    if (result.ok) {
      stats = { ...stats, ...result.value };
    }
    stats = recomputeDerivedMetrics(stats, params);
  }

  return { stats, complete: line.startsWith(COMPLETE_PREFIX) };
}
