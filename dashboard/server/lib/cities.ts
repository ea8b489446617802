import fs from 'node:fs';
import { roundHalfEven } from './rounding';
import type { CitiesPayload, CityPayload, CityPriority, CitySuitability, HomeMetrics } from '../../shared/types';

export const EXCLUDED_CITIES = new Set(['kochi', 'nagpur', 'salem']);

const SEARCH_RESULT_LIMIT = 50;

export interface CityRecord {
  city: string;
  state: string;
  classification: string;
  populationMillions: number;
  avgPeakSpeedKmph: number;
  avgDelayMinutes: number;
  vehicleMix: Record<string, number>;
  issues: string[];
  recommendedActions: string[];
  imageUrl?: string;
  imageCredit?: string;
  imageSource?: string;
  landmarkName?: string;
  landmarkUrl?: string;
}

export interface CityMeta {
  landmarkName?: string;
  landmarkUrl?: string;
  imageUrl?: string;
  imageCredit?: string;
  imageSource?: string;
}

export type CityMetaTable = Map<string, CityMeta>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readString(source: Record<string, unknown>, key: string, context: string): string {
  const value = source[key];
  if (typeof value !== 'string' || !value.trim()) {
    throw new Error(`${context}: ${key} must be a non-empty string.`);
  }
  return value.trim();
}

function readOptionalString(source: Record<string, unknown>, key: string): string | undefined {
  const value = source[key];
  return typeof value === 'string' && value.trim() ? value.trim() : undefined;
}

function readNumber(source: Record<string, unknown>, key: string, context: string): number {
  const value = source[key];
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new Error(`${context}: ${key} must be a finite number.`);
  }
  return value;
}

function readStringList(source: Record<string, unknown>, key: string): string[] {
  const value = source[key];
  if (!Array.isArray(value)) {
    return [];
  }
  return value.filter((item): item is string => typeof item === 'string');
}

function readNumberMap(source: Record<string, unknown>, key: string): Record<string, number> {
  const value = source[key];
  const out: Record<string, number> = {};
  if (!isRecord(value)) {
    return out;
  }
  for (const [name, share] of Object.entries(value)) {
    if (typeof share === 'number' && Number.isFinite(share)) {
      out[name] = share;
    }
  }
  return out;
}

export function parseCityRecord(raw: unknown, index: number): CityRecord {
  const context = `City record #${index}`;
  if (!isRecord(raw)) {
    throw new Error(`${context} is not an object.`);
  }

  return {
    city: readString(raw, 'city', context),
    state: readString(raw, 'state', context),
    classification: readString(raw, 'classification', context),
    populationMillions: readNumber(raw, 'populationMillions', context),
    avgPeakSpeedKmph: readNumber(raw, 'avgPeakSpeedKmph', context),
    avgDelayMinutes: readNumber(raw, 'avgDelayMinutes', context),
    vehicleMix: readNumberMap(raw, 'vehicleMix'),
    issues: readStringList(raw, 'issues'),
    recommendedActions: readStringList(raw, 'recommendedActions'),
    imageUrl: readOptionalString(raw, 'imageUrl'),
    imageCredit: readOptionalString(raw, 'imageCredit'),
    imageSource: readOptionalString(raw, 'imageSource'),
    landmarkName: readOptionalString(raw, 'landmarkName'),
    landmarkUrl: readOptionalString(raw, 'landmarkUrl')
  };
}

export function loadCityRecords(dataPath: string): CityRecord[] {
  const raw: unknown = JSON.parse(fs.readFileSync(dataPath, 'utf-8'));
  if (!Array.isArray(raw)) {
    throw new Error(`City dataset ${dataPath} must be a JSON array.`);
  }
  return raw.map((entry, index) => parseCityRecord(entry, index));
}

export function loadCityMeta(metaPath: string): CityMetaTable {
  const table: CityMetaTable = new Map();
  if (!fs.existsSync(metaPath)) {
    return table;
  }

  const raw: unknown = JSON.parse(fs.readFileSync(metaPath, 'utf-8'));
  if (!isRecord(raw)) {
    throw new Error(`City metadata ${metaPath} must be a JSON object.`);
  }
  for (const [name, entry] of Object.entries(raw)) {
    if (!isRecord(entry)) {
      continue;
    }
    table.set(cityMetaKey(name), {
      landmarkName: readOptionalString(entry, 'landmarkName'),
      landmarkUrl: readOptionalString(entry, 'landmarkUrl'),
      imageUrl: readOptionalString(entry, 'imageUrl'),
      imageCredit: readOptionalString(entry, 'imageCredit'),
      imageSource: readOptionalString(entry, 'imageSource')
    });
  }
  return table;
}

export function cityMetaKey(name: string): string {
  return name.trim().toLowerCase();
}

export function normalizeKey(value: string): string {
  return value
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, ' ')
    .trim();
}

export function buildCityIndex(records: CityRecord[]): Map<string, CityRecord> {
  const index = new Map<string, CityRecord>();
  for (const record of records) {
    index.set(normalizeKey(record.city), record);
    index.set(normalizeKey(`${record.city} ${record.state}`), record);
  }
  return index;
}

function mean(values: number[]): number {
  return values.reduce((total, value) => total + value, 0) / values.length;
}

export function scoreCity(record: CityRecord): CitySuitability {
  // Weighted towards long delays, then slow peak speeds, then population.
  const delayScore = Math.min(1, record.avgDelayMinutes / 45);
  const speedScore = 1 - Math.min(1, record.avgPeakSpeedKmph / 40);
  const populationScore = Math.min(1, record.populationMillions / 15);
  const score = roundHalfEven((delayScore * 0.45 + speedScore * 0.35 + populationScore * 0.2) * 100, 1);

  let priority: CityPriority = 'Moderate';
  if (score >= 70) {
    priority = 'High';
  } else if (score >= 45) {
    priority = 'Medium';
  }

  return {
    score,
    priority,
    rationale: [
      `Average delay of ${record.avgDelayMinutes.toFixed(0)} minutes`,
      `Peak speed around ${record.avgPeakSpeedKmph.toFixed(0)} km/h`,
      `Population ~${record.populationMillions.toFixed(1)}M`
    ]
  };
}

export function aggregateHomeMetrics(records: CityRecord[]): HomeMetrics {
  if (records.length === 0) {
    return {
      density: 0,
      avgWait: 0,
      travelSpeed: 0,
      cityCount: 0,
      priorityHighPct: 0,
      priorityMediumPct: 0,
      priorityModeratePct: 0
    };
  }

  const meanDelay = mean(records.map((record) => record.avgDelayMinutes));
  const meanSpeed = mean(records.map((record) => record.avgPeakSpeedKmph));
  const counts: Record<CityPriority, number> = { High: 0, Medium: 0, Moderate: 0 };
  for (const record of records) {
    counts[scoreCity(record).priority] += 1;
  }
  const pct = (count: number) => roundHalfEven((count / records.length) * 100);

  return {
    density: roundHalfEven(Math.min(95, Math.max(15, (meanDelay / 45) * 100))),
    avgWait: roundHalfEven(meanDelay),
    travelSpeed: roundHalfEven(meanSpeed, 1),
    cityCount: records.length,
    priorityHighPct: pct(counts.High),
    priorityMediumPct: pct(counts.Medium),
    priorityModeratePct: pct(counts.Moderate)
  };
}

export function isExcludedCity(record: CityRecord): boolean {
  return EXCLUDED_CITIES.has(cityMetaKey(record.city));
}

export function searchCityRecords(records: CityRecord[], query: string | undefined): CityRecord[] {
  const needle = query?.trim().toLowerCase() ?? '';
  if (!needle) {
    return [...records].sort(
      (left, right) => right.avgDelayMinutes - left.avgDelayMinutes || left.city.localeCompare(right.city)
    );
  }

  return records
    .filter((record) => `${record.city} ${record.state} ${record.classification}`.toLowerCase().includes(needle))
    .slice(0, SEARCH_RESULT_LIMIT);
}

export function toCityPayload(record: CityRecord, meta: CityMetaTable, imageCache: Map<string, string>): CityPayload {
  const key = cityMetaKey(record.city);
  const defaults = meta.get(key) ?? {};

  return {
    city: record.city,
    state: record.state,
    classification: record.classification,
    populationMillions: record.populationMillions,
    avgPeakSpeedKmph: record.avgPeakSpeedKmph,
    avgDelayMinutes: record.avgDelayMinutes,
    vehicleMix: { ...record.vehicleMix },
    issues: [...record.issues],
    recommendedActions: [...record.recommendedActions],
    imageUrl: record.imageUrl || defaults.imageUrl || imageCache.get(key) || '',
    imageCredit: record.imageCredit || defaults.imageCredit || '',
    imageSource: record.imageSource || defaults.imageSource || '',
    landmarkName: record.landmarkName || defaults.landmarkName || '',
    landmarkUrl: record.landmarkUrl || defaults.landmarkUrl || '',
    suitability: scoreCity(record)
  };
}

export interface CityCatalog {
  records: CityRecord[];
  meta: CityMetaTable;
  imageCache: Map<string, string>;
  homeMetrics: HomeMetrics;
  listCities(query: string | undefined): CitiesPayload;
  findCity(slug: string): CityPayload | 'not_found' | 'excluded';
}

export function createCityCatalog(records: CityRecord[], meta: CityMetaTable): CityCatalog {
  const index = buildCityIndex(records);
  const imageCache = new Map<string, string>();

  return {
    records,
    meta,
    imageCache,
    homeMetrics: aggregateHomeMetrics(records),

    listCities(query) {
      const items = searchCityRecords(records, query)
        .filter((record) => !isExcludedCity(record))
        .map((record) => toCityPayload(record, meta, imageCache));
      return { count: items.length, items };
    },

    findCity(slug) {
      const record = index.get(normalizeKey(slug));
      if (!record) {
        return 'not_found';
      }
      if (isExcludedCity(record)) {
        return 'excluded';
      }
      return toCityPayload(record, meta, imageCache);
    }
  };
}
