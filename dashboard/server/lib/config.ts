import path from 'node:path';

export interface DashboardConfig {
  host: string;
  port: number;
  corsOrigin: string;
  simRunsConfigured: boolean;
  simCommand: string;
  simScript: string;
  stopGraceMs: number;
  logTailLines: number;
  cityDataPath: string;
  cityMetaPath: string;
  cityImageLookup: boolean;
}

type Env = Record<string, string | undefined>;

type ConfigWarn = (message: string) => void;

const DEFAULT_PORT = 8787;
const DEFAULT_STOP_GRACE_MS = 3_000;
const DEFAULT_LOG_TAIL_LINES = 300;

function readPositiveInt(env: Env, key: string, fallback: number, warn: ConfigWarn): number {
  const raw = env[key]?.trim();
  if (!raw) {
    return fallback;
  }
  const value = Number.parseInt(raw, 10);
  if (!Number.isFinite(value) || value <= 0 || String(value) !== raw) {
    warn(`[config] ${key}=${raw} is not a positive integer; using ${fallback}.`);
    return fallback;
  }
  return value;
}

export function getConfiguredSimCommand(env: Env = process.env): string {
  return env.DASHBOARD_SIM_COMMAND?.trim() || 'python3';
}

export function loadDashboardConfig(
  repoRoot: string,
  env: Env = process.env,
  warn: ConfigWarn = (message) => console.warn(message)
): DashboardConfig {
  const portRaw = env.PORT ?? env.DASHBOARD_API_PORT;
  const port = portRaw === undefined
    ? DEFAULT_PORT
    : readPositiveInt({ PORT: portRaw }, 'PORT', DEFAULT_PORT, warn);

  return {
    host: '0.0.0.0',
    port,
    corsOrigin: env.DASHBOARD_CORS_ORIGIN?.trim() ?? '',
    simRunsConfigured: (env.DASHBOARD_ENABLE_SIM_RUNS?.trim().toLowerCase() ?? '') !== 'false',
    simCommand: getConfiguredSimCommand(env),
    simScript: env.DASHBOARD_SIM_SCRIPT?.trim() || 'simulation.py',
    stopGraceMs: readPositiveInt(env, 'DASHBOARD_STOP_GRACE_MS', DEFAULT_STOP_GRACE_MS, warn),
    logTailLines: readPositiveInt(env, 'DASHBOARD_LOG_TAIL_LINES', DEFAULT_LOG_TAIL_LINES, warn),
    cityDataPath: path.resolve(repoRoot, env.DASHBOARD_CITY_DATA_PATH?.trim() || 'dashboard/data/cities.json'),
    cityMetaPath: path.resolve(repoRoot, env.DASHBOARD_CITY_META_PATH?.trim() || 'dashboard/data/city-meta.json'),
    cityImageLookup: (env.DASHBOARD_CITY_IMAGE_LOOKUP?.trim().toLowerCase() ?? '') === 'true'
  };
}
