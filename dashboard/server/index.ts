import express from 'express';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import type { RunsPayload, RuntimeDepsPayload } from '../shared/types';
import { createCityCatalog, loadCityMeta, loadCityRecords } from './lib/cities';
import { warmCityImageCache } from './lib/cityImages';
import { loadDashboardConfig } from './lib/config';
import { createRunRegistry } from './lib/runRegistry';
import { checkRuntimeDependencies } from './lib/runtimeDeps';
import { RunNotFoundError, createSimulationRunManager } from './lib/simulationRuns';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);
const dashboardRoot = path.resolve(__dirname, '..');
const repoRoot = path.resolve(dashboardRoot, '..');

const config = loadDashboardConfig(repoRoot);
const runtimeDependencies = checkRuntimeDependencies(config.simCommand);
const simRunsEnabled = config.simRunsConfigured && runtimeDependencies.simulator.available;
const simRunsDisabledReason =
  config.simRunsConfigured && !runtimeDependencies.simulator.available
    ? `Simulation runs are unavailable because "${config.simCommand}" is missing in this API runtime. Set DASHBOARD_SIM_COMMAND or install the simulator runtime.`
    : 'Simulation runs are disabled in this environment.';

console.log(
  `[runtime-deps] simulator=${runtimeDependencies.simulator.available ? 'available' : 'missing'} (command=${config.simCommand})`
);
if (runtimeDependencies.simulator.versionOutput) {
  console.log(`[runtime-deps] simulator version: ${runtimeDependencies.simulator.versionOutput.split('\n')[0]}`);
}
if (runtimeDependencies.simulator.error) {
  console.error(`[runtime-deps] simulator error: ${runtimeDependencies.simulator.error}`);
}

const registry = createRunRegistry();
const runManager = createSimulationRunManager({
  registry,
  projectRoot: repoRoot,
  simCommand: config.simCommand,
  simScript: config.simScript,
  stopGraceMs: config.stopGraceMs,
  logTailLines: config.logTailLines
});

const cityCatalog = createCityCatalog(loadCityRecords(config.cityDataPath), loadCityMeta(config.cityMetaPath));
console.log(`[dashboard-api] loaded ${cityCatalog.records.length} city records from ${config.cityDataPath}`);
if (config.cityImageLookup) {
  warmCityImageCache(cityCatalog).catch((error: unknown) => {
    console.warn(`[city-images] warm-up failed: ${(error as Error).message}`);
  });
}

const app = express();

app.use(express.json());
app.use((req, res, next) => {
  if (!config.corsOrigin) {
    next();
    return;
  }

  const requestOrigin = req.get('origin');
  if (requestOrigin && requestOrigin === config.corsOrigin) {
    res.setHeader('Access-Control-Allow-Origin', config.corsOrigin);
    res.setHeader('Access-Control-Allow-Methods', 'GET,POST,OPTIONS');
    res.setHeader('Access-Control-Allow-Headers', 'Content-Type');
    res.setHeader('Vary', 'Origin');
  }

  if (req.method === 'OPTIONS') {
    res.status(204).end();
    return;
  }

  next();
});

function sendRunError(res: express.Response, error: unknown): void {
  if (error instanceof RunNotFoundError) {
    res.status(404).json({ error: 'run not found' });
    return;
  }
  res.status(400).json({ error: (error as Error).message });
}

function requireSimRuns(res: express.Response): boolean {
  if (simRunsEnabled) {
    return true;
  }
  res.status(403).json({ error: simRunsDisabledReason });
  return false;
}

app.get('/healthz', (_req, res) => {
  res.json({ ok: true });
});

app.get('/api/runtime-deps', (_req, res) => {
  const deps = checkRuntimeDependencies(config.simCommand);
  const payload: RuntimeDepsPayload = {
    simulator: deps.simulator.available,
    simulatorCommand: deps.simulatorCommand,
    simRunsConfigured: config.simRunsConfigured,
    simRunsEnabled: config.simRunsConfigured && deps.simulator.available,
    versionInfo: {
      simulator: deps.simulator.versionOutput || null,
      simulatorError: deps.simulator.error ?? null
    }
  };
  res.json(payload);
});

app.post('/api/run', (req, res) => {
  if (!requireSimRuns(res)) {
    return;
  }

  const body: unknown = req.body;
  const input = typeof body === 'object' && body !== null ? body : {};
  try {
    res.json(
      runManager.startRun({
        simTime: Reflect.get(input, 'simTime'),
        minGreen: Reflect.get(input, 'minGreen'),
        maxGreen: Reflect.get(input, 'maxGreen')
      })
    );
  } catch (error) {
    sendRunError(res, error);
  }
});

app.get('/api/status/:runId', (req, res) => {
  try {
    res.json(runManager.getRunStatus(String(req.params.runId ?? '')));
  } catch (error) {
    sendRunError(res, error);
  }
});

app.post('/api/stop/:runId', (req, res) => {
  try {
    res.json(runManager.stopRun(String(req.params.runId ?? '')));
  } catch (error) {
    sendRunError(res, error);
  }
});

app.get('/api/runs', (_req, res) => {
  const payload: RunsPayload = { runs: runManager.listRuns() };
  res.json(payload);
});

app.get('/api/runs/:runId/logs', (req, res) => {
  const cursorRaw = Number.parseInt(String(req.query.cursor ?? '0'), 10);
  const limitRaw = Number.parseInt(String(req.query.limit ?? '200'), 10);

  try {
    res.json(
      runManager.getRunLogs(
        String(req.params.runId ?? ''),
        Number.isFinite(cursorRaw) ? cursorRaw : undefined,
        Number.isFinite(limitRaw) ? limitRaw : undefined
      )
    );
  } catch (error) {
    sendRunError(res, error);
  }
});

app.get('/api/home-metrics', (_req, res) => {
  res.json(cityCatalog.homeMetrics);
});

app.get('/api/cities', (req, res) => {
  res.json(cityCatalog.listCities(String(req.query.q ?? '')));
});

app.get('/api/cities/:slug', (req, res) => {
  const result = cityCatalog.findCity(String(req.params.slug ?? ''));
  if (result === 'not_found') {
    res.status(404).json({ error: 'city not found' });
    return;
  }
  if (result === 'excluded') {
    res.status(404).json({ error: 'city not available' });
    return;
  }
  res.json(result);
});

const server = app.listen(config.port, config.host, () => {
  console.log(`[dashboard-api] listening on ${config.host}:${config.port}`);
});

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.once(signal, () => {
    console.log(`[dashboard-api] ${signal} received; stopping simulation workers`);
    runManager.shutdown();
    server.close(() => process.exit(0));
  });
}
