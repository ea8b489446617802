import assert from 'node:assert/strict';
import { getConfiguredSimCommand, loadDashboardConfig } from '../server/lib/config.js';
import { checkRuntimeDependencies } from '../server/lib/runtimeDeps.js';

const warnings: string[] = [];
const collectWarning = (message: string) => {
  warnings.push(message);
};

const defaults = loadDashboardConfig('/srv/traffic', {}, collectWarning);
assert.deepEqual(defaults, {
  host: '0.0.0.0',
  port: 8787,
  corsOrigin: '',
  simRunsConfigured: true,
  simCommand: 'python3',
  simScript: 'simulation.py',
  stopGraceMs: 3000,
  logTailLines: 300,
  cityDataPath: '/srv/traffic/dashboard/data/cities.json',
  cityMetaPath: '/srv/traffic/dashboard/data/city-meta.json',
  cityImageLookup: false
});
assert.deepEqual(warnings, []);

const custom = loadDashboardConfig(
  '/srv/traffic',
  {
    DASHBOARD_API_PORT: '9001',
    DASHBOARD_CORS_ORIGIN: ' http://localhost:5173 ',
    DASHBOARD_ENABLE_SIM_RUNS: 'FALSE',
    DASHBOARD_SIM_COMMAND: ' /opt/sim/bin/python ',
    DASHBOARD_SIM_SCRIPT: 'tools/sim.py',
    DASHBOARD_STOP_GRACE_MS: '500',
    DASHBOARD_LOG_TAIL_LINES: '50',
    DASHBOARD_CITY_DATA_PATH: '/data/cities.json',
    DASHBOARD_CITY_META_PATH: 'meta/cities-meta.json',
    DASHBOARD_CITY_IMAGE_LOOKUP: 'true'
  },
  collectWarning
);
assert.equal(custom.port, 9001);
assert.equal(custom.corsOrigin, 'http://localhost:5173');
assert.equal(custom.simRunsConfigured, false);
assert.equal(custom.simCommand, '/opt/sim/bin/python');
assert.equal(custom.simScript, 'tools/sim.py');
assert.equal(custom.stopGraceMs, 500);
assert.equal(custom.logTailLines, 50);
assert.equal(custom.cityDataPath, '/data/cities.json');
assert.equal(custom.cityMetaPath, '/srv/traffic/meta/cities-meta.json');
assert.equal(custom.cityImageLookup, true);

assert.equal(loadDashboardConfig('/srv/traffic', { PORT: '7000', DASHBOARD_API_PORT: '9001' }, collectWarning).port, 7000);

const invalid = loadDashboardConfig(
  '/srv/traffic',
  { PORT: 'eighty', DASHBOARD_STOP_GRACE_MS: '12abc', DASHBOARD_LOG_TAIL_LINES: '0' },
  collectWarning
);
assert.equal(invalid.port, 8787);
assert.equal(invalid.stopGraceMs, 3000);
assert.equal(invalid.logTailLines, 300);
assert.deepEqual(warnings, [
  '[config] PORT=eighty is not a positive integer; using 8787.',
  '[config] DASHBOARD_STOP_GRACE_MS=12abc is not a positive integer; using 3000.',
  '[config] DASHBOARD_LOG_TAIL_LINES=0 is not a positive integer; using 300.'
]);

assert.equal(getConfiguredSimCommand({ DASHBOARD_SIM_COMMAND: '   ' }), 'python3');

const checkedCommands: string[][] = [];
const deps = checkRuntimeDependencies('sim-python', (command, args) => {
  checkedCommands.push([command, ...args]);
  return { available: false, versionOutput: '', error: 'spawnSync sim-python ENOENT' };
});
assert.deepEqual(checkedCommands, [['sim-python', '--version']]);
assert.equal(deps.simulatorCommand, 'sim-python');
assert.equal(deps.simulator.available, false);
assert.equal(deps.simulator.error, 'spawnSync sim-python ENOENT');

console.log('Config tests passed.');
