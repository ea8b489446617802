import assert from 'node:assert/strict';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import {
  aggregateHomeMetrics,
  createCityCatalog,
  loadCityMeta,
  loadCityRecords,
  normalizeKey,
  parseCityRecord,
  scoreCity,
  searchCityRecords,
  type CityRecord
} from '../server/lib/cities.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);
const dashboardRoot = path.resolve(__dirname, '..');

function makeCity(overrides: Partial<CityRecord>): CityRecord {
  return {
    city: 'Sample',
    state: 'State',
    classification: 'tier_1',
    populationMillions: 1,
    avgPeakSpeedKmph: 30,
    avgDelayMinutes: 10,
    vehicleMix: {},
    issues: [],
    recommendedActions: [],
    ...overrides
  };
}

const gridlock = makeCity({ city: 'Gridlock', avgDelayMinutes: 90, avgPeakSpeedKmph: 0, populationMillions: 30 });
const openRoad = makeCity({ city: 'Open Road', avgDelayMinutes: 0, avgPeakSpeedKmph: 40, populationMillions: 0 });
const midway = makeCity({ city: 'Midway', avgDelayMinutes: 22.5, avgPeakSpeedKmph: 20, populationMillions: 7.5 });

assert.deepEqual(scoreCity(gridlock), {
  score: 100,
  priority: 'High',
  rationale: ['Average delay of 90 minutes', 'Peak speed around 0 km/h', 'Population ~30.0M']
});
assert.equal(scoreCity(openRoad).score, 0);
assert.equal(scoreCity(openRoad).priority, 'Moderate');
assert.equal(scoreCity(midway).score, 50);
assert.equal(scoreCity(midway).priority, 'Medium');

assert.deepEqual(aggregateHomeMetrics([gridlock, openRoad, midway]), {
  density: 83,
  avgWait: 38,
  travelSpeed: 20,
  cityCount: 3,
  priorityHighPct: 33,
  priorityMediumPct: 33,
  priorityModeratePct: 33
});
assert.equal(aggregateHomeMetrics([]).cityCount, 0);
assert.equal(aggregateHomeMetrics([openRoad]).density, 15);

// Exact halves round to the even neighbour.
{
  const slowCity = makeCity({ city: 'Slow City', avgDelayMinutes: 45 });
  const metrics = aggregateHomeMetrics([openRoad, slowCity]);
  assert.equal(metrics.avgWait, 22);
  assert.equal(metrics.density, 50);
}

assert.deepEqual(
  searchCityRecords([openRoad, midway, gridlock], '').map((record) => record.city),
  ['Gridlock', 'Midway', 'Open Road']
);
assert.deepEqual(
  searchCityRecords([openRoad, midway, gridlock], ' ROAD ').map((record) => record.city),
  ['Open Road']
);

assert.equal(normalizeKey('Navi-Mumbai '), 'navi mumbai');
assert.throws(() => parseCityRecord({ city: 'X', state: 'Y' }, 4), /City record #4: classification must be a non-empty string\./);
assert.throws(() => parseCityRecord([], 0), /City record #0 is not an object\./);

// Bundled dataset.
const records = loadCityRecords(path.join(dashboardRoot, 'data/cities.json'));
const meta = loadCityMeta(path.join(dashboardRoot, 'data/city-meta.json'));
assert.equal(records.length, 12);
assert.ok(meta.get('navi mumbai')?.landmarkName);

const catalog = createCityCatalog(records, meta);
const listed = catalog.listCities('');
assert.equal(listed.count, 11);
assert.equal(listed.items[0].city, 'Bengaluru');
assert.ok(listed.items.every((item) => item.city !== 'Kochi'));
assert.deepEqual(
  catalog.listCities('maharashtra').items.map((item) => item.city),
  ['Mumbai', 'Pune', 'Navi Mumbai']
);

assert.equal(catalog.findCity('kochi'), 'excluded');
assert.equal(catalog.findCity('atlantis'), 'not_found');
const naviMumbai = catalog.findCity('navi-mumbai');
assert.ok(typeof naviMumbai === 'object');
assert.equal(naviMumbai.state, 'Maharashtra');
const byState = catalog.findCity('Pune Maharashtra');
assert.ok(typeof byState === 'object');
assert.equal(byState.city, 'Pune');

// Record fields win over metadata, and metadata over cached lookups.
{
  const tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'city-meta-'));
  const metaPath = path.join(tempDir, 'meta.json');
  fs.writeFileSync(
    metaPath,
    JSON.stringify({
      ' Alpha ': { landmarkName: 'Alpha Gate', imageUrl: 'https://img.example/alpha-meta.jpg' },
      Beta: { landmarkName: 'Beta Fort' },
      Broken: 'not an object'
    })
  );
  const tableFromFile = loadCityMeta(metaPath);
  assert.deepEqual([...tableFromFile.keys()], ['alpha', 'beta']);
  assert.equal(loadCityMeta(path.join(tempDir, 'missing.json')).size, 0);

  const alpha = makeCity({ city: 'Alpha', imageUrl: 'https://img.example/alpha-record.jpg' });
  const beta = makeCity({ city: 'Beta', landmarkName: 'Beta Tower' });
  const small = createCityCatalog([alpha, beta], tableFromFile);
  small.imageCache.set('beta', 'https://img.example/beta-cache.jpg');

  const alphaPayload = small.findCity('alpha');
  assert.ok(typeof alphaPayload === 'object');
  assert.equal(alphaPayload.imageUrl, 'https://img.example/alpha-record.jpg');
  assert.equal(alphaPayload.landmarkName, 'Alpha Gate');

  const betaPayload = small.findCity('beta');
  assert.ok(typeof betaPayload === 'object');
  assert.equal(betaPayload.imageUrl, 'https://img.example/beta-cache.jpg');
  assert.equal(betaPayload.landmarkName, 'Beta Tower');
  assert.equal(betaPayload.imageCredit, '');

  fs.rmSync(tempDir, { recursive: true, force: true });
}

console.log('City catalog tests passed.');
