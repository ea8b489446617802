import assert from 'node:assert/strict';
import type { RunStats } from '../shared/types.js';
import { createEmptyStats } from '../server/lib/simStats.js';
import {
  DEFAULT_TIP,
  THROUGHPUT_HISTORY_LIMIT,
  buildRunInsights,
  describeThroughputTrend,
  pushThroughputSample
} from '../src/lib/runInsights.js';

function statsWith(overrides: (stats: RunStats) => void): RunStats {
  const stats = createEmptyStats();
  overrides(stats);
  return stats;
}

// Throughput trend labels.
assert.equal(describeThroughputTrend([]), '—');
assert.equal(describeThroughputTrend([0.5]), '0.50 veh/unit');
assert.equal(describeThroughputTrend([0.5, 0.52]), 'Stable (0.52)');
assert.equal(describeThroughputTrend([0.5, 0.75]), 'Rising ↑ (0.75)');
assert.equal(describeThroughputTrend([0.75, 0.25]), 'Falling ↓ (0.25)');

let history: number[] = [];
for (let sample = 0; sample < THROUGHPUT_HISTORY_LIMIT + 5; sample += 1) {
  history = pushThroughputSample(history, sample);
}
assert.equal(history.length, 30);
assert.equal(history[0], 5);
assert.equal(pushThroughputSample(history, Number.NaN), history);

// Empty stats fall back to the default tip.
assert.deepEqual(buildRunInsights(createEmptyStats(), []), {
  busiestLane: null,
  dominantClass: null,
  throughputLabel: '—',
  tip: DEFAULT_TIP
});

// Busiest lane and dominant class; ties keep the first lane.
{
  const stats = statsWith((draft) => {
    draft.laneTotals[2] = 9;
    draft.laneTotals[3] = 9;
    draft.laneDetails[2].car = 5;
    draft.laneDetails[3].car = 2;
    draft.laneDetails[3].rickshaw = 6;
  });
  const insights = buildRunInsights(stats, [0.4]);
  assert.deepEqual(insights.busiestLane, { lane: 2, count: 9 });
  assert.deepEqual(insights.dominantClass, { vehicleClass: 'car', count: 7 });
  assert.equal(insights.throughputLabel, '0.40 veh/unit');
  assert.equal(insights.tip, 'Balance flow: Lane 2 is leading counts right now.');
}

// Tip precedence: density, then wait, then transit, then freight.
{
  const busHeavy = statsWith((draft) => {
    draft.laneTotals[1] = 4;
    draft.laneDetails[1].bus = 4;
  });
  assert.equal(buildRunInsights(busHeavy, []).tip, 'Transit-heavy demand detected. Enable bus priority for smoother headways.');

  const truckHeavy = statsWith((draft) => {
    draft.laneDetails[4].truck = 3;
  });
  assert.equal(
    buildRunInsights(truckHeavy, []).tip,
    'Freight surge in progress. Schedule freight-friendly greens to clear queues.'
  );

  busHeavy.averageWait = 20;
  assert.equal(
    buildRunInsights(busHeavy, []).tip,
    'Average wait is high. Tighten cycle length and bias towards the busiest lane.'
  );

  busHeavy.trafficDensity = 80;
  assert.equal(
    buildRunInsights(busHeavy, []).tip,
    'Trigger congestion management: extend relief phases and publish detours.'
  );
}

console.log('Run insight tests passed.');
