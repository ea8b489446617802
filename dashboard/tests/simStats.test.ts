import assert from 'node:assert/strict';
import type { RunStats, SimulationParams } from '../shared/types.js';
import {
  applyTelemetryLine,
  createEmptyStats,
  recomputeDerivedMetrics,
  theoreticalCapacity,
  toLaneNumber
} from '../server/lib/simStats.js';
import { roundHalfEven } from '../server/lib/rounding.js';

const params: SimulationParams = { simTime: 100, minGreen: 10, maxGreen: 60 };

function feed(lines: string[], start: RunStats = createEmptyStats(), runParams = params): RunStats {
  return lines.reduce((stats, line) => applyTelemetryLine(line, stats, runParams).stats, start);
}

// Lane detail, cumulative counters and derived metrics.
{
  const stats = feed([
    'LANE_STATS lane=1 total=10 car=6 bus=2 truck=1 rickshaw=1 bike=0',
    'Total vehicles passed: 10',
    'Total time passed: 50'
  ]);
  assert.equal(stats.laneTotals[1], 10);
  assert.deepEqual(stats.laneDetails[1], { total: 10, car: 6, bus: 2, truck: 1, rickshaw: 1, bike: 0 });
  assert.equal(stats.totalVehicles, 10);
  assert.equal(stats.totalTime, 50);
  assert.equal(stats.averageWait, 5);
  assert.equal(theoreticalCapacity(params.simTime), 400);
  assert.equal(stats.trafficDensity, 2.5);
  assert.equal(stats.congestionLevel, 2.5);
}

// Missing lane detail keys count as zero.
{
  const stats = feed(['LANE_STATS lane=2 total=4 bus=4']);
  assert.deepEqual(stats.laneDetails[2], { total: 4, car: 0, bus: 4, truck: 0, rickshaw: 0, bike: 0 });
  assert.equal(stats.laneTotals[2], 4);
}

// Malformed tokens leave the whole line unapplied.
{
  const before = feed(['LANE_STATS lane=1 total=3 car=3']);
  assert.deepEqual(feed(['LANE_STATS lane=1 total=abc car=9'], before), before);
  assert.deepEqual(feed(['LANE_STATS lane=1 total car=9'], before), before);
  assert.deepEqual(feed(['LANE_STATS lane=1 total=9=1'], before), before);
  assert.deepEqual(feed(['LANE_STATS lane=5 total=9'], before), before);
  assert.deepEqual(feed(['LANE_STATS lane=1 total=-2'], before), before);
}

// Short lane total lines.
{
  const stats = feed(['Lane 3: Total: 38', 'Lane 9: Total: 5', 'Lane 2: Total: many']);
  assert.deepEqual(stats.laneTotals, { 1: 0, 2: 0, 3: 38, 4: 0 });
}

// Later lines overwrite earlier values for the same lane.
{
  const stats = feed(['Lane 1: Total: 4', 'LANE_STATS lane=1 total=7 car=7', 'Lane 1: Total: 9']);
  assert.equal(stats.laneTotals[1], 9);
  assert.equal(stats.laneDetails[1].total, 7);
}

// Phase tracks green and yellow lines only.
{
  const stats = feed(['GREEN TS 1 -> r: 0 y: 3 g: 20', 'RED TS 2 -> r: 5 y: 3 g: 20']);
  assert.equal(stats.phase, 'GREEN TS 1 -> r: 0 y: 3 g: 20');
  assert.equal(feed(['YELLOW TS 1'], stats).phase, 'YELLOW TS 1');
}

// Total vehicles alone does not recompute; a failed time parse still does.
{
  const counted = feed(['Total vehicles passed: 8.9']);
  assert.equal(counted.totalVehicles, 8);
  assert.equal(counted.averageWait, 0);
  assert.equal(counted.trafficDensity, 0);

  const recomputed = feed(['Total time passed: soon'], counted);
  assert.equal(recomputed.totalTime, 0);
  assert.equal(recomputed.averageWait, 0);
  assert.equal(recomputed.trafficDensity, 2);
}

// Negative counters are rejected.
{
  const stats = feed(['Total vehicles passed: 6', 'Total vehicles passed: -3']);
  assert.equal(stats.totalVehicles, 6);
}

// Throughput keeps its decimals.
{
  const stats = feed(['No. of vehicles passed per unit time: 0.75']);
  assert.equal(stats.throughput, 0.75);
}

// Summary lines set all three counters at once and recompute.
{
  const shortRun: SimulationParams = { simTime: 10, minGreen: 5, maxGreen: 20 };
  const stats = feed(['SUMMARY total=20 time=80.9 throughput=0.25'], createEmptyStats(), shortRun);
  assert.equal(stats.totalVehicles, 20);
  assert.equal(stats.totalTime, 80);
  assert.equal(stats.throughput, 0.25);
  assert.equal(stats.averageWait, 4);
  assert.equal(stats.trafficDensity, 50);

  // A bad token drops every counter on the line; derived metrics are recomputed from the kept ones.
  const unchanged = feed(['SUMMARY total=99 time=oops throughput=9'], stats, shortRun);
  assert.deepEqual(unchanged, stats);
  assert.equal(unchanged.totalVehicles, 20);
  assert.equal(unchanged.totalTime, 80);
  assert.equal(unchanged.throughput, 0.25);
  assert.equal(unchanged.averageWait, 4);
  assert.equal(unchanged.trafficDensity, 50);
}

// Density is clamped to 100.
{
  const tinyRun: SimulationParams = { simTime: 1, minGreen: 1, maxGreen: 1 };
  const stats = feed(['SUMMARY total=100 time=10'], createEmptyStats(), tinyRun);
  assert.equal(stats.trafficDensity, 100);
  assert.equal(stats.averageWait, 0.1);
  assert.equal(theoreticalCapacity(0), 1);
}

// Average wait rounds to two places and density to one.
{
  const sevenSecondRun: SimulationParams = { simTime: 7, minGreen: 1, maxGreen: 2 };
  const stats = recomputeDerivedMetrics({ ...createEmptyStats(), totalVehicles: 3, totalTime: 10 }, sevenSecondRun);
  assert.equal(stats.averageWait, 3.33);
  assert.equal(stats.trafficDensity, 10.7);
}

// Exact halves round to the even neighbour.
{
  assert.equal(roundHalfEven(0.25, 1), 0.2);
  assert.equal(roundHalfEven(0.35, 1), 0.3);
  assert.equal(roundHalfEven(0.125, 2), 0.12);
  assert.equal(roundHalfEven(0.375, 2), 0.38);
  assert.equal(roundHalfEven(-0.125, 2), -0.12);
  assert.equal(roundHalfEven(2.5), 2);
  assert.equal(roundHalfEven(3.5), 4);
  assert.equal(roundHalfEven(2.675, 2), 2.67);
  assert.equal(roundHalfEven(3.336, 2), 3.34);

  const eightSecondRun: SimulationParams = { simTime: 8, minGreen: 1, maxGreen: 2 };
  const stats = recomputeDerivedMetrics({ ...createEmptyStats(), totalVehicles: 2, totalTime: 0.25 }, eightSecondRun);
  assert.equal(stats.averageWait, 0.12);
  assert.equal(stats.trafficDensity, 6.2);
  assert.equal(stats.congestionLevel, 6.2);
}

// Completion marker, blank lines and snapshot isolation.
{
  const start = createEmptyStats();
  assert.equal(applyTelemetryLine('SIMULATION_COMPLETE', start, params).complete, true);
  assert.equal(applyTelemetryLine('Simulation finished', start, params).complete, false);

  const blank = applyTelemetryLine('   ', start, params);
  assert.equal(blank.stats, start);

  applyTelemetryLine('LANE_STATS lane=4 total=12 truck=12', start, params);
  assert.equal(start.laneTotals[4], 0);
  assert.equal(start.laneDetails[4].truck, 0);
}

assert.equal(toLaneNumber(4), 4);
assert.equal(toLaneNumber(0), null);

console.log('Simulation stats tests passed.');
