import assert from 'node:assert/strict';
import { DEFAULT_SIMULATION_PARAMS, createRunRegistry, isTerminalStatus } from '../server/lib/runRegistry.js';

const queuedIds = ['run-a', 'run-a', 'run-b'];
const registry = createRunRegistry(() => queuedIds.shift() ?? 'run-fallback');

const first = registry.create({ ...DEFAULT_SIMULATION_PARAMS }, new Date('2026-01-05T10:00:00.000Z'));
const second = registry.create({ simTime: 30, minGreen: 5, maxGreen: 15 });
assert.equal(first, 'run-a');
assert.equal(second, 'run-b', 'colliding ids should be regenerated');

const record = registry.get(first);
assert.ok(record);
assert.equal(record.status, 'running');
assert.equal(record.createdAt, '2026-01-05T10:00:00.000Z');
assert.deepEqual(record.params, { simTime: 120, minGreen: 10, maxGreen: 60 });
assert.deepEqual(record.log, []);
assert.equal(record.process, null);
assert.equal(record.exitCode, null);
assert.equal(record.stats.totalVehicles, 0);

assert.deepEqual(
  registry.list().map((entry) => entry.id),
  ['run-b', 'run-a']
);

const logLength = registry.update(second, (entry) => {
  entry.log.push('first line');
  entry.status = 'finished';
  return entry.log.length;
});
assert.equal(logLength, 1);
assert.equal(registry.read(second, (entry) => entry.status), 'finished');
assert.equal(registry.update('missing', () => true), undefined);
assert.equal(registry.read('missing', () => true), undefined);
assert.equal(registry.get('missing'), undefined);

// Params are copied on create.
const params = { simTime: 60, minGreen: 5, maxGreen: 10 };
const copied = registry.create(params);
params.simTime = 1;
assert.equal(registry.read(copied, (entry) => entry.params.simTime), 60);

assert.equal(isTerminalStatus('running'), false);
assert.equal(isTerminalStatus('finished'), true);
assert.equal(isTerminalStatus('error'), true);
assert.equal(isTerminalStatus('stopped'), true);

console.log('Run registry tests passed.');
