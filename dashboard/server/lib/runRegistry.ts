import type { ChildProcess } from 'node:child_process';
import { randomUUID } from 'node:crypto';
import type { RunId, RunStats, SimulationParams, SimulationRunStatus } from '../../shared/types';
import { createEmptyStats } from './simStats';

export const DEFAULT_SIMULATION_PARAMS: Readonly<SimulationParams> = {
  simTime: 120,
  minGreen: 10,
  maxGreen: 60
};

const TERMINAL_STATUSES = new Set<SimulationRunStatus>(['finished', 'error', 'stopped']);

export type WorkerProcess = Pick<ChildProcess, 'exitCode' | 'signalCode' | 'kill'>;

export interface RunRecord {
  readonly id: RunId;
  readonly params: Readonly<SimulationParams>;
  readonly createdAt: string;
  status: SimulationRunStatus;
  log: string[];
  stats: RunStats;
  process: WorkerProcess | null;
  endedAt?: string;
  exitCode: number | null;
}

export function isTerminalStatus(status: SimulationRunStatus): boolean {
  return TERMINAL_STATUSES.has(status);
}

export interface RunRegistry {
  create(params: SimulationParams, now?: Date): RunId;
  get(id: RunId): RunRecord | undefined;
  update<T>(id: RunId, mutator: (record: RunRecord) => T): T | undefined;
  read<T>(id: RunId, reader: (record: Readonly<RunRecord>) => T): T | undefined;
  list(): RunRecord[];
}

/**
 * Owns every run record for the lifetime of the server.
 *
 * `update` and `read` are the record's critical section: callbacks must be
 * synchronous, so nothing else on the event loop can observe a record between
 * two of their writes. Records are never evicted.
 */
export function createRunRegistry(generateId: () => RunId = randomUUID): RunRegistry {
  const runs = new Map<RunId, RunRecord>();

  return {
    create(params, now = new Date()) {
      let id = generateId();
      while (runs.has(id)) {
        id = generateId();
      }

      runs.set(id, {
        id,
        params: { ...params },
        createdAt: now.toISOString(),
        status: 'running',
        log: [],
        stats: createEmptyStats(),
        process: null,
        exitCode: null
      });
      return id;
    },

    get(id) {
      return runs.get(id);
    },

    update<T>(id: RunId, mutator: (record: RunRecord) => T): T | undefined {
      const record = runs.get(id);
      return record ? mutator(record) : undefined;
    },

    read<T>(id: RunId, reader: (record: Readonly<RunRecord>) => T): T | undefined {
      const record = runs.get(id);
      return record ? reader(record) : undefined;
    },

    list() {
      return [...runs.values()].reverse();
    }
  };
}
