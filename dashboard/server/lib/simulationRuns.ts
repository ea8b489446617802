import { spawn } from 'node:child_process';
import type { Readable } from 'node:stream';
import type {
  RunId,
  RunLogsPayload,
  RunStartResponse,
  RunStatusPayload,
  RunStopResponse,
  RunSummary,
  SimulationParams,
  SimulationParamsInput
} from '../../shared/types';
import { DEFAULT_SIMULATION_PARAMS, isTerminalStatus, type RunRegistry, type WorkerProcess } from './runRegistry';
import { applyTelemetryLine, cloneStats } from './simStats';

const DEFAULT_STOP_GRACE_MS = 3_000;
const DEFAULT_LOG_TAIL_LINES = 300;
const LOG_DEFAULT_LIMIT = 200;
const LOG_MAX_LIMIT = 1_000;

export const STOP_REQUESTED_LINE = '[system] stop requested by user';
export const HALTED_LINE = '[system] simulation halted by user';

type StreamName = 'stdout' | 'stderr';

export interface SimulationWorkerProcess extends WorkerProcess {
  stdout: Readable;
  stderr: Readable;
  once(event: 'close', listener: (code: number | null, signal: NodeJS.Signals | null) => void): this;
  once(event: 'error', listener: (error: Error) => void): this;
}

export interface WorkerLaunch {
  command: string;
  args: string[];
  cwd: string;
  env: NodeJS.ProcessEnv;
}

export type SpawnWorkerFn = (launch: WorkerLaunch) => SimulationWorkerProcess;

export type RunLogger = Pick<Console, 'log' | 'warn' | 'error'>;

export interface SimulationRunManagerOptions {
  registry: RunRegistry;
  projectRoot: string;
  simCommand?: string;
  simScript?: string;
  spawnWorker?: SpawnWorkerFn;
  stopGraceMs?: number;
  logTailLines?: number;
  baseEnv?: NodeJS.ProcessEnv;
  platform?: NodeJS.Platform;
  logger?: RunLogger;
}

export interface SimulationRunManager {
  startRun(input?: SimulationParamsInput): RunStartResponse;
  getRunStatus(runId: RunId): RunStatusPayload;
  stopRun(runId: RunId): RunStopResponse;
  listRuns(): RunSummary[];
  getRunLogs(runId: RunId, cursor?: number, limit?: number): RunLogsPayload;
  shutdown(): void;
}

export class RunNotFoundError extends Error {
  readonly runId: RunId;

  constructor(runId: RunId) {
    super(`Unknown simulation run: ${runId}`);
    this.name = 'RunNotFoundError';
    this.runId = runId;
  }
}

const spawnWorkerProcess: SpawnWorkerFn = ({ command, args, cwd, env }) =>
  spawn(command, args, {
    cwd,
    env,
    stdio: ['ignore', 'pipe', 'pipe']
  });

function normalizeParam(key: keyof SimulationParams, raw: unknown): number {
  if (raw === undefined || raw === null || raw === '') {
    return DEFAULT_SIMULATION_PARAMS[key];
  }

  const value = typeof raw === 'string' && /^\s*\d+\s*$/.test(raw) ? Number.parseInt(raw, 10) : raw;
  if (typeof value !== 'number' || !Number.isInteger(value) || value <= 0) {
    throw new Error(`${key} must be a positive integer.`);
  }
  return value;
}

export function normalizeSimulationParams(input: SimulationParamsInput = {}): SimulationParams {
  const params: SimulationParams = {
    simTime: normalizeParam('simTime', input.simTime),
    minGreen: normalizeParam('minGreen', input.minGreen),
    maxGreen: normalizeParam('maxGreen', input.maxGreen)
  };

  if (params.maxGreen < params.minGreen) {
    throw new Error(`maxGreen (${params.maxGreen}) must not be less than minGreen (${params.minGreen}).`);
  }
  return params;
}

export function buildWorkerEnv(
  params: SimulationParams,
  baseEnv: NodeJS.ProcessEnv = process.env,
  platform: NodeJS.Platform = process.platform
): NodeJS.ProcessEnv {
  const env: NodeJS.ProcessEnv = {
    ...baseEnv,
    SIM_TIME: String(params.simTime),
    MIN_GREEN_TIME: String(params.minGreen),
    MAX_GREEN_TIME: String(params.maxGreen)
  };

  env.PYGAME_HIDE_SUPPORT_PROMPT = env.PYGAME_HIDE_SUPPORT_PROMPT ?? '1';
  // Headless hosts get dummy video/audio drivers so the worker never opens a window.
  if (!env.DISPLAY && platform !== 'win32') {
    env.SDL_VIDEODRIVER = env.SDL_VIDEODRIVER ?? 'dummy';
    env.SDL_AUDIODRIVER = env.SDL_AUDIODRIVER ?? 'dummy';
  }
  return env;
}

function coerceLogCursor(value: number | undefined): number {
  if (value === undefined || !Number.isFinite(value)) {
    return 0;
  }
  return Math.max(0, Math.trunc(value));
}

function coerceLogLimit(value: number | undefined): number {
  if (value === undefined || !Number.isFinite(value)) {
    return LOG_DEFAULT_LIMIT;
  }
  const limit = Math.trunc(value);
  if (limit <= 0) {
    return LOG_DEFAULT_LIMIT;
  }
  return Math.min(limit, LOG_MAX_LIMIT);
}

function describeSpawnError(error: unknown, command: string): string {
  if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
    return `[backend error] Simulation executable "${command}" was not found. Configure DASHBOARD_SIM_COMMAND.`;
  }
  return `[backend error] ${error instanceof Error ? error.message : String(error)}`;
}

function isAlive(worker: WorkerProcess): boolean {
  return worker.exitCode === null && worker.signalCode === null;
}

export function createSimulationRunManager(options: SimulationRunManagerOptions): SimulationRunManager {
  const {
    registry,
    projectRoot,
    simCommand = 'python3',
    simScript = 'simulation.py',
    spawnWorker = spawnWorkerProcess,
    stopGraceMs = DEFAULT_STOP_GRACE_MS,
    logTailLines = DEFAULT_LOG_TAIL_LINES,
    baseEnv = process.env,
    platform = process.platform,
    logger = console
  } = options;

  // Workers whose output is still being read, owned here and nowhere else.
  const workers = new Map<RunId, SimulationWorkerProcess>();
  const killTimers = new Map<RunId, ReturnType<typeof setTimeout>>();

  function clearKillTimer(runId: RunId): void {
    const timer = killTimers.get(runId);
    if (timer) {
      clearTimeout(timer);
      killTimers.delete(runId);
    }
  }

  function handleLine(runId: RunId, line: string): void {
    registry.update(runId, (record) => {
      record.log.push(line);
      const update = applyTelemetryLine(line, record.stats, record.params);
      record.stats = update.stats;
      if (update.complete && record.status === 'running') {
        record.status = 'finished';
      }
    });
  }

  function attachLineReader(runId: RunId, stream: Readable, buffers: Record<StreamName, string>, name: StreamName): void {
    stream.setEncoding('utf-8');
    stream.on('data', (chunk: string) => {
      buffers[name] += chunk;
      let lineBreak = buffers[name].indexOf('\n');
      while (lineBreak >= 0) {
        const line = buffers[name].slice(0, lineBreak).replace(/\r$/, '');
        buffers[name] = buffers[name].slice(lineBreak + 1);
        handleLine(runId, line);
        lineBreak = buffers[name].indexOf('\n');
      }
    });
  }

  function failRun(runId: RunId, message: string): void {
    clearKillTimer(runId);
    workers.delete(runId);
    registry.update(runId, (record) => {
      record.log.push(message);
      if (!isTerminalStatus(record.status)) {
        record.status = 'error';
      }
      record.process = null;
      record.endedAt = record.endedAt ?? new Date().toISOString();
    });
    logger.error(`[sim-runs] run ${runId} failed: ${message}`);
  }

  function finalizeRun(runId: RunId, code: number | null, signal: NodeJS.Signals | null): void {
    clearKillTimer(runId);
    workers.delete(runId);
    const status = registry.update(runId, (record) => {
      if (record.status === 'stopped') {
        record.log.push(HALTED_LINE);
      } else if (!isTerminalStatus(record.status)) {
        record.status = code === 0 ? 'finished' : 'error';
      }
      record.process = null;
      record.exitCode = code;
      record.endedAt = new Date().toISOString();
      return record.status;
    });
    logger.log(`[sim-runs] run ${runId} exited (code=${code ?? 'null'}, signal=${signal ?? 'none'}) -> ${status ?? 'unknown'}`);
  }

  function launchWorker(runId: RunId, params: SimulationParams): void {
    let child: SimulationWorkerProcess;
    try {
      child = spawnWorker({
        command: simCommand,
        args: [simScript],
        cwd: projectRoot,
        env: buildWorkerEnv(params, baseEnv, platform)
      });
    } catch (error) {
      failRun(runId, describeSpawnError(error, simCommand));
      return;
    }

    workers.set(runId, child);
    registry.update(runId, (record) => {
      record.process = child;
    });

    const buffers: Record<StreamName, string> = { stdout: '', stderr: '' };
    attachLineReader(runId, child.stdout, buffers, 'stdout');
    attachLineReader(runId, child.stderr, buffers, 'stderr');

    child.once('error', (error) => {
      if (workers.get(runId) === child) {
        failRun(runId, describeSpawnError(error, simCommand));
      }
    });

    child.once('close', (code, signal) => {
      for (const name of ['stdout', 'stderr'] as const) {
        if (buffers[name]) {
          handleLine(runId, buffers[name].replace(/\r$/, ''));
          buffers[name] = '';
        }
      }
      finalizeRun(runId, code, signal);
    });
  }

  function terminateWorker(runId: RunId, worker: WorkerProcess): void {
    worker.kill('SIGTERM');
    clearKillTimer(runId);
    killTimers.set(
      runId,
      setTimeout(() => {
        killTimers.delete(runId);
        if (isAlive(worker)) {
          logger.warn(`[sim-runs] run ${runId} ignored SIGTERM for ${stopGraceMs}ms; sending SIGKILL.`);
          worker.kill('SIGKILL');
        }
      }, stopGraceMs)
    );
  }

  return {
    startRun(input = {}) {
      const params = normalizeSimulationParams(input);
      const runId = registry.create(params);
      logger.log(
        `[sim-runs] starting run ${runId} (simTime=${params.simTime}, minGreen=${params.minGreen}, maxGreen=${params.maxGreen})`
      );
      launchWorker(runId, params);
      const status = registry.read(runId, (record) => record.status) ?? 'error';
      return { runId, status };
    },

    getRunStatus(runId) {
      const payload = registry.read(runId, (record) => ({
        runId: record.id,
        status: record.status,
        params: { ...record.params },
        log: record.log.slice(-logTailLines),
        stats: cloneStats(record.stats)
      }));
      if (!payload) {
        throw new RunNotFoundError(runId);
      }
      return payload;
    },

    stopRun(runId) {
      const found = registry.update(runId, (record) => {
        const worker = record.process;
        if (worker && isAlive(worker)) {
          record.log.push(STOP_REQUESTED_LINE);
          terminateWorker(runId, worker);
        }
        record.status = 'stopped';
        record.process = null;
        return true;
      });
      if (!found) {
        throw new RunNotFoundError(runId);
      }
      logger.log(`[sim-runs] stop requested for run ${runId}`);
      return { runId, status: 'stopped' };
    },

    listRuns() {
      return registry.list().map((record) => ({
        runId: record.id,
        status: record.status,
        params: { ...record.params },
        createdAt: record.createdAt,
        endedAt: record.endedAt,
        exitCode: record.exitCode,
        logLineCount: record.log.length
      }));
    },

    getRunLogs(runId, cursor, limit) {
      const payload = registry.read(runId, (record) => {
        const startCursor = Math.min(coerceLogCursor(cursor), record.log.length);
        const lines = record.log.slice(startCursor, startCursor + coerceLogLimit(limit));
        const nextCursor = startCursor + lines.length;
        const hasMore = nextCursor < record.log.length;
        return {
          runId: record.id,
          cursor: startCursor,
          nextCursor,
          lines,
          hasMore,
          done: isTerminalStatus(record.status) && !workers.has(runId) && !hasMore
        };
      });
      if (!payload) {
        throw new RunNotFoundError(runId);
      }
      return payload;
    },

    shutdown() {
      for (const [runId, worker] of workers) {
        clearKillTimer(runId);
        if (isAlive(worker)) {
          worker.kill('SIGKILL');
        }
      }
      for (const runId of [...killTimers.keys()]) {
        clearKillTimer(runId);
      }
    }
  };
}
