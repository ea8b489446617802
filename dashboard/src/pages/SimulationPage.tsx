import { useCallback, useEffect, useMemo, useRef, useState } from 'react';
import type { FormEvent } from 'react';
import type {
  RunId,
  RunStatusPayload,
  RunSummary,
  RuntimeDepsPayload,
  SimulationParams,
  SimulationRunStatus
} from '../../shared/types';
import {
  fetchRunLogs,
  fetchRunStatus,
  fetchRuns,
  fetchRuntimeDeps,
  isRetryableApiError,
  isRunNotFoundError,
  startSimulation,
  stopSimulation
} from '../lib/api';
import { EChart } from '../components/EChart';
import { IntersectionCanvas } from '../components/IntersectionCanvas';
import { LoadingSkeleton } from '../components/LoadingSkeleton';
import { laneVolumeOption, throughputTrendOption } from '../lib/laneChartOptions';
import { VEHICLE_LABELS, buildRunInsights, pushThroughputSample } from '../lib/runInsights';

const POLL_INTERVAL_MS = 1500;

type ParamField = keyof SimulationParams;

const PARAM_FIELDS: Array<{ key: ParamField; label: string; hint: string }> = [
  { key: 'simTime', label: 'Simulation time (s)', hint: 'Length of the simulated run.' },
  { key: 'minGreen', label: 'Minimum green (s)', hint: 'Shortest green phase per lane.' },
  { key: 'maxGreen', label: 'Maximum green (s)', hint: 'Longest green phase per lane.' }
];

const DEFAULT_FORM: Record<ParamField, string> = {
  simTime: '120',
  minGreen: '10',
  maxGreen: '60'
};

function isTerminal(status: SimulationRunStatus): boolean {
  return status !== 'running';
}

function parseForm(form: Record<ParamField, string>): SimulationParams | string {
  const values: Partial<SimulationParams> = {};
  for (const field of PARAM_FIELDS) {
    const raw = form[field.key].trim();
    if (!/^\d+$/.test(raw) || Number(raw) <= 0) {
      return `${field.label} must be a positive whole number.`;
    }
    values[field.key] = Number(raw);
  }

  const { simTime, minGreen, maxGreen } = values;
  if (simTime === undefined || minGreen === undefined || maxGreen === undefined) {
    return 'All parameters are required.';
  }
  if (maxGreen < minGreen) {
    return 'Maximum green must not be shorter than minimum green.';
  }
  return { simTime, minGreen, maxGreen };
}

function formatTimestamp(value: string | undefined): string {
  if (!value) {
    return '—';
  }
  const parsed = new Date(value);
  return Number.isNaN(parsed.getTime()) ? value : parsed.toLocaleTimeString('en-GB');
}

export function SimulationPage() {
  const [form, setForm] = useState<Record<ParamField, string>>(DEFAULT_FORM);
  const [runtimeDeps, setRuntimeDeps] = useState<RuntimeDepsPayload | null>(null);
  const [runId, setRunId] = useState<RunId | null>(null);
  const [run, setRun] = useState<RunStatusPayload | null>(null);
  const [runs, setRuns] = useState<RunSummary[]>([]);
  const [throughputHistory, setThroughputHistory] = useState<number[]>([]);
  const [formError, setFormError] = useState('');
  const [requestError, setRequestError] = useState('');
  const [isSubmitting, setIsSubmitting] = useState(false);
  const [isStopping, setIsStopping] = useState(false);
  const [fullLog, setFullLog] = useState<string[] | null>(null);
  const [isLoadingLog, setIsLoadingLog] = useState(false);
  const logViewRef = useRef<HTMLPreElement | null>(null);

  const refreshRuns = useCallback(async () => {
    try {
      setRuns(await fetchRuns());
    } catch (error) {
      if (!isRetryableApiError(error)) {
        setRequestError((error as Error).message);
      }
    }
  }, []);

  useEffect(() => {
    let cancelled = false;
    fetchRuntimeDeps()
      .then((payload) => {
        if (!cancelled) {
          setRuntimeDeps(payload);
        }
      })
      .catch((error: unknown) => {
        if (!cancelled) {
          setRequestError((error as Error).message);
        }
      });
    void refreshRuns();
    return () => {
      cancelled = true;
    };
  }, [refreshRuns]);

  useEffect(() => {
    if (!runId) {
      return;
    }

    let cancelled = false;
    let timer: number | undefined;

    const poll = async () => {
      try {
        const payload = await fetchRunStatus(runId);
        if (cancelled) {
          return;
        }
        setRun(payload);
        setThroughputHistory((current) => pushThroughputSample(current, payload.stats.throughput));
        setRequestError('');
        if (isTerminal(payload.status) && timer !== undefined) {
          window.clearInterval(timer);
          timer = undefined;
          void refreshRuns();
        }
      } catch (error) {
        if (cancelled) {
          return;
        }
        if (isRunNotFoundError(error)) {
          window.clearInterval(timer);
          timer = undefined;
          setRunId(null);
          setRun(null);
        }
        if (!isRetryableApiError(error)) {
          setRequestError((error as Error).message);
        }
      }
    };

    timer = window.setInterval(() => {
      void poll();
    }, POLL_INTERVAL_MS);
    void poll();

    return () => {
      cancelled = true;
      if (timer !== undefined) {
        window.clearInterval(timer);
      }
    };
  }, [runId, refreshRuns]);

  useEffect(() => {
    const view = logViewRef.current;
    if (view) {
      view.scrollTop = view.scrollHeight;
    }
  }, [run?.log.length]);

  const handleSubmit = async (event: FormEvent<HTMLFormElement>) => {
    event.preventDefault();
    const parsed = parseForm(form);
    if (typeof parsed === 'string') {
      setFormError(parsed);
      return;
    }

    setFormError('');
    setRequestError('');
    setIsSubmitting(true);
    try {
      const started = await startSimulation(parsed);
      setRun(null);
      setFullLog(null);
      setThroughputHistory([]);
      setRunId(started.runId);
      void refreshRuns();
    } catch (error) {
      setRequestError((error as Error).message);
    } finally {
      setIsSubmitting(false);
    }
  };

  const handleStop = async () => {
    if (!runId) {
      return;
    }
    setIsStopping(true);
    try {
      await stopSimulation(runId);
      setRun(await fetchRunStatus(runId));
      void refreshRuns();
    } catch (error) {
      setRequestError((error as Error).message);
    } finally {
      setIsStopping(false);
    }
  };

  const handleLoadFullLog = async () => {
    if (!runId) {
      return;
    }
    setIsLoadingLog(true);
    try {
      const lines: string[] = [];
      let cursor = 0;
      for (;;) {
        const page = await fetchRunLogs(runId, cursor, 1000);
        lines.push(...page.lines);
        cursor = page.nextCursor;
        if (!page.hasMore) {
          break;
        }
      }
      setFullLog(lines);
    } catch (error) {
      setRequestError((error as Error).message);
    } finally {
      setIsLoadingLog(false);
    }
  };

  const handleSelectRun = (selected: RunId) => {
    if (selected === runId) {
      return;
    }
    setFullLog(null);
    setRun(null);
    setThroughputHistory([]);
    setRunId(selected);
  };

  const stats = run?.stats ?? null;
  const insights = useMemo(() => (stats ? buildRunInsights(stats, throughputHistory) : null), [stats, throughputHistory]);
  const laneOption = useMemo(() => (stats ? laneVolumeOption(stats) : null), [stats]);
  const trendOption = useMemo(() => throughputTrendOption(throughputHistory), [throughputHistory]);
  const runsDisabled = runtimeDeps !== null && !runtimeDeps.simRunsEnabled;
  const isRunning = run?.status === 'running';

  return (
    <section className="simulation-layout">
      {runtimeDeps && !runtimeDeps.simRunsEnabled && (
        <p className="error-banner">
          {runtimeDeps.simRunsConfigured
            ? `Simulator command "${runtimeDeps.simulatorCommand}" is unavailable on the API host.`
            : 'Simulation runs are disabled in this environment.'}
        </p>
      )}
      {requestError && <p className="error-banner">{requestError}</p>}

      <div className="panel-grid">
        <form className="panel run-form" onSubmit={(event) => void handleSubmit(event)}>
          <h2>Signal timing</h2>
          {PARAM_FIELDS.map((field) => (
            <label key={field.key} className="field">
              <span>{field.label}</span>
              <input
                type="number"
                min={1}
                step={1}
                value={form[field.key]}
                onChange={(event) => setForm((current) => ({ ...current, [field.key]: event.target.value }))}
              />
              <small>{field.hint}</small>
            </label>
          ))}
          {formError && <p className="field-error">{formError}</p>}
          <div className="button-row">
            <button type="submit" className="primary-button" disabled={isSubmitting || isRunning || runsDisabled}>
              {isSubmitting ? 'Starting...' : 'Start simulation'}
            </button>
            <button
              type="button"
              className="secondary-button"
              disabled={!isRunning || isStopping}
              onClick={() => void handleStop()}
            >
              {isStopping ? 'Stopping...' : 'Stop'}
            </button>
          </div>
        </form>

        <div className="panel run-summary">
          <h2>
            Current run
            {run && <span className={`status-pill status-${run.status}`}>{run.status}</span>}
          </h2>
          {!runId && <p className="muted">Start a simulation to stream lane counts and timings.</p>}
          {runId && !run && <LoadingSkeleton className="stat-grid-skeleton" count={4} />}
          {run && stats && (
            <>
              <p className="phase-line">{stats.phase || 'Waiting for first signal phase...'}</p>
              <div className="stat-grid">
                <article>
                  <p className="stat-title">Vehicles passed</p>
                  <strong>{stats.totalVehicles.toLocaleString('en-GB')}</strong>
                </article>
                <article>
                  <p className="stat-title">Average wait</p>
                  <strong>{stats.averageWait.toFixed(2)} s</strong>
                </article>
                <article>
                  <p className="stat-title">Traffic density</p>
                  <strong>{stats.trafficDensity.toFixed(1)}%</strong>
                </article>
                <article>
                  <p className="stat-title">Throughput</p>
                  <strong>{stats.throughput.toFixed(2)}</strong>
                </article>
              </div>
              <p className="muted">
                {run.params.simTime}s run, green {run.params.minGreen}–{run.params.maxGreen}s
              </p>
            </>
          )}
        </div>
      </div>

      {stats && laneOption && insights && (
        <div className="panel-grid">
          <div className="panel intersection-panel">
            <h3>Intersection</h3>
            <IntersectionCanvas stats={stats} running={isRunning} />
          </div>
          <div className="panel">
            <h3>Lane volumes</h3>
            <EChart option={laneOption} ariaLabel="Vehicles per lane" />
          </div>
          <div className="panel insights-panel">
            <h3>Insights</h3>
            <dl>
              <dt>Busiest lane</dt>
              <dd>{insights.busiestLane ? `Lane ${insights.busiestLane.lane} (${insights.busiestLane.count})` : '—'}</dd>
              <dt>Dominant vehicle</dt>
              <dd>
                {insights.dominantClass
                  ? `${VEHICLE_LABELS[insights.dominantClass.vehicleClass]} (${insights.dominantClass.count})`
                  : '—'}
              </dd>
              <dt>Throughput trend</dt>
              <dd>{insights.throughputLabel}</dd>
            </dl>
            <EChart option={trendOption} className="chart chart-small" ariaLabel="Throughput trend" />
            <p className="insight-tip">{insights.tip}</p>
          </div>
        </div>
      )}

      {run && (
        <div className="panel">
          <h3>
            Worker log
            {fullLog === null ? (
              <button
                type="button"
                className="secondary-button log-toggle"
                disabled={isLoadingLog}
                onClick={() => void handleLoadFullLog()}
              >
                {isLoadingLog ? 'Loading...' : 'Load full log'}
              </button>
            ) : (
              <button type="button" className="secondary-button log-toggle" onClick={() => setFullLog(null)}>
                Show live tail
              </button>
            )}
          </h3>
          <pre ref={logViewRef} className="log-view">
            {fullLog !== null
              ? fullLog.join('\n')
              : run.log.length > 0
                ? run.log.join('\n')
                : 'No output yet.'}
          </pre>
        </div>
      )}

      <div className="panel">
        <h3>Recent runs</h3>
        {runs.length === 0 ? (
          <p className="muted">No runs yet.</p>
        ) : (
          <table className="runs-table">
            <thead>
              <tr>
                <th>Started</th>
                <th>Status</th>
                <th>Parameters</th>
                <th>Ended</th>
                <th>Log lines</th>
              </tr>
            </thead>
            <tbody>
              {runs.map((summary) => (
                <tr
                  key={summary.runId}
                  className={summary.runId === runId ? 'selected' : undefined}
                  onClick={() => handleSelectRun(summary.runId)}
                >
                  <td>{formatTimestamp(summary.createdAt)}</td>
                  <td>
                    <span className={`status-pill status-${summary.status}`}>{summary.status}</span>
                  </td>
                  <td>
                    {summary.params.simTime}s / {summary.params.minGreen}–{summary.params.maxGreen}s
                  </td>
                  <td>{formatTimestamp(summary.endedAt)}</td>
                  <td>{summary.logLineCount}</td>
                </tr>
              ))}
            </tbody>
          </table>
        )}
      </div>
    </section>
  );
}
