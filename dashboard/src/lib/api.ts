import type {
  CitiesPayload,
  HomeMetrics,
  RunId,
  RunLogsPayload,
  RunStartResponse,
  RunStatusPayload,
  RunStopResponse,
  RunSummary,
  RunsPayload,
  RuntimeDepsPayload,
  SimulationParams
} from '../../shared/types';

export class ApiRequestError extends Error {
  retryable: boolean;
  status: number | null;

  constructor(message: string, retryable: boolean, status: number | null) {
    super(message);
    this.name = 'ApiRequestError';
    this.retryable = retryable;
    this.status = status;
  }
}

export const API_RETRY_DELAY_MS = 2000;

const apiBaseUrl = (import.meta.env.VITE_API_BASE_URL ?? '').trim().replace(/\/+$/, '');

function buildApiUrl(path: string): string {
  const normalizedPath = path.startsWith('/') ? path : `/${path}`;
  return apiBaseUrl ? `${apiBaseUrl}${normalizedPath}` : normalizedPath;
}

function isRetryableStatus(status: number): boolean {
  return status === 408 || status === 425 || status === 429 || status >= 500;
}

async function readErrorMessage(response: Response, fallbackMessage: string): Promise<string> {
  try {
    const payload: unknown = await response.json();
    if (typeof payload === 'object' && payload !== null) {
      const error: unknown = Reflect.get(payload, 'error');
      if (typeof error === 'string' && error) {
        return error;
      }
    }
  } catch {
    return fallbackMessage;
  }
  return fallbackMessage;
}

async function requestJson<T>(path: string, fallbackMessage: string, init?: RequestInit): Promise<T> {
  let response: Response;
  try {
    response = await fetch(buildApiUrl(path), init);
  } catch {
    throw new ApiRequestError(fallbackMessage, true, null);
  }

  if (!response.ok) {
    const message = await readErrorMessage(response, fallbackMessage);
    throw new ApiRequestError(message, isRetryableStatus(response.status), response.status);
  }

  return (await response.json()) as T;
}

function postJson<T>(path: string, fallbackMessage: string, body?: unknown): Promise<T> {
  return requestJson<T>(path, fallbackMessage, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(body ?? {})
  });
}

export function isRetryableApiError(error: unknown): boolean {
  return error instanceof ApiRequestError && error.retryable;
}

export function isRunNotFoundError(error: unknown): boolean {
  return error instanceof ApiRequestError && error.status === 404;
}

export function fetchRuntimeDeps(): Promise<RuntimeDepsPayload> {
  return requestJson<RuntimeDepsPayload>('/api/runtime-deps', 'Failed to check simulator runtime');
}

export function startSimulation(params: SimulationParams): Promise<RunStartResponse> {
  return postJson<RunStartResponse>('/api/run', 'Failed to start simulation', params);
}

export function fetchRunStatus(runId: RunId): Promise<RunStatusPayload> {
  return requestJson<RunStatusPayload>(`/api/status/${encodeURIComponent(runId)}`, 'Failed to load run status');
}

export function stopSimulation(runId: RunId): Promise<RunStopResponse> {
  return postJson<RunStopResponse>(`/api/stop/${encodeURIComponent(runId)}`, 'Failed to stop simulation');
}

export async function fetchRuns(): Promise<RunSummary[]> {
  const payload = await requestJson<RunsPayload>('/api/runs', 'Failed to load simulation runs');
  return payload.runs;
}

export function fetchRunLogs(runId: RunId, cursor = 0, limit = 200): Promise<RunLogsPayload> {
  const params = new URLSearchParams({ cursor: String(cursor), limit: String(limit) });
  return requestJson<RunLogsPayload>(
    `/api/runs/${encodeURIComponent(runId)}/logs?${params.toString()}`,
    'Failed to load run logs'
  );
}

export function fetchHomeMetrics(): Promise<HomeMetrics> {
  return requestJson<HomeMetrics>('/api/home-metrics', 'Failed to load traffic overview');
}

export function fetchCities(query = ''): Promise<CitiesPayload> {
  const trimmed = query.trim();
  const path = trimmed ? `/api/cities?q=${encodeURIComponent(trimmed)}` : '/api/cities';
  return requestJson<CitiesPayload>(path, 'Failed to load cities');
}
