export type RunId = string;

export type SimulationRunStatus = 'running' | 'finished' | 'error' | 'stopped';

export type LaneNumber = 1 | 2 | 3 | 4;

export type VehicleClass = 'car' | 'bus' | 'truck' | 'rickshaw' | 'bike';

export interface SimulationParams {
  simTime: number;
  minGreen: number;
  maxGreen: number;
}

export type SimulationParamsInput = Partial<Record<keyof SimulationParams, unknown>>;

export interface LaneDetail {
  total: number;
  car: number;
  bus: number;
  truck: number;
  rickshaw: number;
  bike: number;
}

export interface RunStats {
  phase: string;
  laneTotals: Record<LaneNumber, number>;
  laneDetails: Record<LaneNumber, LaneDetail>;
  totalVehicles: number;
  totalTime: number;
  throughput: number;
  averageWait: number;
  trafficDensity: number;
  congestionLevel: number;
}

export interface RunStartResponse {
  runId: RunId;
  status: SimulationRunStatus;
}

export interface RunStatusPayload {
  runId: RunId;
  status: SimulationRunStatus;
  params: SimulationParams;
  log: string[];
  stats: RunStats;
}

export interface RunStopResponse {
  runId: RunId;
  status: 'stopped';
}

export interface RunSummary {
  runId: RunId;
  status: SimulationRunStatus;
  params: SimulationParams;
  createdAt: string;
  endedAt?: string;
  exitCode: number | null;
  logLineCount: number;
}

export interface RunsPayload {
  runs: RunSummary[];
}

export interface RunLogsPayload {
  runId: RunId;
  cursor: number;
  nextCursor: number;
  lines: string[];
  hasMore: boolean;
  done: boolean;
}

export interface RuntimeDepsPayload {
  simulator: boolean;
  simulatorCommand: string;
  simRunsConfigured: boolean;
  simRunsEnabled: boolean;
  versionInfo: {
    simulator: string | null;
    simulatorError: string | null;
  };
}

export type CityPriority = 'High' | 'Medium' | 'Moderate';

export interface CitySuitability {
  score: number;
  priority: CityPriority;
  rationale: string[];
}

export interface CityPayload {
  city: string;
  state: string;
  classification: string;
  populationMillions: number;
  avgPeakSpeedKmph: number;
  avgDelayMinutes: number;
  vehicleMix: Record<string, number>;
  issues: string[];
  recommendedActions: string[];
  imageUrl: string;
  imageCredit: string;
  imageSource: string;
  landmarkName: string;
  landmarkUrl: string;
  suitability: CitySuitability;
}

export interface CitiesPayload {
  count: number;
  items: CityPayload[];
}

export interface HomeMetrics {
  density: number;
  avgWait: number;
  travelSpeed: number;
  cityCount: number;
  priorityHighPct: number;
  priorityMediumPct: number;
  priorityModeratePct: number;
}
