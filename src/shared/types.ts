import type {
  ALERT_LEVELS,
  DATA_SOURCES,
  HEALTH_STATES,
  RUN_STATUSES,
  SEVERITIES,
  TRENDS,
} from './constants';

export type RunStatus = (typeof RUN_STATUSES)[number];
export type Severity = (typeof SEVERITIES)[number];
export type HealthState = (typeof HEALTH_STATES)[number];
export type AlertLevel = (typeof ALERT_LEVELS)[number];
export type Trend = (typeof TRENDS)[number];
export type DataSource = (typeof DATA_SOURCES)[number];

export interface RunRecord {
  id: string;
  status: RunStatus;
  duration: number;
  timestamp: string;
  branch: string | null;
  commit: string | null;
  author: string | null;
  workflow: string | null;
  url: string | null;
}

export interface AnomalyRecord {
  id: string;
  runId: string;
  issue: string;
  fix: string;
  severity: Severity;
  timestamp: string;
}

export type NewAnomaly = Omit<AnomalyRecord, 'id'>;

export interface Thresholds {
  durationWarning: number;
  durationCritical: number;
  failureRateWarning: number;
  failureRateCritical: number;
}

export interface RunStats {
  totalRuns: number;
  successfulRuns: number;
  totalFailures: number;
  successRate: number;
  avgDuration: number;
  lastRunAt: string | null;
}

export type Prediction =
  | {
      available: true;
      predictedDuration: number;
      successProbability: number;
      confidence: 'medium' | 'high';
      trend: Trend;
    }
  | { available: false; reason: string };

export interface PerformanceAnalysis {
  durationTrend: Trend;
  successRateTrend: Trend;
  performanceScore: number;
  recommendations: string[];
  prediction: Prediction;
}

export interface HealthReport {
  overallHealth: HealthState;
  healthScore: number;
  alertLevel: AlertLevel;
  performanceAnalysis: PerformanceAnalysis | null;
  lastUpdated: string;
}

export interface Optimization {
  title: string;
  description: string;
  impact: 'low' | 'medium' | 'high';
}

export interface InsightPrediction {
  metric: string;
  value: number;
  unit: string;
  confidence: 'medium' | 'high';
}

export interface Insights {
  patterns: string[];
  optimizations: Optimization[];
  predictions: InsightPrediction[];
  recommendations: string[];
}

export interface PipelineSnapshot {
  runs: RunRecord[];
  anomalies: AnomalyRecord[];
  source: DataSource;
  error?: string;
}

export interface DashboardData extends PipelineSnapshot {
  stats: RunStats;
  refreshIntervalSeconds: number;
}

export interface StatsData {
  stats: RunStats;
  performanceScore: number;
  healthScore: number;
  rollingSuccessRates: number[];
  source: DataSource;
  error?: string;
}

export interface IngestSummary {
  fetched: number;
  stored: number;
  duplicates: number;
  skipped: number;
  anomalies: AnomalyRecord[];
  errors: { runId: string; error: string }[];
}

export interface ApiResponse<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
}
