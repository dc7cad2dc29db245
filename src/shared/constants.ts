export const API_PREFIX = '/api';

export const RUN_STATUSES = ['success', 'failure'] as const;

export const SEVERITIES = ['low', 'medium', 'high', 'critical'] as const;

export const HEALTH_STATES = ['healthy', 'warning', 'critical', 'unknown'] as const;

export const ALERT_LEVELS = ['low', 'medium', 'high'] as const;

export const TRENDS = ['improving', 'stable', 'degrading'] as const;

export const DATA_SOURCES = ['store', 'sample'] as const;

export const DEFAULT_THRESHOLDS = {
  durationWarning: 120,
  durationCritical: 300,
  failureRateWarning: 0.1,
  failureRateCritical: 0.2,
} as const;

export const ROLLING_WINDOW = 5;
export const SCORE_WINDOW = 10;
export const PREDICTION_WINDOW = 5;
export const NEUTRAL_SCORE = 50;
