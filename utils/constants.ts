// utils/constants.ts

// --- CENTRAL CONFIGURATION ---
export const CONSTANTS = {
  // Provider (OpenWeatherMap)
  PROVIDER: {
    UNITS: 'metric',
    INTERVALS_PER_DAY: 8, // 3-hour granularity
    MIN_FORECAST_DAYS: 1,
    MAX_FORECAST_DAYS: 5,
  },

  // Search History Pagination
  HISTORY: {
    DEFAULT_LIMIT: 100,
    MAX_LIMIT: 1000,
    COUNTER_KEY: 'search_history',
  },

  // Timeouts (Standardized)
  TIMEOUTS: {
    EXTERNAL_API: 30000, // 30 seconds
    SHUTDOWN_FORCE_EXIT: 10000,
  },

  ERROR_CODES: {
    VALIDATION_ERROR: 'VALIDATION_ERROR',
    NOT_FOUND: 'NOT_FOUND',
    PROVIDER_ERROR: 'PROVIDER_ERROR',
    PROVIDER_SHAPE_ERROR: 'PROVIDER_SHAPE_ERROR',
    STORAGE_ERROR: 'STORAGE_ERROR',
    INTERNAL_ERROR: 'INTERNAL_ERROR',
  },
} as const;

export type ErrorCode = typeof CONSTANTS.ERROR_CODES[keyof typeof CONSTANTS.ERROR_CODES];
