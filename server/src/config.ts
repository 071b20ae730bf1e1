export type AppConfig = {
  port: number;
  corsOrigin: string;
  forecastSuffix: string;
  periodLengthDays: number;
  maxUploadBytes: number;
};

export const DEFAULT_CONFIG: AppConfig = {
  port: 4242,
  corsOrigin: "http://localhost:5173",
  forecastSuffix: "-25",
  periodLengthDays: 7,
  maxUploadBytes: 10 * 1024 * 1024
};

function positiveNumber(value: string | undefined, fallback: number) {
  if (value === undefined || value.trim() === "") return fallback;
  const parsed = Number(value);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const maxUploadMb = positiveNumber(env.MAX_UPLOAD_MB, DEFAULT_CONFIG.maxUploadBytes / (1024 * 1024));

  return {
    port: positiveNumber(env.PORT, DEFAULT_CONFIG.port),
    corsOrigin: env.CORS_ORIGIN ?? DEFAULT_CONFIG.corsOrigin,
    forecastSuffix: env.FORECAST_SUFFIX || DEFAULT_CONFIG.forecastSuffix,
    periodLengthDays: positiveNumber(env.FORECAST_PERIOD_DAYS, DEFAULT_CONFIG.periodLengthDays),
    maxUploadBytes: Math.round(maxUploadMb * 1024 * 1024)
  };
}
