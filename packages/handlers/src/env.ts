export interface AppConfig {
  appName: string;
  stage: string;
  tableName: string;
  controlTableName: string;
  storeTimeoutMs: number;
  cacheTimeoutMs: number;
  rotationEarlyToleranceSeconds: number;
}

const CACHE_TTL_MS = 5 * 60 * 1000;
let cachedConfig: { value: AppConfig; expiresAt: number } | undefined;

export function loadConfig(options: { forceRefresh?: boolean } = {}): AppConfig {
  const now = Date.now();
  if (!options.forceRefresh && cachedConfig && cachedConfig.expiresAt > now) {
    return cachedConfig.value;
  }

  const config: AppConfig = {
    appName: process.env.APP_NAME ?? 'question-rotation',
    stage: process.env.STAGE ?? 'dev',
    tableName: requiredEnv('TABLE_NAME'),
    controlTableName: requiredEnv('CONTROL_TABLE_NAME'),
    storeTimeoutMs: parseOptionalInt(process.env.STORE_TIMEOUT_MS) ?? 2000,
    cacheTimeoutMs: parseOptionalInt(process.env.CACHE_TIMEOUT_MS) ?? 250,
    rotationEarlyToleranceSeconds:
      parseOptionalInt(process.env.ROTATION_EARLY_TOLERANCE_SECONDS) ?? 300
  };

  cachedConfig = { value: config, expiresAt: now + CACHE_TTL_MS };
  return config;
}

export function clearConfigCache(): void {
  cachedConfig = undefined;
}

function requiredEnv(name: string): string {
  const value = process.env[name];
  if (!value) {
    throw new Error(`${name} environment variable is required`);
  }
  return value;
}

function parseOptionalInt(value: string | undefined): number | undefined {
  if (!value) {
    return undefined;
  }

  const parsed = Number.parseInt(value, 10);
  return Number.isNaN(parsed) ? undefined : parsed;
}
