export type Environment = 'development' | 'testing' | 'production';

export interface AppConfig {
  port: number;
  databaseUrl: string;
  debug: boolean;
  appName: string;
  appVersion: string;
  environment: Environment;
  poolMax: number;
}

const DEFAULT_DATABASE_URL = 'sqlite:./task_management.db';

const TRUTHY = ['true', '1', 'yes', 'on'];

export function parseBoolean(value: string | undefined, fallback = false): boolean {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }
  return TRUTHY.includes(value.trim().toLowerCase());
}

function parseInteger(name: string, value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new Error(`Invalid ${name}: expected a non-negative integer, got "${value}"`);
  }
  return parsed;
}

function parseEnvironment(value: string | undefined): Environment {
  const normalized = (value || 'development').trim().toLowerCase();
  if (normalized === 'development' || normalized === 'testing' || normalized === 'production') {
    return normalized;
  }
  throw new Error(`Invalid ENVIRONMENT: "${value}"`);
}

/**
 * Reads the service configuration from environment variables.
 * Called once at startup; the result is frozen.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Readonly<AppConfig> {
  return Object.freeze({
    port: parseInteger('PORT', env.PORT, 3001),
    databaseUrl: env.DATABASE_URL || DEFAULT_DATABASE_URL,
    debug: parseBoolean(env.DEBUG),
    appName: env.APP_NAME || 'Task Management API',
    appVersion: env.APP_VERSION || '1.0.0',
    environment: parseEnvironment(env.ENVIRONMENT),
    poolMax: parseInteger('DB_POOL_MAX', env.DB_POOL_MAX, 10),
  });
}

export function isTesting(config: AppConfig): boolean {
  return config.environment === 'testing';
}
