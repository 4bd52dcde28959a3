import Joi from 'joi';
import dotenv from 'dotenv';
import path from 'path';
import { ConfigurationError } from './errors';

/**
 * Typed application configuration, validated from the process environment.
 */
export interface AppConfig {
  nodeEnv: string;
  host: string;
  port: number;
  databaseUrl?: string;
  supabaseUrl?: string;
  supabaseKey?: string;
  corsOrigins: string[];
  timezone: string;
}

interface ValidatedEnv {
  NODE_ENV: string;
  HOST: string;
  PORT: number;
  DATABASE_URL?: string;
  SUPABASE_URL?: string;
  SUPABASE_KEY?: string;
  CORS_ORIGINS: string;
  APP_TIMEZONE: string;
}

const envSchema = Joi.object<ValidatedEnv>({
  NODE_ENV: Joi.string().valid('development', 'production', 'test').default('development'),
  HOST: Joi.string().default('0.0.0.0'),
  PORT: Joi.number().port().default(8000),
  DATABASE_URL: Joi.string().uri({ scheme: ['postgres', 'postgresql'] }).optional(),
  SUPABASE_URL: Joi.string().uri().optional(),
  SUPABASE_KEY: Joi.string().optional(),
  CORS_ORIGINS: Joi.string().default('http://localhost:5173,http://localhost:3000'),
  APP_TIMEZONE: Joi.string()
    .default('UTC')
    .custom((value: string, helpers) => (isKnownTimezone(value) ? value : helpers.error('any.invalid'))),
}).unknown(true);

let cached: AppConfig | null = null;

function isKnownTimezone(zone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: zone });
    return true;
  } catch {
    return false;
  }
}

// Load environment-specific .env file, falling back to the default one
function loadEnvFiles(): void {
  const envFile = process.env.NODE_ENV === 'test' ? '.env.test' : '.env';
  dotenv.config({ path: path.resolve(process.cwd(), envFile) });

  if (!process.env.DATABASE_URL) {
    dotenv.config();
  }
}

/**
 * Parses an environment map into an AppConfig.
 * Exported separately from getConfig so it can be exercised without touching process.env.
 *
 * @throws {ConfigurationError} listing every invalid key
 */
export function parseConfig(env: NodeJS.ProcessEnv): AppConfig {
  const { error, value } = envSchema.validate(env, { abortEarly: false, convert: true });
  if (error) {
    throw new ConfigurationError(
      'Invalid environment configuration',
      error.details.map((detail) => detail.message),
    );
  }

  const validated: ValidatedEnv = value;
  return {
    nodeEnv: validated.NODE_ENV,
    host: validated.HOST,
    port: validated.PORT,
    databaseUrl: validated.DATABASE_URL,
    supabaseUrl: validated.SUPABASE_URL,
    supabaseKey: validated.SUPABASE_KEY,
    corsOrigins: validated.CORS_ORIGINS.split(',')
      .map((origin) => origin.trim())
      .filter((origin) => origin.length > 0),
    timezone: validated.APP_TIMEZONE,
  };
}

/**
 * Returns the cached configuration, loading .env files on first use.
 */
export function getConfig(): AppConfig {
  if (!cached) {
    loadEnvFiles();
    cached = parseConfig(process.env);
  }
  return cached;
}

/**
 * Fails with a ConfigurationError when a setting needed by an adapter is missing.
 */
export function requireSetting(setting: string | undefined, envName: string): string {
  if (!setting) {
    throw new ConfigurationError(`Missing required environment variable (${envName})`);
  }
  return setting;
}

/**
 * Drops the cached configuration so the next getConfig() reads the environment again.
 */
export function resetConfig(): void {
  cached = null;
}
