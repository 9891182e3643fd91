// utils/config.ts
import { z } from 'zod';
import logger from './logger';

// Define the schema for our environment variables
const envSchema = z.object({
  PORT: z.string().transform(Number).default('8000'),
  HOST: z.string().default('0.0.0.0'),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  // OpenWeatherMap
  OPENWEATHER_API_KEY: z.string().trim().min(1, 'OpenWeatherMap API key is required'),
  OPENWEATHER_BASE_URL: z.string().url().default('https://api.openweathermap.org/data/2.5'),

  // Search History Storage
  HISTORY_STORE: z.enum(['mongo', 'memory']).default('mongo'),
  MONGODB_URI: z.string().url().optional(),
  MONGO_POOL_SIZE: z.string().transform(Number).default('10'),

  // Trust Proxy Configuration
  TRUST_PROXY_LVL: z.string().transform(Number).default('1'),
}).refine((env) => env.HISTORY_STORE !== 'mongo' || Boolean(env.MONGODB_URI), {
  message: 'MONGODB_URI is required when HISTORY_STORE=mongo',
  path: ['MONGODB_URI'],
});

export interface AppConfig {
  readonly port: number;
  readonly host: string;
  readonly env: 'development' | 'production' | 'test';
  readonly trustProxyLevel: number;
  readonly openWeather: {
    readonly apiKey: string;
    readonly baseUrl: string;
  };
  readonly history:
    | { readonly store: 'memory' }
    | { readonly store: 'mongo'; readonly mongoUri: string; readonly mongoPoolSize: number };
}

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid environment configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

/**
 * Validates the environment once at startup and returns the configuration
 * that gets handed to every collaborator.
 */
export const loadConfig = (source: NodeJS.ProcessEnv = process.env): AppConfig => {
  const result = envSchema.safeParse(source);

  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    logger.error('❌ Invalid Environment Configuration:');
    issues.forEach((issue) => logger.error(`   -> ${issue}`));
    throw new ConfigError(issues);
  }

  const env = result.data;

  const history: AppConfig['history'] = env.HISTORY_STORE === 'mongo' && env.MONGODB_URI
    ? { store: 'mongo', mongoUri: env.MONGODB_URI, mongoPoolSize: env.MONGO_POOL_SIZE }
    : { store: 'memory' };

  const config: AppConfig = {
    port: env.PORT,
    host: env.HOST,
    env: env.NODE_ENV,
    trustProxyLevel: env.TRUST_PROXY_LVL,
    openWeather: {
      apiKey: env.OPENWEATHER_API_KEY,
      // Tolerate a trailing slash in the env value
      baseUrl: env.OPENWEATHER_BASE_URL.replace(/\/+$/, ''),
    },
    history,
  };

  logger.info(`✅ Configuration Validated & Loaded (history store: ${history.store})`);

  return Object.freeze(config);
};
