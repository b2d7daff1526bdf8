import 'dotenv/config';
import { ZodError } from 'zod';
import { ConfigurationError } from '../utils/errors.js';
import { configSchema, type Config } from './validation.js';

const NODE_ENVS = ['development', 'production', 'test'] as const;
const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

function pick<T extends string>(value: string | undefined, allowed: readonly T[]): T | undefined {
  return allowed.find(candidate => candidate === value);
}

function toInt(value: string | undefined): number | undefined {
  return value ? parseInt(value, 10) : undefined;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const nodeEnv = pick(env.NODE_ENV, NODE_ENVS);

  const rawConfig = {
    server: {
      nodeEnv,
      logLevel: pick(env.LOG_LEVEL, LOG_LEVELS) ?? (nodeEnv === 'test' ? 'silent' : undefined),
    },
    catalog: {
      path: env.CATALOG_PATH || undefined,
    },
    rules: {
      smallBusinessMaxSqm: toInt(env.RULES_SMALL_BUSINESS_MAX_SQM),
      smallBusinessMaxPeople: toInt(env.RULES_SMALL_BUSINESS_MAX_PEOPLE),
      largeBusinessMinSqm: toInt(env.RULES_LARGE_BUSINESS_MIN_SQM),
      largeBusinessMinPeople: toInt(env.RULES_LARGE_BUSINESS_MIN_PEOPLE),
      complexFeatureCount: toInt(env.RULES_COMPLEX_FEATURE_COUNT),
    },
  };

  try {
    return configSchema.parse(rawConfig);
  } catch (error) {
    if (error instanceof ZodError) {
      console.error('\n❌ Invalid configuration:\n');
      error.issues.forEach(issue => {
        const field = issue.path.join('.');
        console.error(`  ${field}: ${issue.message}`);
      });
      console.error('\nCheck .env file and compare with .env.example\n');
      throw new ConfigurationError('Invalid configuration', error.issues);
    }
    throw error;
  }
}

export const config = loadConfig();
