// ================================================================================================
// APP CONFIG: resolves settings from environment, validated with zod
// ================================================================================================

import { readFileSync } from 'fs';
import { AppConfigSchema, UniverseSchema, type AppConfig, type Universe } from './models';

export type {
  AppConfig,
  ControllerConfig,
  OracleConfig,
  Universe,
  UniverseCategory,
  UniversePool,
  UniverseToken,
} from './models';

type Env = Record<string, string | undefined>;

function intFromEnv(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw === '') return fallback;
  return Number(raw);
}

/** Resolve the full application config from environment */
export function resolveConfig(env: Env = process.env): AppConfig {
  return AppConfigSchema.parse({
    apiServerPort: intFromEnv(env, 'API_SERVER_PORT', 4040),
    logLevel: env.LOG_LEVEL ?? 'info',
    universeFile: env.UNIVERSE_FILE ?? 'data/universe.json',
    oracle: {
      observationPeriod: intFromEnv(env, 'ORACLE_OBSERVATION_PERIOD', 60 * 60),
      minTimeElapsed: intFromEnv(env, 'ORACLE_MIN_TIME_ELAPSED', 60 * 60),
      maxTimeElapsed: intFromEnv(env, 'ORACLE_MAX_TIME_ELAPSED', 2 * 24 * 60 * 60),
    },
    controller: {
      owner: env.CONTROLLER_OWNER ?? 'owner',
      defaultExitFeeRecipient: env.DEFAULT_EXIT_FEE_RECIPIENT ?? 'fee-recipient',
      defaultSellerPremium: intFromEnv(env, 'DEFAULT_SELLER_PREMIUM', 2),
    },
  });
}

/** Read and validate the seed universe */
export function loadUniverse(file: string): Universe {
  const raw: unknown = JSON.parse(readFileSync(file, 'utf8'));
  return UniverseSchema.parse(raw);
}
