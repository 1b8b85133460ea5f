import { parseUnits } from '../fixedPoint';

export type StoreBackend = 'sqlite' | 'memory';

export interface ServerConfig {
  port: number;
  storeBackend: StoreBackend;
  dbPath?: string;
  adminKeySet: boolean;
  owner?: string;
  stakingTokenSymbol?: string;
  rewardsTokenSymbol?: string;
  scheduler?: {
    cron: string;
    timezone: string;
    amount: bigint;
  };
}

/**
 * Read server configuration from environment variables
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const port = env.PORT ? parseInt(env.PORT, 10) : 3000;
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new Error(`Invalid PORT: "${env.PORT}"`);
  }

  const backend = env.STORE_BACKEND ?? 'sqlite';
  if (backend !== 'sqlite' && backend !== 'memory') {
    throw new Error(`Invalid STORE_BACKEND: "${backend}" (expected sqlite or memory)`);
  }

  const config: ServerConfig = {
    port,
    storeBackend: backend,
    dbPath: env.DB_PATH || undefined,
    adminKeySet: Boolean(env.ADMIN_KEY),
    owner: env.OWNER_ADDRESS || undefined,
    stakingTokenSymbol: env.STAKING_TOKEN_SYMBOL || undefined,
    rewardsTokenSymbol: env.REWARDS_TOKEN_SYMBOL || undefined,
  };

  if (env.SCHEDULER_ENABLED === 'true') {
    if (!env.FUNDING_AMOUNT) {
      throw new Error('FUNDING_AMOUNT is required when SCHEDULER_ENABLED=true');
    }
    config.scheduler = {
      cron: env.FUNDING_CRON || '0 0 * * 1',
      timezone: env.FUNDING_TIMEZONE || 'UTC',
      amount: parseUnits(env.FUNDING_AMOUNT),
    };
  }

  return config;
}
