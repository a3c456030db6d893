// dotenv/config must evaluate before envSchema reads process.env.
import 'dotenv/config';

import { env } from './envSchema.js';

export const config = {
  get port() { return env.port; },
  get nodeEnv() { return env.nodeEnv; },
  get isTest() { return env.nodeEnv === 'test'; },

  get apiKey() { return env.apiKey; },
  get jwtSecret() { return env.jwtSecret; },
  get rateLimitWindowMs() { return env.rateLimitWindowMs; },
  get rateLimitMaxRequests() { return env.rateLimitMaxRequests; },

  get logLevel() { return env.logLevel; },
  get logFileEnabled() { return env.logFileEnabled; },
  get logFileRetentionHours() { return env.logFileRetentionHours; },

  get oracleStaleTimeoutSec() { return env.oracleStaleTimeoutSec; },
  get rpcUrl() { return env.rpcUrl; },
  get feedRefreshIntervalMs() { return env.feedRefreshIntervalMs; },

  get engineConfigPath() { return env.engineConfigPath; },
  get engineAccount() { return env.engineAccount; },

  get addressNormalizeLowercase() { return env.addressNormalizeLowercase; }
};

export type AppConfig = typeof config;
