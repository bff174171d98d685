import dotenv from 'dotenv';

import {
  engineConfigInputFromEnv,
  engineConfigSchema,
  envSchema,
  type AppConfig,
  type EngineConfig
} from './schema.js';

dotenv.config();

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = envSchema.safeParse(env);

  if (!result.success) {
    throw new Error(`Invalid configuration: ${result.error.message}`);
  }

  return result.data;
}

export function loadEngineConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  const result = engineConfigSchema.safeParse(engineConfigInputFromEnv(env));

  if (!result.success) {
    throw new Error(`Invalid engine configuration: ${result.error.message}`);
  }

  return result.data;
}

export {
  engineConfigSchema,
  envSchema,
  type AppConfig,
  type EngineConfig,
  type EngineConfigInput
} from './schema.js';
