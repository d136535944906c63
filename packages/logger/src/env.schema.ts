import { z } from 'zod';

import { LOG_LEVELS, initLogger, type Sink } from './logger.js';
import { ConsoleSink } from './sinks/console.js';

const booleanFlag = (fallback: 'true' | 'false') =>
  z
    .enum(['true', 'false'])
    .default(fallback)
    .transform((val) => val === 'true');

export const loggerEnvSchema = z.object({
  CURRENCY_UNITS_LOG_COLOR: booleanFlag('false'),
  CURRENCY_UNITS_LOG_CONSOLE: booleanFlag('false'),
  CURRENCY_UNITS_LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  NODE_ENV: z.enum(['production', 'development', 'test']).default('development'),
});

export type LoggerEnvConfig = z.infer<typeof loggerEnvSchema>;

/**
 * Validate the logger's environment variables.
 * @throws Error listing every invalid variable
 */
export function validateLoggerEnv(env: NodeJS.ProcessEnv = process.env): LoggerEnvConfig {
  const result = loggerEnvSchema.safeParse(env);
  if (!result.success) {
    const errors = result.error.issues.map((e) => `  - ${e.path.join('.')}: ${e.message}`).join('\n');
    throw new Error(`Logger environment validation failed:\n${errors}`);
  }
  return result.data;
}

/**
 * Configure the global logger from the environment. Console output is opt-in;
 * extra sinks are always installed.
 */
export function initLoggerFromEnv(env: NodeJS.ProcessEnv = process.env, extraSinks: Sink[] = []): LoggerEnvConfig {
  const config = validateLoggerEnv(env);
  const sinks: Sink[] = [...extraSinks];
  if (config.CURRENCY_UNITS_LOG_CONSOLE) {
    sinks.push(new ConsoleSink({ color: config.CURRENCY_UNITS_LOG_COLOR }));
  }

  initLogger({ level: config.CURRENCY_UNITS_LOG_LEVEL, sinks });
  return config;
}
