/**
 * Bench Sequencer - Configuration
 *
 * Centralized configuration management with environment variable support
 */

import { z } from 'zod';

const ConfigSchema = z.object({
  // Runtime
  nodeEnv: z.enum(['development', 'production', 'test']).default('development'),
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),

  // Build Metadata
  version: z.string().default('1.0.0'),
  serviceName: z.string().default('bench-sequencer'),

  // Sequence Execution Configuration
  automation: z.object({
    stopOnError: z.boolean().default(true),
    maxIterations: z.number().int().positive().default(10000),
    defaultParallelWorkers: z.number().int().min(1).max(16).default(4),
    maxParallelWorkers: z.number().int().min(1).max(16).default(16),
    maxDelaySeconds: z.number().positive().default(3600),
    maxSweepPoints: z.number().int().positive().default(100000),
  }),

  // Storage Configuration
  storage: z.object({
    logsDir: z.string().default('./logs'),
    sequencesDir: z.string().default('./sequences'),
  }),
});

export type Config = z.infer<typeof ConfigSchema>;

function loadConfig(): Config {
  const rawConfig = {
    nodeEnv: process.env.NODE_ENV || 'development',
    logLevel: process.env.LOG_LEVEL || 'info',

    version: process.env.BENCHSEQ_VERSION || '1.0.0',
    serviceName: process.env.BENCHSEQ_SERVICE_NAME || 'bench-sequencer',

    automation: {
      stopOnError: process.env.AUTOMATION_STOP_ON_ERROR !== 'false',
      maxIterations: parseInt(process.env.AUTOMATION_MAX_ITERATIONS || '10000', 10),
      defaultParallelWorkers: parseInt(process.env.AUTOMATION_DEFAULT_PARALLEL_WORKERS || '4', 10),
      maxParallelWorkers: parseInt(process.env.AUTOMATION_MAX_PARALLEL_WORKERS || '16', 10),
      maxDelaySeconds: parseFloat(process.env.AUTOMATION_MAX_DELAY_SECONDS || '3600'),
      maxSweepPoints: parseInt(process.env.AUTOMATION_MAX_SWEEP_POINTS || '100000', 10),
    },

    storage: {
      logsDir: process.env.LOGS_DIR || './logs',
      sequencesDir: process.env.SEQUENCES_DIR || './sequences',
    },
  };

  return ConfigSchema.parse(rawConfig);
}

export const config = loadConfig();

export function getConfig(): Config {
  return config;
}
