/**
 * Configuration management for deadline-lens
 */

import { z } from 'zod';
import { config as dotenvConfig } from 'dotenv';
import { resolve } from 'path';
import { ConfigurationError } from '../errors/index.js';

// Values already present in the environment win over .env
dotenvConfig({ path: resolve(process.cwd(), '.env') });

// Comma-separated extension list, normalized to a leading dot
const extensionList = z
  .string()
  .transform((val) =>
    val
      .split(',')
      .map((ext) => ext.trim().toLowerCase())
      .filter(Boolean)
      .map((ext) => (ext.startsWith('.') ? ext : `.${ext}`))
  )
  .refine((list) => list.length > 0, 'at least one file extension is required');

// Configuration schema
const configSchema = z.object({
  // Application
  nodeEnv: z.enum(['development', 'production', 'test']).default('development'),
  logLevel: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),

  // Input discovery and the per-file pass
  analysis: z.object({
    logExtensions: extensionList.default('.log,.out'),
    traceExtensions: extensionList.default('.qlog,.json'),
    readConcurrency: z.coerce.number().int().positive().default(4),
  }),

  // Timeline chart
  timeline: z.object({
    width: z.coerce.number().int().min(200).default(1200),
    height: z.coerce.number().int().min(150).default(600),
  }),
});

export type Config = z.infer<typeof configSchema>;

// Parse and validate configuration
function loadConfig(): Config {
  const rawConfig = {
    nodeEnv: process.env.NODE_ENV,
    logLevel: process.env.LOG_LEVEL,

    analysis: {
      logExtensions: process.env.DEADLINE_LENS_LOG_EXTENSIONS,
      traceExtensions: process.env.DEADLINE_LENS_TRACE_EXTENSIONS,
      readConcurrency: process.env.DEADLINE_LENS_READ_CONCURRENCY,
    },

    timeline: {
      width: process.env.DEADLINE_LENS_TIMELINE_WIDTH,
      height: process.env.DEADLINE_LENS_TIMELINE_HEIGHT,
    },
  };

  return configSchema.parse(rawConfig);
}

function formatIssues(error: z.ZodError): string[] {
  return error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
}

// Singleton config instance
let configInstance: Config | null = null;

export function getConfig(): Config {
  if (!configInstance) {
    try {
      configInstance = loadConfig();
    } catch (error) {
      if (error instanceof z.ZodError) {
        const issues = formatIssues(error);
        throw new ConfigurationError(`Invalid configuration: ${issues.join('; ')}`, { issues });
      }
      throw error;
    }
  }
  return configInstance;
}

// For testing - reset config
export function resetConfig(): void {
  configInstance = null;
}
