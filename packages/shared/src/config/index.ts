/**
 * Configuration management for flowgauge
 */

import { z } from 'zod';
import { config as dotenvConfig } from 'dotenv';
import { resolve, dirname } from 'path';
import { fileURLToPath } from 'url';
import { ConfigurationError } from '../errors/index.js';

// Load environment variables from the working directory, then the repository root
const __dirname = dirname(fileURLToPath(import.meta.url));
const monorepoRoot = resolve(__dirname, '../../../../');

const envPaths = [
  resolve(process.cwd(), '.env'),
  resolve(monorepoRoot, '.env'),
];

for (const envPath of envPaths) {
  dotenvConfig({ path: envPath });
}

// "true" and "1" enable a flag; anything else (including unset) disables it
const envBoolean = z
  .string()
  .optional()
  .transform((val) => val === 'true' || val === '1');

const envList = (separator: RegExp) =>
  z
    .string()
    .optional()
    .transform((val) => {
      const items = (val ?? '').split(separator).map((item) => item.trim()).filter(Boolean);
      return items.length > 0 ? items : undefined;
    });

// Configuration schema
const configSchema = z.object({
  // Application
  nodeEnv: z.enum(['development', 'production', 'test']).default('development'),
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  // Log every enriched flow
  verbose: envBoolean,

  // Prometheus scrape endpoint
  metrics: z.object({
    host: z.string().default('0.0.0.0'),
    port: z.coerce.number().int().min(1).max(65535).default(9590),
    path: z.string().startsWith('/').default('/metrics'),
    countPackets: envBoolean,
  }),

  // Flow collector process (pmacctd printing JSON)
  collector: z.object({
    command: z.string().min(1).default('pmacctd'),
    args: z
      .string()
      .transform((val) => val.split(/\s+/).filter(Boolean))
      .default('-r 1 -c src_host,dst_host -P print -O json'),
    stopSignal: z.enum(['SIGINT', 'SIGTERM', 'SIGHUP']).default('SIGINT'),
  }),

  // MaxMind databases
  geoip: z.object({
    cityDatabase: z.string().min(1).default('GeoLite2-City.mmdb'),
    asnDatabase: z.string().min(1).default('GeoLite2-ASN.mmdb'),
  }),

  network: z.object({
    // Overrides interface discovery when set
    localAddresses: envList(/,/),
  }),
});

export type Config = z.infer<typeof configSchema>;

// Parse and validate configuration
function loadConfig(): Config {
  const rawConfig = {
    nodeEnv: process.env.NODE_ENV,
    logLevel: process.env.LOG_LEVEL,
    verbose: process.env.FLOW_VERBOSE,

    metrics: {
      host: process.env.METRICS_HOST,
      port: process.env.METRICS_PORT,
      path: process.env.METRICS_PATH,
      countPackets: process.env.METRICS_COUNT_PACKETS,
    },

    collector: {
      command: process.env.COLLECTOR_COMMAND,
      args: process.env.COLLECTOR_ARGS,
      stopSignal: process.env.COLLECTOR_STOP_SIGNAL,
    },

    geoip: {
      cityDatabase: process.env.GEOIP_CITY_DB,
      asnDatabase: process.env.GEOIP_ASN_DB,
    },

    network: {
      localAddresses: process.env.LOCAL_ADDRESSES,
    },
  };

  return configSchema.parse(rawConfig);
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
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

// Validate config without loading (for startup checks)
export function validateConfig(): { valid: boolean; errors?: string[] } {
  try {
    loadConfig();
    return { valid: true };
  } catch (error) {
    if (error instanceof z.ZodError) {
      return {
        valid: false,
        errors: formatIssues(error),
      };
    }
    throw error;
  }
}
