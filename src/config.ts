/**
 * Configuration Management
 *
 * Handles loading, validation, and hot-reload of the config file.
 *
 * @packageDocumentation
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import { z } from 'zod';
import { DEFAULT_MODELS, type RateBudget, type Tier } from './types.js';
import { defaultLogger, type Logger } from './logger.js';

/**
 * Per-tier key matching and rate budget
 */
const TierConfigSchema = z.object({
  keyPrefixes: z.array(z.string().min(1)).default([]),
  keys: z.array(z.string().min(1)).default([]),
  requests: z.number().int().positive(),
  windowSeconds: z.number().positive(),
});

const EndpointListSchema = z.array(z.string().url()).min(1);

/**
 * Full config schema
 */
const ConfigSchema = z.object({
  server: z.object({
    host: z.string().default('0.0.0.0'),
    port: z.number().int().min(0).max(65535).default(8100),
  }).default({}),
  upstream: z.object({
    endpoints: EndpointListSchema,
    apiKey: z.string().optional(),
    attemptTimeoutMs: z.number().int().positive().default(15_000),
    /** Longest gap between events of a committed stream (default: attemptTimeoutMs) */
    streamIdleTimeoutMs: z.number().int().positive().optional(),
    chatPath: z.string().default('/chat/completions'),
  }),
  tiers: z.object({
    customer: TierConfigSchema,
    business: TierConfigSchema,
  }),
  cache: z.object({
    enabled: z.boolean().default(true),
    ttlSeconds: z.number().positive().default(300),
    maxEntries: z.number().int().positive().default(1000),
  }).default({}),
  session: z.object({
    idleTimeoutMs: z.number().int().positive().default(300_000),
  }).default({}),
  rateLimiter: z.object({
    idleWindows: z.number().int().positive().default(10),
  }).default({}),
  models: z.array(z.string()).optional(),
});

export type TierConfig = z.infer<typeof TierConfigSchema>;
export type Config = z.infer<typeof ConfigSchema>;
export type ConfigInput = z.input<typeof ConfigSchema>;

/**
 * Default configuration
 */
export const DEFAULT_CONFIG: Config = {
  server: { host: '0.0.0.0', port: 8100 },
  upstream: {
    endpoints: [
      'https://upstream-1.example.com/api/v1',
      'https://upstream-2.example.com/api/v1',
    ],
    attemptTimeoutMs: 15_000,
    chatPath: '/chat/completions',
  },
  tiers: {
    customer: { keyPrefixes: ['cus_'], keys: [], requests: 10, windowSeconds: 60 },
    business: { keyPrefixes: ['bus_'], keys: [], requests: 100, windowSeconds: 60 },
  },
  cache: { enabled: true, ttlSeconds: 300, maxEntries: 1000 },
  session: { idleTimeoutMs: 300_000 },
  rateLimiter: { idleWindows: 10 },
  models: [...DEFAULT_MODELS],
};

/**
 * Validate a raw config object, filling defaults.
 */
export function parseConfig(raw: unknown): Config {
  return ConfigSchema.parse(raw);
}

/**
 * Get config file path
 */
export function getConfigPath(): string {
  return process.env['CHAT_GATEWAY_CONFIG'] ?? path.join(os.homedir(), '.chat-gateway', 'config.json');
}

/**
 * Write default config file
 */
export function writeDefaultConfig(configPath: string = getConfigPath(), logger: Logger = defaultLogger): void {
  const dir = path.dirname(configPath);

  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }

  if (!fs.existsSync(configPath)) {
    fs.writeFileSync(
      configPath,
      JSON.stringify(DEFAULT_CONFIG, null, 2) + '\n',
      'utf-8'
    );
    logger.info(`Created default config at ${configPath}`);
  }
}

/**
 * Apply environment overrides on top of a validated config.
 */
export function applyEnvOverrides(config: Config, env: NodeJS.ProcessEnv = process.env): Config {
  const next: Config = {
    ...config,
    server: { ...config.server },
    upstream: { ...config.upstream },
  };

  const port = env['PORT'];
  if (port) {
    const parsed = parseInt(port, 10);
    if (!isNaN(parsed)) next.server.port = parsed;
  }
  if (env['HOST']) next.server.host = env['HOST'];
  if (env['UPSTREAM_API_KEY']) next.upstream.apiKey = env['UPSTREAM_API_KEY'];

  const endpoints = env['UPSTREAM_ENDPOINTS']
    ?.split(',')
    .map((e) => e.trim())
    .filter((e) => e.length > 0);
  if (endpoints && endpoints.length > 0) {
    const parsed = EndpointListSchema.safeParse(endpoints);
    if (!parsed.success) {
      throw new Error(`UPSTREAM_ENDPOINTS must be a comma-separated list of URLs: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
    }
    next.upstream.endpoints = parsed.data;
  }

  return next;
}

/**
 * Load and validate config
 */
export function loadConfig(configPath: string = getConfigPath(), logger: Logger = defaultLogger): Config {
  // Create default if doesn't exist
  writeDefaultConfig(configPath, logger);

  let config: Config;
  try {
    const raw = fs.readFileSync(configPath, 'utf-8');
    const parsed: unknown = JSON.parse(raw);
    config = parseConfig(parsed);
  } catch (err) {
    if (err instanceof z.ZodError) {
      logger.error(`Invalid config: ${err.message}`);
    } else if (err instanceof SyntaxError) {
      logger.error(`Config JSON parse error: ${err.message}`);
    } else {
      logger.error(`Failed to load config: ${String(err)}`);
    }
    logger.info('Using default config');
    config = DEFAULT_CONFIG;
  }

  // Invalid environment overrides propagate
  return applyEnvOverrides(config);
}

/**
 * Rate budget for a tier from config
 */
export function getTierBudget(config: Config, tier: Tier): RateBudget {
  const t = config.tiers[tier];
  return { requests: t.requests, windowMs: Math.round(t.windowSeconds * 1000) };
}

/**
 * Rate budgets for every tier
 */
export function getTierBudgets(config: Config): Record<Tier, RateBudget> {
  return {
    customer: getTierBudget(config, 'customer'),
    business: getTierBudget(config, 'business'),
  };
}

/**
 * Watch config file for changes. Returns a function that stops watching.
 */
export function watchConfig(
  onChange: (config: Config) => void,
  configPath: string = getConfigPath(),
  logger: Logger = defaultLogger
): () => void {
  const dir = path.dirname(configPath);
  const file = path.basename(configPath);

  // Ensure directory exists
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }

  let debounceTimer: NodeJS.Timeout | null = null;

  const watcher = fs.watch(dir, (_eventType, filename) => {
    if (filename === file) {
      // Debounce to avoid multiple reloads
      if (debounceTimer) clearTimeout(debounceTimer);
      debounceTimer = setTimeout(() => {
        logger.info('Config file changed, reloading...');
        try {
          onChange(loadConfig(configPath, logger));
        } catch (err) {
          logger.error(`Config reload failed, keeping current settings: ${err instanceof Error ? err.message : String(err)}`);
        }
      }, 100);
    }
  });

  return () => {
    if (debounceTimer) clearTimeout(debounceTimer);
    watcher.close();
  };
}
