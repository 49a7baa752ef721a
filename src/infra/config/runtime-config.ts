import * as fs from 'fs';
import * as path from 'path';
import { getConfigDir } from './config-paths.js';
import { isGenericDebugEnabled, isTickgraphDebugEnabled } from './debug-flags.js';

export interface TickgraphRuntimeConfig {
  scheduler: {
    /** Upper bound on time steps the CLI pulls from one run */
    maxTimeSteps: number;
    warnOnDefaultConditions: boolean;
  };
  debug: {
    loggingEnabled: boolean;
  };
}

export const DEFAULT_RUNTIME_CONFIG: TickgraphRuntimeConfig = {
  scheduler: {
    maxTimeSteps: 1000,
    warnOnDefaultConditions: true,
  },
  debug: {
    loggingEnabled: false,
  },
};

export function getRuntimeConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  return path.join(getConfigDir(env), 'tickgraph.json');
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toPositiveInt(value: unknown, fallback: number): number {
  if (typeof value === 'number' && Number.isInteger(value) && value > 0) {
    return value;
  }

  if (typeof value === 'string') {
    const parsed = Number.parseInt(value, 10);
    if (Number.isInteger(parsed) && parsed > 0) {
      return parsed;
    }
  }

  return fallback;
}

function toBoolean(value: unknown, fallback: boolean): boolean {
  if (typeof value === 'boolean') {
    return value;
  }

  if (typeof value === 'string') {
    const normalized = value.trim().toLowerCase();
    if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
    if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
  }

  return fallback;
}

function deepMerge(base: Record<string, unknown>, value: unknown): Record<string, unknown> {
  if (!isRecord(value)) {
    return { ...base };
  }

  const merged: Record<string, unknown> = { ...base };

  for (const key of Object.keys(value)) {
    const baseValue = merged[key];
    const sourceValue = value[key];

    if (isRecord(baseValue) && isRecord(sourceValue)) {
      merged[key] = deepMerge(baseValue, sourceValue);
    } else {
      merged[key] = sourceValue;
    }
  }

  return merged;
}

/**
 * Coerce an arbitrary parsed object into a complete config, field by field.
 */
export function normalizeConfig(raw: unknown): TickgraphRuntimeConfig {
  const source = isRecord(raw) ? raw : {};
  const scheduler = isRecord(source.scheduler) ? source.scheduler : {};
  const debug = isRecord(source.debug) ? source.debug : {};

  return {
    scheduler: {
      maxTimeSteps: toPositiveInt(scheduler.maxTimeSteps, DEFAULT_RUNTIME_CONFIG.scheduler.maxTimeSteps),
      warnOnDefaultConditions: toBoolean(
        scheduler.warnOnDefaultConditions,
        DEFAULT_RUNTIME_CONFIG.scheduler.warnOnDefaultConditions
      ),
    },
    debug: {
      loggingEnabled: toBoolean(debug.loggingEnabled, DEFAULT_RUNTIME_CONFIG.debug.loggingEnabled),
    },
  };
}

/**
 * Environment variables layered over a base config.
 */
export function applyEnvironmentOverrides(
  config: TickgraphRuntimeConfig,
  env: NodeJS.ProcessEnv = process.env
): TickgraphRuntimeConfig {
  return {
    scheduler: {
      ...config.scheduler,
      maxTimeSteps: toPositiveInt(env.TICKGRAPH_MAX_TIME_STEPS, config.scheduler.maxTimeSteps),
    },
    debug: {
      loggingEnabled:
        env.TICKGRAPH_DEBUG !== undefined
          ? isTickgraphDebugEnabled(env)
          : config.debug.loggingEnabled || isGenericDebugEnabled(env),
    },
  };
}

/**
 * Read tickgraph.json (when present) over the defaults, then apply the
 * environment. A file that does not parse is reported and ignored.
 */
export function loadRuntimeConfig(
  env: NodeJS.ProcessEnv = process.env,
  logger: Pick<Console, 'warn'> = console
): TickgraphRuntimeConfig {
  const configPath = getRuntimeConfigPath(env);
  let fileConfig: Record<string, unknown> = {};

  if (fs.existsSync(configPath)) {
    try {
      fileConfig = deepMerge({}, JSON.parse(fs.readFileSync(configPath, 'utf-8')));
    } catch (error) {
      logger.warn(`[Config] Ignoring unreadable ${configPath}:`, error instanceof Error ? error.message : error);
    }
  }

  const merged = deepMerge(
    { scheduler: { ...DEFAULT_RUNTIME_CONFIG.scheduler }, debug: { ...DEFAULT_RUNTIME_CONFIG.debug } },
    fileConfig
  );
  return applyEnvironmentOverrides(normalizeConfig(merged), env);
}

export function saveRuntimeConfig(
  config: TickgraphRuntimeConfig,
  env: NodeJS.ProcessEnv = process.env
): void {
  const configDir = getConfigDir(env);
  if (!fs.existsSync(configDir)) {
    fs.mkdirSync(configDir, { recursive: true, mode: 0o700 });
  }

  fs.writeFileSync(getRuntimeConfigPath(env), JSON.stringify(normalizeConfig(config), null, 2), {
    mode: 0o600,
  });
}
