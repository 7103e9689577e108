import { readFile } from 'node:fs/promises';
import {
  IngestionConfigSchema,
  type IngestionConfig,
  type Interval,
} from '@gapless/schemas';
import { ConfigurationError, getEnvVar, toErrorMessage } from '@gapless/utils';

export interface ConfigOverrides {
  symbols?: string[];
  intervals?: Interval[];
}

/**
 * Environment variable prefix carrying an adapter's credentials
 *
 * @example credentialEnvPrefix('binance-us') // 'GAPLESS_BINANCE_US'
 */
export function credentialEnvPrefix(adapterId: string): string {
  return `GAPLESS_${adapterId.toUpperCase().replace(/[^A-Z0-9]/g, '_')}`;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Lay credentials from the environment over the adapters of a raw config
 */
export function applyEnvCredentials(raw: unknown, env: NodeJS.ProcessEnv): unknown {
  if (!isRecord(raw) || !Array.isArray(raw.adapters)) return raw;

  const adapters = raw.adapters.map((adapter: unknown) => {
    if (!isRecord(adapter) || typeof adapter.id !== 'string') return adapter;
    const prefix = credentialEnvPrefix(adapter.id);
    const apiKey = getEnvVar(`${prefix}_API_KEY`, env);
    if (!apiKey) return adapter;
    const apiSecret = getEnvVar(`${prefix}_API_SECRET`, env);
    return { ...adapter, credentials: apiSecret ? { apiKey, apiSecret } : { apiKey } };
  });

  return { ...raw, adapters };
}

/**
 * Validate a raw configuration object
 *
 * @throws ConfigurationError listing every problem
 */
export function parseIngestionConfig(
  raw: unknown,
  env: NodeJS.ProcessEnv = process.env,
  overrides: ConfigOverrides = {}
): IngestionConfig {
  const withCredentials = applyEnvCredentials(raw, env);
  const merged = isRecord(withCredentials)
    ? {
        ...withCredentials,
        ...(overrides.symbols ? { symbols: overrides.symbols } : {}),
        ...(overrides.intervals ? { intervals: overrides.intervals } : {}),
      }
    : withCredentials;

  const result = IngestionConfigSchema.safeParse(merged);
  if (!result.success) {
    const problems = result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new ConfigurationError(`Invalid ingestion config: ${problems.join('; ')}`);
  }
  return result.data;
}

/**
 * Read and validate a JSON configuration file
 */
export async function loadIngestionConfig(
  path: string,
  env: NodeJS.ProcessEnv = process.env,
  overrides: ConfigOverrides = {}
): Promise<IngestionConfig> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (error) {
    throw new ConfigurationError(`Cannot read config file ${path}: ${toErrorMessage(error)}`, { cause: error });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new ConfigurationError(`Config file ${path} is not valid JSON: ${toErrorMessage(error)}`, { cause: error });
  }

  return parseIngestionConfig(raw, env, overrides);
}
