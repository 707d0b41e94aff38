/**
 * Configuration loading — YAML text in, validated read-only settings out.
 */

import { readFile } from 'node:fs/promises';
import _Ajv from 'ajv';
import { parse as parseYaml } from 'yaml';
import type { CacheBounds, ExtractorConfigs, RuleConfig } from '../core/types.js';
import { ConfigError } from '../core/errors.js';
import { CONFIG_SCHEMA, type RawConfig, type RawEventHandler } from './schema.js';

const Ajv = _Ajv.default;
const ajv = new Ajv({ allErrors: true, allowUnionTypes: true });
const validateRaw = ajv.compile<RawConfig>(CONFIG_SCHEMA);

export const CONFIG_ENV_VAR = 'HOOKMETRICS_CONFIG';
export const DEFAULT_CONFIG_PATH = 'config.yaml';

export interface HookmetricsConfig {
  /** Normalised: leading slash, no trailing slash */
  readonly webhookBasepath: string;
  readonly textfileDir: string;
  readonly output: { readonly scrapeable: boolean; readonly textfile: boolean };
  readonly exporterMetrics: boolean;
  readonly cache: Readonly<CacheBounds>;
  readonly listen: { readonly host: string; readonly port: number };
  readonly rules: readonly RuleConfig[];
}

export const DEFAULTS = {
  webhookBasepath: '/webhook',
  textfileDir: '/var/lib/node_exporter/textfile_collector',
  scrapeable: true,
  textfile: false,
  exporterMetrics: false,
  cacheMaxSize: 128,
  cacheTtlSeconds: 600,
  host: '0.0.0.0',
  port: 5000,
} as const;

/** `--config <path>` wins over the environment, which wins over the default. */
export function resolveConfigPath(argv: readonly string[], env: NodeJS.ProcessEnv): string {
  const flag = argv.findIndex((arg) => arg === '--config' || arg.startsWith('--config='));
  if (flag !== -1) {
    const arg = argv[flag];
    const value = arg.includes('=') ? arg.slice(arg.indexOf('=') + 1) : argv[flag + 1];
    if (!value) throw new ConfigError('--config requires a path');
    return value;
  }
  return env[CONFIG_ENV_VAR] || DEFAULT_CONFIG_PATH;
}

export function normaliseBasepath(basepath: string): string {
  const trimmed = basepath.trim().replace(/\/+$/, '');
  if (trimmed === '') return '';
  return trimmed.startsWith('/') ? trimmed : `/${trimmed}`;
}

/** Parse and validate YAML text. Throws ConfigError. */
export function parseConfig(text: string, source = 'config'): HookmetricsConfig {
  let parsed: unknown;
  try {
    parsed = parseYaml(text);
  } catch (error) {
    throw new ConfigError(`invalid YAML: ${error instanceof Error ? error.message : String(error)}`, source);
  }

  if (!validateRaw(parsed)) {
    throw new ConfigError(ajv.errorsText(validateRaw.errors, { dataVar: 'config' }), source);
  }

  const raw = parsed;
  return Object.freeze({
    webhookBasepath: normaliseBasepath(raw.webhook_basepath ?? DEFAULTS.webhookBasepath),
    textfileDir: raw.textfile_dir ?? DEFAULTS.textfileDir,
    output: Object.freeze({
      scrapeable: raw.output?.scrapeable ?? DEFAULTS.scrapeable,
      textfile: raw.output?.textfile ?? DEFAULTS.textfile,
    }),
    exporterMetrics: raw.exporter_metrics ?? DEFAULTS.exporterMetrics,
    cache: Object.freeze({
      maxSize: raw.cache?.max_size ?? DEFAULTS.cacheMaxSize,
      ttlMs: (raw.cache?.ttl ?? DEFAULTS.cacheTtlSeconds) * 1000,
    }),
    listen: Object.freeze({
      host: raw.listen?.host ?? DEFAULTS.host,
      port: raw.listen?.port ?? DEFAULTS.port,
    }),
    rules: Object.freeze(raw.event_handlers.map((handler, i) => toRule(handler, `${source}: event_handlers[${i}]`))),
  });
}

/** Read and parse a configuration file. Throws ConfigError. */
export async function loadConfig(path: string): Promise<HookmetricsConfig> {
  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (error) {
    throw new ConfigError(`cannot read configuration: ${error instanceof Error ? error.message : String(error)}`, path);
  }
  return parseConfig(text, path);
}

function toRule(handler: RawEventHandler, path: string): RuleConfig {
  const extractors = handler.extractors ?? {};
  if (extractors.type !== undefined && extractors.kind !== undefined) {
    throw new ConfigError('set either "type" or "kind", not both', `${path}.extractors`);
  }
  const configs: ExtractorConfigs = {
    help: extractors.help,
    kind: extractors.type ?? extractors.kind,
    value: extractors.value,
    labels: extractors.labels,
  };
  return { eventPattern: handler.event_title, extractors: configs };
}
