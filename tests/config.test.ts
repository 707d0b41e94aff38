import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import {
  loadConfig,
  normaliseBasepath,
  parseConfig,
  resolveConfigPath,
} from '../src/config/loader.js';
import { ConfigError } from '../src/core/errors.js';
import { MetricEngine } from '../src/core/engine.js';

describe('parseConfig', () => {
  it('fills in defaults', () => {
    const config = parseConfig('event_handlers: []');
    expect(config).toEqual({
      webhookBasepath: '/webhook',
      textfileDir: '/var/lib/node_exporter/textfile_collector',
      output: { scrapeable: true, textfile: false },
      exporterMetrics: false,
      cache: { maxSize: 128, ttlMs: 600_000 },
      listen: { host: '0.0.0.0', port: 5000 },
      rules: [],
    });
  });

  it('maps handlers to rules and accepts kind as an alias of type', () => {
    const config = parseConfig(
      [
        'webhook_basepath: /hooks/',
        'cache: { max_size: 4, ttl: 1.5 }',
        'event_handlers:',
        '  - event_title: "^a"',
        '    extractors:',
        '      type: "\'counter\'"',
        '      value: data.n',
        '  - event_title: "^b"',
        '    extractors:',
        '      kind: "\'info\'"',
        '      labels: [data.x, [data.y, "/(\\\\w+)/"]]',
      ].join('\n'),
    );
    expect(config.webhookBasepath).toBe('/hooks');
    expect(config.cache).toEqual({ maxSize: 4, ttlMs: 1500 });
    expect(config.rules).toEqual([
      { eventPattern: '^a', extractors: { help: undefined, kind: "'counter'", value: 'data.n', labels: undefined } },
      {
        eventPattern: '^b',
        extractors: { help: undefined, kind: "'info'", value: undefined, labels: ['data.x', ['data.y', '/(\\w+)/']] },
      },
    ]);
  });

  it('returns a frozen configuration', () => {
    const config = parseConfig('event_handlers: []');
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.cache)).toBe(true);
  });

  it('rejects unknown keys', () => {
    expect(() => parseConfig('event_handlers: []\nlisten_port: 80')).toThrow(ConfigError);
    expect(() => parseConfig('event_handlers: []\nlisten_port: 80')).toThrow(/must NOT have additional properties/);
  });

  it('requires event_handlers', () => {
    expect(() => parseConfig('webhook_basepath: /x')).toThrow(/must have required property 'event_handlers'/);
  });

  it('rejects out-of-range cache settings', () => {
    expect(() => parseConfig('event_handlers: []\ncache: { max_size: 0 }')).toThrow(ConfigError);
    expect(() => parseConfig('event_handlers: []\ncache: { ttl: 0 }')).toThrow(ConfigError);
  });

  it('rejects extractors that are not strings or lists of strings', () => {
    const text = 'event_handlers:\n  - event_title: a\n    extractors:\n      value: { nested: map }';
    expect(() => parseConfig(text)).toThrow(ConfigError);
  });

  it('rejects type and kind together', () => {
    const text = 'event_handlers:\n  - event_title: a\n    extractors:\n      type: x\n      kind: y';
    expect(() => parseConfig(text)).toThrow('config: event_handlers[0].extractors: set either "type" or "kind", not both');
  });

  it('wraps YAML syntax errors', () => {
    expect(() => parseConfig('event_handlers: [')).toThrow(/^config: invalid YAML/);
  });
});

describe('normaliseBasepath', () => {
  it('adds a leading slash and drops trailing ones', () => {
    expect(normaliseBasepath('hooks/')).toBe('/hooks');
    expect(normaliseBasepath('/a/b')).toBe('/a/b');
    expect(normaliseBasepath('/')).toBe('');
  });
});

describe('resolveConfigPath', () => {
  it('prefers --config over the environment', () => {
    expect(resolveConfigPath(['--config', 'x.yaml'], { HOOKMETRICS_CONFIG: 'env.yaml' })).toBe('x.yaml');
    expect(resolveConfigPath(['--config=y.yaml'], {})).toBe('y.yaml');
  });

  it('falls back to the environment, then config.yaml', () => {
    expect(resolveConfigPath([], { HOOKMETRICS_CONFIG: 'env.yaml' })).toBe('env.yaml');
    expect(resolveConfigPath([], {})).toBe('config.yaml');
  });

  it('rejects --config without a value', () => {
    expect(() => resolveConfigPath(['--config'], {})).toThrow(ConfigError);
  });
});

describe('loadConfig', () => {
  let dir: string;

  beforeAll(async () => {
    dir = await mkdtemp(join(tmpdir(), 'hookmetrics-config-'));
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('reads a file from disk', async () => {
    const path = join(dir, 'config.yaml');
    await writeFile(path, 'listen: { port: 9100 }\nevent_handlers: []\n');
    const config = await loadConfig(path);
    expect(config.listen).toEqual({ host: '0.0.0.0', port: 9100 });
  });

  it('names the file in errors', async () => {
    const path = join(dir, 'bad.yaml');
    await writeFile(path, 'event_handlers: 3\n');
    await expect(loadConfig(path)).rejects.toThrow(`${path}: config/event_handlers must be array`);
  });

  it('reports a missing file', async () => {
    await expect(loadConfig(join(dir, 'missing.yaml'))).rejects.toThrow(/cannot read configuration/);
  });

  it('loads the bundled example and builds an engine from it', async () => {
    const config = await loadConfig(fileURLToPath(new URL('../config.example.yaml', import.meta.url)));
    expect(config.rules.map((rule) => rule.eventPattern)).toEqual(['^odalogs_error', '^odalogs_.*', '^build_info$']);
    const engine = new MetricEngine({ rules: config.rules, cache: config.cache });
    const result = engine.processEvent('odalogs_latency', { data: { message: 'latency (42)ms', host: 'h1' } });
    expect(result.ok && result.value.lastValue).toBe(42);
  });
});
