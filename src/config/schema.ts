/**
 * JSON schema for the YAML configuration file, as written on disk.
 */

import type { StageConfig } from '../core/types.js';

export interface RawExtractors {
  help?: RawExtractor;
  type?: RawExtractor;
  kind?: RawExtractor;
  value?: RawExtractor;
  labels?: RawExtractor;
}

export type RawExtractor = StageConfig | Array<StageConfig | StageConfig[]>;

export interface RawEventHandler {
  event_title: string;
  extractors?: RawExtractors;
}

export interface RawConfig {
  webhook_basepath?: string;
  textfile_dir?: string;
  output?: { scrapeable?: boolean; textfile?: boolean };
  exporter_metrics?: boolean;
  cache?: { max_size?: number; ttl?: number };
  listen?: { host?: string; port?: number };
  event_handlers: RawEventHandler[];
}

const stage = { type: ['string', 'null'] };

const extractor = {
  anyOf: [
    stage,
    {
      type: 'array',
      items: { anyOf: [stage, { type: 'array', items: stage }] },
    },
  ],
};

export const CONFIG_SCHEMA = {
  type: 'object',
  additionalProperties: false,
  required: ['event_handlers'],
  properties: {
    webhook_basepath: { type: 'string' },
    textfile_dir: { type: 'string', minLength: 1 },
    output: {
      type: 'object',
      additionalProperties: false,
      properties: {
        scrapeable: { type: 'boolean' },
        textfile: { type: 'boolean' },
      },
    },
    exporter_metrics: { type: 'boolean' },
    cache: {
      type: 'object',
      additionalProperties: false,
      properties: {
        max_size: { type: 'integer', minimum: 1 },
        ttl: { type: 'number', exclusiveMinimum: 0 },
      },
    },
    listen: {
      type: 'object',
      additionalProperties: false,
      properties: {
        host: { type: 'string', minLength: 1 },
        port: { type: 'integer', minimum: 0, maximum: 65535 },
      },
    },
    event_handlers: {
      type: 'array',
      items: {
        type: 'object',
        additionalProperties: false,
        required: ['event_title'],
        properties: {
          event_title: { type: 'string', minLength: 1 },
          extractors: {
            type: 'object',
            additionalProperties: false,
            properties: {
              help: extractor,
              type: extractor,
              kind: extractor,
              value: extractor,
              labels: extractor,
            },
          },
        },
      },
    },
  },
} as const;
