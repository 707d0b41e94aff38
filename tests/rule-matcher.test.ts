import { describe, it, expect } from 'vitest';
import { RuleMatcher, compileRules, stripDelimiters } from '../src/core/rule-matcher.js';
import { ValueExtractor } from '../src/core/extractor.js';
import { ConfigError } from '../src/core/errors.js';
import type { RuleConfig } from '../src/core/types.js';

const extractor = new ValueExtractor();

function matcher(...patterns: string[]): RuleMatcher {
  const configs: RuleConfig[] = patterns.map((eventPattern) => ({ eventPattern, extractors: {} }));
  return new RuleMatcher(compileRules(configs, extractor));
}

function matched(m: RuleMatcher, eventName: string): string | undefined {
  const result = m.match(eventName);
  return result.ok ? result.value.source : undefined;
}

describe('RuleMatcher', () => {
  it('prefers the earlier of two matching rules', () => {
    const m = matcher('^odalogs_error', '^odalogs_.*');
    expect(matched(m, 'odalogs_error_disk')).toBe('^odalogs_error');
    expect(matched(m, 'odalogs_warn')).toBe('^odalogs_.*');
  });

  it('follows declaration order, not specificity', () => {
    const m = matcher('^a', '^ab');
    expect(matched(m, 'abc')).toBe('^a');
  });

  it('anchors at the start but not the end', () => {
    const m = matcher('build');
    expect(matched(m, 'build_info')).toBe('build');
    expect(matched(m, 'rebuild')).toBeUndefined();
  });

  it('strips /.../ delimiters', () => {
    const m = matcher('/^foo$/');
    expect(matched(m, 'foo')).toBe('/^foo$/');
    expect(matched(m, 'foobar')).toBeUndefined();
  });

  it('reports the event name and configured patterns when nothing matches', () => {
    const m = matcher('^odalogs_error', '^odalogs_.*');
    expect(m.match('x_odalogs_error')).toEqual({
      ok: false,
      error: {
        type: 'rule_not_found',
        eventName: 'x_odalogs_error',
        configuredPatterns: ['^odalogs_error', '^odalogs_.*'],
      },
    });
  });

  it('lists patterns in declaration order', () => {
    expect(matcher('^b', '^a').patterns()).toEqual(['^b', '^a']);
  });
});

describe('compileRules', () => {
  it('rejects a malformed pattern with its location', () => {
    expect(() => compileRules([{ eventPattern: '(', extractors: {} }], extractor)).toThrow(ConfigError);
    expect(() => compileRules([{ eventPattern: '(', extractors: {} }], extractor)).toThrow(
      /^event_handlers\[0\]\.event_title: invalid regular expression/,
    );
  });

  it('rejects a malformed extractor', () => {
    expect(() =>
      compileRules([{ eventPattern: '^a', extractors: { value: 'data[' } }], extractor),
    ).toThrow(/^event_handlers\[0\]\.extractors\.value\[0\]\[0\]: invalid query/);
  });
});

describe('stripDelimiters', () => {
  it('strips only a matched pair', () => {
    expect(stripDelimiters('/a/')).toBe('a');
    expect(stripDelimiters('/')).toBe('/');
    expect(stripDelimiters('a/')).toBe('a/');
    expect(stripDelimiters('/a')).toBe('/a');
  });
});
