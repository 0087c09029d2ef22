/**
 * 웹훅 메시지 생성 테스트
 */

import { describe, it, expect } from 'vitest';
import { MissingCountryError } from '../lib/errors.js';
import {
  buildReportPayload,
  DEFAULT_FIELD_GROUPS,
  direct,
  formatFieldGroup,
  formatFieldValue,
  payloadToText,
  percentOf,
  type ContextBlock,
} from '../lib/report-payload.js';
import type { StatsTable } from '../lib/stats-table.js';

const FIELDS = ['Total Cases', 'New Cases', 'Total Deaths', 'New Deaths', 'Active Cases', 'Serious', 'Cases/1M'];

function tableOf(rows: Record<string, Record<string, number>>): StatsTable {
  return {
    fields: FIELDS,
    countries: new Map(
      Object.entries(rows).map(([country, values]): [string, Map<string, number>] => [country, new Map(Object.entries(values))])
    ),
    columns: new Map(
      Object.entries(rows).map(([country, values]): [string, Array<number | undefined>] => [country, FIELDS.map(f => values[f])])
    ),
  };
}

const USA = {
  'Total Cases': 1000,
  'New Cases': 50,
  'Total Deaths': 20,
  'New Deaths': 2,
  'Active Cases': 900,
  'Serious': 80,
  'Cases/1M': 3,
};

const GAP = ' '.repeat(12);

describe('formatFieldValue', () => {
  it('should group thousands and keep fixed decimals', () => {
    expect(formatFieldValue({ label: 'x', select: direct(0), decimals: 0 }, 1234567)).toBe('1,234,567');
    expect(formatFieldValue({ label: 'x', select: direct(0), decimals: 1 }, 3)).toBe('3.0');
  });

  it('should always show the sign of signed fields', () => {
    const field = { label: 'x', select: direct(0), decimals: 0, signed: true };

    expect(formatFieldValue(field, 50)).toBe('+50');
    expect(formatFieldValue(field, 0)).toBe('+0');
    expect(formatFieldValue(field, -1200)).toBe('-1,200');
  });

  it('should render negative zero as zero', () => {
    const field = { label: 'x', select: direct(0), decimals: 0, signed: true };

    expect(formatFieldValue(field, -0)).toBe('+0');
    expect(formatFieldValue({ label: 'x', select: direct(0), decimals: 1 }, -0)).toBe('0.0');
  });

  it('should strip trailing zeros from percentages', () => {
    const field = { label: 'x', select: percentOf(1, 0), decimals: 2, percent: true };

    expect(formatFieldValue(field, 2)).toBe('2%');
    expect(formatFieldValue(field, 2.5)).toBe('2.5%');
    expect(formatFieldValue(field, 0.4817)).toBe('0.48%');
  });

  it('should render missing values as a dash', () => {
    expect(formatFieldValue({ label: 'x', select: direct(0), decimals: 0 }, null)).toBe('—');
  });
});

describe('formatFieldGroup', () => {
  it('should join label/value pairs with newlines', () => {
    expect(formatFieldGroup(DEFAULT_FIELD_GROUPS[0], [1000, 50])).toBe(
      `Total Cases:${GAP}\`1,000\`\nNew Cases:${GAP}\`+50\``
    );
  });

  it('should compute derived fields from positional values', () => {
    expect(formatFieldGroup(DEFAULT_FIELD_GROUPS[1], [1694, -12, 34, 5])).toBe(
      `Total Deaths:${GAP}\`34\`\nNew Deaths:${GAP}\`+5\`\nMortality:${GAP}\`2.01%\``
    );
  });

  it('should render a dash when a derived value cannot be computed', () => {
    expect(formatFieldGroup([{ label: 'Mortality:', select: percentOf(2, 0), decimals: 2, percent: true }], [0, 0, 0])).toBe(
      `Mortality:${GAP}\`—\``
    );
  });
});

describe('buildReportPayload', () => {
  it('should build summary, divider and context blocks per watched country', () => {
    const payload = buildReportPayload(
      tableOf({ USA }),
      [{ country: 'USA', intro: 'intro text' }],
      'March 1, 2020, 09:00 GMT'
    );

    expect(payload.text).toBe('*Covid-19 statistics* (last updated: March 1, 2020, 09:00 GMT)');
    expect(payload.blocks).toEqual([
      { type: 'section', text: { type: 'mrkdwn', text: payload.text } },
      { type: 'divider' },
      {
        type: 'context',
        elements: [
          { type: 'mrkdwn', text: 'intro text' },
          { type: 'mrkdwn', text: `Total Cases:${GAP}\`1,000\`\nNew Cases:${GAP}\`+50\`` },
          { type: 'mrkdwn', text: `Total Deaths:${GAP}\`20\`\nNew Deaths:${GAP}\`+2\`\nMortality:${GAP}\`2%\`` },
          { type: 'mrkdwn', text: `Active Cases:${GAP}\`900\`\nSerious:${GAP}\`80\`\nCases/1M:${GAP}\`3.0\`` },
        ],
      },
    ]);
    expect(payload).not.toHaveProperty('channel');
  });

  it('should include the channel when configured', () => {
    const payload = buildReportPayload(tableOf({ USA }), [{ country: 'USA', intro: 'hi' }], 'm', { channel: '#covid' });

    expect(payload.channel).toBe('#covid');
  });

  it('should keep the configured country order', () => {
    const payload = buildReportPayload(
      tableOf({ USA, Italy: { ...USA, 'Total Cases': 5 } }),
      [{ country: 'Italy', intro: 'first' }, { country: 'USA', intro: 'second' }],
      'm'
    );
    const contexts = payload.blocks.filter((b): b is ContextBlock => b.type === 'context');

    expect(payload.blocks.map(b => b.type)).toEqual(['section', 'divider', 'context', 'divider', 'context']);
    expect(contexts.map(c => c.elements[0].text)).toEqual(['first', 'second']);
  });

  it('should show a dash for fields omitted during extraction', () => {
    const { Serious: _omitted, ...withoutSerious } = USA;
    const payload = buildReportPayload(tableOf({ USA: withoutSerious }), [{ country: 'USA', intro: 'hi' }], 'm');
    const context = payload.blocks[2];

    expect(context.type === 'context' && context.elements[3].text).toBe(
      `Active Cases:${GAP}\`900\`\nSerious:${GAP}\`—\`\nCases/1M:${GAP}\`3.0\``
    );
  });

  it('should throw MissingCountryError for an unknown country', () => {
    expect(() =>
      buildReportPayload(tableOf({ USA }), [{ country: 'Atlantis', intro: 'hi' }], 'm')
    ).toThrow(MissingCountryError);
  });

  it('should be deterministic', () => {
    const watched = [{ country: 'USA', intro: 'hi' }];

    expect(JSON.stringify(buildReportPayload(tableOf({ USA }), watched, 'm'))).toBe(
      JSON.stringify(buildReportPayload(tableOf({ USA }), watched, 'm'))
    );
  });
});

describe('payloadToText', () => {
  it('should flatten blocks into plain text', () => {
    const payload = buildReportPayload(tableOf({ USA }), [{ country: 'USA', intro: 'hi' }], 'm');

    expect(payloadToText(payload).split('\n').slice(0, 4)).toEqual([
      '*Covid-19 statistics* (last updated: m)',
      '-'.repeat(40),
      'hi',
      `Total Cases:${GAP}\`1,000\``,
    ]);
  });
});
