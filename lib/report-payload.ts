/**
 * 웹훅 메시지 생성
 * 관심 국가별로 구분선 + context 블록(소개 문구, 필드 그룹 3개)을 만듭니다.
 */

import { MissingCountryError } from './errors.js';
import { getNumberFormat } from './stats-number.js';
import { orderedValues, type StatsTable } from './stats-table.js';

export type WatchedCountry = {
  /** 소스 테이블의 국가 이름과 정확히 일치해야 함 */
  country: string;
  intro: string;
};

export type MrkdwnText = { type: 'mrkdwn'; text: string };
export type SectionBlock = { type: 'section'; text: MrkdwnText };
export type DividerBlock = { type: 'divider' };
export type ContextBlock = { type: 'context'; elements: MrkdwnText[] };
export type ReportBlock = SectionBlock | DividerBlock | ContextBlock;

export type ReportPayload = {
  text: string;
  blocks: ReportBlock[];
  channel?: string;
};

export type StatValues = ReadonlyArray<number | undefined>;

/**
 * 값 선택: 컬럼 위치로 직접 읽거나, 여러 값으로 계산
 */
export type ValueSelector =
  | { kind: 'direct'; index: number }
  | { kind: 'derived'; compute: (values: StatValues) => number | null };

export type FieldSpec = {
  label: string;
  select: ValueSelector;
  decimals: number;
  /** 증감 값: 0 이상이면 "+" 표시 */
  signed?: boolean;
  /** 끝자리 0과 소수점을 제거하고 "%"를 붙임 */
  percent?: boolean;
};

export type FieldGroup = readonly FieldSpec[];

export const direct = (index: number): ValueSelector => ({ kind: 'direct', index });

export const percentOf = (part: number, whole: number): ValueSelector => ({
  kind: 'derived',
  compute: (values) => {
    const p = values[part];
    const w = values[whole];
    if (p === undefined || w === undefined || w === 0) return null;
    return (p / w) * 100;
  },
});

/**
 * 기본 필드 그룹 (컬럼 순서: 누적 확진, 신규 확진, 누적 사망, 신규 사망, 치료 중, 위중, 100만명당 확진)
 */
export const DEFAULT_FIELD_GROUPS: readonly FieldGroup[] = [
  [
    { label: 'Total Cases:', select: direct(0), decimals: 0 },
    { label: 'New Cases:', select: direct(1), decimals: 0, signed: true },
  ],
  [
    { label: 'Total Deaths:', select: direct(2), decimals: 0 },
    { label: 'New Deaths:', select: direct(3), decimals: 0, signed: true },
    { label: 'Mortality:', select: percentOf(2, 0), decimals: 2, percent: true },
  ],
  [
    { label: 'Active Cases:', select: direct(4), decimals: 0 },
    { label: 'Serious:', select: direct(5), decimals: 0 },
    { label: 'Cases/1M:', select: direct(6), decimals: 1 },
  ],
];

/** 라벨과 값 사이 고정 간격 (정렬용 패딩 아님) */
export const VALUE_GAP = ' '.repeat(12);

export const MISSING_VALUE = '—';

export const DEFAULT_TITLE = 'Covid-19 statistics';

export type BuildOptions = {
  locale?: string;
  channel?: string;
  title?: string;
  groups?: readonly FieldGroup[];
};

export function summaryText(marker: string, title: string = DEFAULT_TITLE): string {
  return `*${title}* (last updated: ${marker})`;
}

function selectValue(select: ValueSelector, values: StatValues): number | null {
  switch (select.kind) {
    case 'direct':
      return values[select.index] ?? null;
    case 'derived':
      return select.compute(values);
  }
}

/**
 * 값 하나를 로케일 기준으로 포맷팅
 */
export function formatFieldValue(field: FieldSpec, value: number | null, locale: string = 'en-US'): string {
  if (value === null || !Number.isFinite(value)) return MISSING_VALUE;

  const formatted = new Intl.NumberFormat(locale, {
    minimumFractionDigits: field.decimals,
    maximumFractionDigits: field.decimals,
    signDisplay: field.signed ? 'always' : 'auto',
  }).format(value === 0 ? 0 : value);

  if (!field.percent) return formatted;

  const { decimalSeparator } = getNumberFormat(locale);
  const stripped = formatted.includes(decimalSeparator)
    ? formatted.replace(/0+$/, '').replace(new RegExp(`\\${decimalSeparator}$`), '')
    : formatted;
  return `${stripped}%`;
}

/**
 * 필드 그룹 하나를 "라벨 `값`" 줄 목록으로 포맷팅
 */
export function formatFieldGroup(group: FieldGroup, values: StatValues, locale: string = 'en-US'): string {
  return group
    .map(field => `${field.label}${VALUE_GAP}\`${formatFieldValue(field, selectValue(field.select, values), locale)}\``)
    .join('\n');
}

/**
 * ReportPayload 생성
 * @throws MissingCountryError 관심 국가가 테이블에 없을 때
 */
export function buildReportPayload(
  table: StatsTable,
  watched: readonly WatchedCountry[],
  marker: string,
  options: BuildOptions = {}
): ReportPayload {
  const locale = options.locale ?? 'en-US';
  const groups = options.groups ?? DEFAULT_FIELD_GROUPS;
  const summary = summaryText(marker, options.title);

  const blocks: ReportBlock[] = [
    { type: 'section', text: { type: 'mrkdwn', text: summary } },
  ];

  for (const entry of watched) {
    const values = orderedValues(table, entry.country);
    if (!values) {
      throw new MissingCountryError(entry.country);
    }

    blocks.push({ type: 'divider' });
    blocks.push({
      type: 'context',
      elements: [
        { type: 'mrkdwn', text: entry.intro },
        ...groups.map((group): MrkdwnText => ({ type: 'mrkdwn', text: formatFieldGroup(group, values, locale) })),
      ],
    });
  }

  const payload: ReportPayload = { text: summary, blocks };
  if (options.channel) {
    payload.channel = options.channel;
  }
  return payload;
}

/**
 * 미리보기용 평문 변환
 */
export function payloadToText(payload: ReportPayload): string {
  const parts: string[] = [];
  for (const block of payload.blocks) {
    switch (block.type) {
      case 'section':
        parts.push(block.text.text);
        break;
      case 'divider':
        parts.push('-'.repeat(40));
        break;
      case 'context':
        parts.push(...block.elements.map(e => e.text));
        break;
    }
  }
  return parts.join('\n');
}
