/**
 * 통계 셀 숫자 파싱
 * 소스 페이지의 셀 포맷이 일정하지 않아 관대하게 처리합니다.
 */

export type NumberFormat = {
  locale: string;
  groupSeparator: string;
  decimalSeparator: string;
};

const formatCache = new Map<string, NumberFormat>();

/**
 * 로케일의 천 단위 구분자와 소수점 기호 (Intl 기준)
 */
export function getNumberFormat(locale: string = 'en-US'): NumberFormat {
  const cached = formatCache.get(locale);
  if (cached) return cached;

  const parts = new Intl.NumberFormat(locale, { useGrouping: true }).formatToParts(12345.6);
  const format: NumberFormat = {
    locale,
    groupSeparator: parts.find(p => p.type === 'group')?.value ?? ',',
    decimalSeparator: parts.find(p => p.type === 'decimal')?.value ?? '.',
  };
  formatCache.set(locale, format);
  return format;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

const INTEGER_PATTERN = /^[+-]?\d+$/;
const FLOAT_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

/**
 * 셀 텍스트를 숫자로 변환
 * - 공백만 있는 셀은 0
 * - "+-12" 처럼 부호가 겹친 값은 음수로 처리
 * - 정수 → 실수 순서로 시도
 * @returns 숫자 또는 파싱 불가 시 null
 */
export function parseStatNumber(text: string, format: NumberFormat = getNumberFormat()): number | null {
  let cleaned = text.replace(/\u00a0/g, ' ').trim();
  if (!cleaned) return 0;

  if (cleaned.startsWith('+-')) {
    cleaned = '-' + cleaned.slice(2);
  }

  // 구분자가 공백 계열인 로케일(fr-FR 등)도 처리
  const groupPattern = /\s/.test(format.groupSeparator)
    ? /\s/g
    : new RegExp(escapeRegExp(format.groupSeparator), 'g');
  const ungrouped = cleaned.replace(groupPattern, '');

  if (INTEGER_PATTERN.test(ungrouped)) {
    // "+-0" → -0 이 "-0"으로 표시되지 않도록
    return parseInt(ungrouped, 10) || 0;
  }

  const normalized = format.decimalSeparator === '.'
    ? ungrouped
    : ungrouped.replace(format.decimalSeparator, '.');
  if (FLOAT_PATTERN.test(normalized)) {
    const n = Number(normalized);
    return Number.isFinite(n) ? n || 0 : null;
  }

  return null;
}
