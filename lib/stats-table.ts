/**
 * 국가별 통계 테이블 추출
 * 헤더 행의 컬럼 이름을 필드로, 각 데이터 행의 첫 셀을 국가 이름으로 사용합니다.
 */

import * as cheerio from 'cheerio';
import { hasChildren, isTag, isText, type AnyNode, type Element } from 'domhandler';
import { ExtractionError } from './errors.js';
import { getNumberFormat, parseStatNumber } from './stats-number.js';

export type CountryStats = Map<string, Map<string, number>>;

export type StatsTable = {
  /** 헤더 순서대로의 필드 이름 (국가 컬럼 제외) */
  fields: string[];
  countries: CountryStats;
  /** 국가별 컬럼 위치 순서의 값 (헤더 이름이 중복돼도 위치 유지) */
  columns: Map<string, Array<number | undefined>>;
};

export type ExtractOptions = {
  tableSelector?: string;
  locale?: string;
};

export const DEFAULT_TABLE_SELECTOR = 'table#main_table_countries_today';

/**
 * 하위 텍스트 노드를 모두 모아 공백 하나로 연결
 * 국가 이름이 여러 요소로 쪼개진 경우(<span>S.</span><span>Korea</span>) 대비
 */
export function collectText(node: AnyNode): string {
  const pieces: string[] = [];
  const walk = (current: AnyNode) => {
    if (isText(current)) {
      pieces.push(current.data);
    } else if (hasChildren(current)) {
      current.children.forEach(walk);
    }
  };
  walk(node);
  return pieces
    .map(p => p.replace(/\s+/g, ' ').trim())
    .filter(Boolean)
    .join(' ');
}

function findHeaderRow($: cheerio.CheerioAPI, table: cheerio.Cheerio<Element>): cheerio.Cheerio<Element> | null {
  const theadRow = table.find('thead tr').first();
  if (theadRow.length > 0) return theadRow;

  const thRow = table.find('tr').filter((_, row) => $(row).children('th').length > 0).first();
  return thRow.length > 0 ? thRow : null;
}

/**
 * 통계 테이블 찾기: 지정 셀렉터 우선, 없으면 헤더 행이 있는 첫 테이블
 */
function pickStatsTable($: cheerio.CheerioAPI, selector: string): cheerio.Cheerio<Element> | null {
  const preferred = $(selector).toArray().find(isTag);
  if (preferred) return $(preferred);

  const fallback = $('table').filter((_, table) => findHeaderRow($, $(table)) !== null).first();
  return fallback.length > 0 ? fallback : null;
}

/**
 * 문서에서 국가 → 필드 → 숫자 매핑 추출
 * @throws ExtractionError 테이블, 헤더 행, 데이터 행 중 하나라도 없을 때
 */
export function extractStatsTable($: cheerio.CheerioAPI, options: ExtractOptions = {}): StatsTable {
  const selector = options.tableSelector ?? DEFAULT_TABLE_SELECTOR;
  const format = getNumberFormat(options.locale);

  const table = pickStatsTable($, selector);
  if (!table) {
    throw new ExtractionError(`Statistics table not found (selector: ${selector})`);
  }

  const headerRow = findHeaderRow($, table);
  if (!headerRow) {
    throw new ExtractionError('Statistics table has no header row');
  }

  const fields = headerRow
    .children('th, td')
    .toArray()
    .slice(1)
    .map(cell => collectText(cell));

  const dataRows = table
    .find('tr')
    .toArray()
    .filter(row => row !== headerRow[0] && $(row).closest('thead').length === 0);

  const countries: CountryStats = new Map();
  const columns = new Map<string, Array<number | undefined>>();

  for (const row of dataRows) {
    const cells = $(row).children('td, th').toArray();
    if (cells.length === 0) continue;

    const country = collectText(cells[0]);
    if (!country) continue;

    const values = new Map<string, number>();
    const positional: Array<number | undefined> = fields.map(() => undefined);
    cells.slice(1, fields.length + 1).forEach((cell, i) => {
      const text = $(cell).text();
      const value = parseStatNumber(text, format);
      if (value === null) {
        console.warn(`[Stats] Unparsable cell for ${country} / ${fields[i]}: "${text.trim()}"`);
        return;
      }
      values.set(fields[i], value);
      positional[i] = value;
    });

    countries.set(country, values);
    columns.set(country, positional);
  }

  // 공백 행만 있는 테이블도 데이터 없음으로 처리
  if (countries.size === 0) {
    throw new ExtractionError('Statistics table has no data rows');
  }

  return { fields, countries, columns };
}

/**
 * 헤더 순서대로 정렬된 국가의 값 목록 (파싱 실패한 필드는 undefined)
 */
export function orderedValues(table: StatsTable, country: string): Array<number | undefined> | null {
  return table.columns.get(country) ?? null;
}
