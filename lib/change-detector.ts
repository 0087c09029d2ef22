/**
 * 소스 페이지 갱신 여부 판별
 * "Last updated: ..." 요소의 텍스트를 변경 감지 토큰으로 사용합니다.
 */

import * as cheerio from 'cheerio';
import { MarkerNotFoundError } from './errors.js';

export const DEFAULT_MARKER_LABEL = 'Last updated';

export type Detection =
  | { changed: true; marker: string; previous: string | null }
  | { changed: false; marker: string };

/**
 * 라벨을 포함한 가장 안쪽 요소(여러 개면 첫 번째)에서 갱신 시각 문자열 추출
 * @throws MarkerNotFoundError
 */
export function readMarker($: cheerio.CheerioAPI, label: string = DEFAULT_MARKER_LABEL): string {
  const labelled = $('body *')
    .not('script, style, noscript')
    .filter((_, el) => $(el).text().includes(label));

  if (labelled.length === 0) {
    throw new MarkerNotFoundError(`Element labelled "${label}" not found`);
  }

  const withValue = labelled.filter((_, el) => $(el).text().includes(':'));
  const candidates = new Set(withValue.toArray());

  // 다른 후보를 포함하지 않는 가장 안쪽 요소 중 문서상 첫 번째 (푸터 등 뒤쪽 문구 무시)
  const element = withValue
    .filter((_, el) => !$(el).find('*').toArray().some(child => candidates.has(child)))
    .first();
  if (element.length === 0) {
    throw new MarkerNotFoundError(`Element labelled "${label}" has no ":" separator`);
  }

  const text = element.text();
  const colon = text.indexOf(':');
  const marker = text.slice(colon + 1).trim();
  if (!marker) {
    throw new MarkerNotFoundError(`Element labelled "${label}" has an empty value`);
  }
  return marker;
}

export class ChangeDetector {
  private last: string | null = null;

  constructor(private label: string = DEFAULT_MARKER_LABEL) {}

  /** 마지막으로 본 갱신 시각 (null = 아직 없음) */
  get lastMarker(): string | null {
    return this.last;
  }

  /** 상태를 바꾸지 않고 현재 마커만 조회 */
  peek($: cheerio.CheerioAPI): string {
    return readMarker($, this.label);
  }

  /**
   * 새 마커면 추출을 시작하기 전에 먼저 저장한다.
   * 이후 단계가 실패해도 같은 마커를 다시 처리하지 않는다.
   */
  detect($: cheerio.CheerioAPI): Detection {
    const marker = readMarker($, this.label);
    if (marker === this.last) {
      return { changed: false, marker };
    }

    const previous = this.last;
    this.last = marker;
    return { changed: true, marker, previous };
  }
}
