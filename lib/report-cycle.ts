/**
 * 리포트 사이클: 조회 → 변경 감지 → 추출 → 메시지 생성 → 전송
 */

import * as cheerio from 'cheerio';
import type { ChangeDetector } from './change-detector.js';
import type { HttpClient } from './http-client.js';
import { buildReportPayload, type ReportPayload, type WatchedCountry } from './report-payload.js';
import { extractStatsTable } from './stats-table.js';
import { deliverReport } from './webhook-delivery.js';

export type ReportSettings = {
  sourceUrl: string;
  webhookUrl: string;
  channel?: string;
  watched: readonly WatchedCountry[];
  locale: string;
  maxAttempts: number;
  tableSelector?: string;
};

export type CycleResult =
  | { status: 'unchanged'; marker: string; finishedAt: string }
  | { status: 'delivered'; marker: string; countries: number; finishedAt: string };

export class ReportCycle {
  constructor(
    private readonly http: HttpClient,
    private readonly detector: ChangeDetector,
    private readonly settings: ReportSettings
  ) {}

  async run(): Promise<CycleResult> {
    console.log(`[Cycle] Waking up, fetching ${this.settings.sourceUrl}`);
    const $ = await this.load();

    const detection = this.detector.detect($);
    if (!detection.changed) {
      console.log(`[Cycle] Nothing new (marker: ${detection.marker})`);
      return { status: 'unchanged', marker: detection.marker, finishedAt: new Date().toISOString() };
    }

    console.log(`[Cycle] New content (marker: ${detection.marker}, previous: ${detection.previous ?? 'none'})`);
    const payload = this.build($, detection.marker);
    await deliverReport(this.http, this.settings.webhookUrl, payload, { maxAttempts: this.settings.maxAttempts });

    return {
      status: 'delivered',
      marker: detection.marker,
      countries: this.settings.watched.length,
      finishedAt: new Date().toISOString(),
    };
  }

  /**
   * 전송하지 않고 현재 페이지 기준 메시지만 생성 (마지막 마커는 변경하지 않음)
   */
  async preview(): Promise<ReportPayload> {
    const $ = await this.load();
    return this.build($, this.detector.peek($));
  }

  private async load(): Promise<cheerio.CheerioAPI> {
    const html = await this.http.getText(this.settings.sourceUrl);
    return cheerio.load(html);
  }

  private build($: cheerio.CheerioAPI, marker: string): ReportPayload {
    const table = extractStatsTable($, {
      tableSelector: this.settings.tableSelector,
      locale: this.settings.locale,
    });
    console.log(`[Cycle] Extracted ${table.countries.size} countries, ${table.fields.length} fields`);

    return buildReportPayload(table, this.settings.watched, marker, {
      locale: this.settings.locale,
      channel: this.settings.channel,
    });
  }
}
