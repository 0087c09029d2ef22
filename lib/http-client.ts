/**
 * HTTP 전송 계층
 * 요청마다 타임아웃을 걸어 응답 없는 호출을 HttpTimeoutError로 바꿉니다.
 */

import { HttpTimeoutError, SourceFetchError } from './errors.js';

export type HttpPostResult = {
  status: number;
  body: string;
};

export interface HttpClient {
  /** 페이지 본문 조회 (2xx가 아니거나 본문이 비어 있으면 SourceFetchError) */
  getText(url: string): Promise<string>;
  /** JSON POST, 상태 코드와 상관없이 응답을 그대로 반환 */
  postJson(url: string, payload: unknown): Promise<HttpPostResult>;
}

export const DEFAULT_TIMEOUT_MS = 5000;

const BROWSER_HEADERS: Record<string, string> = {
  'User-Agent': 'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
  'Accept': 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
  'Accept-Language': 'en-US,en;q=0.9',
  'Cache-Control': 'no-cache',
};

export class FetchHttpClient implements HttpClient {
  constructor(private timeoutMs: number = DEFAULT_TIMEOUT_MS) {}

  async getText(url: string): Promise<string> {
    let response: Response;
    let html: string;
    try {
      ({ response, text: html } = await this.request(url, {
        method: 'GET',
        redirect: 'follow',
        headers: BROWSER_HEADERS,
      }));
    } catch (error) {
      if (error instanceof HttpTimeoutError) {
        throw error;
      }
      throw new SourceFetchError(
        `Failed to fetch ${url}: ${error instanceof Error ? error.message : String(error)}`,
        url,
        undefined,
        { cause: error }
      );
    }

    if (!response.ok) {
      throw new SourceFetchError(`HTTP ${response.status} ${response.statusText}`, url, response.status);
    }

    if (!html.trim()) {
      throw new SourceFetchError('Source page returned an empty body', url, response.status);
    }

    return html;
  }

  async postJson(url: string, payload: unknown): Promise<HttpPostResult> {
    const { response, text } = await this.request(url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(payload),
    });
    return { status: response.status, body: text };
  }

  /**
   * 응답 본문까지 읽은 뒤에 타이머를 해제
   */
  private async request(url: string, init: RequestInit): Promise<{ response: Response; text: string }> {
    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeoutMs);

    try {
      const response = await fetch(url, { ...init, signal: controller.signal });
      const text = await response.text();
      return { response, text };
    } catch (error) {
      if (timedOut) {
        throw new HttpTimeoutError(url, this.timeoutMs);
      }
      throw error;
    } finally {
      clearTimeout(timer);
    }
  }
}
