/**
 * 웹훅 전송 (타임아웃만 재시도)
 */

import { DeliveryError, HttpTimeoutError, TimeoutExceededError } from './errors.js';
import type { HttpClient, HttpPostResult } from './http-client.js';
import type { ReportPayload } from './report-payload.js';

export const DEFAULT_MAX_ATTEMPTS = 10;

export type DeliveryOptions = {
  maxAttempts?: number;
};

/**
 * ReportPayload를 웹훅으로 POST
 * - 200: 성공
 * - 200 이외 상태 코드: DeliveryError (재시도 없음)
 * - 타임아웃: 지연 없이 즉시 재시도, 모두 실패하면 TimeoutExceededError
 */
export async function deliverReport(
  http: HttpClient,
  webhookUrl: string,
  payload: ReportPayload,
  options: DeliveryOptions = {}
): Promise<void> {
  const maxAttempts = options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    let result: HttpPostResult;
    try {
      result = await http.postJson(webhookUrl, payload);
    } catch (error) {
      if (error instanceof HttpTimeoutError) {
        console.warn(`[Delivery] Timeout, attempt ${attempt}/${maxAttempts}`);
        continue;
      }
      throw new DeliveryError(
        `Webhook request failed: ${error instanceof Error ? error.message : String(error)}`,
        webhookUrl,
        undefined,
        { cause: error }
      );
    }

    if (result.status !== 200) {
      throw new DeliveryError(
        `Webhook rejected report: HTTP ${result.status} ${result.body.slice(0, 200)}`.trim(),
        webhookUrl,
        result.status
      );
    }

    console.log(`[Delivery] Report delivered (attempt ${attempt}/${maxAttempts})`);
    return;
  }

  throw new TimeoutExceededError(webhookUrl, maxAttempts);
}
