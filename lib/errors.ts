/**
 * 리포트 봇 에러 분류
 * 셀 단위 숫자 파싱 실패를 제외한 모든 에러는 스케줄러까지 전파됩니다.
 */

export type ReportBotErrorCode =
  | 'MARKER_NOT_FOUND'
  | 'EXTRACTION_FAILED'
  | 'MISSING_COUNTRY'
  | 'DELIVERY_FAILED'
  | 'TIMEOUT_EXCEEDED'
  | 'HTTP_TIMEOUT'
  | 'SOURCE_FETCH_FAILED'
  | 'INVALID_CONFIG';

export class ReportBotError extends Error {
  constructor(
    public code: ReportBotErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'ReportBotError';
  }
}

/**
 * 갱신 시각 요소를 찾지 못함 (소스 레이아웃 변경)
 */
export class MarkerNotFoundError extends ReportBotError {
  constructor(message: string, public url?: string) {
    super('MARKER_NOT_FOUND', message);
    this.name = 'MarkerNotFoundError';
  }
}

/**
 * 국가별 통계 테이블 구조가 예상과 다름
 */
export class ExtractionError extends ReportBotError {
  constructor(message: string) {
    super('EXTRACTION_FAILED', message);
    this.name = 'ExtractionError';
  }
}

/**
 * 설정된 관심 국가가 추출 결과에 없음
 */
export class MissingCountryError extends ReportBotError {
  constructor(public country: string) {
    super('MISSING_COUNTRY', `Country "${country}" not found in extracted statistics`);
    this.name = 'MissingCountryError';
  }
}

export class DeliveryError extends ReportBotError {
  constructor(
    message: string,
    public url: string,
    public status?: number,
    options?: { cause?: unknown }
  ) {
    super('DELIVERY_FAILED', message, options);
    this.name = 'DeliveryError';
  }
}

/**
 * 웹훅 전송 재시도 횟수 소진
 */
export class TimeoutExceededError extends ReportBotError {
  constructor(public url: string, public attempts: number) {
    super('TIMEOUT_EXCEEDED', `Webhook delivery timed out ${attempts} times in a row`);
    this.name = 'TimeoutExceededError';
  }
}

export class HttpTimeoutError extends ReportBotError {
  constructor(public url: string, public timeoutMs: number) {
    super('HTTP_TIMEOUT', `Request to ${url} timed out after ${timeoutMs}ms`);
    this.name = 'HttpTimeoutError';
  }
}

export class SourceFetchError extends ReportBotError {
  constructor(
    message: string,
    public url: string,
    public status?: number,
    options?: { cause?: unknown }
  ) {
    super('SOURCE_FETCH_FAILED', message, options);
    this.name = 'SourceFetchError';
  }
}

export class ConfigError extends ReportBotError {
  constructor(message: string) {
    super('INVALID_CONFIG', message);
    this.name = 'ConfigError';
  }
}
