/**
 * 환경 변수 + 관심 국가 파일 로딩
 */

import { readFileSync } from 'fs';
import { isAbsolute, join } from 'path';
import { z } from 'zod';
import { ConfigError } from '../lib/errors.js';
import { DEFAULT_TIMEOUT_MS } from '../lib/http-client.js';
import type { WatchedCountry } from '../lib/report-payload.js';
import type { RefreshTime } from '../lib/scheduler.js';
import { DEFAULT_MAX_ATTEMPTS } from '../lib/webhook-delivery.js';

export const DEFAULT_SOURCE_URL = 'https://www.worldometers.info/coronavirus/';
export const DEFAULT_WATCHED_FILE = 'config/watched-countries.json';

export type AppConfig = {
  webhookUrl: string;
  channel?: string;
  refreshTime: RefreshTime;
  sourceUrl: string;
  watched: WatchedCountry[];
  httpTimeoutMs: number;
  maxAttempts: number;
  locale: string;
  runOnStart: boolean;
  port?: number;
};

/**
 * "HH:MM" 또는 "HH:MM:SS"
 */
export function parseRefreshTime(value: string): RefreshTime | null {
  const m = value.trim().match(/^(\d{1,2}):(\d{2})(?::(\d{2}))?$/);
  if (!m) return null;

  const hour = Number(m[1]);
  const minute = Number(m[2]);
  const second = m[3] === undefined ? 0 : Number(m[3]);
  if (hour > 23 || minute > 59 || second > 59) return null;

  return { hour, minute, second };
}

const refreshTimeSchema = z.string().transform((value, ctx) => {
  const time = parseRefreshTime(value);
  if (!time) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Expected HH:MM[:SS], got "${value}"` });
    return z.NEVER;
  }
  return time;
});

const booleanSchema = z
  .enum(['true', 'false', '1', '0'])
  .transform(value => value === 'true' || value === '1');

const envSchema = z.object({
  WEBHOOK_URL: z.string().url(),
  SLACK_CHANNEL: z.string().min(1).optional(),
  REFRESH_TIME: refreshTimeSchema.default('09:00:00'),
  SOURCE_URL: z.string().url().default(DEFAULT_SOURCE_URL),
  WATCHED_COUNTRIES_FILE: z.string().min(1).default(DEFAULT_WATCHED_FILE),
  HTTP_TIMEOUT_MS: z.coerce.number().int().min(5000).max(60000).default(DEFAULT_TIMEOUT_MS),
  DELIVERY_MAX_ATTEMPTS: z.coerce.number().int().min(1).default(DEFAULT_MAX_ATTEMPTS),
  NUMBER_LOCALE: z.string().min(2).default('en-US'),
  RUN_ON_START: booleanSchema.default('true'),
  PORT: z.coerce.number().int().min(1).max(65535).optional(),
});

export const watchedCountriesSchema = z
  .array(
    z.object({
      country: z.string().trim().min(1),
      intro: z.string(),
    })
  )
  .min(1);

function formatIssues(error: z.ZodError): string {
  return error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
}

/**
 * 관심 국가 목록 파일 읽기 (상대 경로는 작업 디렉터리 기준)
 */
export function loadWatchedCountries(file: string, cwd: string = process.cwd()): WatchedCountry[] {
  const path = isAbsolute(file) ? file : join(cwd, file);

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    throw new ConfigError(`Cannot read watched countries from ${path}: ${error instanceof Error ? error.message : String(error)}`);
  }

  const parsed = watchedCountriesSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(`Invalid watched countries in ${path}: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

/**
 * @throws ConfigError
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env, cwd: string = process.cwd()): AppConfig {
  // 빈 문자열은 미설정으로 취급
  const defined = Object.fromEntries(Object.entries(env).filter(([, v]) => v !== undefined && v !== ''));

  const parsed = envSchema.safeParse(defined);
  if (!parsed.success) {
    throw new ConfigError(`Invalid configuration: ${formatIssues(parsed.error)}`);
  }
  const e = parsed.data;

  return {
    webhookUrl: e.WEBHOOK_URL,
    channel: e.SLACK_CHANNEL,
    refreshTime: e.REFRESH_TIME,
    sourceUrl: e.SOURCE_URL,
    watched: loadWatchedCountries(e.WATCHED_COUNTRIES_FILE, cwd),
    httpTimeoutMs: e.HTTP_TIMEOUT_MS,
    maxAttempts: e.DELIVERY_MAX_ATTEMPTS,
    locale: e.NUMBER_LOCALE,
    runOnStart: e.RUN_ON_START,
    port: e.PORT,
  };
}
