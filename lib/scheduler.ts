/**
 * 일일 스케줄러
 * 사이클 실행 → 다음 기상 시각 계산 → 대기를 무한 반복합니다.
 * 한 번에 하나의 사이클만 실행되며, 사이클 에러는 루프를 종료시킵니다.
 */

import { setTimeout as sleepFor } from 'node:timers/promises';

export type RefreshTime = {
  hour: number;
  minute: number;
  second: number;
};

/**
 * 오늘의 설정 시각이 이미 지났으면(같은 시각 포함) 다음 날 같은 시각
 * 프로세스 로컬 타임존 기준
 */
export function computeNextWake(now: Date, time: RefreshTime): Date {
  const wake = new Date(now.getTime());
  wake.setHours(time.hour, time.minute, time.second, 0);

  if (wake.getTime() <= now.getTime()) {
    wake.setDate(wake.getDate() + 1);
    // DST 전환일 보정
    wake.setHours(time.hour, time.minute, time.second, 0);
  }
  return wake;
}

export function formatRefreshTime(time: RefreshTime): string {
  return [time.hour, time.minute, time.second].map(n => String(n).padStart(2, '0')).join(':');
}

export type SchedulerOptions = {
  runOnStart?: boolean;
  now?: () => Date;
  sleep?: (ms: number) => Promise<void>;
};

export type SchedulerState = 'idle' | 'running' | 'sleeping';

export class DailyScheduler<T> {
  private state: SchedulerState = 'idle';
  private wakeAt: Date | null = null;
  private last: T | null = null;
  private readonly now: () => Date;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(
    private readonly cycle: () => Promise<T>,
    private readonly refreshTime: RefreshTime,
    private readonly options: SchedulerOptions = {}
  ) {
    this.now = options.now ?? (() => new Date());
    this.sleep = options.sleep ?? ((ms: number) => sleepFor(ms));
  }

  get currentState(): SchedulerState {
    return this.state;
  }

  get nextWakeAt(): Date | null {
    return this.wakeAt;
  }

  get lastResult(): T | null {
    return this.last;
  }

  /**
   * 외부에서 프로세스를 종료할 때까지 반복 (사이클 에러 시 reject)
   */
  async run(): Promise<never> {
    if (this.options.runOnStart ?? true) {
      await this.runCycle();
    }

    for (;;) {
      await this.sleepUntilNextWake();
      await this.runCycle();
    }
  }

  private async runCycle(): Promise<void> {
    this.state = 'running';
    this.wakeAt = null;
    this.last = await this.cycle();
  }

  private async sleepUntilNextWake(): Promise<void> {
    const now = this.now();
    const wake = computeNextWake(now, this.refreshTime);
    const delay = wake.getTime() - now.getTime();

    this.state = 'sleeping';
    this.wakeAt = wake;
    console.log(`[Scheduler] Sleeping ${Math.round(delay / 1000)}s until ${wake.toISOString()} (${formatRefreshTime(this.refreshTime)} local)`);
    await this.sleep(delay);
  }
}
