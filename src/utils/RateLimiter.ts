/**
 * Rate Limiter Utility
 *
 * SOLID 원칙:
 * - SRP: Rate Limiting만 담당
 *
 * 목적:
 * - 배치/백필에서 연속 스크래핑 사이 최소 간격 보장
 * - 직전 실행 이후 이미 지난 시간만큼은 대기하지 않음
 */

import { logger } from "@/config/logger";

export type SleepFn = (ms: number) => Promise<void>;

const defaultSleep: SleepFn = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Rate Limiter
 */
export class RateLimiter {
  private lastExecutionTime: number | null = null;

  constructor(
    private waitTimeMs: number,
    private readonly sleep: SleepFn = defaultSleep,
    private readonly now: () => number = Date.now,
  ) {}

  /**
   * Rate limiting 적용 (필요시 대기)
   *
   * @returns 실제 대기한 시간 (ms)
   */
  async throttle(context?: string): Promise<number> {
    let waited = 0;

    if (this.lastExecutionTime !== null) {
      const elapsed = this.now() - this.lastExecutionTime;
      if (elapsed < this.waitTimeMs) {
        waited = this.waitTimeMs - elapsed;
        logger.debug({ wait_time_ms: waited, context }, "Rate limiting 대기");
        await this.sleep(waited);
      }
    }

    this.lastExecutionTime = this.now();
    return waited;
  }

  /**
   * 설정 업데이트
   */
  updateWaitTime(waitTimeMs: number): void {
    this.waitTimeMs = waitTimeMs;
  }

  /**
   * 현재 설정 조회
   */
  getWaitTime(): number {
    return this.waitTimeMs;
  }
}
