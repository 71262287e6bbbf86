/**
 * FieldStrategy / runCascade
 *
 * 필드별 추출 전략 목록을 우선순위 순으로 실행
 * - 첫 번째로 값을 돌려준 전략에서 중단
 * - 개별 전략 실패는 로그 후 다음 전략 진행
 * - 타임아웃은 상위(스테이지 경계)로 전파
 *
 * Design Pattern:
 * - Strategy Pattern + Chain of Responsibility
 */

import type { Logger } from "@/config/logger";
import { isTimeoutError, toErrorMessage } from "@/core/interfaces/ScrapeErrorType";
import type { PageSnapshot } from "@/extractors/base/PageSnapshot";

/**
 * 단일 필드 추출 전략
 * 값을 찾지 못하면 undefined
 */
export interface FieldStrategy<T> {
  readonly name: string;
  extract(snapshot: PageSnapshot): Promise<T | undefined>;
}

export interface CascadeOptions<T> {
  /** 후보 값 검증 (false → 버리고 다음 전략) */
  accept?: (value: T) => boolean;
}

/**
 * 캐스케이드 실행
 */
export async function runCascade<T>(
  field: string,
  strategies: ReadonlyArray<FieldStrategy<T>>,
  snapshot: PageSnapshot,
  log: Logger,
  options: CascadeOptions<T> = {},
): Promise<T | undefined> {
  for (const strategy of strategies) {
    try {
      const value = await strategy.extract(snapshot);
      if (value === undefined) {
        continue;
      }
      if (options.accept && !options.accept(value)) {
        log.debug(
          { field, strategy: strategy.name, value },
          "[Cascade] 후보 값 거부",
        );
        continue;
      }
      log.debug({ field, strategy: strategy.name }, "[Cascade] 추출 성공");
      return value;
    } catch (error) {
      if (isTimeoutError(error)) {
        throw error;
      }
      log.warn(
        { field, strategy: strategy.name, error: toErrorMessage(error) },
        "[Cascade] 전략 실패 - 다음 전략 시도",
      );
    }
  }

  log.debug({ field }, "[Cascade] 모든 전략 실패");
  return undefined;
}

/**
 * 함수 → FieldStrategy 헬퍼
 */
export function strategy<T>(
  name: string,
  extract: (snapshot: PageSnapshot) => Promise<T | undefined>,
): FieldStrategy<T> {
  return { name, extract };
}

/**
 * 정규식 첫 캡처 그룹 (trim, 빈 값 → undefined)
 */
export function firstGroup(
  text: string | null | undefined,
  pattern: RegExp,
): string | undefined {
  if (!text) {
    return undefined;
  }
  const match = text.match(pattern);
  const value = match?.[1]?.trim();
  return value || undefined;
}
