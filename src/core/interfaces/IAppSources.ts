/**
 * 외부 소스 인터페이스
 *
 * 오케스트레이터는 구체 구현 대신 이 인터페이스에 의존 (테스트에서 대체)
 */

import type { AppRecord } from "@/core/domain/AppRecord";
import type {
  StorefrontRecord,
  StorefrontTarget,
} from "@/core/domain/StorefrontRecord";

/**
 * 앱 이름 → 스토어프론트 숫자 식별자
 */
export interface IIdentityResolver {
  /**
   * @returns 식별자, 검색 결과가 없으면 null
   * @throws 네비게이션/전송 실패
   */
  resolve(appName: string): Promise<string | null>;
}

export interface IStorefrontExtractor {
  /**
   * 실패는 record.error 로 표현 (예외 없음)
   */
  extract(target: StorefrontTarget): Promise<StorefrontRecord>;
}

/**
 * 대시보드 추출 대상
 */
export type DashboardTarget = { appId: string } | { url: string };

export interface IDashboardExtractor {
  /**
   * 실패는 record.error 로 표현 (예외 없음)
   */
  extract(target: DashboardTarget): Promise<AppRecord>;
}
