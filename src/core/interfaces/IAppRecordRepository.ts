/**
 * App Record Repository 인터페이스
 *
 * SOLID 원칙:
 * - ISP: 스크래핑 결과 저장/조회에 필요한 연산만 노출
 * - DIP: 서비스는 Supabase 구체 구현에 의존하지 않음
 *
 * 계약:
 * - 쓰기 연산은 예외 대신 false / 0 반환 (로그 남김)
 * - 조회 연산은 쿼리 실패 시 예외
 */

import type { AppRecord } from "@/core/domain/AppRecord";

export interface IAppRecordRepository {
  /**
   * (app_id, app_name) 기준 upsert
   * 저장 직전 파생 숫자 필드 재계산, 저장 후 재조회로 검증
   *
   * @returns 검증까지 성공하면 true
   */
  upsert(record: AppRecord): Promise<boolean>;

  /**
   * 전체 레코드 (scraped_at 최신순)
   */
  listAll(): Promise<AppRecord[]>;

  /**
   * app_id 로 최신 레코드 조회
   */
  findByAppId(appId: string): Promise<AppRecord | null>;

  /**
   * @returns 삭제된 row 가 있으면 true
   */
  deleteByAppId(appId: string): Promise<boolean>;

  deleteByAppName(appName: string): Promise<boolean>;

  /**
   * @returns 삭제된 row 수
   */
  deleteManyByAppIds(appIds: readonly string[]): Promise<number>;

  healthCheck(): Promise<boolean>;
}
