/**
 * Supabase App Record Repository 구현
 *
 * SOLID 원칙:
 * - SRP: Supabase와의 데이터 통신만 담당
 * - DIP: IAppRecordRepository 인터페이스 구현
 *
 * Design Pattern:
 * - Repository Pattern: 데이터 접근 로직 캡슐화
 * - Singleton Pattern: Supabase 클라이언트 재사용
 */

import { createClient, SupabaseClient } from "@supabase/supabase-js";
import type { IAppRecordRepository } from "@/core/interfaces/IAppRecordRepository";
import type { AppRecord } from "@/core/domain/AppRecord";
import { AppRecordMapper } from "@/mappers/AppRecordMapper";
import { DATABASE_CONFIG } from "@/config/constants";
import { logger as rootLogger, Logger } from "@/config/logger";
import { toErrorMessage } from "@/core/interfaces/ScrapeErrorType";
import { getTimestampWithTimezone } from "@/utils/timestamp";

/**
 * Supabase App Record Repository
 */
export class SupabaseAppRecordRepository implements IAppRecordRepository {
  private static instance: SupabaseClient | null = null;
  private client: SupabaseClient;
  private readonly tableName = DATABASE_CONFIG.APPS_TABLE_NAME;

  constructor(
    private readonly log: Logger = rootLogger,
    private readonly now: () => string = getTimestampWithTimezone,
  ) {
    this.client = this.getSupabaseClient();
  }

  /**
   * Supabase 클라이언트 가져오기 (Singleton)
   */
  private getSupabaseClient(): SupabaseClient {
    if (SupabaseAppRecordRepository.instance) {
      return SupabaseAppRecordRepository.instance;
    }

    const supabaseUrl = process.env.SUPABASE_URL;
    const supabaseKey = process.env.SUPABASE_SERVICE_ROLE_KEY;

    if (!supabaseUrl || !supabaseKey) {
      throw new Error(
        "SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY must be set in environment variables",
      );
    }

    SupabaseAppRecordRepository.instance = createClient(supabaseUrl, supabaseKey);
    this.log.info("Supabase client 초기화 완료");

    return SupabaseAppRecordRepository.instance;
  }

  /**
   * (app_id, app_name) 기준 upsert + 재조회 검증
   */
  async upsert(record: AppRecord): Promise<boolean> {
    const row = AppRecordMapper.toRow(record, this.now());
    const appId = row.app_id ?? "";
    const appName = row.app_name ?? "Unknown";

    this.log.info({ app_id: appId, app_name: appName }, "[Repository] 레코드 저장 시작");

    try {
      const { error } = await this.client
        .from(this.tableName)
        .upsert(row, { onConflict: DATABASE_CONFIG.CONFLICT_COLUMNS });

      if (error) {
        this.log.error(
          { error: error.message, code: error.code, app_id: appId },
          "[Repository] 레코드 저장 실패",
        );
        return false;
      }

      const { data, error: verifyError } = await this.client
        .from(this.tableName)
        .select("app_id")
        .eq("app_id", appId)
        .eq("app_name", appName)
        .limit(1);

      if (verifyError || !data || data.length === 0) {
        this.log.error(
          { app_id: appId, app_name: appName, error: verifyError?.message },
          "[Repository] 저장 검증 실패 - 레코드를 찾을 수 없음",
        );
        return false;
      }

      this.log.info({ app_id: appId, app_name: appName }, "[Repository] 레코드 저장 완료");
      return true;
    } catch (error) {
      this.log.error(
        { error: toErrorMessage(error), app_id: appId },
        "[Repository] 레코드 저장 실패",
      );
      return false;
    }
  }

  /**
   * 전체 조회 (Pagination, scraped_at 최신순)
   *
   * Supabase 1000개 제한을 우회하여 모든 데이터 조회
   */
  async listAll(): Promise<AppRecord[]> {
    const PAGE_SIZE = DATABASE_CONFIG.PAGINATION_PAGE_SIZE;
    const allResults: AppRecord[] = [];
    let offset = 0;
    let hasMore = true;

    while (hasMore) {
      const { data, error } = await this.client
        .from(this.tableName)
        .select("*")
        .order("scraped_at", { ascending: false })
        .range(offset, offset + PAGE_SIZE - 1);

      if (error) {
        this.log.error(
          { error: error.message, code: error.code, offset },
          "[Repository] Pagination 쿼리 실패",
        );
        throw new Error(`Supabase query failed: ${error.message}`);
      }

      const rows: unknown[] = data ?? [];
      allResults.push(...rows.map((row) => AppRecordMapper.fromRow(row)));
      offset += PAGE_SIZE;
      hasMore = rows.length === PAGE_SIZE;
    }

    this.log.info({ totalCount: allResults.length }, "[Repository] 전체 조회 완료");
    return allResults;
  }

  /**
   * app_id 로 최신 레코드 조회
   */
  async findByAppId(appId: string): Promise<AppRecord | null> {
    const { data, error } = await this.client
      .from(this.tableName)
      .select("*")
      .eq("app_id", appId)
      .order("scraped_at", { ascending: false })
      .limit(1);

    if (error) {
      this.log.error(
        { error: error.message, code: error.code, app_id: appId },
        "[Repository] Supabase 쿼리 실패",
      );
      throw new Error(`Supabase query failed: ${error.message}`);
    }

    const rows: unknown[] = data ?? [];
    if (rows.length === 0) {
      this.log.info({ app_id: appId }, "[Repository] 레코드를 찾을 수 없음");
      return null;
    }
    return AppRecordMapper.fromRow(rows[0]);
  }

  async deleteByAppId(appId: string): Promise<boolean> {
    return (await this.deleteWhere("app_id", [appId])) > 0;
  }

  async deleteByAppName(appName: string): Promise<boolean> {
    return (await this.deleteWhere("app_name", [appName])) > 0;
  }

  async deleteManyByAppIds(appIds: readonly string[]): Promise<number> {
    if (appIds.length === 0) {
      return 0;
    }
    return this.deleteWhere("app_id", appIds);
  }

  /**
   * 연결 상태 확인
   */
  async healthCheck(): Promise<boolean> {
    try {
      const { error } = await this.client
        .from(this.tableName)
        .select("app_id")
        .limit(1);

      if (error) {
        this.log.error({ error: error.message }, "[Repository] Health check 실패");
        return false;
      }

      this.log.debug("[Repository] Health check 성공");
      return true;
    } catch (error) {
      this.log.error({ error: toErrorMessage(error) }, "[Repository] Health check 실패");
      return false;
    }
  }

  /**
   * 삭제 공통 로직
   * @returns 삭제된 row 수 (실패 시 0)
   */
  private async deleteWhere(
    column: "app_id" | "app_name",
    values: readonly string[],
  ): Promise<number> {
    try {
      const { error, count } = await this.client
        .from(this.tableName)
        .delete({ count: "exact" })
        .in(column, [...values]);

      if (error) {
        this.log.error(
          { error: error.message, code: error.code, column, values },
          "[Repository] 레코드 삭제 실패",
        );
        return 0;
      }

      const deleted = count ?? 0;
      this.log.info({ column, values, deleted }, "[Repository] 레코드 삭제 완료");
      return deleted;
    } catch (error) {
      this.log.error(
        { error: toErrorMessage(error), column, values },
        "[Repository] 레코드 삭제 실패",
      );
      return 0;
    }
  }
}
