/**
 * Record Maintenance Service
 *
 * 저장된 레코드 보정 작업
 * - backfillRatings: 평점/평점 수가 빠진 레코드를 스토어프론트에서 다시 채움
 * - backfillReleaseDates: 출시일이 빠진 레코드를 스토어프론트에서 다시 채움
 * - recomputeNumericFields: 파생 숫자 필드를 현재 정규화 규칙으로 재계산
 *
 * SOLID 원칙:
 * - SRP: 저장 레코드 보정만 담당
 * - DIP: IAppRecordRepository / IStorefrontExtractor 에 의존
 */

import type { Logger } from "@/config/logger";
import { logger as rootLogger } from "@/config/logger";
import type { AppRecord } from "@/core/domain/AppRecord";
import type { IAppRecordRepository } from "@/core/interfaces/IAppRecordRepository";
import type { IStorefrontExtractor } from "@/core/interfaces/IAppSources";
import { toErrorMessage } from "@/core/interfaces/ScrapeErrorType";
import { AppRecordMapper, DerivedNumericFields } from "@/mappers/AppRecordMapper";
import { RateLimiter } from "@/utils/RateLimiter";

/**
 * 보정 작업 결과
 */
export interface MaintenanceSummary {
  /** 전체 레코드 수 */
  total: number;
  /** 보정 대상 수 */
  candidates: number;
  updated: number;
  /** 식별자 없음 등으로 건너뜀 */
  skipped: number;
  failed: number;
}

type StorefrontBackfillField = "average_rating" | "rating_count" | "release_date";

const DERIVED_FIELDS: ReadonlyArray<keyof DerivedNumericFields> = [
  "downloads_numeric",
  "revenue_numeric",
  "rating_count_numeric",
  "average_rating_numeric",
];

export class RecordMaintenanceService {
  constructor(
    private readonly repository: IAppRecordRepository,
    private readonly storefront: IStorefrontExtractor,
    private readonly rateLimiter: RateLimiter,
    private readonly log: Logger = rootLogger,
  ) {}

  backfillRatings(): Promise<MaintenanceSummary> {
    return this.backfillFromStorefront("ratings", ["average_rating", "rating_count"]);
  }

  backfillReleaseDates(): Promise<MaintenanceSummary> {
    return this.backfillFromStorefront("release_dates", ["release_date"]);
  }

  /**
   * 저장된 파생 숫자 필드가 현재 규칙과 다른 레코드만 다시 저장
   * (upsert 가 저장 직전 재계산)
   */
  async recomputeNumericFields(): Promise<MaintenanceSummary> {
    const records = await this.repository.listAll();
    const stale = records.filter((record) => this.hasStaleNumericFields(record));
    const summary: MaintenanceSummary = {
      total: records.length,
      candidates: stale.length,
      updated: 0,
      skipped: 0,
      failed: 0,
    };

    this.log.info({ total: summary.total, candidates: summary.candidates }, "[Maintenance] 숫자 필드 재계산 시작");

    for (const record of stale) {
      if (await this.repository.upsert(record)) {
        summary.updated++;
      } else {
        summary.failed++;
      }
    }

    this.log.info({ ...summary }, "[Maintenance] 숫자 필드 재계산 완료");
    return summary;
  }

  hasStaleNumericFields(record: AppRecord): boolean {
    const derived = AppRecordMapper.deriveNumericFields(record);
    return DERIVED_FIELDS.some((field) => (record[field] ?? null) !== derived[field]);
  }

  private async backfillFromStorefront(
    job: string,
    fields: readonly StorefrontBackfillField[],
  ): Promise<MaintenanceSummary> {
    const records = await this.repository.listAll();
    const candidates = records.filter((record) => fields.some((field) => !record[field]));
    const summary: MaintenanceSummary = {
      total: records.length,
      candidates: candidates.length,
      updated: 0,
      skipped: 0,
      failed: 0,
    };

    this.log.info({ job, total: summary.total, candidates: summary.candidates }, "[Maintenance] 백필 시작");

    for (const [index, record] of candidates.entries()) {
      const appId = record.app_id;
      const progress = `${index + 1}/${candidates.length}`;

      if (!appId) {
        this.log.warn({ job, progress, app_name: record.app_name }, "[Maintenance] 식별자 없음 - 건너뜀");
        summary.skipped++;
        continue;
      }

      await this.rateLimiter.throttle(appId);

      try {
        const storefront = await this.storefront.extract({ appId });
        if (storefront.error) {
          this.log.warn({ job, progress, appId, error: storefront.error }, "[Maintenance] 스토어프론트 추출 실패");
          summary.failed++;
          continue;
        }

        let changed = false;
        for (const field of fields) {
          const value = storefront[field];
          if (value) {
            record[field] = value;
            changed = true;
          }
        }

        if (!changed) {
          this.log.warn({ job, progress, appId }, "[Maintenance] 스토어프론트에 값 없음");
          summary.failed++;
          continue;
        }

        if (await this.repository.upsert(record)) {
          summary.updated++;
        } else {
          summary.failed++;
        }
      } catch (error) {
        this.log.error({ job, progress, appId, error: toErrorMessage(error) }, "[Maintenance] 백필 실패");
        summary.failed++;
      }
    }

    this.log.info({ job, ...summary }, "[Maintenance] 백필 완료");
    return summary;
  }
}
