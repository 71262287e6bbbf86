/**
 * Batch Scrape Service
 *
 * 앱 이름 / 식별자 목록을 순차 스크래핑하고 선택적으로 저장
 *
 * SOLID 원칙:
 * - SRP: 배치 순회 + 항목별 결과 분류만 담당
 * - DIP: AppScrapeService / IIdentityResolver / IAppRecordRepository 에 의존
 *
 * 규칙:
 * - 한 번에 한 항목 (병렬 X), 항목 사이 최소 간격 (RateLimiter)
 * - 한 항목의 실패가 나머지 항목을 중단시키지 않음
 * - id 모드에서 숫자가 아닌 항목은 skipped_invalid_identifier
 */

import type { Logger } from "@/config/logger";
import { logger as rootLogger } from "@/config/logger";
import type { AppRecord } from "@/core/domain/AppRecord";
import type {
  BatchItemResult,
  BatchMode,
  BatchSummary,
} from "@/core/domain/BatchOutcome";
import type { IAppRecordRepository } from "@/core/interfaces/IAppRecordRepository";
import type { IIdentityResolver } from "@/core/interfaces/IAppSources";
import { ScrapeErrorType, toErrorMessage } from "@/core/interfaces/ScrapeErrorType";
import { AppRecordMapper } from "@/mappers/AppRecordMapper";
import { RateLimiter } from "@/utils/RateLimiter";
import { createBatchLogger, createRunId, logImportant } from "@/utils/LoggerContext";
import type { AppScrapeService } from "./AppScrapeService";

/**
 * 배치 처리 옵션
 */
export interface BatchRunOptions {
  mode: BatchMode;
  /** 스크래핑 결과 저장 여부 */
  save: boolean;
}

const NUMERIC_ID = /^\d+$/;

export class BatchScrapeService {
  constructor(
    private readonly scraper: AppScrapeService,
    private readonly resolver: IIdentityResolver,
    private readonly repository: IAppRecordRepository,
    private readonly rateLimiter: RateLimiter,
    private readonly log: Logger = rootLogger,
  ) {}

  async run(items: readonly string[], options: BatchRunOptions): Promise<BatchSummary> {
    const startTime = Date.now();
    const log = createBatchLogger(createRunId(), options.mode, this.log);
    const results: BatchItemResult[] = [];

    log.info({ total: items.length, save: options.save }, "[BatchScrape] 배치 처리 시작");

    for (let i = 0; i < items.length; i++) {
      const item = items[i].trim();

      log.info({ progress: `${i + 1}/${items.length}`, item }, "[BatchScrape] 항목 처리 중");

      if (options.mode === "id" && !NUMERIC_ID.test(item)) {
        log.warn({ item }, "[BatchScrape] 숫자 식별자가 아님 - 건너뜀");
        results.push({ item, outcome: "skipped_invalid_identifier" });
        continue;
      }

      await this.rateLimiter.throttle(item);
      results.push(await this.processItem(item, options, log));
    }

    const processed = results.filter((r) => r.outcome !== "skipped_invalid_identifier").length;
    const succeeded = results.filter((r) => r.outcome === "success").length;
    const summary: BatchSummary = {
      total: items.length,
      processed,
      succeeded,
      failed: processed - succeeded,
      results,
      durationMs: Date.now() - startTime,
    };

    logImportant(log, "[BatchScrape] 배치 처리 완료", {
      total: summary.total,
      processed: summary.processed,
      succeeded: summary.succeeded,
      failed: summary.failed,
      durationMs: summary.durationMs,
    });

    return summary;
  }

  /**
   * 항목 → 식별자
   * id 모드 또는 숫자 항목은 그대로, name 모드는 검색
   */
  private async identify(item: string, mode: BatchMode): Promise<string | null> {
    if (mode === "id" || NUMERIC_ID.test(item)) {
      return item;
    }
    return this.resolver.resolve(item);
  }

  /**
   * 단일 항목 처리 (예외 → error 결과)
   */
  private async processItem(
    item: string,
    options: BatchRunOptions,
    log: Logger,
  ): Promise<BatchItemResult> {
    let record: AppRecord;
    try {
      const appId = await this.identify(item, options.mode);
      if (!appId) {
        log.warn({ item }, "[BatchScrape] 식별자를 찾을 수 없음 - 건너뜀");
        return { item, outcome: "not_found", error: `Could not find app id for '${item}'` };
      }
      record = await this.scraper.scrape({ appId });
    } catch (error) {
      log.error({ item, error: toErrorMessage(error) }, "[BatchScrape] 항목 처리 실패");
      return { item, outcome: "error", error: toErrorMessage(error) };
    }

    const base: BatchItemResult = {
      item,
      outcome: "success",
      app_id: record.app_id,
      app_name: record.app_name,
      error: record.error,
    };

    if (record.error_type === ScrapeErrorType.NOT_FOUND) {
      return { ...base, outcome: "not_found" };
    }
    if (!AppRecordMapper.hasScrapedContent(record)) {
      log.warn({ item, error: record.error }, "[BatchScrape] 추출된 데이터 없음");
      return { ...base, outcome: "no_data" };
    }
    if (!options.save) {
      return base;
    }

    let saved: boolean;
    try {
      saved = await this.repository.upsert(record);
    } catch (error) {
      log.error({ item, error: toErrorMessage(error) }, "[BatchScrape] 저장 중 예외");
      return { ...base, outcome: "save_error", error: toErrorMessage(error) };
    }
    if (!saved) {
      log.error({ item, app_id: record.app_id }, "[BatchScrape] 저장 실패");
      return { ...base, outcome: "save_error", error: record.error ?? "Failed to save record" };
    }
    return base;
  }
}
