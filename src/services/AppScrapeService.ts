/**
 * App Scrape Service
 *
 * 단일 앱 스크래핑 오케스트레이터
 *
 * SOLID 원칙:
 * - SRP: 단계 순서 + 결과 병합만 담당
 * - DIP: IIdentityResolver / IDashboardExtractor / IStorefrontExtractor 에 의존
 *
 * Design Pattern:
 * - Facade Pattern: 식별 → 대시보드 → 스토어프론트 보강을 한 번의 호출로
 *
 * 흐름:
 * 1. 식별: appId / directUrl 이 있으면 생략, 숫자 query 는 그대로 식별자
 * 2. 대시보드 추출 (error 가 있어도 계속 진행)
 * 3. 스토어프론트 보강: average_rating / rating_count / release_date 만 병합
 */

import type { Logger } from "@/config/logger";
import { logger as rootLogger } from "@/config/logger";
import { AppRecord, createEmptyAppRecord } from "@/core/domain/AppRecord";
import type { StorefrontRecord } from "@/core/domain/StorefrontRecord";
import type {
  DashboardTarget,
  IDashboardExtractor,
  IIdentityResolver,
  IStorefrontExtractor,
} from "@/core/interfaces/IAppSources";
import {
  ScrapeErrorType,
  classifyError,
  toErrorMessage,
} from "@/core/interfaces/ScrapeErrorType";
import { createScrapeLogger } from "@/utils/LoggerContext";

/**
 * 스크래핑 요청 (셋 중 하나 이상 필요)
 */
export interface ScrapeRequest {
  /** 앱 이름 또는 숫자 식별자 */
  query?: string;
  /** 스토어프론트 숫자 식별자 (검색 생략) */
  appId?: string;
  /** 대시보드 overview URL (검색 생략) */
  directUrl?: string;
}

/**
 * 스토어프론트에서 병합하는 필드
 */
const STOREFRONT_MERGE_FIELDS = ["average_rating", "rating_count", "release_date"] as const;

const NUMERIC_ID = /^\d+$/;

export class AppScrapeService {
  constructor(
    private readonly resolver: IIdentityResolver,
    private readonly dashboard: IDashboardExtractor,
    private readonly storefront: IStorefrontExtractor,
    private readonly log: Logger = rootLogger,
  ) {}

  async scrape(request: ScrapeRequest): Promise<AppRecord> {
    const query = request.query?.trim();
    const log = createScrapeLogger(request.directUrl ?? request.appId ?? query ?? "", this.log);
    const startTime = Date.now();

    // 1. 식별
    let appId = request.appId?.trim() || undefined;
    if (!appId && !request.directUrl && query) {
      if (NUMERIC_ID.test(query)) {
        appId = query;
      } else {
        try {
          appId = (await this.resolver.resolve(query)) ?? undefined;
        } catch (error) {
          log.error({ query, error: toErrorMessage(error) }, "[AppScrape] 식별자 검색 실패");
          return createEmptyAppRecord({
            error: `Error searching for '${query}': ${toErrorMessage(error)}`,
            error_type: classifyError(error),
          });
        }

        if (!appId) {
          log.warn({ query }, "[AppScrape] 식별자를 찾을 수 없음");
          return createEmptyAppRecord({
            error: `Could not find app id for '${query}'. Please check the app name.`,
            error_type: ScrapeErrorType.NOT_FOUND,
          });
        }
      }
    }

    let target: DashboardTarget;
    if (request.directUrl) {
      target = { url: request.directUrl };
    } else if (appId) {
      target = { appId };
    } else {
      return createEmptyAppRecord({
        error: "No app id, app name or direct URL provided",
        error_type: ScrapeErrorType.NOT_FOUND,
      });
    }

    // 2. 대시보드
    const record = await this.dashboard.extract(target);
    if (!record.app_id && appId) {
      record.app_id = appId;
    }
    if (record.error) {
      log.warn(
        { error: record.error, errorType: record.error_type },
        "[AppScrape] 대시보드 추출 오류 - 스토어프론트 보강은 계속 진행",
      );
    }

    // 3. 스토어프론트 보강
    if (record.app_id) {
      await this.enrichFromStorefront(record, record.app_id, log);
    }

    log.info(
      {
        app_id: record.app_id,
        app_name: record.app_name,
        hasError: Boolean(record.error),
        durationMs: Date.now() - startTime,
      },
      "[AppScrape] 스크래핑 완료",
    );
    return record;
  }

  /**
   * 스토어프론트 평점/출시일 병합 (값이 있는 필드만)
   * 대시보드 error 는 그대로 유지
   */
  async enrichFromStorefront(record: AppRecord, appId: string, log: Logger = this.log): Promise<void> {
    let storefrontRecord: StorefrontRecord;
    try {
      storefrontRecord = await this.storefront.extract({ appId });
    } catch (error) {
      log.warn({ appId, error: toErrorMessage(error) }, "[AppScrape] 스토어프론트 보강 실패");
      return;
    }

    const merged: string[] = [];
    for (const field of STOREFRONT_MERGE_FIELDS) {
      const value = storefrontRecord[field];
      if (value) {
        record[field] = value;
        merged.push(field);
      }
    }

    if (merged.length > 0) {
      log.info({ appId, merged }, "[AppScrape] 스토어프론트 보강 완료");
    } else if (storefrontRecord.error) {
      log.warn({ appId, error: storefrontRecord.error }, "[AppScrape] 스토어프론트 데이터 없음");
    }
  }
}
