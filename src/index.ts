/**
 * App Metrics Scraper
 *
 * 라이브러리 진입점
 * - scrapeApp(): 단일 앱 스크래핑 (+ 선택적 저장)
 * - createScraperServices(): 서비스 조립 (배치/보정 스크립트에서 재사용)
 */

import { ConfigLoader } from "@/config/ConfigLoader";
import { logger as rootLogger, Logger } from "@/config/logger";
import type { AppRecord } from "@/core/domain/AppRecord";
import type {
  ScraperConfig,
  ScraperConfigOverrides,
} from "@/core/domain/ScraperConfig";
import type { IAppRecordRepository } from "@/core/interfaces/IAppRecordRepository";
import { DashboardExtractor } from "@/extractors/dashboard/DashboardExtractor";
import { StorefrontExtractor } from "@/extractors/storefront/StorefrontExtractor";
import { AppRecordMapper } from "@/mappers/AppRecordMapper";
import { SupabaseAppRecordRepository } from "@/repositories/SupabaseAppRecordRepository";
import { StorefrontIdentitySearcher } from "@/searchers/StorefrontIdentitySearcher";
import { AppScrapeService, ScrapeRequest } from "@/services/AppScrapeService";
import { BatchScrapeService } from "@/services/BatchScrapeService";
import { CategorySearchService } from "@/services/CategorySearchService";
import { RecordMaintenanceService } from "@/services/RecordMaintenanceService";
import { BrowserController } from "@/scrapers/controllers/BrowserController";
import { RateLimiter } from "@/utils/RateLimiter";

export type { AppRecord, InAppPurchase } from "@/core/domain/AppRecord";
export type { StorefrontRecord } from "@/core/domain/StorefrontRecord";
export type { BatchItemResult, BatchMode, BatchSummary } from "@/core/domain/BatchOutcome";
export type { ScraperConfig, ScraperConfigOverrides } from "@/core/domain/ScraperConfig";
export type { IAppRecordRepository } from "@/core/interfaces/IAppRecordRepository";
export type { ScrapeRequest } from "@/services/AppScrapeService";
export type { BatchRunOptions } from "@/services/BatchScrapeService";
export type { MaintenanceSummary } from "@/services/RecordMaintenanceService";
export { ScrapeError, ScrapeErrorType } from "@/core/interfaces/ScrapeErrorType";
export { NumericNormalizer } from "@/extractors/common/NumericNormalizer";
export { AppRecordMapper } from "@/mappers/AppRecordMapper";
export { ConfigLoader, MIN_INTER_REQUEST_DELAY_MS } from "@/config/ConfigLoader";
export {
  AppScrapeService,
  BatchScrapeService,
  CategorySearchService,
  DashboardExtractor,
  RecordMaintenanceService,
  StorefrontExtractor,
  StorefrontIdentitySearcher,
  SupabaseAppRecordRepository,
};

/**
 * 조립된 서비스 묶음
 */
export interface ScraperServices {
  config: ScraperConfig;
  resolver: StorefrontIdentitySearcher;
  dashboard: DashboardExtractor;
  storefront: StorefrontExtractor;
  appScrape: AppScrapeService;
  categorySearch: CategorySearchService;
}

/**
 * 설정 → 서비스 조립 (실제 브라우저 사용)
 */
export function createScraperServices(
  overrides: ScraperConfigOverrides = {},
  log: Logger = rootLogger,
): ScraperServices {
  const config = ConfigLoader.getInstance().getScraperConfig(overrides);
  const createController = (): BrowserController => new BrowserController();
  const resolver = new StorefrontIdentitySearcher(config, createController, log);
  const dashboard = new DashboardExtractor(config, createController, log);
  const storefront = new StorefrontExtractor(config, createController, log);

  return {
    config,
    resolver,
    dashboard,
    storefront,
    appScrape: new AppScrapeService(resolver, dashboard, storefront, log),
    categorySearch: new CategorySearchService(config, createController, log),
  };
}

/**
 * 배치 서비스 생성
 */
export function createBatchScrapeService(
  services: ScraperServices,
  repository: IAppRecordRepository,
  log: Logger = rootLogger,
): BatchScrapeService {
  return new BatchScrapeService(
    services.appScrape,
    services.resolver,
    repository,
    new RateLimiter(services.config.interRequestDelayMs),
    log,
  );
}

/**
 * 보정 서비스 생성
 */
export function createMaintenanceService(
  services: ScraperServices,
  repository: IAppRecordRepository,
  log: Logger = rootLogger,
): RecordMaintenanceService {
  return new RecordMaintenanceService(
    repository,
    services.storefront,
    new RateLimiter(services.config.interRequestDelayMs),
    log,
  );
}

export interface ScrapeAppOptions extends ScraperConfigOverrides {
  /** 추출된 데이터가 있으면 저장 */
  save?: boolean;
  logger?: Logger;
}

/**
 * 단일 앱 스크래핑
 *
 * @example
 * const record = await scrapeApp({ query: "Notes Pro" }, { save: true });
 */
export async function scrapeApp(
  input: ScrapeRequest,
  options: ScrapeAppOptions = {},
): Promise<AppRecord> {
  const { save = false, logger: log = rootLogger, ...overrides } = options;
  const services = createScraperServices(overrides, log);
  const record = await services.appScrape.scrape(input);

  if (save && AppRecordMapper.hasScrapedContent(record)) {
    const saved = await new SupabaseAppRecordRepository(log).upsert(record);
    if (!saved) {
      log.warn({ app_id: record.app_id }, "[scrapeApp] 저장 실패 - 레코드는 그대로 반환");
    }
  }

  return record;
}
