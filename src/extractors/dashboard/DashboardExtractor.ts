/**
 * DashboardExtractor
 *
 * 분석 대시보드 overview 페이지 추출 Facade
 *
 * SOLID 원칙:
 * - SRP: 단계 순서/병합만 담당, 필드 추출은 단계별 추출기에 위임
 * - DIP: IBrowserController / IRenderedPage 에 의존
 *
 * 단계 (앞 단계가 채운 필드는 덮어쓰지 않음):
 * 1. 내부 API (JSON)
 * 2. JSON-LD
 * 3. 메타 태그
 * 4. 메인 콘텐츠 영역 DOM + 본문 정규식
 *
 * 실패 시 예외 대신 error / error_type 기록 (이미 채운 필드는 유지)
 */

import type { Logger } from "@/config/logger";
import { logger as rootLogger } from "@/config/logger";
import { AppRecord, createEmptyAppRecord } from "@/core/domain/AppRecord";
import type { ScraperConfig } from "@/core/domain/ScraperConfig";
import type { DashboardTarget, IDashboardExtractor } from "@/core/interfaces/IAppSources";
import type { IRenderedPage } from "@/core/interfaces/IRenderedPage";
import {
  ScrapeError,
  ScrapeErrorType,
  classifyError,
  toErrorMessage,
} from "@/core/interfaces/ScrapeErrorType";
import { PageSnapshot } from "@/extractors/base/PageSnapshot";
import { firstGroup } from "@/extractors/base/FieldStrategy";
import type {
  BrowserControllerFactory,
  IBrowserController,
} from "@/scrapers/controllers/IBrowserController";
import { BrowserController } from "@/scrapers/controllers/BrowserController";
import { withBrowser } from "@/scrapers/controllers/withBrowser";
import { DashboardApiClient } from "./DashboardApiClient";
import { DashboardFields, fillMissing } from "./DashboardFields";
import { DashboardInAppPurchaseExtractor } from "./DashboardInAppPurchaseExtractor";
import { DashboardMetadataExtractor } from "./DashboardMetadataExtractor";
import { DashboardMetaTagExtractor } from "./DashboardMetaTagExtractor";
import { DashboardMetricsExtractor } from "./DashboardMetricsExtractor";
import { DashboardSentinels } from "./DashboardSentinels";
import { JsonLdSchemaExtractor } from "./JsonLdSchemaExtractor";

const OVERVIEW_ID = /\/overview\/(\d+)/;
const LOGIN_TITLE = /\b(?:log|sign)[\s-]?in\b/i;

export class DashboardExtractor implements IDashboardExtractor {
  private readonly apiClient: DashboardApiClient;
  private readonly sentinels: DashboardSentinels;
  private readonly jsonLdExtractor: JsonLdSchemaExtractor;
  private readonly metaTagExtractor: DashboardMetaTagExtractor;
  private readonly metadataExtractor: DashboardMetadataExtractor;
  private readonly metricsExtractor: DashboardMetricsExtractor;
  private readonly purchaseExtractor: DashboardInAppPurchaseExtractor;

  constructor(
    private readonly config: ScraperConfig,
    private readonly createController: BrowserControllerFactory = () =>
      new BrowserController(),
    private readonly log: Logger = rootLogger,
  ) {
    const dashboard = config.dashboard;
    this.apiClient = new DashboardApiClient(dashboard, log);
    this.sentinels = new DashboardSentinels(dashboard.brandingKeywords);
    this.jsonLdExtractor = new JsonLdSchemaExtractor(log);
    this.metaTagExtractor = new DashboardMetaTagExtractor();
    this.metadataExtractor = new DashboardMetadataExtractor(dashboard, this.sentinels, log);
    this.metricsExtractor = new DashboardMetricsExtractor(log);
    this.purchaseExtractor = new DashboardInAppPurchaseExtractor();
  }

  /**
   * overview URL: {appBase}/overview/{id}?country={country}
   */
  buildUrl(appId: string): string {
    const { appBaseUrl, overviewPath, country } = this.config.dashboard;
    const path = overviewPath.replace("{id}", encodeURIComponent(appId));
    return `${appBaseUrl}${path}?country=${country}`;
  }

  /**
   * 로그인 페이지 리다이렉트 여부 (최종 URL / 페이지 제목)
   */
  isAuthRedirect(finalUrl: string, pageTitle: string): boolean {
    const lowerUrl = finalUrl.toLowerCase();
    return (
      this.config.dashboard.authUrlMarkers.some((marker) => lowerUrl.includes(marker)) ||
      LOGIN_TITLE.test(pageTitle)
    );
  }

  async extract(target: DashboardTarget): Promise<AppRecord> {
    const url = "url" in target ? target.url : this.buildUrl(target.appId);
    const appId = "appId" in target ? target.appId : firstGroup(target.url, OVERVIEW_ID);
    const record = createEmptyAppRecord(appId ? { app_id: appId } : {});

    this.log.info({ url, appId }, "[DashboardExtractor] 추출 시작");

    try {
      await withBrowser(
        this.createController,
        {
          headless: this.config.headless,
          defaultTimeoutMs: this.config.dashboard.timeouts.evaluationMs,
        },
        this.log,
        async (controller) => {
          await this.render(controller, url);
          if (appId) {
            this.merge(record, await this.apiClient.fetch(controller, appId), "api");
          }
          await controller.waitForContent(
            this.config.dashboard.contentWait,
            this.config.dashboard.timeouts.networkIdleMs,
          );
          await this.populate(controller.getRenderedPage(), record);
        },
      );
    } catch (error) {
      record.error = toErrorMessage(error);
      record.error_type = classifyError(error);
      this.log.error(
        { url, error: record.error, errorType: record.error_type },
        "[DashboardExtractor] 추출 실패",
      );
      return record;
    }

    this.log.info(
      {
        url,
        app_id: record.app_id,
        app_name: record.app_name,
        iapCount: record.in_app_purchases.length,
      },
      "[DashboardExtractor] 추출 완료",
    );
    return record;
  }

  /**
   * 렌더링된 페이지 단계 (JSON-LD → 메타 태그 → DOM)
   * 진행하면서 record 에 기록하므로 중간 실패 시에도 앞 단계 값은 남음
   */
  async populate(page: IRenderedPage, record: AppRecord): Promise<void> {
    const snapshot = new PageSnapshot(page, this.config.dashboard.contentWait.rootSelector);

    this.merge(record, await this.jsonLdExtractor.extract(snapshot), "json_ld");
    this.merge(record, await this.metaTagExtractor.extract(snapshot), "meta_tags");
    this.merge(record, await this.metadataExtractor.extract(snapshot), "dom");
    this.merge(record, await this.metricsExtractor.extract(snapshot), "kpi");

    const overviewId = firstGroup(snapshot.url(), OVERVIEW_ID);
    if (overviewId) {
      record.app_id = overviewId;
    }

    if (record.in_app_purchases.length === 0) {
      record.in_app_purchases = await this.purchaseExtractor.extract(snapshot);
    }
  }

  private merge(record: AppRecord, fields: DashboardFields, stage: string): void {
    const filled = fillMissing(record, this.sentinels.clean(fields));
    if (filled.length > 0) {
      this.log.debug({ stage, filled }, "[DashboardExtractor] 필드 채움");
    }
  }

  private async render(controller: IBrowserController, url: string): Promise<void> {
    const navigation = await controller.navigate(url, {
      waitUntil: "domcontentloaded",
      timeoutMs: this.config.dashboard.timeouts.navigationMs,
    });

    if (this.isAuthRedirect(navigation.finalUrl, navigation.pageTitle)) {
      throw new ScrapeError(
        ScrapeErrorType.AUTH_REQUIRED,
        `Login required to access the analytics dashboard: ${url}`,
      );
    }
    if (navigation.status !== null && navigation.status >= 400) {
      throw new ScrapeError(
        ScrapeErrorType.NAVIGATION_FAILED,
        `Failed to load dashboard page: ${url} (Status: ${navigation.status})`,
      );
    }
  }
}
