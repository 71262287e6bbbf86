/**
 * StorefrontExtractor
 *
 * 스토어프론트 상세 페이지 추출 Facade
 *
 * Design Pattern:
 * - Facade Pattern: 평점/IAP/메타데이터 추출기를 하나의 흐름으로
 *
 * 실패 시:
 * - 예외를 던지지 않고 error / error_type 기록
 * - 실패 전에 채운 필드는 유지
 * - 브라우저는 항상 정리
 */

import type { Logger } from "@/config/logger";
import { logger as rootLogger } from "@/config/logger";
import type { ScraperConfig } from "@/core/domain/ScraperConfig";
import type {
  StorefrontRecord,
  StorefrontTarget,
} from "@/core/domain/StorefrontRecord";
import type { IRenderedPage } from "@/core/interfaces/IRenderedPage";
import type { IStorefrontExtractor } from "@/core/interfaces/IAppSources";
import {
  ScrapeError,
  ScrapeErrorType,
  classifyError,
  toErrorMessage,
} from "@/core/interfaces/ScrapeErrorType";
import { PageSnapshot } from "@/extractors/base/PageSnapshot";
import { StorefrontRatingExtractor } from "./StorefrontRatingExtractor";
import { StorefrontInAppPurchaseExtractor } from "./StorefrontInAppPurchaseExtractor";
import { StorefrontMetadataExtractor } from "./StorefrontMetadataExtractor";
import type {
  BrowserControllerFactory,
  IBrowserController,
} from "@/scrapers/controllers/IBrowserController";
import { BrowserController } from "@/scrapers/controllers/BrowserController";
import { withBrowser } from "@/scrapers/controllers/withBrowser";

export class StorefrontExtractor implements IStorefrontExtractor {
  private readonly ratingExtractor: StorefrontRatingExtractor;
  private readonly purchaseExtractor: StorefrontInAppPurchaseExtractor;
  private readonly metadataExtractor: StorefrontMetadataExtractor;

  constructor(
    private readonly config: ScraperConfig,
    private readonly createController: BrowserControllerFactory = () =>
      new BrowserController(),
    private readonly log: Logger = rootLogger,
  ) {
    this.ratingExtractor = new StorefrontRatingExtractor(log);
    this.purchaseExtractor = new StorefrontInAppPurchaseExtractor();
    this.metadataExtractor = new StorefrontMetadataExtractor(config.storefront, log);
  }

  /**
   * 상세 페이지 URL: {base}/{locale}/app/id{id}
   */
  buildUrl(appId: string): string {
    const { baseUrl, locale } = this.config.storefront;
    return `${baseUrl}/${locale}/app/id${appId}`;
  }

  async extract(target: StorefrontTarget): Promise<StorefrontRecord> {
    const url = "url" in target ? target.url : this.buildUrl(target.appId);
    const record: StorefrontRecord = { in_app_purchases: [] };
    if ("appId" in target) {
      record.app_id = target.appId;
    }

    this.log.info({ url }, "[StorefrontExtractor] 추출 시작");

    try {
      await withBrowser(
        this.createController,
        {
          headless: this.config.headless,
          defaultTimeoutMs: this.config.storefront.timeouts.navigationMs,
        },
        this.log,
        async (controller) => {
          await this.render(controller, url);
          await this.populate(controller.getRenderedPage(), record);
        },
      );
    } catch (error) {
      record.error = toErrorMessage(error);
      record.error_type = classifyError(error);
      this.log.error(
        { url, error: record.error, errorType: record.error_type },
        "[StorefrontExtractor] 추출 실패",
      );
      return record;
    }

    this.log.info(
      {
        url,
        average_rating: record.average_rating,
        rating_count: record.rating_count,
        release_date: record.release_date,
      },
      "[StorefrontExtractor] 추출 완료",
    );
    return record;
  }

  /**
   * 렌더링된 페이지에서 필드 채우기 (진행하면서 record 에 기록)
   */
  async populate(page: IRenderedPage, record: StorefrontRecord): Promise<void> {
    const snapshot = new PageSnapshot(page);

    const metadata = await this.metadataExtractor.extract(snapshot);
    Object.assign(record, metadata, {
      app_id: metadata.app_id ?? record.app_id,
    });

    const ratings = await this.ratingExtractor.extract(snapshot);
    record.average_rating = ratings.average_rating;
    record.rating_count = ratings.rating_count;

    record.in_app_purchases = await this.purchaseExtractor.extract(snapshot);
  }

  private async render(controller: IBrowserController, url: string): Promise<void> {
    const { timeouts } = this.config.storefront;

    const navigation = await controller.navigate(url, {
      waitUntil: "domcontentloaded",
      timeoutMs: timeouts.navigationMs,
    });
    if (navigation.status !== null && navigation.status >= 400) {
      throw new ScrapeError(
        ScrapeErrorType.NAVIGATION_FAILED,
        `Failed to load storefront page: ${url} (Status: ${navigation.status})`,
      );
    }

    await controller.wait(timeouts.settleBeforeMs);
    await controller.waitForSelector("body", {
      timeoutMs: timeouts.bodyVisibleMs,
      state: "visible",
    });
    await controller.wait(timeouts.settleAfterMs);
  }
}
