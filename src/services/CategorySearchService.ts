/**
 * Category Search Service
 *
 * 대시보드 카테고리 페이지 → 앱 숫자 식별자 목록 (최대 limit 개)
 * 반환된 식별자는 BatchScrapeService id 모드로 그대로 넘길 수 있음
 *
 * 카테고리 페이지가 없거나 링크가 없으면 빈 배열, 네비게이션 실패 → ScrapeError
 */

import type { Logger } from "@/config/logger";
import { logger as rootLogger } from "@/config/logger";
import type { ScraperConfig } from "@/core/domain/ScraperConfig";
import {
  ScrapeError,
  ScrapeErrorType,
  classifyError,
  toErrorMessage,
} from "@/core/interfaces/ScrapeErrorType";
import type {
  BrowserControllerFactory,
  IBrowserController,
} from "@/scrapers/controllers/IBrowserController";
import { BrowserController } from "@/scrapers/controllers/BrowserController";
import { withBrowser } from "@/scrapers/controllers/withBrowser";
import { DASHBOARD_ID_PATTERNS, collectAppIds } from "@/searchers/AppLinkIds";

export const DEFAULT_CATEGORY_LIMIT = 10;

export class CategorySearchService {
  constructor(
    private readonly config: ScraperConfig,
    private readonly createController: BrowserControllerFactory = () =>
      new BrowserController(),
    private readonly log: Logger = rootLogger,
  ) {}

  buildCategoryUrl(category: string): string {
    const { appBaseUrl, categoryPath } = this.config.dashboard;
    const slug = encodeURIComponent(category.trim().toLowerCase());
    return `${appBaseUrl}${categoryPath.replace("{category}", slug)}`;
  }

  async search(category: string, limit: number = DEFAULT_CATEGORY_LIMIT): Promise<string[]> {
    if (!category.trim() || limit <= 0) {
      return [];
    }

    const url = this.buildCategoryUrl(category);
    this.log.info({ category, url, limit }, "[CategorySearch] 카테고리 검색 시작");

    try {
      const appIds = await withBrowser(
        this.createController,
        {
          headless: this.config.headless,
          defaultTimeoutMs: this.config.dashboard.timeouts.evaluationMs,
        },
        this.log,
        (controller) => this.collect(controller, url, limit),
      );

      this.log.info({ category, count: appIds.length }, "[CategorySearch] 카테고리 검색 완료");
      return appIds;
    } catch (error) {
      if (error instanceof ScrapeError) {
        throw error;
      }
      throw new ScrapeError(
        classifyError(error),
        `Error searching category "${category}": ${toErrorMessage(error)}`,
        { cause: error },
      );
    }
  }

  private async collect(
    controller: IBrowserController,
    url: string,
    limit: number,
  ): Promise<string[]> {
    const { timeouts, contentWait, categoryLinkSelectors } = this.config.dashboard;

    const navigation = await controller.navigate(url, {
      waitUntil: "domcontentloaded",
      timeoutMs: timeouts.navigationMs,
    });
    if (navigation.status === 404) {
      this.log.warn({ url }, "[CategorySearch] 카테고리 페이지 없음");
      return [];
    }
    if (navigation.status !== null && navigation.status >= 400) {
      throw new ScrapeError(
        ScrapeErrorType.NAVIGATION_FAILED,
        `Failed to load category page: ${url} (Status: ${navigation.status})`,
      );
    }
    await controller.waitForContent(contentWait, timeouts.networkIdleMs);

    const page = controller.getRenderedPage();
    const hrefs: string[] = [];
    for (const selector of categoryLinkSelectors) {
      const links = await page.querySelectorAll(selector);
      hrefs.push(...links.map((link) => link.attributes.href ?? ""));
    }

    return collectAppIds(hrefs, DASHBOARD_ID_PATTERNS, limit);
  }
}
