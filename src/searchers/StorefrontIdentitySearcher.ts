/**
 * StorefrontIdentitySearcher
 *
 * 앱 이름 → 스토어프론트 숫자 식별자 (검색 결과 첫 앱 링크)
 *
 * SOLID 원칙:
 * - SRP: 식별자 검색만 담당
 * - DIP: IIdentityResolver / IBrowserController 에 의존
 *
 * 흐름:
 * 1. 검색 페이지 이동 ({base}{searchPath}?term=...)
 * 2. 결과 selector 를 순서대로 대기 + 링크 수집
 * 3. "/app/" 과 "/id" 를 모두 포함한 첫 링크에서 숫자 id 추출
 *
 * 결과 없음 → null, 네비게이션 실패 → ScrapeError
 */

import type { Logger } from "@/config/logger";
import { logger as rootLogger } from "@/config/logger";
import type { ScraperConfig } from "@/core/domain/ScraperConfig";
import type { IIdentityResolver } from "@/core/interfaces/IAppSources";
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
import { STOREFRONT_ID_PATTERNS, appIdFromHref } from "./AppLinkIds";

export class StorefrontIdentitySearcher implements IIdentityResolver {
  constructor(
    private readonly config: ScraperConfig,
    private readonly createController: BrowserControllerFactory = () =>
      new BrowserController(),
    private readonly log: Logger = rootLogger,
  ) {}

  buildSearchUrl(appName: string): string {
    const { baseUrl, searchPath } = this.config.storefront;
    return `${baseUrl}${searchPath}?term=${encodeURIComponent(appName)}`;
  }

  async resolve(appName: string): Promise<string | null> {
    const url = this.buildSearchUrl(appName);
    this.log.info({ appName, url }, "[IdentitySearcher] 검색 시작");

    try {
      const appId = await withBrowser(
        this.createController,
        {
          headless: this.config.headless,
          defaultTimeoutMs: this.config.storefront.timeouts.navigationMs,
        },
        this.log,
        (controller) => this.search(controller, url),
      );

      if (appId) {
        this.log.info({ appName, appId }, "[IdentitySearcher] 식별자 확인");
      } else {
        this.log.warn({ appName }, "[IdentitySearcher] 검색 결과 없음");
      }
      return appId;
    } catch (error) {
      if (error instanceof ScrapeError) {
        throw error;
      }
      throw new ScrapeError(
        classifyError(error),
        `Error searching storefront for "${appName}": ${toErrorMessage(error)}`,
        { cause: error },
      );
    }
  }

  /**
   * 링크 목록 → 첫 번째 앱 식별자
   */
  extractIdFromHrefs(hrefs: readonly string[]): string | null {
    for (const href of hrefs) {
      if (!href.includes("/app/") || !href.includes("/id")) {
        continue;
      }
      const appId = appIdFromHref(href, STOREFRONT_ID_PATTERNS);
      if (appId) {
        return appId;
      }
    }
    return null;
  }

  private async search(controller: IBrowserController, url: string): Promise<string | null> {
    const { timeouts, searchResultSelectors } = this.config.storefront;

    const navigation = await controller.navigate(url, {
      waitUntil: "domcontentloaded",
      timeoutMs: timeouts.navigationMs,
    });
    if (navigation.status !== null && navigation.status >= 400) {
      throw new ScrapeError(
        ScrapeErrorType.NAVIGATION_FAILED,
        `Failed to load storefront search: ${url} (Status: ${navigation.status})`,
      );
    }
    await controller.wait(timeouts.searchSettleMs);

    const page = controller.getRenderedPage();
    for (const selector of searchResultSelectors) {
      const found = await controller.waitForSelector(selector, {
        timeoutMs: timeouts.selectorMs,
      });
      if (!found) {
        continue;
      }

      const links = await page.querySelectorAll(selector);
      const appId = this.extractIdFromHrefs(
        links.map((link) => link.attributes.href ?? ""),
      );
      if (appId) {
        this.log.debug({ selector }, "[IdentitySearcher] 결과 selector 매칭");
        return appId;
      }
    }

    return null;
  }
}
