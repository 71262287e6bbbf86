/**
 * Browser Controller 구현체
 *
 * 브라우저 생명주기 및 네비게이션 관리
 *
 * SOLID 원칙:
 * - SRP: 브라우저 제어만 담당 (추출/파싱 X)
 * - LSP: IBrowserController 대체 가능
 * - DIP: 인터페이스에 의존
 *
 * 책임:
 * 1. 브라우저/컨텍스트/페이지 생명주기 관리
 * 2. 네비게이션 + 렌더링 대기 휴리스틱
 * 3. 브라우저 컨텍스트 기반 JSON 요청
 */

import { chromium } from "playwright-extra";
import StealthPlugin from "puppeteer-extra-plugin-stealth";
import type { Browser, BrowserContext, Page } from "playwright-core";

import type {
  BrowserInitOptions,
  IBrowserController,
  NavigateOptions,
  NavigationResult,
} from "./IBrowserController";
import type { ContentWaitHeuristics } from "@/core/domain/ScraperConfig";
import type { IRenderedPage } from "@/core/interfaces/IRenderedPage";
import { PlaywrightRenderedPage } from "@/scrapers/PlaywrightRenderedPage";
import { resolveBrowserArgs } from "@/config/BrowserArgs";
import { SCRAPER_CONFIG } from "@/config/constants";
import { logger } from "@/config/logger";
import { isTimeoutError, toErrorMessage } from "@/core/interfaces/ScrapeErrorType";

// Stealth 플러그인 적용 (모듈 레벨)
chromium.use(StealthPlugin());

export class BrowserController implements IBrowserController {
  private browser: Browser | null = null;
  private context: BrowserContext | null = null;
  private page: Page | null = null;
  private _initialized: boolean = false;

  /**
   * 브라우저 초기화
   */
  async initialize(options: BrowserInitOptions): Promise<void> {
    if (this._initialized) {
      logger.debug("[BrowserController] 이미 초기화됨");
      return;
    }

    logger.info({ headless: options.headless }, "[BrowserController] 브라우저 초기화 시작");

    this.browser = await chromium.launch({
      headless: options.headless,
      args: resolveBrowserArgs(options.headless),
    });

    this.context = await this.browser.newContext({
      viewport: SCRAPER_CONFIG.DEFAULT_VIEWPORT,
      userAgent: SCRAPER_CONFIG.DEFAULT_USER_AGENT,
      locale: SCRAPER_CONFIG.DEFAULT_LOCALE,
      timezoneId: SCRAPER_CONFIG.DEFAULT_TIMEZONE,
      extraHTTPHeaders: { ...SCRAPER_CONFIG.EXTRA_HTTP_HEADERS },
    });

    // Anti-detection 설정
    await this.context.addInitScript(() => {
      Object.defineProperty(navigator, "webdriver", {
        get: () => false,
      });
    });

    this.page = await this.context.newPage();
    if (options.defaultTimeoutMs) {
      this.page.setDefaultTimeout(options.defaultTimeoutMs);
    }
    this._initialized = true;

    logger.info("[BrowserController] 브라우저 초기화 완료");
  }

  async navigate(url: string, options: NavigateOptions): Promise<NavigationResult> {
    const page = this.requirePage();

    logger.info({ url, waitUntil: options.waitUntil }, "[BrowserController] 페이지 이동");
    const response = await page.goto(url, {
      waitUntil: options.waitUntil,
      timeout: options.timeoutMs,
    });

    return {
      status: response ? response.status() : null,
      finalUrl: page.url(),
      pageTitle: await page.title(),
    };
  }

  async wait(ms: number): Promise<void> {
    if (ms > 0) {
      await this.requirePage().waitForTimeout(ms);
    }
  }

  async waitForSelector(
    selector: string,
    options: { timeoutMs: number; state?: "attached" | "visible" },
  ): Promise<boolean> {
    try {
      await this.requirePage().waitForSelector(selector, {
        timeout: options.timeoutMs,
        state: options.state ?? "attached",
      });
      return true;
    } catch (error) {
      if (!isTimeoutError(error)) {
        throw error;
      }
      logger.debug({ selector }, "[BrowserController] selector 대기 타임아웃");
      return false;
    }
  }

  /**
   * network idle 대기 후 루트 요소 텍스트가 충분히 길어질 때까지 폴링
   */
  async waitForContent(
    heuristics: ContentWaitHeuristics,
    networkIdleMs: number,
  ): Promise<boolean> {
    const page = this.requirePage();

    try {
      await page.waitForLoadState("networkidle", { timeout: networkIdleMs });
    } catch (error) {
      if (!isTimeoutError(error)) {
        throw error;
      }
      logger.debug("[BrowserController] networkidle 타임아웃 - 계속 진행");
    }

    const root = page.locator(heuristics.rootSelector).first();
    for (let attempt = 1; attempt <= heuristics.maxPolls; attempt++) {
      if ((await root.count()) > 0) {
        const length = (await root.innerText()).trim().length;
        if (length > heuristics.minTextLength) {
          logger.debug({ attempt, length }, "[BrowserController] 콘텐츠 렌더링 확인");
          return true;
        }
      }
      await page.waitForTimeout(heuristics.pollIntervalMs);
    }

    logger.warn(
      { selector: heuristics.rootSelector, maxPolls: heuristics.maxPolls },
      "[BrowserController] 콘텐츠 렌더링 대기 한도 초과",
    );
    return false;
  }

  async requestJson(url: string, timeoutMs: number): Promise<unknown | null> {
    const context = this.context;
    if (!context) {
      throw new Error("BrowserController가 초기화되지 않음");
    }

    try {
      const response = await context.request.get(url, { timeout: timeoutMs });
      if (response.status() !== 200) {
        logger.debug({ url, status: response.status() }, "[BrowserController] JSON 요청 실패 상태");
        return null;
      }
      const body: unknown = await response.json();
      return body;
    } catch (error) {
      logger.debug({ url, error: toErrorMessage(error) }, "[BrowserController] JSON 요청 에러 (무시)");
      return null;
    }
  }

  getRenderedPage(): IRenderedPage {
    return new PlaywrightRenderedPage(this.requirePage());
  }

  /**
   * 리소스 정리
   */
  async cleanup(): Promise<void> {
    logger.debug("[BrowserController] 정리 중...");

    // 앞 단계가 실패해도 browser.close() 는 반드시 실행
    try {
      try {
        await this.page?.close();
      } finally {
        this.page = null;
        try {
          await this.context?.close();
        } finally {
          this.context = null;
        }
      }
    } finally {
      try {
        await this.browser?.close();
      } finally {
        this.browser = null;
        this._initialized = false;
      }
    }

    logger.debug("[BrowserController] 정리 완료");
  }

  isInitialized(): boolean {
    return this._initialized;
  }

  private requirePage(): Page {
    if (!this.page) {
      throw new Error("BrowserController가 초기화되지 않음");
    }
    return this.page;
  }
}
