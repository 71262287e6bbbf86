/**
 * FakeBrowserController
 *
 * IBrowserController 테스트 대역
 * - navigate 결과 / JSON 응답 / 페이지를 미리 지정
 * - 호출 기록 (navigatedUrls, requestedUrls, cleanedUp)
 */

import type { ContentWaitHeuristics } from "@/core/domain/ScraperConfig";
import type { IRenderedPage } from "@/core/interfaces/IRenderedPage";
import type {
  BrowserInitOptions,
  IBrowserController,
  NavigateOptions,
  NavigationResult,
} from "@/scrapers/controllers/IBrowserController";

export interface FakeBrowserOptions {
  page: IRenderedPage;
  status?: number | null;
  /** 기본값: page.currentUrl() */
  finalUrl?: string;
  pageTitle?: string;
  /** navigate 에서 던질 에러 */
  navigateError?: Error;
  /** requestJson 응답 (기본 null) */
  json?: unknown;
  /** 이 selector 들만 waitForSelector 성공 (기본: 전부 성공) */
  presentSelectors?: string[];
}

export class FakeBrowserController implements IBrowserController {
  readonly navigatedUrls: string[] = [];
  readonly requestedUrls: string[] = [];
  initOptions: BrowserInitOptions | null = null;
  cleanedUp = false;

  constructor(private readonly options: FakeBrowserOptions) {}

  async initialize(options: BrowserInitOptions): Promise<void> {
    this.initOptions = options;
  }

  async navigate(url: string, _options: NavigateOptions): Promise<NavigationResult> {
    this.navigatedUrls.push(url);
    if (this.options.navigateError) {
      throw this.options.navigateError;
    }
    return {
      status: this.options.status === undefined ? 200 : this.options.status,
      finalUrl: this.options.finalUrl ?? this.options.page.currentUrl(),
      pageTitle: this.options.pageTitle ?? (await this.options.page.title()),
    };
  }

  async wait(_ms: number): Promise<void> {}

  async waitForSelector(
    selector: string,
    _options: { timeoutMs: number; state?: "attached" | "visible" },
  ): Promise<boolean> {
    const present = this.options.presentSelectors;
    return present === undefined || present.includes(selector);
  }

  async waitForContent(
    _heuristics: ContentWaitHeuristics,
    _networkIdleMs: number,
  ): Promise<boolean> {
    return true;
  }

  async requestJson(url: string, _timeoutMs: number): Promise<unknown | null> {
    this.requestedUrls.push(url);
    return this.options.json ?? null;
  }

  getRenderedPage(): IRenderedPage {
    return this.options.page;
  }

  async cleanup(): Promise<void> {
    this.cleanedUp = true;
  }

  isInitialized(): boolean {
    return this.initOptions !== null;
  }
}
