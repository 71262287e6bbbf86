/**
 * DashboardExtractor Test
 *
 * 목적: 단계 병합 순서(API 우선), 로그인 리다이렉트/HTTP 실패/타임아웃 시 error 기록 검증
 */

import { describe, it, expect, jest, beforeAll } from "@jest/globals";
import pino from "pino";

jest.mock("@/scrapers/controllers/BrowserController", () => ({
  BrowserController: jest.fn(),
}));

import type { ScraperConfig } from "@/core/domain/ScraperConfig";
import { ScrapeErrorType } from "@/core/interfaces/ScrapeErrorType";
import { DashboardExtractor } from "@/extractors/dashboard/DashboardExtractor";
import { FakeBrowserController } from "../../fakes/FakeBrowserController";
import { FixturePage } from "../../fakes/FixturePage";
import { createTestConfig } from "../../fakes/testConfig";

const log = pino({ level: "silent" });

const OVERVIEW_HTML = `<html><head><title>Notes Pro - Overview</title>
<script type="application/ld+json">{"@type":"SoftwareApplication","name":"Notes Pro LD","applicationCategory":"Productivity","dateModified":"2024-03-15T10:00:00Z"}</script>
</head><body>
<div id="react-root">
<h1>Notes Pro Page</h1>
<div>Developer: Example Labs</div>
<div>Revenue: $20K</div>
<table>
<tr><th>Title</th><th>Duration</th><th>Price</th></tr>
<tr><td>Pro Monthly</td><td>1 Month</td><td>$4.99</td></tr>
</table>
</div>
</body></html>`;

describe("DashboardExtractor", () => {
  let config: ScraperConfig;
  let overviewUrl: string;

  beforeAll(() => {
    config = createTestConfig();
    overviewUrl = `${config.dashboard.appBaseUrl}/overview/123?country=US`;
  });

  function createExtractor(controller: FakeBrowserController): DashboardExtractor {
    return new DashboardExtractor(config, () => controller, log);
  }

  it("overview URL 에 식별자와 국가를 넣어야 함", () => {
    const extractor = createExtractor(
      new FakeBrowserController({ page: new FixturePage("<html></html>") }),
    );

    expect(extractor.buildUrl("123")).toBe(overviewUrl);
  });

  describe("isAuthRedirect()", () => {
    it("최종 URL 에 로그인 표식이 있으면 true 여야 함", () => {
      const extractor = createExtractor(
        new FakeBrowserController({ page: new FixturePage("<html></html>") }),
      );

      expect(extractor.isAuthRedirect(`${config.dashboard.appBaseUrl}/users/sign-in`, "")).toBe(true);
    });

    it("페이지 제목이 로그인 화면이면 true 여야 함", () => {
      const extractor = createExtractor(
        new FakeBrowserController({ page: new FixturePage("<html></html>") }),
      );

      expect(extractor.isAuthRedirect(overviewUrl, "Log In | Dashboard")).toBe(true);
      expect(extractor.isAuthRedirect(overviewUrl, "Notes Pro - Overview")).toBe(false);
    });
  });

  it("API 값이 페이지 값보다 우선하고 빈 필드만 뒤 단계로 채워야 함", async () => {
    const controller = new FakeBrowserController({
      page: new FixturePage(OVERVIEW_HTML, overviewUrl),
      json: { name: "Notes Pro API", price: 0, estimates: { downloads: "5M" } },
    });

    const record = await createExtractor(controller).extract({ appId: "123" });

    expect(record).toMatchObject({
      app_id: "123",
      app_name: "Notes Pro API",
      price: "Free",
      downloads_worldwide: "5M",
      categories: "Productivity",
      last_updated: "2024/03/15",
      developer_name: "Example Labs",
      revenue_worldwide: "$20K",
      in_app_purchases: [{ title: "Pro Monthly", duration: "1 Month", price: "$4.99" }],
    });
    expect(record.error).toBeUndefined();
    expect(controller.navigatedUrls).toEqual([overviewUrl]);
    expect(controller.requestedUrls).toEqual([
      `${config.dashboard.appBaseUrl}/api/ios/apps/123?country=US`,
    ]);
    expect(controller.cleanedUp).toBe(true);
  });

  it("직접 URL 의 overview 경로에서 식별자를 얻어야 함", async () => {
    const controller = new FakeBrowserController({
      page: new FixturePage('<html><body><div id="react-root"><h1>Notes Pro</h1></div></body></html>'),
    });
    const url = `${config.dashboard.appBaseUrl}/overview/456?country=US`;

    const record = await createExtractor(controller).extract({ url });

    expect(record.app_id).toBe("456");
    expect(record.app_name).toBe("Notes Pro");
    expect(controller.navigatedUrls).toEqual([url]);
    expect(controller.requestedUrls).toEqual([
      `${config.dashboard.appBaseUrl}/api/ios/apps/456?country=US`,
    ]);
  });

  it("식별자가 없는 직접 URL 은 API 를 호출하지 않아야 함", async () => {
    const controller = new FakeBrowserController({
      page: new FixturePage('<html><body><div id="react-root"><h1>Notes Pro</h1></div></body></html>'),
    });

    const record = await createExtractor(controller).extract({
      url: `${config.dashboard.appBaseUrl}/custom-report`,
    });

    expect(record.app_id).toBeUndefined();
    expect(record.app_name).toBe("Notes Pro");
    expect(controller.requestedUrls).toEqual([]);
  });

  it("로그인 페이지로 리다이렉트되면 AUTH_REQUIRED 를 기록해야 함", async () => {
    const controller = new FakeBrowserController({
      page: new FixturePage("<html><body>Sign in</body></html>"),
      finalUrl: `${config.dashboard.appBaseUrl}/users/sign-in`,
    });

    const record = await createExtractor(controller).extract({ appId: "123" });

    expect(record.app_id).toBe("123");
    expect(record.error_type).toBe(ScrapeErrorType.AUTH_REQUIRED);
    expect(record.error).toBe(`Login required to access the analytics dashboard: ${overviewUrl}`);
    expect(controller.requestedUrls).toEqual([]);
    expect(controller.cleanedUp).toBe(true);
  });

  it("HTTP 500 은 NAVIGATION_FAILED 를 기록해야 함", async () => {
    const controller = new FakeBrowserController({
      page: new FixturePage("<html></html>", overviewUrl),
      status: 500,
    });

    const record = await createExtractor(controller).extract({ appId: "123" });

    expect(record.error_type).toBe(ScrapeErrorType.NAVIGATION_FAILED);
    expect(record.error).toBe(`Failed to load dashboard page: ${overviewUrl} (Status: 500)`);
  });

  it("타임아웃은 TIMEOUT 을 기록하고 브라우저를 정리해야 함", async () => {
    const timeout = new Error("page.goto: Timeout 60000ms exceeded");
    timeout.name = "TimeoutError";
    const controller = new FakeBrowserController({
      page: new FixturePage("<html></html>"),
      navigateError: timeout,
    });

    const record = await createExtractor(controller).extract({ appId: "123" });

    expect(record.error_type).toBe(ScrapeErrorType.TIMEOUT);
    expect(record.in_app_purchases).toEqual([]);
    expect(controller.cleanedUp).toBe(true);
  });
});
