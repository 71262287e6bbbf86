/**
 * CategorySearchService Test
 *
 * 목적: 카테고리 페이지 앱 링크 → 식별자 목록 (중복 제거, limit), 결과 없음 / 페이지 없음 / 네비게이션 실패 구분 검증
 */

import { describe, it, expect, jest, beforeAll } from "@jest/globals";
import pino from "pino";

jest.mock("@/scrapers/controllers/BrowserController", () => ({
  BrowserController: jest.fn(),
}));

import type { ScraperConfig } from "@/core/domain/ScraperConfig";
import { ScrapeErrorType } from "@/core/interfaces/ScrapeErrorType";
import { CategorySearchService } from "@/services/CategorySearchService";
import { DASHBOARD_ID_PATTERNS, collectAppIds } from "@/searchers/AppLinkIds";
import { FakeBrowserController } from "../fakes/FakeBrowserController";
import { FixturePage } from "../fakes/FixturePage";
import { createTestConfig } from "../fakes/testConfig";

const log = pino({ level: "silent" });

function categoryHtml(count: number): string {
  const links = Array.from(
    { length: count },
    (_, i) => `<a href="/apps/ios/app/productivity-app-${i + 1}/${1001 + i}">App ${i + 1}</a>`,
  );
  return `<html><body><div id="react-root">
<a href="/apps/ios/category/productivity">Productivity</a>
<a href="/apps/ios/app/productivity-app-1/1001">App 1 (again)</a>
${links.join("\n")}
</div></body></html>`;
}

describe("collectAppIds()", () => {
  it("대시보드 앱 링크 / overview 링크에서 순서대로 중복 없이 수집해야 함", () => {
    expect(
      collectAppIds(
        [
          "https://dashboard.example.test/apps/ios/app/notes-pro/123?country=US",
          "/apps/ios/category/productivity",
          "/overview/456",
          "/apps/ios/app/notes-pro/123",
          "/apps/ios/app/789",
        ],
        DASHBOARD_ID_PATTERNS,
        10,
      ),
    ).toEqual(["123", "456", "789"]);
  });

  it("limit 개에서 멈춰야 함", () => {
    expect(collectAppIds(["/overview/1", "/overview/2", "/overview/3"], DASHBOARD_ID_PATTERNS, 2)).toEqual([
      "1",
      "2",
    ]);
  });
});

describe("CategorySearchService", () => {
  let config: ScraperConfig;

  beforeAll(() => {
    config = createTestConfig();
  });

  function createService(controller: FakeBrowserController): CategorySearchService {
    return new CategorySearchService(config, () => controller, log);
  }

  it("카테고리 이름을 소문자로 인코딩한 URL 이어야 함", () => {
    const service = createService(new FakeBrowserController({ page: new FixturePage("<html></html>") }));

    expect(service.buildCategoryUrl(" Health & Fitness ")).toBe(
      `${config.dashboard.appBaseUrl}/apps/ios/category/health%20%26%20fitness`,
    );
  });

  it("링크가 10개보다 많으면 기본값 10개만 반환하고 브라우저를 정리해야 함", async () => {
    const controller = new FakeBrowserController({ page: new FixturePage(categoryHtml(12)) });

    const appIds = await createService(controller).search("Productivity");

    expect(appIds).toEqual([
      "1001",
      "1002",
      "1003",
      "1004",
      "1005",
      "1006",
      "1007",
      "1008",
      "1009",
      "1010",
    ]);
    expect(controller.navigatedUrls).toEqual([
      `${config.dashboard.appBaseUrl}/apps/ios/category/productivity`,
    ]);
    expect(controller.cleanedUp).toBe(true);
  });

  it("limit 를 지정하면 그 개수까지만 반환해야 함", async () => {
    const controller = new FakeBrowserController({ page: new FixturePage(categoryHtml(12)) });

    await expect(createService(controller).search("Productivity", 3)).resolves.toEqual([
      "1001",
      "1002",
      "1003",
    ]);
  });

  it("앱 링크가 없으면 빈 배열이어야 함", async () => {
    const controller = new FakeBrowserController({
      page: new FixturePage('<html><body><div id="react-root"><p>No apps</p></div></body></html>'),
    });

    await expect(createService(controller).search("Productivity")).resolves.toEqual([]);
    expect(controller.cleanedUp).toBe(true);
  });

  it("카테고리 페이지가 404 면 빈 배열이어야 함", async () => {
    const controller = new FakeBrowserController({
      page: new FixturePage(categoryHtml(3)),
      status: 404,
    });

    await expect(createService(controller).search("Unknown Category")).resolves.toEqual([]);
  });

  it("빈 카테고리는 브라우저를 열지 않고 빈 배열이어야 함", async () => {
    const controller = new FakeBrowserController({ page: new FixturePage(categoryHtml(3)) });

    await expect(createService(controller).search("   ")).resolves.toEqual([]);
    expect(controller.navigatedUrls).toEqual([]);
    expect(controller.cleanedUp).toBe(false);
  });

  it("HTTP 5xx 는 NAVIGATION_FAILED ScrapeError 로 던져야 함", async () => {
    const controller = new FakeBrowserController({
      page: new FixturePage(categoryHtml(3)),
      status: 503,
    });

    await expect(createService(controller).search("Productivity")).rejects.toMatchObject({
      type: ScrapeErrorType.NAVIGATION_FAILED,
    });
    expect(controller.cleanedUp).toBe(true);
  });
});
