/**
 * DOMHelper Utility Test
 *
 * 목적: IRenderedPage DOM 접근 헬퍼 검증 (요소 없음/에러 → 기본값, 타임아웃 → 전파)
 */

import { describe, it, expect, jest } from "@jest/globals";
import type { IRenderedPage } from "@/core/interfaces/IRenderedPage";
import { DOMHelper } from "@/extractors/common/DOMHelper";
import { FixturePage } from "../../fakes/FixturePage";

const HTML = `<html><body>
<h1>  Notes Pro  </h1>
<h2></h2>
<a class="support" href="/support/notes">Support</a>
<a class="site" href="https://example.test/">Site</a>
</body></html>`;

function failingPage(error: Error): IRenderedPage {
  const page = new FixturePage("<html></html>");
  jest.spyOn(page, "querySelector").mockRejectedValue(error);
  return page;
}

describe("DOMHelper", () => {
  const page = new FixturePage(HTML);

  describe("safeText()", () => {
    it("요소가 있으면 trim 한 텍스트를 반환해야 함", async () => {
      await expect(DOMHelper.safeText(page, "h1")).resolves.toBe("Notes Pro");
    });

    it("요소가 없거나 비어 있으면 기본값을 반환해야 함", async () => {
      await expect(DOMHelper.safeText(page, ".missing", "기본값")).resolves.toBe("기본값");
      await expect(DOMHelper.safeText(page, "h2")).resolves.toBe("");
    });

    it("일반 에러는 기본값, 타임아웃은 전파해야 함", async () => {
      await expect(DOMHelper.safeText(failingPage(new Error("detached")), "h1")).resolves.toBe("");

      const timeout = new Error("Timeout 30000ms exceeded");
      timeout.name = "TimeoutError";
      await expect(DOMHelper.safeText(failingPage(timeout), "h1")).rejects.toBe(timeout);
    });
  });

  it("safeAttribute()는 속성 값 또는 기본값을 반환해야 함", async () => {
    await expect(DOMHelper.safeAttribute(page, "a.site", "href")).resolves.toBe("https://example.test/");
    await expect(DOMHelper.safeAttribute(page, "a.site", "target", "_self")).resolves.toBe("_self");
  });

  it("firstText()는 조건을 만족하는 첫 selector 텍스트를 반환해야 함", async () => {
    await expect(DOMHelper.firstText(page, [".missing", "h2", "h1"])).resolves.toBe("Notes Pro");
    await expect(
      DOMHelper.firstText(page, ["h1", "a.support"], (text) => text !== "Notes Pro"),
    ).resolves.toBe("Support");
    await expect(DOMHelper.firstText(page, [".missing"])).resolves.toBeUndefined();
  });

  describe("firstHref() / toAbsoluteUrl()", () => {
    it("상대 경로는 baseUrl 기준 절대 경로여야 함", async () => {
      await expect(
        DOMHelper.firstHref(page, "a.support", "https://apps.example.test/"),
      ).resolves.toBe("https://apps.example.test/support/notes");
    });

    it("절대 URL 은 그대로여야 함", () => {
      expect(DOMHelper.toAbsoluteUrl("http://example.test/a", "https://base.test")).toBe(
        "http://example.test/a",
      );
    });

    it("링크가 없으면 undefined 여야 함", async () => {
      await expect(DOMHelper.firstHref(page, "a.none", "https://base.test")).resolves.toBeUndefined();
    });
  });
});
