/**
 * DashboardMetaTagExtractor Test
 *
 * 목적: og:title / description 메타 태그 → 이름, 다운로드 수 검증
 */

import { describe, it, expect } from "@jest/globals";
import { PageSnapshot } from "@/extractors/base/PageSnapshot";
import { DashboardMetaTagExtractor } from "@/extractors/dashboard/DashboardMetaTagExtractor";
import { FixturePage } from "../../fakes/FixturePage";

function snapshotOf(head: string): PageSnapshot {
  return new PageSnapshot(new FixturePage(`<html><head>${head}</head><body></body></html>`));
}

describe("DashboardMetaTagExtractor", () => {
  const extractor = new DashboardMetaTagExtractor();

  it("og:title 의 ' - ' 앞부분과 description 의 다운로드 수를 추출해야 함", async () => {
    const snapshot = snapshotOf(`
      <meta property="og:title" content="Notes Pro - iOS App Overview">
      <meta name="description" content="Notes Pro has 120K downloads worldwide">
    `);

    await expect(extractor.extract(snapshot)).resolves.toEqual({
      app_name: "Notes Pro",
      downloads_worldwide: "120K",
    });
  });

  it("og:description 이 description 보다 우선해야 함", async () => {
    const snapshot = snapshotOf(`
      <meta property="og:description" content="3M downloads">
      <meta name="description" content="5K downloads">
    `);

    await expect(extractor.extract(snapshot)).resolves.toEqual({ downloads_worldwide: "3M" });
  });

  it("메타 태그가 없으면 빈 결과여야 함", async () => {
    await expect(extractor.extract(snapshotOf(""))).resolves.toEqual({});
  });
});
