/**
 * RecordMaintenanceService Test
 *
 * 목적: 스토어프론트 백필 대상 선별/결과 집계, 파생 숫자 필드 재계산 검증
 */

import { describe, it, expect, jest, beforeEach } from "@jest/globals";
import pino from "pino";
import { createEmptyAppRecord } from "@/core/domain/AppRecord";
import type { StorefrontRecord, StorefrontTarget } from "@/core/domain/StorefrontRecord";
import type { IStorefrontExtractor } from "@/core/interfaces/IAppSources";
import { RecordMaintenanceService } from "@/services/RecordMaintenanceService";
import { RateLimiter, SleepFn } from "@/utils/RateLimiter";
import { InMemoryAppRecordRepository } from "../fakes/InMemoryAppRecordRepository";

const log = pino({ level: "silent" });

const STOREFRONT_BY_ID: Record<string, StorefrontRecord> = {
  "2": {
    in_app_purchases: [],
    average_rating: "4.2",
    rating_count: "300",
    release_date: "Mar 3, 2019",
  },
  "4": { in_app_purchases: [], error: "Failed to load storefront page" },
};

describe("RecordMaintenanceService", () => {
  const storefrontExtract = jest.fn<IStorefrontExtractor["extract"]>();
  const sleep = jest.fn<SleepFn>();
  let repository: InMemoryAppRecordRepository;
  let service: RecordMaintenanceService;

  beforeEach(() => {
    storefrontExtract.mockReset();
    storefrontExtract.mockImplementation(async (target: StorefrontTarget) => {
      const id = "appId" in target ? target.appId : "";
      return STOREFRONT_BY_ID[id] ?? { in_app_purchases: [] };
    });
    sleep.mockReset();
    sleep.mockResolvedValue(undefined);
    repository = new InMemoryAppRecordRepository([
      createEmptyAppRecord({
        app_id: "1",
        app_name: "Alpha",
        average_rating: "4.5",
        rating_count: "1K",
        release_date: "Jan 1, 2020",
      }),
      createEmptyAppRecord({ app_id: "2", app_name: "Beta", downloads_worldwide: "2M" }),
      createEmptyAppRecord({ app_name: "Gamma" }),
      createEmptyAppRecord({ app_id: "4", app_name: "Delta" }),
    ]);
    service = new RecordMaintenanceService(
      repository,
      { extract: storefrontExtract },
      new RateLimiter(0, sleep, () => 0),
      log,
    );
  });

  describe("backfillRatings()", () => {
    it("평점이 빠진 레코드만 스토어프론트로 채우고 결과를 집계해야 함", async () => {
      const summary = await service.backfillRatings();

      expect(summary).toEqual({ total: 4, candidates: 3, updated: 1, skipped: 1, failed: 1 });
      expect(storefrontExtract.mock.calls).toEqual([[{ appId: "2" }], [{ appId: "4" }]]);

      const beta = await repository.findByAppId("2");
      expect(beta).toMatchObject({
        average_rating: "4.2",
        rating_count: "300",
        average_rating_numeric: 4.2,
        rating_count_numeric: 300,
        downloads_numeric: 2000000,
      });
      expect(beta?.release_date).toBeUndefined();
    });

    it("스토어프론트에 값이 없거나 예외가 나면 failed 로 집계해야 함", async () => {
      storefrontExtract.mockImplementation(async (target) => {
        if ("appId" in target && target.appId === "2") {
          throw new Error("browser crashed");
        }
        return { in_app_purchases: [] };
      });

      const summary = await service.backfillRatings();

      expect(summary).toEqual({ total: 4, candidates: 3, updated: 0, skipped: 1, failed: 2 });
    });

    it("저장이 실패하면 failed 로 집계해야 함", async () => {
      repository.rejectAppIds.add("2");

      const summary = await service.backfillRatings();

      expect(summary.updated).toBe(0);
      expect(summary.failed).toBe(2);
    });
  });

  it("backfillReleaseDates()는 출시일만 채워야 함", async () => {
    const summary = await service.backfillReleaseDates();

    expect(summary).toEqual({ total: 4, candidates: 3, updated: 1, skipped: 1, failed: 1 });
    const beta = await repository.findByAppId("2");
    expect(beta?.release_date).toBe("Mar 3, 2019");
    expect(beta?.average_rating).toBeUndefined();
  });

  describe("recomputeNumericFields()", () => {
    it("저장된 값이 현재 규칙과 다른 레코드만 다시 저장해야 함", async () => {
      repository = new InMemoryAppRecordRepository([
        createEmptyAppRecord({
          app_id: "1",
          app_name: "Alpha",
          downloads_worldwide: "5k",
          downloads_numeric: 5000,
        }),
        createEmptyAppRecord({
          app_id: "2",
          app_name: "Beta",
          downloads_worldwide: "2M",
          downloads_numeric: 2000000,
        }),
      ]);
      service = new RecordMaintenanceService(
        repository,
        { extract: storefrontExtract },
        new RateLimiter(0, sleep, () => 0),
        log,
      );

      const summary = await service.recomputeNumericFields();

      expect(summary).toEqual({ total: 2, candidates: 1, updated: 1, skipped: 0, failed: 0 });
      await expect(repository.findByAppId("1")).resolves.toMatchObject({ downloads_numeric: 0 });
      expect(storefrontExtract).not.toHaveBeenCalled();
    });
  });

  describe("hasStaleNumericFields()", () => {
    it("파생 값이 없는 필드는 저장 값도 없어야 최신으로 봐야 함", () => {
      expect(
        service.hasStaleNumericFields(
          createEmptyAppRecord({ revenue_worldwide: "$20K", revenue_numeric: 20000 }),
        ),
      ).toBe(false);
      expect(
        service.hasStaleNumericFields(createEmptyAppRecord({ revenue_numeric: 20000 })),
      ).toBe(true);
    });

    it("평점 수는 정수로 비교해야 함", () => {
      expect(
        service.hasStaleNumericFields(
          createEmptyAppRecord({ rating_count: "8.1K", rating_count_numeric: 8100 }),
        ),
      ).toBe(false);
    });
  });
});
