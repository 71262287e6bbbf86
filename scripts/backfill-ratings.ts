#!/usr/bin/env npx tsx
/**
 * 평점 / 출시일 백필 스크립트
 *
 * 저장된 레코드 중 average_rating / rating_count (또는 release_date) 가 비어 있는
 * 레코드를 스토어프론트에서 다시 읽어 채웁니다.
 *
 * 사용법:
 *   npx tsx scripts/backfill-ratings.ts [OPTIONS]
 *
 * 옵션:
 *   --release-dates    평점 대신 출시일 백필
 *   --delay <ms>       요청 간 딜레이 (기본값: SCRAPER_INTER_REQUEST_DELAY_MS 또는 2000ms, 최소 500ms)
 *
 * 환경변수:
 *   - SUPABASE_URL
 *   - SUPABASE_SERVICE_ROLE_KEY
 */

import { config } from "dotenv";
config({ path: ".env.local" });
config();

import {
  MIN_INTER_REQUEST_DELAY_MS,
  createMaintenanceService,
  createScraperServices,
  SupabaseAppRecordRepository,
  type MaintenanceSummary,
} from "@/index";

interface BackfillArgs {
  releaseDates: boolean;
  delayMs?: number;
}

function parseDelay(raw: string): number {
  const delayMs = Number.parseInt(raw, 10);
  if (!Number.isFinite(delayMs) || delayMs < MIN_INTER_REQUEST_DELAY_MS) {
    console.error(`--delay 는 ${MIN_INTER_REQUEST_DELAY_MS}ms 이상이어야 합니다: ${raw}`);
    process.exit(1);
  }
  return delayMs;
}

function parseArgs(): BackfillArgs {
  const args = process.argv.slice(2);
  const parsed: BackfillArgs = { releaseDates: false };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === "--release-dates") {
      parsed.releaseDates = true;
    } else if (arg === "--delay" && args[i + 1]) {
      parsed.delayMs = parseDelay(args[++i]);
    } else if (arg.startsWith("--delay=")) {
      parsed.delayMs = parseDelay(arg.substring("--delay=".length));
    }
  }

  return parsed;
}

function printSummary(title: string, summary: MaintenanceSummary): void {
  console.log("\n" + "=".repeat(60));
  console.log(title);
  console.log("=".repeat(60));
  console.log(`  - 전체:     ${summary.total}`);
  console.log(`  - 대상:     ${summary.candidates}`);
  console.log(`  - 업데이트: ${summary.updated}`);
  console.log(`  - 건너뜀:   ${summary.skipped}`);
  console.log(`  - 실패:     ${summary.failed}`);
  console.log("=".repeat(60) + "\n");
}

async function main(): Promise<void> {
  const args = parseArgs();
  const services = createScraperServices(
    args.delayMs !== undefined ? { interRequestDelayMs: args.delayMs } : {},
  );
  const service = createMaintenanceService(services, new SupabaseAppRecordRepository());

  const summary = args.releaseDates
    ? await service.backfillReleaseDates()
    : await service.backfillRatings();

  printSummary(args.releaseDates ? "출시일 백필 결과" : "평점 백필 결과", summary);

  if (summary.failed > 0) {
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  console.error("백필 실패:", error);
  process.exit(1);
});
