#!/usr/bin/env npx tsx
/**
 * 파생 숫자 필드 재계산 스크립트
 *
 * downloads_numeric / revenue_numeric / rating_count_numeric / average_rating_numeric 이
 * 현재 정규화 규칙과 다른 레코드만 다시 저장합니다.
 *
 * 사용법:
 *   npx tsx scripts/recompute-numeric-fields.ts
 *
 * 환경변수:
 *   - SUPABASE_URL
 *   - SUPABASE_SERVICE_ROLE_KEY
 */

import { config } from "dotenv";
config({ path: ".env.local" });
config();

import {
  createMaintenanceService,
  createScraperServices,
  SupabaseAppRecordRepository,
} from "@/index";

async function main(): Promise<void> {
  const service = createMaintenanceService(
    createScraperServices(),
    new SupabaseAppRecordRepository(),
  );
  const summary = await service.recomputeNumericFields();

  console.log("\n" + "=".repeat(60));
  console.log("숫자 필드 재계산 결과");
  console.log("=".repeat(60));
  console.log(`  - 전체:     ${summary.total}`);
  console.log(`  - 대상:     ${summary.candidates}`);
  console.log(`  - 업데이트: ${summary.updated}`);
  console.log(`  - 실패:     ${summary.failed}`);
  console.log("=".repeat(60) + "\n");

  if (summary.failed > 0) {
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  console.error("재계산 실패:", error);
  process.exit(1);
});
