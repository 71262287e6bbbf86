/**
 * 로거 컨텍스트 유틸리티
 *
 * 컨텍스트 인식 로거 생성 헬퍼 함수
 * 배치 ID, 스크래핑 대상 추적 지원
 */

import { v7 as uuidv7 } from "uuid";
import { logger, Logger } from "@/config/logger";

/**
 * 배치 실행 ID 생성 (시간 정렬 가능한 UUID v7)
 */
export function createRunId(): string {
  return uuidv7();
}

/**
 * 배치 전용 로거 생성
 * @param batchId - 배치 실행 ID
 * @param mode - "name" | "id"
 */
export function createBatchLogger(
  batchId: string,
  mode: string,
  parent: Logger = logger,
): Logger {
  return parent.child({
    batch_id: batchId,
    mode,
  });
}

/**
 * 단일 스크래핑 전용 로거 생성
 * @param target - 앱 이름, 식별자 또는 URL
 */
export function createScrapeLogger(target: string, parent: Logger = logger): Logger {
  return parent.child({
    scrape_target: target,
  });
}

/**
 * 중요 정보 로깅 (콘솔에 표시됨)
 */
export function logImportant(
  log: Logger,
  message: string,
  data?: Record<string, unknown>,
): void {
  log.info({ ...data, important: true }, message);
}
