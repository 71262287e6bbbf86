/**
 * 배치 처리 결과 모델
 */

/**
 * 항목별 처리 결과 태그
 */
export type BatchItemOutcome =
  | "success"
  | "no_data"
  | "save_error"
  | "skipped_invalid_identifier"
  | "not_found"
  | "error";

/**
 * 배치 입력 해석 방식
 * - name: 앱 이름 → 식별자 검색 후 스크래핑
 * - id: 숫자 식별자로 바로 스크래핑
 */
export type BatchMode = "name" | "id";

/**
 * 단일 항목 처리 결과
 */
export interface BatchItemResult {
  item: string;
  outcome: BatchItemOutcome;
  app_id?: string;
  app_name?: string;
  error?: string;
}

/**
 * 배치 처리 결과
 */
export interface BatchSummary {
  total: number;
  processed: number;
  succeeded: number;
  failed: number;
  results: BatchItemResult[];
  durationMs: number;
}
