/**
 * Scrape Error Type Enum
 *
 * 목적:
 * - 스크래핑 실패 원인 세분화
 * - 레코드 error_type 필드 / 로깅 태그
 * - 재시도 가능 여부 결정
 */

/**
 * 스크래핑 에러 타입
 */
export enum ScrapeErrorType {
  /** 식별자 검색 결과 없음 */
  NOT_FOUND = "NOT_FOUND",

  /** 로그인 페이지로 리다이렉트됨 */
  AUTH_REQUIRED = "AUTH_REQUIRED",

  /** 네비게이션/평가 타임아웃 */
  TIMEOUT = "TIMEOUT",

  /** HTTP 4xx/5xx 또는 전송 실패 */
  NAVIGATION_FAILED = "NAVIGATION_FAILED",

  /** 페이지 파싱 중 예외 */
  EXTRACTION_FAILED = "EXTRACTION_FAILED",
}

/**
 * Scrape Error 클래스
 */
export class ScrapeError extends Error {
  public readonly type: ScrapeErrorType;
  public readonly retryable: boolean;

  constructor(
    type: ScrapeErrorType,
    message: string,
    options?: {
      cause?: unknown;
    },
  ) {
    super(message, { cause: options?.cause });
    this.name = "ScrapeError";
    this.type = type;
    this.retryable = ScrapeError.isRetryable(type);
  }

  /**
   * 재시도 가능 여부 판단 (Helper)
   */
  static isRetryable(type: ScrapeErrorType): boolean {
    switch (type) {
      case ScrapeErrorType.TIMEOUT:
      case ScrapeErrorType.NAVIGATION_FAILED:
        return true;

      default:
        return false;
    }
  }
}

/**
 * Playwright 타임아웃 여부
 * playwright-core 의 TimeoutError 는 name === "TimeoutError"
 */
export function isTimeoutError(error: unknown): boolean {
  return error instanceof Error && error.name === "TimeoutError";
}

/**
 * 임의 에러 → 에러 타입 분류
 */
export function classifyError(error: unknown): ScrapeErrorType {
  if (error instanceof ScrapeError) {
    return error.type;
  }
  if (isTimeoutError(error)) {
    return ScrapeErrorType.TIMEOUT;
  }
  if (error instanceof Error && /net::ERR_|ECONNREFUSED|ENOTFOUND/.test(error.message)) {
    return ScrapeErrorType.NAVIGATION_FAILED;
  }
  return ScrapeErrorType.EXTRACTION_FAILED;
}

/**
 * 임의 에러 → 메시지 문자열
 */
export function toErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
