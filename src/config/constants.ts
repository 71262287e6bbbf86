/**
 * 애플리케이션 설정 상수
 *
 * 환경변수 기반 설정 관리
 * - 환경변수가 없으면 기본값 사용
 * - 소스별 URL/대기 설정은 sources/*.yaml (ConfigLoader) 담당
 */

/**
 * 데이터베이스 설정
 */
export const DATABASE_CONFIG = {
  /**
   * 앱 레코드 테이블명
   * 환경변수: APPS_TABLE_NAME
   * 기본값: "apps"
   */
  APPS_TABLE_NAME: process.env.APPS_TABLE_NAME || "apps",

  /**
   * upsert 충돌 키 (앱 식별자 쌍)
   */
  CONFLICT_COLUMNS: "app_id,app_name",

  /**
   * listAll 페이지 크기 (PostgREST 1000 row 제한 우회)
   */
  PAGINATION_PAGE_SIZE: 1000,
} as const;

/**
 * 스크래퍼 공통 설정
 */
export const SCRAPER_CONFIG = {
  /**
   * 기본 User-Agent (데스크톱 Chrome)
   */
  DEFAULT_USER_AGENT:
    process.env.SCRAPER_USER_AGENT ||
    "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36",

  DEFAULT_VIEWPORT: { width: 1920, height: 1080 },

  DEFAULT_LOCALE: "en-US",

  DEFAULT_TIMEZONE: "America/New_York",

  /**
   * 기본 요청 헤더
   */
  EXTRA_HTTP_HEADERS: {
    "Accept-Language": "en-US,en;q=0.9",
    Accept:
      "text/html,application/xhtml+xml,application/xml;q=0.9,image/webp,*/*;q=0.8",
  },
} as const;

/**
 * 추출 결과 제한값
 */
export const EXTRACTION_LIMITS = {
  /** 인앱 구매 항목 최대 개수 */
  MAX_IN_APP_PURCHASES: 20,

  /** 인앱 구매 제목 최대 길이 (초과 시 기본 제목 사용) */
  MAX_IAP_TITLE_LENGTH: 200,

  /** 앱 이름 후보 최대 길이 */
  MAX_APP_NAME_LENGTH: 200,

  /** 설명 최대 길이 (초과 시 "..." 추가) */
  MAX_DESCRIPTION_LENGTH: 500,

  /** 인앱 구매 섹션 스캔 범위 (문자 수) */
  IAP_SECTION_WINDOW: 5000,

  /** "Top Countries" 라벨 이후 국가명 탐색 범위 */
  TOP_COUNTRIES_WINDOW: 500,

  /** "publisher" 주변 국가명 탐색 범위 */
  PUBLISHER_COUNTRY_WINDOW: 200,
} as const;

/**
 * 기본 인앱 구매 제목 (제목을 찾지 못한 경우)
 */
export const DEFAULT_IAP_TITLE = "In-App Purchase";
