/**
 * AppRecord 도메인 모델
 *
 * 한 번의 스크래핑 결과 (대시보드 + 스토어프론트 보강)
 * - 모든 필드 선택적: undefined(미발견)와 빈 문자열은 구분
 * - 식별자: (app_id, app_name) 쌍
 * - *_numeric 필드는 저장 직전 텍스트 필드로부터 항상 재계산
 */

import { z } from "zod";
import { ScrapeErrorType } from "@/core/interfaces/ScrapeErrorType";

/**
 * 인앱 구매 항목
 */
export interface InAppPurchase {
  title: string;
  duration?: string;
  price: string;
}

/**
 * 앱 레코드
 */
export interface AppRecord {
  app_name?: string;
  app_id?: string;
  categories?: string;
  price?: string;
  top_countries?: string;
  advertised_status?: string;
  support_url?: string;
  developer_website?: string;
  developer_name?: string;
  content_rating?: string;
  downloads_worldwide?: string;
  revenue_worldwide?: string;
  last_updated?: string;
  publisher_country?: string;
  category_ranking?: string;
  in_app_purchases: InAppPurchase[];
  average_rating?: string;
  rating_count?: string;
  release_date?: string;
  version?: string;

  downloads_numeric?: number;
  revenue_numeric?: number;
  rating_count_numeric?: number;
  average_rating_numeric?: number;

  scraped_at?: string;

  /** 주 소스 실패 메시지 (부분 결과일 수 있음) */
  error?: string;
  error_type?: ScrapeErrorType;
}

/**
 * 텍스트 필드 키 (매퍼/병합 로직에서 순회용)
 */
export const APP_RECORD_TEXT_FIELDS = [
  "app_name",
  "app_id",
  "categories",
  "price",
  "top_countries",
  "advertised_status",
  "support_url",
  "developer_website",
  "developer_name",
  "content_rating",
  "downloads_worldwide",
  "revenue_worldwide",
  "last_updated",
  "publisher_country",
  "category_ranking",
  "average_rating",
  "rating_count",
  "release_date",
  "version",
] as const;

export type AppRecordTextField = (typeof APP_RECORD_TEXT_FIELDS)[number];

/**
 * 빈 레코드 생성
 */
export function createEmptyAppRecord(
  init: Partial<AppRecord> = {},
): AppRecord {
  return { in_app_purchases: [], ...init };
}

/**
 * 빈 문자열을 null로 변환하는 전처리기
 * DB에서 빈 문자열("")로 저장된 값을 null로 정규화
 */
const emptyToNull = <T extends z.ZodTypeAny>(schema: T) =>
  z.preprocess((val) => (val === "" ? null : val), schema);

const optionalText = () => emptyToNull(z.string().nullable().optional());

/**
 * apps 테이블 row 스키마
 *
 * in_app_purchases: JSON 직렬화 문자열 (없으면 null)
 */
export const AppRowSchema = z.object({
  app_name: optionalText(),
  app_id: optionalText(),
  categories: optionalText(),
  price: optionalText(),
  top_countries: optionalText(),
  advertised_status: optionalText(),
  support_url: optionalText(),
  developer_website: optionalText(),
  developer_name: optionalText(),
  content_rating: optionalText(),
  downloads_worldwide: optionalText(),
  revenue_worldwide: optionalText(),
  last_updated: optionalText(),
  publisher_country: optionalText(),
  category_ranking: optionalText(),
  in_app_purchases: optionalText(),
  average_rating: optionalText(),
  rating_count: optionalText(),
  release_date: optionalText(),
  version: optionalText(),
  downloads_numeric: z.coerce.number().nullable().optional(),
  revenue_numeric: z.coerce.number().nullable().optional(),
  rating_count_numeric: z.coerce.number().nullable().optional(),
  average_rating_numeric: z.coerce.number().nullable().optional(),
  scraped_at: optionalText(),
});

export type AppRow = z.infer<typeof AppRowSchema>;

/**
 * 직렬화된 인앱 구매 목록 스키마
 */
export const InAppPurchaseListSchema = z.array(
  z.object({
    title: z.string(),
    duration: z.string().optional(),
    price: z.string(),
  }),
);
