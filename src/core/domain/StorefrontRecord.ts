/**
 * StorefrontRecord 도메인 모델
 *
 * 스토어프론트 상세 페이지 추출 결과
 * 오케스트레이터는 이 중 평점/평점 수/출시일만 AppRecord로 병합
 */

import type { ScrapeErrorType } from "@/core/interfaces/ScrapeErrorType";

/**
 * 스토어프론트 인앱 구매 항목 (기간 정보 없음)
 */
export interface StorefrontPurchase {
  title: string;
  price: string;
}

export interface StorefrontRecord {
  app_name?: string;
  app_id?: string;
  rating_count?: string;
  average_rating?: string;
  age_rating?: string;
  category?: string;
  developer_name?: string;
  languages?: string;
  app_size?: string;
  price?: string;
  in_app_purchases: StorefrontPurchase[];
  description?: string;
  release_date?: string;
  version?: string;
  compatibility?: string;
  copyright?: string;
  support_url?: string;
  developer_website?: string;
  error?: string;
  error_type?: ScrapeErrorType;
}

/**
 * 추출 대상: 숫자 식별자 또는 상세 페이지 URL
 */
export type StorefrontTarget = { appId: string } | { url: string };
