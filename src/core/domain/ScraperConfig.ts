/**
 * ScraperConfig 도메인 모델
 *
 * YAML 소스 설정(sources/*.yaml) + 실행 옵션을 합친 값 객체
 * 스크래퍼 컴포넌트는 전역 상수 대신 이 객체를 주입받음
 */

import { z } from "zod";

const TimeoutMs = z.number().int().positive();

/**
 * 스토어프론트 설정 스키마
 */
export const StorefrontSourceSchema = z.object({
  source: z.literal("storefront"),
  baseUrl: z.string().url(),
  locale: z.string().min(1),
  searchPath: z.string().startsWith("/"),
  timeouts: z.object({
    navigationMs: TimeoutMs,
    bodyVisibleMs: TimeoutMs,
    selectorMs: TimeoutMs,
    settleBeforeMs: z.number().int().nonnegative(),
    settleAfterMs: z.number().int().nonnegative(),
    searchSettleMs: z.number().int().nonnegative(),
  }),
  searchResultSelectors: z.array(z.string().min(1)).min(1),
  descriptionSelectors: z.array(z.string().min(1)),
  descriptionExcludedKeywords: z.array(z.string()),
});

/**
 * 대시보드 설정 스키마
 */
export const DashboardSourceSchema = z.object({
  source: z.literal("dashboard"),
  appBaseUrl: z.string().url(),
  country: z.string().min(2),
  overviewPath: z.string().includes("{id}"),
  apiPath: z.string().includes("{id}"),
  categoryPath: z.string().includes("{category}"),
  timeouts: z.object({
    navigationMs: TimeoutMs,
    networkIdleMs: TimeoutMs,
    apiMs: TimeoutMs,
    evaluationMs: TimeoutMs,
  }),
  contentWait: z.object({
    rootSelector: z.string().min(1),
    minTextLength: z.number().int().nonnegative(),
    maxPolls: z.number().int().positive(),
    pollIntervalMs: z.number().int().nonnegative(),
  }),
  authUrlMarkers: z.array(z.string().min(1)).min(1),
  brandingKeywords: z.array(z.string().min(1)),
  nameSelectors: z.array(z.string().min(1)),
  pageNameSelectors: z.array(z.string().min(1)),
  categorySelectors: z.array(z.string().min(1)),
  commonCategories: z.array(z.string().min(1)),
  knownCountries: z.array(z.string().min(1)),
  categoryLinkSelectors: z.array(z.string().min(1)).min(1),
});

export type StorefrontSourceConfig = z.infer<typeof StorefrontSourceSchema>;
export type DashboardSourceConfig = z.infer<typeof DashboardSourceSchema>;
export type ContentWaitHeuristics = DashboardSourceConfig["contentWait"];

/**
 * 스크래퍼 전체 설정
 */
export interface ScraperConfig {
  /** headless 모드 여부 */
  headless: boolean;
  /** 배치/백필 요청 간 최소 간격 (ms) */
  interRequestDelayMs: number;
  storefront: StorefrontSourceConfig;
  dashboard: DashboardSourceConfig;
}

/**
 * 실행 시 덮어쓸 수 있는 설정
 */
export type ScraperConfigOverrides = Partial<
  Pick<ScraperConfig, "headless" | "interRequestDelayMs">
>;
