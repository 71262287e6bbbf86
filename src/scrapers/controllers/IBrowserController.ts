/**
 * Browser Controller Interface
 *
 * 브라우저 생명주기 및 네비게이션 관리 인터페이스
 *
 * SOLID 원칙:
 * - SRP: 브라우저 제어만 담당 (추출/파싱 X)
 * - ISP: 추출기에 필요한 최소 작업만 노출
 * - DIP: 추출기/검색기는 이 인터페이스에 의존
 */

import type { ContentWaitHeuristics } from "@/core/domain/ScraperConfig";
import type { IRenderedPage } from "@/core/interfaces/IRenderedPage";

/**
 * 브라우저 초기화 옵션
 */
export interface BrowserInitOptions {
  headless: boolean;
  /** 페이지 기본 타임아웃 (evaluate/selector 등) */
  defaultTimeoutMs?: number;
}

export type WaitUntil = "load" | "domcontentloaded" | "networkidle" | "commit";

export interface NavigateOptions {
  waitUntil: WaitUntil;
  timeoutMs: number;
}

/**
 * 네비게이션 결과
 */
export interface NavigationResult {
  /** HTTP 상태 (응답 없음 → null) */
  status: number | null;
  /** 최종 URL (리다이렉트 반영) */
  finalUrl: string;
  /** 페이지 타이틀 */
  pageTitle: string;
}

export interface IBrowserController {
  /**
   * 브라우저/컨텍스트/페이지 생성
   */
  initialize(options: BrowserInitOptions): Promise<void>;

  /**
   * 페이지 이동
   * 타임아웃/전송 실패는 예외
   */
  navigate(url: string, options: NavigateOptions): Promise<NavigationResult>;

  /** 고정 대기 */
  wait(ms: number): Promise<void>;

  /**
   * selector 대기
   * @returns 시간 내 나타났는지 여부 (타임아웃은 false)
   */
  waitForSelector(
    selector: string,
    options: { timeoutMs: number; state?: "attached" | "visible" },
  ): Promise<boolean>;

  /**
   * 콘텐츠 렌더링 대기
   * network idle → 루트 요소 텍스트 길이 폴링
   * @returns 최소 텍스트 길이 도달 여부
   */
  waitForContent(
    heuristics: ContentWaitHeuristics,
    networkIdleMs: number,
  ): Promise<boolean>;

  /**
   * 브라우저 컨텍스트(쿠키 공유)로 JSON GET
   * 200 이 아니거나 실패 시 null
   */
  requestJson(url: string, timeoutMs: number): Promise<unknown | null>;

  /**
   * 현재 페이지의 읽기 전용 뷰
   */
  getRenderedPage(): IRenderedPage;

  /**
   * 리소스 정리
   */
  cleanup(): Promise<void>;

  isInitialized(): boolean;
}

export type BrowserControllerFactory = () => IBrowserController;
