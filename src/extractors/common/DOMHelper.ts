/**
 * DOMHelper Utility
 *
 * 목적: IRenderedPage DOM 안전 접근 유틸리티
 * 패턴: Utility Class (Static Methods)
 */

import type { IRenderedPage } from "@/core/interfaces/IRenderedPage";
import { isTimeoutError } from "@/core/interfaces/ScrapeErrorType";

/**
 * DOM 헬퍼 유틸리티
 *
 * - 요소 없음/에러 시 기본값 반환
 * - 타임아웃은 호출자에게 전파
 */
export class DOMHelper {
  /**
   * 안전한 텍스트 추출
   *
   * @param defaultValue 요소가 없거나 비어 있을 때 값 (기본: 빈 문자열)
   */
  static async safeText(
    page: IRenderedPage,
    selector: string,
    defaultValue: string = "",
  ): Promise<string> {
    try {
      const element = await page.querySelector(selector);
      return element?.text.trim() || defaultValue;
    } catch (error) {
      if (isTimeoutError(error)) throw error;
      return defaultValue;
    }
  }

  /**
   * 안전한 속성 추출
   */
  static async safeAttribute(
    page: IRenderedPage,
    selector: string,
    attribute: string,
    defaultValue: string = "",
  ): Promise<string> {
    try {
      const element = await page.querySelector(selector);
      return element?.attributes[attribute] || defaultValue;
    } catch (error) {
      if (isTimeoutError(error)) throw error;
      return defaultValue;
    }
  }

  /**
   * selector 들 중 처음으로 비어 있지 않은 텍스트
   */
  static async firstText(
    page: IRenderedPage,
    selectors: readonly string[],
    accept: (text: string) => boolean = () => true,
  ): Promise<string | undefined> {
    for (const selector of selectors) {
      const text = await this.safeText(page, selector);
      if (text && accept(text)) {
        return text;
      }
    }
    return undefined;
  }

  /**
   * 첫 번째 링크 href (상대 경로 → baseUrl 기준 절대 경로)
   */
  static async firstHref(
    page: IRenderedPage,
    selector: string,
    baseUrl: string,
  ): Promise<string | undefined> {
    const href = await this.safeAttribute(page, selector, "href");
    return href ? this.toAbsoluteUrl(href, baseUrl) : undefined;
  }

  static toAbsoluteUrl(href: string, baseUrl: string): string {
    if (/^https?:\/\//i.test(href)) {
      return href;
    }
    return `${baseUrl.replace(/\/+$/, "")}/${href.replace(/^\/+/, "")}`;
  }
}
