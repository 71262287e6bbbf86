/**
 * IRenderedPage Interface
 *
 * 렌더링이 끝난 페이지에 대한 읽기 전용 접근
 * 추출기는 Playwright Page 대신 이 인터페이스에 의존 (테스트에서는 jsdom 구현)
 */

/**
 * DOM 요소 스냅샷 (직렬화 가능)
 */
export interface ElementSnapshot {
  /** textContent (trim) */
  text: string;
  /** 속성 맵 */
  attributes: Record<string, string>;
}

export interface IRenderedPage {
  /** 현재 URL (리다이렉트 반영) */
  currentUrl(): string;

  /** document.title */
  title(): Promise<string>;

  /**
   * selector 첫 요소의 렌더링 텍스트
   * 요소가 없으면 null
   */
  getText(selector?: string): Promise<string | null>;

  /** 전체 HTML */
  getHtml(): Promise<string>;

  /**
   * 브라우저 컨텍스트에서 스크립트 실행
   * 스크립트는 직렬화되므로 클로저 변수 사용 불가
   */
  evaluateScript<T>(script: () => T): Promise<T>;

  querySelector(selector: string): Promise<ElementSnapshot | null>;

  querySelectorAll(selector: string): Promise<ElementSnapshot[]>;
}
