/**
 * 링크 href → 앱 숫자 식별자
 *
 * 스토어프론트 검색 결과와 대시보드 카테고리 페이지가 함께 사용
 */

/** 스토어프론트 상세 링크: ".../app/{slug}/id123" 또는 ".../id/123" */
export const STOREFRONT_ID_PATTERNS: readonly RegExp[] = [/\/id(\d+)/, /\/id\/(\d+)/];

/** 대시보드 앱 링크: ".../app/{slug}/123" 또는 ".../overview/123" */
export const DASHBOARD_ID_PATTERNS: readonly RegExp[] = [
  /\/app\/[^/?#]+\/(\d+)(?:[/?#]|$)/,
  /\/app\/(\d+)(?:[/?#]|$)/,
  /\/overview\/(\d+)/,
];

export function appIdFromHref(href: string, patterns: readonly RegExp[]): string | null {
  for (const pattern of patterns) {
    const match = href.match(pattern);
    if (match?.[1]) {
      return match[1];
    }
  }
  return null;
}

/**
 * 링크 순서대로 중복 없는 식별자를 최대 limit 개 수집
 */
export function collectAppIds(
  hrefs: readonly string[],
  patterns: readonly RegExp[],
  limit: number,
): string[] {
  const ids: string[] = [];
  for (const href of hrefs) {
    if (ids.length >= limit) {
      break;
    }
    const appId = appIdFromHref(href, patterns);
    if (appId && !ids.includes(appId)) {
      ids.push(appId);
    }
  }
  return ids;
}
