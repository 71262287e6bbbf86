/**
 * NumericNormalizer Utility
 *
 * 목적: 크기 표기 텍스트("8.2K", "< $5k", "1,234") → 숫자 변환
 * 패턴: Utility Class (Static Methods)
 */

const MULTIPLIERS: Record<string, number> = {
  K: 1e3,
  M: 1e6,
  B: 1e9,
};

const EMPTY_MARKERS = new Set(["", "n/a", "none"]);

/** "< 5k", "< $5k", "<5K", "< 5" */
const LESS_THAN_FIVE_PATTERN = /^<\s*\$?\s*5\s*k?$/i;

const MAGNITUDE_PATTERN = /^(\d+(?:\.\d+)?)\s*([KMB])?$/i;

/** 대시보드 다운로드 "5k" 표기 (비교 기호 없음) */
const DOWNLOADS_FLOOR_PATTERN = /^5k$/i;

/**
 * 숫자 정규화 유틸리티
 *
 * 예외를 던지지 않으며, 해석 불가 입력은 undefined
 */
export class NumericNormalizer {
  /**
   * 텍스트 → 숫자
   *
   * "8.2K" → 8200, "13M" → 13000000, "$1,234" → 1234
   * "< 5k" / "< $5k" → 0
   * "", "N/A", null → undefined
   */
  static normalize(text: string | null | undefined): number | undefined {
    if (text === null || text === undefined) {
      return undefined;
    }

    const trimmed = text.trim();
    if (EMPTY_MARKERS.has(trimmed.toLowerCase())) {
      return undefined;
    }

    // 5천 미만 표기는 0으로 간주
    if (LESS_THAN_FIVE_PATTERN.test(trimmed)) {
      return 0;
    }

    const cleaned = trimmed.replace(/^[<>=$\s]+/, "").replace(/,/g, "");
    const match = cleaned.match(MAGNITUDE_PATTERN);
    if (!match) {
      return undefined;
    }

    const base = Number.parseFloat(match[1]);
    const multiplier = match[2] ? MULTIPLIERS[match[2].toUpperCase()] : 1;

    // 부동소수 오차 제거 (8.2 * 1000 = 8199.999…)
    return Number((base * multiplier).toFixed(6));
  }

  /**
   * 대시보드 다운로드 수 전용 변환
   * "5k" 단독 표기는 0 (그 외는 normalize 와 동일)
   */
  static normalizeDownloads(text: string | null | undefined): number | undefined {
    if (text && DOWNLOADS_FLOOR_PATTERN.test(text.trim())) {
      return 0;
    }
    return this.normalize(text);
  }

  /**
   * 평점 수 (정수)
   */
  static normalizeCount(text: string | null | undefined): number | undefined {
    const value = this.normalize(text);
    return value === undefined ? undefined : Math.round(value);
  }
}
