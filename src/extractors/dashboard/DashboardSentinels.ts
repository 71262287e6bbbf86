/**
 * 대시보드 값 검증 (sentinel 값 제거)
 *
 * 페이지 라벨/브랜딩 문구가 값으로 잡히는 경우를 걸러냄
 * - 개발자: "Website"(정확히 일치), "country" 포함, 브랜딩 문구 포함
 * - 상위 국가: "/ Regions" 포함, 문자가 없는 값
 * - 앱 이름: 200자 이상, 브랜딩 문구 포함
 */

import { EXTRACTION_LIMITS } from "@/config/constants";
import type { DashboardFields } from "./DashboardFields";

export class DashboardSentinels {
  constructor(private readonly brandingKeywords: readonly string[]) {}

  containsBranding(value: string): boolean {
    const lower = value.toLowerCase();
    return this.brandingKeywords.some((keyword) => lower.includes(keyword.toLowerCase()));
  }

  isAcceptableName = (value: string): boolean => {
    const trimmed = value.trim();
    return (
      trimmed.length > 0 &&
      trimmed.length < EXTRACTION_LIMITS.MAX_APP_NAME_LENGTH &&
      !this.containsBranding(trimmed)
    );
  };

  isAcceptableDeveloper = (value: string): boolean => {
    const lower = value.trim().toLowerCase();
    return (
      lower.length > 0 &&
      lower.length < 200 &&
      lower !== "website" &&
      !lower.includes("country") &&
      !this.containsBranding(lower)
    );
  };

  isAcceptableTopCountries = (value: string): boolean => {
    return (
      !value.toLowerCase().includes("/ regions") &&
      /[a-z]/i.test(value) &&
      value.length < 200
    );
  };

  /**
   * 부분 결과에서 sentinel 값 제거 (새 객체 반환)
   */
  clean(fields: DashboardFields): DashboardFields {
    const cleaned: DashboardFields = { ...fields };
    if (cleaned.developer_name !== undefined && !this.isAcceptableDeveloper(cleaned.developer_name)) {
      delete cleaned.developer_name;
    }
    if (cleaned.top_countries !== undefined && !this.isAcceptableTopCountries(cleaned.top_countries)) {
      delete cleaned.top_countries;
    }
    return cleaned;
  }
}
