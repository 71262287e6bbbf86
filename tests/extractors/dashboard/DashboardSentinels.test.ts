/**
 * DashboardSentinels Test
 *
 * 목적: 페이지 라벨/브랜딩 문구가 값으로 잡히는 경우 제거 검증
 */

import { describe, it, expect } from "@jest/globals";
import { DashboardSentinels } from "@/extractors/dashboard/DashboardSentinels";

describe("DashboardSentinels", () => {
  const sentinels = new DashboardSentinels(["acme analytics", "sign up"]);

  describe("isAcceptableName()", () => {
    it("일반 앱 이름은 허용해야 함", () => {
      expect(sentinels.isAcceptableName("Notes Pro")).toBe(true);
    });

    it("브랜딩 문구(대소문자 무시)가 포함되면 거부해야 함", () => {
      expect(sentinels.isAcceptableName("Acme Analytics Dashboard")).toBe(false);
      expect(sentinels.isAcceptableName("SIGN UP FREE")).toBe(false);
    });

    it("빈 값과 200자 이상 값은 거부해야 함", () => {
      expect(sentinels.isAcceptableName("   ")).toBe(false);
      expect(sentinels.isAcceptableName("a".repeat(200))).toBe(false);
      expect(sentinels.isAcceptableName("a".repeat(199))).toBe(true);
    });
  });

  describe("isAcceptableDeveloper()", () => {
    it("'Website' 와 정확히 같으면 거부해야 함", () => {
      expect(sentinels.isAcceptableDeveloper("Website")).toBe(false);
      expect(sentinels.isAcceptableDeveloper(" website ")).toBe(false);
    });

    it("'country' 를 포함하면 거부해야 함", () => {
      expect(sentinels.isAcceptableDeveloper("Publisher Country")).toBe(false);
    });

    it("브랜딩 문구를 포함하면 거부해야 함", () => {
      expect(sentinels.isAcceptableDeveloper("Sign up today")).toBe(false);
    });

    it("개발사 이름은 허용해야 함 ('Website' 를 포함만 하는 경우 포함)", () => {
      expect(sentinels.isAcceptableDeveloper("Example Labs")).toBe(true);
      expect(sentinels.isAcceptableDeveloper("Website Builders Inc")).toBe(true);
    });
  });

  describe("isAcceptableTopCountries()", () => {
    it("'/ Regions' 라벨 잔여물은 거부해야 함", () => {
      expect(sentinels.isAcceptableTopCountries("Top Countries / Regions")).toBe(false);
    });

    it("문자가 없는 값은 거부해야 함", () => {
      expect(sentinels.isAcceptableTopCountries("/")).toBe(false);
      expect(sentinels.isAcceptableTopCountries("12, 34")).toBe(false);
    });

    it("국가 목록은 허용해야 함", () => {
      expect(sentinels.isAcceptableTopCountries("United States, Japan")).toBe(true);
    });
  });

  it("clean()은 sentinel 값만 제거한 새 객체를 반환해야 함", () => {
    const fields = {
      app_name: "Notes Pro",
      developer_name: "Website",
      top_countries: "United States",
    };

    const cleaned = sentinels.clean(fields);

    expect(cleaned).toEqual({ app_name: "Notes Pro", top_countries: "United States" });
    expect(fields.developer_name).toBe("Website");
  });

  it("clean()은 거부된 상위 국가도 제거해야 함", () => {
    expect(sentinels.clean({ developer_name: "Example Labs", top_countries: "/ Regions" })).toEqual({
      developer_name: "Example Labs",
    });
  });
});
