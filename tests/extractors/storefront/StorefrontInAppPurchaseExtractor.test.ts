/**
 * StorefrontInAppPurchaseExtractor Test
 *
 * 목적: "In-App Purchases" 섹션 파싱, 구조 기반 fallback, 중복 제거 검증
 */

import { describe, it, expect } from "@jest/globals";
import { StorefrontInAppPurchaseExtractor } from "@/extractors/storefront/StorefrontInAppPurchaseExtractor";
import { PageSnapshot } from "@/extractors/base/PageSnapshot";
import { FixturePage } from "../../fakes/FixturePage";

describe("StorefrontInAppPurchaseExtractor", () => {
  const extractor = new StorefrontInAppPurchaseExtractor();

  describe("parseSection()", () => {
    it("섹션 라인의 가격 앞 텍스트를 제목으로 읽어야 함", () => {
      const body = [
        "Information",
        "In-App Purchases",
        "Pro Monthly $4.99",
        "Pro Yearly $39.99",
        "Privacy Policy",
        "Other $1.00",
      ].join("\n");

      expect(extractor.parseSection(body)).toEqual([
        { title: "Pro Monthly", price: "$4.99" },
        { title: "Pro Yearly", price: "$39.99" },
      ]);
    });

    it("제목이 없으면 기본 제목을 사용해야 함", () => {
      const body = "In-App Purchases\n$9.99\n";

      expect(extractor.parseSection(body)).toEqual([
        { title: "In-App Purchase", price: "$9.99" },
      ]);
    });

    it("non-breaking hyphen 표기도 섹션으로 인식해야 함", () => {
      const body = "In‑App Purchases\nCoins $0.99";

      expect(extractor.parseSection(body)).toEqual([
        { title: "Coins", price: "$0.99" },
      ]);
    });

    it("섹션이 없으면 빈 목록이어야 함", () => {
      expect(extractor.parseSection("Ratings and Reviews\nPro $4.99")).toEqual([]);
    });
  });

  describe("parseElementTexts()", () => {
    it("가격과 subscription / purchase 를 포함한 텍스트만 사용해야 함", () => {
      expect(
        extractor.parseElementTexts([
          "Premium Subscription $2.99",
          "Download $1.00",
          "Coin Purchase $0.99",
        ]),
      ).toEqual([
        { title: "Premium Subscription", price: "$2.99" },
        { title: "Coin Purchase", price: "$0.99" },
      ]);
    });
  });

  describe("extract()", () => {
    it("같은 (title, price) 항목은 한 번만 반환해야 함", async () => {
      const page = new FixturePage(`<html><body>
<h2>In-App Purchases</h2>
<p>Pro Monthly $4.99</p>
<p>Pro Monthly $4.99</p>
<p>Pro Yearly $39.99</p>
<h2>Privacy</h2>
</body></html>`);

      const result = await extractor.extract(new PageSnapshot(page));

      expect(result).toEqual([
        { title: "Pro Monthly", price: "$4.99" },
        { title: "Pro Yearly", price: "$39.99" },
      ]);
    });

    it("섹션이 없으면 짧은 요소 텍스트에서 찾아야 함", async () => {
      const page = new FixturePage(`<html><body>
<ul><li>Premium Subscription $2.99</li><li>Support</li></ul>
</body></html>`);

      const result = await extractor.extract(new PageSnapshot(page));

      expect(result).toEqual([{ title: "Premium Subscription", price: "$2.99" }]);
    });
  });
});
