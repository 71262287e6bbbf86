/**
 * StorefrontInAppPurchaseExtractor
 *
 * "In-App Purchases" 섹션 라인 파싱 → 실패 시 가격이 포함된 짧은 요소 텍스트
 * (title, price) 중복 제거, 최대 20개
 */

import type { ISnapshotExtractor } from "@/extractors/base/ISnapshotExtractor";
import type { PageSnapshot } from "@/extractors/base/PageSnapshot";
import type { StorefrontPurchase } from "@/core/domain/StorefrontRecord";
import { DEFAULT_IAP_TITLE, EXTRACTION_LIMITS } from "@/config/constants";

const PRICE_PATTERN = /\$([\d,]+(?:\.\d{2})?)/;
const PRICE_AND_REST = /\$[\d,]+(?:\.\d{2})?.*$/;

/** 일반 하이픈 + non-breaking hyphen(U+2011) */
const SECTION_MARKERS = ["in-app purchase", "in‑app purchase"];
const SECTION_TERMINATORS = ["information", "supports", "privacy"];

export class StorefrontInAppPurchaseExtractor
  implements ISnapshotExtractor<StorefrontPurchase[]>
{
  async extract(snapshot: PageSnapshot): Promise<StorefrontPurchase[]> {
    const fromSection = this.parseSection(await snapshot.bodyText());
    const items =
      fromSection.length > 0
        ? fromSection
        : this.parseElementTexts(await snapshot.shortElementTexts());

    return this.dedupe(items).slice(0, EXTRACTION_LIMITS.MAX_IN_APP_PURCHASES);
  }

  /**
   * 섹션 라인 파싱
   * 가격 앞 텍스트가 제목 (비어 있거나 너무 길면 기본 제목)
   */
  parseSection(bodyText: string): StorefrontPurchase[] {
    const lower = bodyText.toLowerCase();
    const start = SECTION_MARKERS.map((marker) => lower.indexOf(marker)).find(
      (index) => index !== -1,
    );
    if (start === undefined) {
      return [];
    }

    const section = bodyText.substring(
      start,
      start + EXTRACTION_LIMITS.IAP_SECTION_WINDOW,
    );
    const items: StorefrontPurchase[] = [];
    let inSection = false;

    for (const rawLine of section.split("\n")) {
      const line = rawLine.trim();
      const lowerLine = line.toLowerCase();

      if (SECTION_MARKERS.some((marker) => lowerLine.includes(marker))) {
        inSection = true;
        continue;
      }
      if (!inSection || !line) {
        continue;
      }
      if (SECTION_TERMINATORS.some((word) => lowerLine.includes(word))) {
        break;
      }

      const priceMatch = line.match(PRICE_PATTERN);
      if (!priceMatch) {
        continue;
      }

      const title = line.replace(PRICE_AND_REST, "").trim();
      items.push({
        title:
          title && title.length < EXTRACTION_LIMITS.MAX_IAP_TITLE_LENGTH
            ? title
            : DEFAULT_IAP_TITLE,
        price: `$${priceMatch[1]}`,
      });
    }

    return items;
  }

  /**
   * 구조 기반 fallback: 가격 + "subscription"/"purchase" 포함 요소
   */
  parseElementTexts(texts: string[]): StorefrontPurchase[] {
    const items: StorefrontPurchase[] = [];
    for (const text of texts) {
      const lower = text.toLowerCase();
      const priceMatch = text.match(PRICE_PATTERN);
      if (
        !priceMatch ||
        !(lower.includes("subscription") || lower.includes("purchase"))
      ) {
        continue;
      }
      const title = text.replace(PRICE_AND_REST, "").trim();
      if (title && title.length < EXTRACTION_LIMITS.MAX_IAP_TITLE_LENGTH) {
        items.push({ title, price: `$${priceMatch[1]}` });
      }
    }
    return items;
  }

  private dedupe(items: StorefrontPurchase[]): StorefrontPurchase[] {
    const seen = new Set<string>();
    return items.filter((item) => {
      const key = `${item.title}|${item.price}`;
      if (seen.has(key)) {
        return false;
      }
      seen.add(key);
      return true;
    });
  }
}
