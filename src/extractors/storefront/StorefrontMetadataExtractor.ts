/**
 * StorefrontMetadataExtractor
 *
 * 스토어프론트 상세 페이지의 평점/IAP 외 메타데이터
 * - 대부분 본문 텍스트의 "라벨 + 값" 라인 정규식
 * - 이름/설명/출시일은 캐스케이드
 */

import type { Logger } from "@/config/logger";
import type { StorefrontSourceConfig } from "@/core/domain/ScraperConfig";
import type { StorefrontRecord } from "@/core/domain/StorefrontRecord";
import type { ISnapshotExtractor } from "@/extractors/base/ISnapshotExtractor";
import type { PageSnapshot } from "@/extractors/base/PageSnapshot";
import {
  FieldStrategy,
  firstGroup,
  runCascade,
  strategy,
} from "@/extractors/base/FieldStrategy";
import { DOMHelper } from "@/extractors/common/DOMHelper";
import { EXTRACTION_LIMITS } from "@/config/constants";

export type StorefrontMetadata = Omit<
  StorefrontRecord,
  | "in_app_purchases"
  | "average_rating"
  | "rating_count"
  | "error"
  | "error_type"
>;

const LABEL_PATTERNS = {
  category: /Category\s+([^\n\r]+)/i,
  developer_name: /Developer\s+([^\n\r]+)/i,
  languages: /Languages?[\s:]+([^\n\r]+?)(?:\n|Information|Supports|$)/i,
  app_size: /Size\s+([^\n\r]+)/i,
  compatibility: /Requires\s+([^\n\r]+)/i,
  copyright: /©\s+([^\n\r]+)/,
  version: /Version[\s:]+([\d.]+)/i,
} as const;

const LONG_DATE = "([A-Za-z]+\\s+\\d{1,2},?\\s+\\d{4})";
const NUMERIC_DATE = "(\\d{1,2}[/-]\\d{1,2}[/-]\\d{4})";

const RELEASE_PATTERNS = [
  new RegExp(`Released[\\s:]+${LONG_DATE}`, "i"),
  new RegExp(`Release\\s+Date[\\s:]+${LONG_DATE}`, "i"),
  new RegExp(`First\\s+Available[\\s:]+${LONG_DATE}`, "i"),
  new RegExp(`Released[\\s:]+${NUMERIC_DATE}`, "i"),
];

const RELEASE_FALLBACK_PATTERNS = [
  new RegExp(`(?:First\\s+)?Released[:\\s]+${NUMERIC_DATE}`, "i"),
  new RegExp(`(?:First\\s+)?Released[:\\s]+${LONG_DATE}`, "i"),
];

const META_DATE_PATTERN =
  /(\d{4}[/-]\d{1,2}[/-]\d{1,2}|[A-Za-z]+\s+\d{1,2},?\s+\d{4})/;

export class StorefrontMetadataExtractor
  implements ISnapshotExtractor<StorefrontMetadata>
{
  private readonly nameStrategies: FieldStrategy<string>[];
  private readonly descriptionStrategies: FieldStrategy<string>[];
  private readonly releaseDateStrategies: FieldStrategy<string>[];

  constructor(
    private readonly config: StorefrontSourceConfig,
    private readonly log: Logger,
  ) {
    this.nameStrategies = [
      strategy("page_title", async (s) => (await s.title()).split(" - ")[0]?.trim() || undefined),
      strategy("h1", async (s) => DOMHelper.firstText(s.page, ["h1"])),
    ];

    this.descriptionStrategies = [
      strategy("description_selectors", async (s) =>
        DOMHelper.firstText(s.page, this.config.descriptionSelectors, (text) => text.length > 50),
      ),
      strategy("long_body_line", async (s) => this.findLongBodyLine(await s.bodyText())),
    ];

    this.releaseDateStrategies = [
      strategy("text_node_patterns", async (s) =>
        this.matchFirst((await s.textNodes()).join("\n"), RELEASE_PATTERNS),
      ),
      strategy("meta_tags", async (s) => this.findMetaDate(s)),
      strategy("body_patterns", async (s) =>
        this.matchFirst(await s.bodyText(), [...RELEASE_PATTERNS, ...RELEASE_FALLBACK_PATTERNS]),
      ),
    ];
  }

  async extract(snapshot: PageSnapshot): Promise<StorefrontMetadata> {
    const bodyText = await snapshot.bodyText();
    const result: StorefrontMetadata = {};

    result.app_name = await runCascade("app_name", this.nameStrategies, snapshot, this.log);
    result.app_id = firstGroup(snapshot.url(), /\/id(\d+)/);

    result.age_rating =
      firstGroup(bodyText, /Ages\s+(\d+\+)/i) ?? firstGroup(bodyText, /(\d+\+)\s+Years?/i);
    result.category = firstGroup(bodyText, LABEL_PATTERNS.category);
    result.developer_name = firstGroup(bodyText, LABEL_PATTERNS.developer_name);
    result.languages = firstGroup(bodyText, LABEL_PATTERNS.languages)?.replace(/\s+/g, " ");
    result.app_size = firstGroup(bodyText, LABEL_PATTERNS.app_size);
    result.price = this.extractPrice(bodyText);
    result.compatibility = firstGroup(bodyText, LABEL_PATTERNS.compatibility);
    result.copyright = firstGroup(bodyText, LABEL_PATTERNS.copyright);
    result.version = firstGroup(bodyText, LABEL_PATTERNS.version);

    const description = await runCascade(
      "description",
      this.descriptionStrategies,
      snapshot,
      this.log,
    );
    result.description = description ? this.truncateDescription(description) : undefined;

    result.release_date = await runCascade(
      "release_date",
      this.releaseDateStrategies,
      snapshot,
      this.log,
    );

    result.support_url = await DOMHelper.firstHref(
      snapshot.page,
      'a[href*="support"], a[href*="help"]',
      this.config.baseUrl,
    );
    result.developer_website = await DOMHelper.firstHref(
      snapshot.page,
      'a[href*="developer"], a[href*="publisher"]',
      this.config.baseUrl,
    );

    return result;
  }

  /**
   * "Free" 표기 우선, 없으면 첫 달러 금액
   * 둘 다 없으면 undefined
   */
  extractPrice(bodyText: string): string | undefined {
    if (/\bFree\b/i.test(bodyText)) {
      return "Free";
    }
    const amount = firstGroup(bodyText, /\$(\d+\.?\d*)/);
    return amount ? `$${amount}` : undefined;
  }

  truncateDescription(text: string): string {
    const normalized = text.split(/\s+/).filter(Boolean).join(" ");
    const max = EXTRACTION_LIMITS.MAX_DESCRIPTION_LENGTH;
    return normalized.length > max ? `${normalized.slice(0, max)}...` : normalized;
  }

  private findLongBodyLine(bodyText: string): string | undefined {
    const excluded = this.config.descriptionExcludedKeywords.map((k) => k.toLowerCase());
    return bodyText
      .split("\n")
      .map((line) => line.trim())
      .find((line) => {
        if (line.length <= 100 || line.length >= 1000) {
          return false;
        }
        const lower = line.toLowerCase();
        return !excluded.some((keyword) => lower.includes(keyword));
      });
  }

  private async findMetaDate(snapshot: PageSnapshot): Promise<string | undefined> {
    for (const tag of await snapshot.metaTags()) {
      const key = tag.attributes.property || tag.attributes.name || "";
      const content = tag.attributes.content || "";
      if ((key.includes("release") || key.includes("date")) && content) {
        const date = firstGroup(content, META_DATE_PATTERN);
        if (date) {
          return date;
        }
      }
    }
    return undefined;
  }

  private matchFirst(text: string, patterns: RegExp[]): string | undefined {
    for (const pattern of patterns) {
      const value = firstGroup(text, pattern);
      if (value) {
        return value;
      }
    }
    return undefined;
  }
}
