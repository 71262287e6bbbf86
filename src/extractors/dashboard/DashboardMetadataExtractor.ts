/**
 * DashboardMetadataExtractor
 *
 * 렌더링된 overview 페이지에서 메타데이터 추출 (DOM 단계)
 *
 * Design Pattern:
 * - Strategy Pattern + Chain of Responsibility (필드별 runCascade)
 *
 * 공통 순서: 메인 콘텐츠 영역(#react-root) → 페이지 전체
 * 메인 콘텐츠 영역 scope 는 헤더/내비게이션 텍스트가 값으로 잡히는 것을 막음
 */

import type { Logger } from "@/config/logger";
import type { DashboardSourceConfig } from "@/core/domain/ScraperConfig";
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
import type { DashboardFields } from "./DashboardFields";
import type { DashboardSentinels } from "./DashboardSentinels";

const CATEGORY_KEYWORDS = ["Category", "Categories", "Genre"];

const PRICE_SELECTORS = [
  '[class*="price"]',
  '[class*="Price"]',
  "[data-price]",
  '[data-testid*="price"]',
];

const DEVELOPER_LABEL = /\b(?:Developer|Publisher|By|Made by)[\s:]+([^\n\r]+)/i;
const DEVELOPER_LABEL_PATTERNS = [
  DEVELOPER_LABEL,
  /Developer[\s:]+([^\n\r]+)/i,
  /Publisher[\s:]+([^\n\r]+)/i,
];
const DEVELOPER_BOUNDED = /\b(?:Developer|Publisher|By)[\s:]+([^\n\r]+?)(?:\n|Country|Website|$)/i;

const CONTENT_RATING_LABEL = /(?:Content Rating|Age Rating|Rating)[\s:]*(\d+\+)/i;
const AGE_MARKER = /\b(\d{1,2}\+)(?!\d)/;

const UPDATED_LABEL = /(?:Last Updated|Updated|Release Date)[\s:]+(\d{4}[/-]\d{1,2}[/-]\d{1,2})/i;
const ANY_ISO_LIKE_DATE = /(\d{4}[/-]\d{1,2}[/-]\d{1,2})/;

const PUBLISHER_COUNTRY_LABEL = /Publisher Country[\s:]+([^\n\r]+)/i;

const TOP_COUNTRIES_BOUNDED = /Top Countries[\s:]+([^\n\r]+?)(?:\n|Regions|$)/i;
const TOP_COUNTRIES_LINE = /Top Countries[:\s]+([^\n\r]+)/i;

/**
 * "Foo | Bar\nBaz" → "Foo"
 */
function firstSegment(value: string | undefined): string | undefined {
  const segment = value?.split("\n")[0]?.split("|")[0]?.trim();
  return segment || undefined;
}

/**
 * 본문 텍스트 → "Free" / "Paid"
 */
export function classifyPrice(text: string): "Free" | "Paid" | undefined {
  if (/\bFree\b/i.test(text) || /\$0(?:\.0+)?(?![\d.])/.test(text)) {
    return "Free";
  }
  if (/\$\d+/.test(text)) {
    return "Paid";
  }
  return undefined;
}

export class DashboardMetadataExtractor implements ISnapshotExtractor<DashboardFields> {
  private readonly nameStrategies: FieldStrategy<string>[];
  private readonly categoryStrategies: FieldStrategy<string>[];
  private readonly priceStrategies: FieldStrategy<string>[];
  private readonly developerStrategies: FieldStrategy<string>[];
  private readonly contentRatingStrategies: FieldStrategy<string>[];
  private readonly lastUpdatedStrategies: FieldStrategy<string>[];
  private readonly publisherCountryStrategies: FieldStrategy<string>[];
  private readonly topCountriesStrategies: FieldStrategy<string>[];

  constructor(
    private readonly config: DashboardSourceConfig,
    private readonly sentinels: DashboardSentinels,
    private readonly log: Logger,
  ) {
    const root = config.contentWait.rootSelector;
    const scoped = (selectors: readonly string[]) => selectors.map((sel) => `${root} ${sel}`);
    const acceptName = sentinels.isAcceptableName;
    const acceptDeveloper = sentinels.isAcceptableDeveloper;

    this.nameStrategies = [
      strategy("react_root_h1", async (s) => DOMHelper.firstText(s.page, scoped(["h1"]), acceptName)),
      strategy("react_root_selectors", async (s) =>
        DOMHelper.firstText(s.page, scoped(config.nameSelectors), acceptName),
      ),
      strategy("react_root_first_line", async (s) =>
        this.firstLine(await s.scopedText(), (line) => acceptName(line)),
      ),
      strategy("page_selectors", async (s) =>
        DOMHelper.firstText(s.page, config.pageNameSelectors, acceptName),
      ),
      strategy("page_title", async (s) => this.nameFromTitle(await s.title())),
      strategy("page_text_lines", async (s) =>
        this.firstLine(
          await s.pageText(),
          (line) => acceptName(line) && !line.toLowerCase().startsWith("http"),
          10,
        ),
      ),
      strategy("og_title", async (s) => s.metaContent("og:title")),
    ];

    const acceptCategory = (value: string) =>
      value.length < 100 && !value.toLowerCase().includes("ranking");

    this.categoryStrategies = [
      strategy("react_root_label", async (s) =>
        this.matchCategoryLabel(await s.scopedText(), acceptCategory),
      ),
      strategy("react_root_selectors", async (s) =>
        DOMHelper.firstText(s.page, scoped(config.categorySelectors), acceptCategory),
      ),
      strategy("page_text_label", async (s) =>
        this.matchCategoryLabel(await s.pageText(), acceptCategory),
      ),
      strategy("common_categories", async (s) => {
        const lower = (await s.pageText()).toLowerCase();
        return config.commonCategories.find((cat) => lower.includes(cat.toLowerCase()));
      }),
    ];

    // 헤더/배너 문구("Start Free Trial")가 잡히지 않도록 페이지 전체 텍스트는 보지 않음
    this.priceStrategies = [
      strategy("react_root_text", async (s) => {
        const text = await s.scopedText();
        return text ? classifyPrice(text) : undefined;
      }),
      strategy("react_root_selectors", async (s) => this.priceFromSelectors(s, scoped(PRICE_SELECTORS))),
      strategy("price_selectors", async (s) => this.priceFromSelectors(s, PRICE_SELECTORS)),
    ];

    this.developerStrategies = [
      strategy("react_root_label", async (s) => {
        const text = await s.scopedText();
        for (const pattern of DEVELOPER_LABEL_PATTERNS) {
          const value = firstSegment(firstGroup(text, pattern));
          if (value && acceptDeveloper(value)) return value;
        }
        return undefined;
      }),
      strategy("react_root_links", async (s) => {
        const links = await s.page.querySelectorAll(
          scoped(['a[href*="developer"]', 'a[href*="publisher"]']).join(", "),
        );
        return links.map((link) => link.text).find((text) => acceptDeveloper(text));
      }),
      strategy("page_text_label", async (s) =>
        firstSegment(firstGroup(await s.pageText(), DEVELOPER_LABEL)),
      ),
      strategy("react_root_bounded", async (s) =>
        firstSegment(firstGroup(await s.scopedText(), DEVELOPER_BOUNDED)),
      ),
    ];

    this.contentRatingStrategies = [
      strategy("body_label", async (s) => firstGroup(await s.bodyText(), CONTENT_RATING_LABEL)),
      strategy("page_text_label", async (s) => firstGroup(await s.pageText(), CONTENT_RATING_LABEL)),
      strategy("age_marker", async (s) => firstGroup(await s.pageText(), AGE_MARKER)),
    ];

    this.lastUpdatedStrategies = [
      strategy("body_label", async (s) => firstGroup(await s.bodyText(), UPDATED_LABEL)),
      strategy("page_text_label", async (s) => firstGroup(await s.pageText(), UPDATED_LABEL)),
      strategy("any_date", async (s) => firstGroup(await s.pageText(), ANY_ISO_LIKE_DATE)),
    ];

    this.publisherCountryStrategies = [
      strategy("body_label", async (s) =>
        firstSegment(firstGroup(await s.bodyText(), PUBLISHER_COUNTRY_LABEL)),
      ),
      strategy("page_text_label", async (s) =>
        firstSegment(firstGroup(await s.pageText(), PUBLISHER_COUNTRY_LABEL)),
      ),
      strategy("near_publisher", async (s) => this.countryNearPublisher(await s.bodyText())),
    ];

    this.topCountriesStrategies = [
      strategy("react_root_label", async (s) =>
        firstGroup(await s.scopedText(), TOP_COUNTRIES_BOUNDED),
      ),
      strategy("page_text_label", async (s) => firstGroup(await s.pageText(), TOP_COUNTRIES_LINE)),
      strategy("after_label", async (s) =>
        this.countriesAfterLabel((await s.scopedText()) ?? (await s.pageText())),
      ),
    ];
  }

  async extract(snapshot: PageSnapshot): Promise<DashboardFields> {
    const run = (
      field: string,
      strategies: FieldStrategy<string>[],
      accept?: (value: string) => boolean,
    ) => runCascade(field, strategies, snapshot, this.log, { accept });

    const { appBaseUrl } = this.config;

    return {
      app_name: await run("app_name", this.nameStrategies, this.sentinels.isAcceptableName),
      categories: await run("categories", this.categoryStrategies),
      price: await run("price", this.priceStrategies),
      developer_name: await run(
        "developer_name",
        this.developerStrategies,
        this.sentinels.isAcceptableDeveloper,
      ),
      content_rating: await run("content_rating", this.contentRatingStrategies),
      last_updated: await run("last_updated", this.lastUpdatedStrategies),
      publisher_country: await run("publisher_country", this.publisherCountryStrategies),
      top_countries: await run(
        "top_countries",
        this.topCountriesStrategies,
        this.sentinels.isAcceptableTopCountries,
      ),
      support_url: await DOMHelper.firstHref(
        snapshot.page,
        'a[href*="support"], a[href*="help"]',
        appBaseUrl,
      ),
      developer_website: await DOMHelper.firstHref(
        snapshot.page,
        'a[href*="developer"], a[href*="publisher"]',
        appBaseUrl,
      ),
    };
  }

  /**
   * 페이지 제목 → 앱 이름
   * "App - Overview | Brand" 형식에서 overview / 브랜딩 조각 제외
   */
  nameFromTitle(title: string): string | undefined {
    return title
      .split(/\s+[-|]\s+/)
      .map((part) => part.trim())
      .find(
        (part) =>
          part.length > 0 &&
          part.toLowerCase() !== "overview" &&
          this.sentinels.isAcceptableName(part),
      );
  }

  /**
   * "publisher" 주변(±200자)에 등장하는 알려진 국가명
   */
  countryNearPublisher(text: string): string | undefined {
    const lower = text.toLowerCase();
    const publisherIndex = lower.indexOf("publisher");
    if (publisherIndex === -1) {
      return undefined;
    }
    return this.config.knownCountries.find((country) => {
      const index = lower.indexOf(country.toLowerCase());
      return (
        index !== -1 &&
        Math.abs(index - publisherIndex) < EXTRACTION_LIMITS.PUBLISHER_COUNTRY_WINDOW
      );
    });
  }

  /**
   * "Top Countries" 이후 500자 안의 알려진 국가명 (설정 순서, 쉼표 구분)
   */
  countriesAfterLabel(text: string): string | undefined {
    const lower = text.toLowerCase();
    const start = lower.indexOf("top countries");
    if (start === -1) {
      return undefined;
    }
    const section = lower.substring(start, start + EXTRACTION_LIMITS.TOP_COUNTRIES_WINDOW);
    const found = this.config.knownCountries.filter((country) =>
      section.includes(country.toLowerCase()),
    );
    return found.length > 0 ? found.join(", ") : undefined;
  }

  private async priceFromSelectors(
    snapshot: PageSnapshot,
    selectors: readonly string[],
  ): Promise<"Free" | "Paid" | undefined> {
    for (const selector of selectors) {
      const price = classifyPrice(await DOMHelper.safeText(snapshot.page, selector));
      if (price) {
        return price;
      }
    }
    return undefined;
  }

  private matchCategoryLabel(
    text: string | null,
    accept: (value: string) => boolean,
  ): string | undefined {
    for (const keyword of CATEGORY_KEYWORDS) {
      const value = firstSegment(firstGroup(text, new RegExp(`${keyword}[\\s:]+([^\\n\\r]+)`, "i")));
      if (value && accept(value)) {
        return value;
      }
    }
    return undefined;
  }

  private firstLine(
    text: string | null,
    accept: (line: string) => boolean,
    maxLines: number = Number.POSITIVE_INFINITY,
  ): string | undefined {
    if (!text) {
      return undefined;
    }
    return text
      .split("\n")
      .map((line) => line.trim())
      .filter((line) => line.length > 2)
      .slice(0, maxLines)
      .find(accept);
  }
}
