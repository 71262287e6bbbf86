/**
 * PageSnapshot
 *
 * 렌더링된 페이지의 지연 평가 + 메모이제이션 뷰
 * 여러 필드 캐스케이드가 같은 본문 텍스트/텍스트 노드를 반복 조회하므로
 * 페이지 접근은 항목당 한 번만 수행
 */

import type {
  ElementSnapshot,
  IRenderedPage,
} from "@/core/interfaces/IRenderedPage";
import {
  collectMainContentTables,
  collectShortElementTexts,
  collectTextNodes,
  TableSnapshot,
} from "@/extractors/common/PageScripts";

/**
 * 최초 호출 시 한 번만 로드
 */
class Lazy<T> {
  private value: Promise<T> | null = null;

  constructor(private readonly load: () => Promise<T>) {}

  get(): Promise<T> {
    if (!this.value) {
      this.value = this.load();
    }
    return this.value;
  }
}

export class PageSnapshot {
  readonly page: IRenderedPage;
  private readonly titleValue: Lazy<string>;
  private readonly bodyTextValue: Lazy<string>;
  private readonly scopedTextValue: Lazy<string | null>;
  private readonly textNodesValue: Lazy<string[]>;
  private readonly shortElementTextsValue: Lazy<string[]>;
  private readonly tablesValue: Lazy<TableSnapshot[]>;
  private readonly metaTagsValue: Lazy<ElementSnapshot[]>;
  private readonly jsonLdValue: Lazy<string[]>;

  /**
   * @param scopeSelector 메인 콘텐츠 영역 selector (예: "#react-root")
   */
  constructor(page: IRenderedPage, scopeSelector?: string) {
    this.page = page;
    this.titleValue = new Lazy(() => page.title());
    this.bodyTextValue = new Lazy(async () => (await page.getText("body")) ?? "");
    this.scopedTextValue = new Lazy(async () =>
      scopeSelector ? page.getText(scopeSelector) : null,
    );
    this.textNodesValue = new Lazy(() => page.evaluateScript(collectTextNodes));
    this.shortElementTextsValue = new Lazy(() =>
      page.evaluateScript(collectShortElementTexts),
    );
    this.tablesValue = new Lazy(() =>
      page.evaluateScript(collectMainContentTables),
    );
    this.metaTagsValue = new Lazy(() => page.querySelectorAll("meta"));
    this.jsonLdValue = new Lazy(async () =>
      (await page.querySelectorAll('script[type="application/ld+json"]'))
        .map((el) => el.text)
        .filter((text) => text.length > 0),
    );
  }

  url(): string {
    return this.page.currentUrl();
  }

  title(): Promise<string> {
    return this.titleValue.get();
  }

  /** 본문 렌더링 텍스트 (없으면 빈 문자열) */
  bodyText(): Promise<string> {
    return this.bodyTextValue.get();
  }

  /**
   * 메인 콘텐츠 영역 텍스트
   * scopeSelector 미지정 또는 요소 없음 → null
   */
  scopedText(): Promise<string | null> {
    return this.scopedTextValue.get();
  }

  textNodes(): Promise<string[]> {
    return this.textNodesValue.get();
  }

  /**
   * 텍스트 노드를 줄 단위로 합친 텍스트
   * 텍스트 노드가 없으면 본문 렌더링 텍스트
   */
  async pageText(): Promise<string> {
    const nodes = await this.textNodes();
    return nodes.length > 0 ? nodes.join("\n") : this.bodyText();
  }

  shortElementTexts(): Promise<string[]> {
    return this.shortElementTextsValue.get();
  }

  tables(): Promise<TableSnapshot[]> {
    return this.tablesValue.get();
  }

  metaTags(): Promise<ElementSnapshot[]> {
    return this.metaTagsValue.get();
  }

  jsonLdBlocks(): Promise<string[]> {
    return this.jsonLdValue.get();
  }

  /**
   * meta[property|name=key] content
   */
  async metaContent(key: string): Promise<string | undefined> {
    const tags = await this.metaTags();
    const tag = tags.find(
      (t) => t.attributes.property === key || t.attributes.name === key,
    );
    const content = tag?.attributes.content?.trim();
    return content || undefined;
  }
}
