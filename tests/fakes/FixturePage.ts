/**
 * FixturePage
 *
 * jsdom 기반 IRenderedPage (브라우저 없이 추출기 검증)
 * - getText: textContent (렌더링 대신 HTML 원본 줄바꿈 유지)
 * - evaluateScript: 실행 동안 전역 document 를 fixture 문서로 교체
 */

import { JSDOM } from "jsdom";
import type {
  ElementSnapshot,
  IRenderedPage,
} from "@/core/interfaces/IRenderedPage";

export class FixturePage implements IRenderedPage {
  private readonly dom: JSDOM;

  constructor(
    html: string,
    private readonly url: string = "https://fixture.test/",
  ) {
    this.dom = new JSDOM(html, { url });
  }

  private get document(): Document {
    return this.dom.window.document;
  }

  currentUrl(): string {
    return this.url;
  }

  async title(): Promise<string> {
    return this.document.title;
  }

  async getText(selector: string = "body"): Promise<string | null> {
    const element = this.document.querySelector(selector);
    return element ? (element.textContent ?? "") : null;
  }

  async getHtml(): Promise<string> {
    return this.dom.serialize();
  }

  async evaluateScript<T>(script: () => T): Promise<T> {
    const previous: unknown = Reflect.get(globalThis, "document");
    Reflect.set(globalThis, "document", this.document);
    try {
      return script();
    } finally {
      if (previous === undefined) {
        Reflect.deleteProperty(globalThis, "document");
      } else {
        Reflect.set(globalThis, "document", previous);
      }
    }
  }

  async querySelector(selector: string): Promise<ElementSnapshot | null> {
    const [first] = await this.querySelectorAll(selector);
    return first ?? null;
  }

  async querySelectorAll(selector: string): Promise<ElementSnapshot[]> {
    return Array.from(this.document.querySelectorAll(selector)).map((el) => {
      const attributes: Record<string, string> = {};
      for (const attr of Array.from(el.attributes)) {
        attributes[attr.name] = attr.value;
      }
      return { text: (el.textContent ?? "").trim(), attributes };
    });
  }
}
