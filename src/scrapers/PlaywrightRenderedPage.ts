/**
 * PlaywrightRenderedPage
 *
 * Playwright Page → IRenderedPage 어댑터
 *
 * Design Pattern:
 * - Adapter Pattern
 */

import type { Page } from "playwright-core";
import type {
  ElementSnapshot,
  IRenderedPage,
} from "@/core/interfaces/IRenderedPage";

export class PlaywrightRenderedPage implements IRenderedPage {
  constructor(private readonly page: Page) {}

  currentUrl(): string {
    return this.page.url();
  }

  title(): Promise<string> {
    return this.page.title();
  }

  async getText(selector: string = "body"): Promise<string | null> {
    const locator = this.page.locator(selector).first();
    if ((await locator.count()) === 0) {
      return null;
    }
    return locator.innerText();
  }

  getHtml(): Promise<string> {
    return this.page.content();
  }

  evaluateScript<T>(script: () => T): Promise<T> {
    return this.page.evaluate(script);
  }

  async querySelector(selector: string): Promise<ElementSnapshot | null> {
    const [first] = await this.querySelectorAll(selector);
    return first ?? null;
  }

  querySelectorAll(selector: string): Promise<ElementSnapshot[]> {
    return this.page.$$eval(selector, (elements) =>
      elements.map((el) => {
        const attributes: Record<string, string> = {};
        for (let i = 0; i < el.attributes.length; i++) {
          attributes[el.attributes[i].name] = el.attributes[i].value;
        }
        return { text: (el.textContent || "").trim(), attributes };
      }),
    );
  }
}
