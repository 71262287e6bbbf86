/**
 * DashboardInAppPurchaseExtractor
 *
 * 메인 콘텐츠 영역의 인앱 구매 표 → { title, duration, price }
 * - 대상 표: "in-app purchase" / "iap" 언급, 또는 "title" + "price" 둘 다 포함
 * - 첫 행(헤더) 및 컬럼명과 같은 셀 텍스트의 행은 제외
 */

import type { InAppPurchase } from "@/core/domain/AppRecord";
import type { ISnapshotExtractor } from "@/extractors/base/ISnapshotExtractor";
import type { PageSnapshot } from "@/extractors/base/PageSnapshot";
import type { TableSnapshot } from "@/extractors/common/PageScripts";
import { EXTRACTION_LIMITS } from "@/config/constants";

const HEADER_WORDS = ["title", "duration", "price"];

export class DashboardInAppPurchaseExtractor
  implements ISnapshotExtractor<InAppPurchase[]>
{
  async extract(snapshot: PageSnapshot): Promise<InAppPurchase[]> {
    const table = (await snapshot.tables()).find((t) => this.isPurchaseTable(t));
    if (!table) {
      return [];
    }
    return this.parseRows(table.rows).slice(0, EXTRACTION_LIMITS.MAX_IN_APP_PURCHASES);
  }

  isPurchaseTable(table: TableSnapshot): boolean {
    const text = table.text.toLowerCase();
    return (
      text.includes("in-app purchase") ||
      text.includes("iap") ||
      (text.includes("title") && text.includes("price"))
    );
  }

  parseRows(rows: string[][]): InAppPurchase[] {
    const items: InAppPurchase[] = [];

    for (const cells of rows.slice(1)) {
      if (cells.length < 2) {
        continue;
      }
      const [title = "", duration = "", price = ""] = cells;
      if (!title || this.isHeaderCell(title)) {
        continue;
      }
      items.push(duration ? { title, duration, price } : { title, price });
    }

    return items;
  }

  private isHeaderCell(text: string): boolean {
    const lower = text.toLowerCase();
    return HEADER_WORDS.some((word) =>
      word === "title" ? lower === word : lower.includes(word),
    );
  }
}
