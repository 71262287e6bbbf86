/**
 * DashboardMetricsExtractor
 *
 * KPI 블록 값 (다운로드 / 매출 / 카테고리 순위)
 *
 * 우선순위:
 * 1. KPI 카드 안의 aria-labelledby span
 * 2. "Downloads:" / "Revenue:" 라벨 텍스트
 * 3. "N downloads|installs" / "$N revenue|earnings" 문구
 */

import type { Logger } from "@/config/logger";
import type { ISnapshotExtractor } from "@/extractors/base/ISnapshotExtractor";
import type { PageSnapshot } from "@/extractors/base/PageSnapshot";
import {
  FieldStrategy,
  firstGroup,
  runCascade,
  strategy,
} from "@/extractors/base/FieldStrategy";
import { DOMHelper } from "@/extractors/common/DOMHelper";
import type { DashboardFields } from "./DashboardFields";

const KPI_BLOCK = '[data-test="app-overview-kpi-block"]';

/**
 * KPI 값 span selector
 */
export function kpiValueSelector(metric: "downloads" | "revenue" | "category-ranking"): string {
  return `${KPI_BLOCK} span[aria-labelledby="app-overview-unified-kpi-${metric}"]`;
}

const DOWNLOADS_LABEL = /Downloads[:\s]+([^\n\r]+?)(?:\n|Worldwide|Last Month|$)/i;
const DOWNLOADS_COUNT = /(\d+[KMB]?)\s*(?:downloads?|installs?)/i;
const REVENUE_LABEL = /Revenue[:\s]+([^\n\r]+?)(?:\n|Worldwide|Last Month|$)/i;
const REVENUE_AMOUNT = /(\$?\d+[KMB]?)\s*(?:revenue|earnings)/i;
const RANKING_NUMBER = /#(\d+)/;

export class DashboardMetricsExtractor implements ISnapshotExtractor<DashboardFields> {
  private readonly downloadsStrategies: FieldStrategy<string>[];
  private readonly revenueStrategies: FieldStrategy<string>[];

  constructor(private readonly log: Logger) {
    this.downloadsStrategies = [
      strategy("kpi_block", async (s) =>
        (await DOMHelper.safeText(s.page, kpiValueSelector("downloads"))) || undefined,
      ),
      strategy("label_text", async (s) => firstGroup(await s.pageText(), DOWNLOADS_LABEL)),
      strategy("count_phrase", async (s) => firstGroup(await s.pageText(), DOWNLOADS_COUNT)),
    ];

    this.revenueStrategies = [
      strategy("kpi_block", async (s) => {
        const text = await DOMHelper.safeText(s.page, kpiValueSelector("revenue"));
        return text.replace(/^\$/, "").trim() || undefined;
      }),
      strategy("label_text", async (s) => firstGroup(await s.pageText(), REVENUE_LABEL)),
      strategy("amount_phrase", async (s) => firstGroup(await s.pageText(), REVENUE_AMOUNT)),
    ];
  }

  async extract(snapshot: PageSnapshot): Promise<DashboardFields> {
    return {
      downloads_worldwide: await runCascade(
        "downloads_worldwide",
        this.downloadsStrategies,
        snapshot,
        this.log,
      ),
      revenue_worldwide: await runCascade(
        "revenue_worldwide",
        this.revenueStrategies,
        snapshot,
        this.log,
      ),
      category_ranking: await this.extractRanking(snapshot),
    };
  }

  /**
   * "#249" → "249", 카테고리 <p> 가 있으면 "249 (Games)"
   */
  async extractRanking(snapshot: PageSnapshot): Promise<string | undefined> {
    const selector = kpiValueSelector("category-ranking");
    const rank = firstGroup(await DOMHelper.safeText(snapshot.page, selector), RANKING_NUMBER);
    if (!rank) {
      return undefined;
    }
    const category = await DOMHelper.safeText(snapshot.page, `${selector} p`);
    return category ? `${rank} (${category})` : rank;
  }
}
