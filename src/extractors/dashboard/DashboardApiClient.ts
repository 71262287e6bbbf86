/**
 * DashboardApiClient
 *
 * 대시보드 내부 JSON API 조회 (브라우저 컨텍스트의 쿠키/세션 사용)
 * - 비 200 응답, 요청 에러, 스키마 불일치 → 빈 결과 (페이지 스크래핑으로 진행)
 */

import { z } from "zod";
import type { Logger } from "@/config/logger";
import type { DashboardSourceConfig } from "@/core/domain/ScraperConfig";
import type { IBrowserController } from "@/scrapers/controllers/IBrowserController";
import type { DashboardFields } from "./DashboardFields";

const NumberOrString = z.union([z.number(), z.string()]);

/**
 * API 응답 중 사용하는 필드만 정의 (나머지 키는 무시)
 */
const DashboardApiPayloadSchema = z.object({
  name: z.string().nullish(),
  category: z.object({ name: z.string().nullish() }).nullish(),
  price: NumberOrString.nullish(),
  developer: z.object({ name: z.string().nullish() }).nullish(),
  content_rating: z.string().nullish(),
  last_updated: z.string().nullish(),
  updated_at: z.string().nullish(),
  publisher_country: z.string().nullish(),
  estimates: z
    .object({
      downloads: NumberOrString.nullish(),
      revenue: NumberOrString.nullish(),
    })
    .nullish(),
});

export type DashboardApiPayload = z.infer<typeof DashboardApiPayloadSchema>;

export class DashboardApiClient {
  constructor(
    private readonly config: DashboardSourceConfig,
    private readonly log: Logger,
  ) {}

  buildUrl(appId: string): string {
    const path = this.config.apiPath.replace("{id}", encodeURIComponent(appId));
    return `${this.config.appBaseUrl}${path}?country=${this.config.country}`;
  }

  async fetch(controller: IBrowserController, appId: string): Promise<DashboardFields> {
    const url = this.buildUrl(appId);
    const body = await controller.requestJson(url, this.config.timeouts.apiMs);
    if (body === null) {
      this.log.debug({ url }, "[DashboardApi] API 응답 없음 - 페이지 스크래핑으로 진행");
      return {};
    }
    return this.toFields(body);
  }

  /**
   * API JSON → 부분 결과
   */
  toFields(body: unknown): DashboardFields {
    const parsed = DashboardApiPayloadSchema.safeParse(body);
    if (!parsed.success) {
      this.log.warn(
        { issues: parsed.error.issues.map((issue) => issue.path.join(".")) },
        "[DashboardApi] 응답 형식 불일치 - 무시",
      );
      return {};
    }

    const payload = parsed.data;
    const fields: DashboardFields = {
      app_name: payload.name || undefined,
      categories: payload.category?.name || undefined,
      developer_name: payload.developer?.name || undefined,
      content_rating: payload.content_rating || undefined,
      last_updated: payload.last_updated || payload.updated_at || undefined,
      publisher_country: payload.publisher_country || undefined,
    };

    if (payload.price !== null && payload.price !== undefined) {
      fields.price = Number(payload.price) === 0 ? "Free" : "Paid";
    }
    const downloads = payload.estimates?.downloads;
    if (downloads !== null && downloads !== undefined) {
      fields.downloads_worldwide = String(downloads);
    }
    const revenue = payload.estimates?.revenue;
    if (revenue !== null && revenue !== undefined) {
      fields.revenue_worldwide = String(revenue);
    }

    return fields;
  }
}
