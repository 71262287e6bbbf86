/**
 * JSON-LD Schema.org 데이터 추출기
 *
 * SOLID 원칙:
 * - SRP: JSON-LD Schema.org(SoftwareApplication) 추출만 담당
 * - OCP: 새로운 Schema.org 필드 추가 시 매핑만 확장
 *
 * Design Pattern:
 * - Strategy Pattern: 대시보드 추출 단계 중 하나
 *
 * 매핑:
 * - name → app_name
 * - applicationCategory → categories
 * - offers.price → price ("0"/0 → "Free", 그 외 "Paid")
 * - dateModified → last_updated (YYYY/MM/DD)
 *
 * 매핑 결과가 있는 첫 블록을 사용
 */

import { z } from "zod";
import type { Logger } from "@/config/logger";
import type { ISnapshotExtractor } from "@/extractors/base/ISnapshotExtractor";
import type { PageSnapshot } from "@/extractors/base/PageSnapshot";
import { toErrorMessage } from "@/core/interfaces/ScrapeErrorType";
import { toSlashDate } from "@/utils/timestamp";
import type { DashboardFields } from "./DashboardFields";

const OfferSchema = z.object({
  price: z.union([z.number(), z.string()]).nullish(),
});

/**
 * Schema.org SoftwareApplication (사용 필드만)
 */
const SchemaOrgApplicationSchema = z.object({
  name: z.string().nullish(),
  applicationCategory: z.string().nullish(),
  offers: z.union([OfferSchema, z.array(OfferSchema)]).nullish(),
  dateModified: z.string().nullish(),
});

type SchemaOrgApplication = z.infer<typeof SchemaOrgApplicationSchema>;

export class JsonLdSchemaExtractor implements ISnapshotExtractor<DashboardFields> {
  constructor(private readonly log: Logger) {}

  async extract(snapshot: PageSnapshot): Promise<DashboardFields> {
    const blocks = await snapshot.jsonLdBlocks();

    for (const block of blocks) {
      const data = this.parseBlock(block);
      if (!data) {
        continue;
      }
      // 앱 정보가 없는 블록(Organization 등)은 건너뜀
      const fields = this.toFields(data);
      if (Object.keys(fields).length > 0) {
        this.log.debug({ fields: Object.keys(fields) }, "[JsonLd] 추출 완료");
        return fields;
      }
    }

    return {};
  }

  /**
   * script 텍스트 → Schema.org 객체
   * JSON 파싱 실패 / 객체가 아닌 경우 null
   */
  parseBlock(text: string): SchemaOrgApplication | null {
    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch (error) {
      this.log.debug({ error: toErrorMessage(error) }, "[JsonLd] JSON 파싱 실패 - 다음 블록");
      return null;
    }

    const parsed = SchemaOrgApplicationSchema.safeParse(json);
    return parsed.success ? parsed.data : null;
  }

  toFields(data: SchemaOrgApplication): DashboardFields {
    const fields: DashboardFields = {};

    if (data.name) {
      fields.app_name = data.name.trim();
    }
    if (data.applicationCategory) {
      fields.categories = data.applicationCategory.trim();
    }

    const offer = Array.isArray(data.offers) ? data.offers[0] : data.offers;
    const price = offer?.price;
    if (price !== null && price !== undefined) {
      fields.price = Number(price) === 0 ? "Free" : "Paid";
    }

    if (data.dateModified) {
      fields.last_updated = toSlashDate(data.dateModified) ?? data.dateModified;
    }

    return fields;
  }
}
