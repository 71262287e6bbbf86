/**
 * AppRecord ↔ apps 테이블 row 매퍼
 *
 * SOLID 원칙:
 * - SRP: 도메인 ↔ 저장 형식 변환만 담당
 *
 * 규칙:
 * - *_numeric 필드는 toRow 에서 텍스트 필드로부터 항상 재계산
 * - in_app_purchases 는 JSON 문자열 (빈 목록 → null)
 */

import {
  APP_RECORD_TEXT_FIELDS,
  AppRecord,
  AppRow,
  AppRowSchema,
  InAppPurchase,
  InAppPurchaseListSchema,
  createEmptyAppRecord,
} from "@/core/domain/AppRecord";
import { NumericNormalizer } from "@/extractors/common/NumericNormalizer";
import { logger } from "@/config/logger";

/**
 * 파생 숫자 필드
 */
export interface DerivedNumericFields {
  downloads_numeric: number | null;
  revenue_numeric: number | null;
  rating_count_numeric: number | null;
  average_rating_numeric: number | null;
}

export class AppRecordMapper {
  /**
   * 텍스트 필드 → 파생 숫자 필드
   */
  static deriveNumericFields(
    record: Pick<
      AppRecord,
      | "downloads_worldwide"
      | "revenue_worldwide"
      | "rating_count"
      | "average_rating"
    >,
  ): DerivedNumericFields {
    return {
      downloads_numeric:
        NumericNormalizer.normalizeDownloads(record.downloads_worldwide) ??
        null,
      revenue_numeric:
        NumericNormalizer.normalize(record.revenue_worldwide) ?? null,
      rating_count_numeric:
        NumericNormalizer.normalizeCount(record.rating_count) ?? null,
      average_rating_numeric:
        NumericNormalizer.normalize(record.average_rating) ?? null,
    };
  }

  /**
   * 도메인 → row
   * 식별자 누락 시 app_name "Unknown", app_id 빈 문자열
   */
  static toRow(record: AppRecord, scrapedAt: string): AppRow {
    const row: AppRow = {};
    for (const field of APP_RECORD_TEXT_FIELDS) {
      row[field] = record[field] ?? null;
    }

    row.app_name = record.app_name || "Unknown";
    row.app_id = record.app_id ?? "";
    row.in_app_purchases = this.serializePurchases(record.in_app_purchases);
    row.scraped_at = scrapedAt;

    return { ...row, ...this.deriveNumericFields(record) };
  }

  /**
   * row → 도메인
   * 스키마 검증 실패 시 예외
   */
  static fromRow(raw: unknown): AppRecord {
    const row = AppRowSchema.parse(raw);
    const record = createEmptyAppRecord();

    for (const field of APP_RECORD_TEXT_FIELDS) {
      const value = row[field];
      if (value !== null && value !== undefined) {
        record[field] = value;
      }
    }

    record.in_app_purchases = this.deserializePurchases(row.in_app_purchases);
    if (row.scraped_at) record.scraped_at = row.scraped_at;
    if (row.downloads_numeric != null) record.downloads_numeric = row.downloads_numeric;
    if (row.revenue_numeric != null) record.revenue_numeric = row.revenue_numeric;
    if (row.rating_count_numeric != null) record.rating_count_numeric = row.rating_count_numeric;
    if (row.average_rating_numeric != null) record.average_rating_numeric = row.average_rating_numeric;

    return record;
  }

  static serializePurchases(purchases: InAppPurchase[]): string | null {
    if (purchases.length === 0) {
      return null;
    }
    return JSON.stringify(
      purchases.map((p) =>
        p.duration === undefined
          ? { title: p.title, price: p.price }
          : { title: p.title, duration: p.duration, price: p.price },
      ),
    );
  }

  /**
   * JSON 문자열 → 인앱 구매 목록
   * 파싱 실패 시 빈 목록 (로그 남김)
   */
  static deserializePurchases(json: string | null | undefined): InAppPurchase[] {
    if (!json) {
      return [];
    }
    try {
      const parsed = InAppPurchaseListSchema.safeParse(JSON.parse(json));
      if (parsed.success) {
        return parsed.data;
      }
      logger.warn(
        { issues: parsed.error.issues.length },
        "[AppRecordMapper] 인앱 구매 JSON 형식 불일치",
      );
    } catch (error) {
      logger.warn(
        { error: error instanceof Error ? error.message : String(error) },
        "[AppRecordMapper] 인앱 구매 JSON 파싱 실패",
      );
    }
    return [];
  }

  /**
   * 식별자 외에 실제로 추출된 값이 있는지
   * (식별자는 입력에서 채워지므로 판단에서 제외)
   */
  static hasScrapedContent(record: AppRecord): boolean {
    if (record.in_app_purchases.length > 0) {
      return true;
    }
    return APP_RECORD_TEXT_FIELDS.some(
      (field) => field !== "app_id" && Boolean(record[field]),
    );
  }
}
