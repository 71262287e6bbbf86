/**
 * 대시보드 단계별 부분 결과
 *
 * 단계(API → JSON-LD → 메타 태그 → DOM) 결과는 모두 이 형태로 반환되고
 * 레코드에는 아직 비어 있는 필드만 채워짐
 */

import {
  APP_RECORD_TEXT_FIELDS,
  AppRecord,
  AppRecordTextField,
} from "@/core/domain/AppRecord";

export type DashboardFields = Partial<Pick<AppRecord, AppRecordTextField>>;

/**
 * 비어 있는 필드만 채움
 *
 * @returns 채운 필드 이름 목록
 */
export function fillMissing(
  record: AppRecord,
  fields: DashboardFields,
): AppRecordTextField[] {
  const filled: AppRecordTextField[] = [];
  for (const key of APP_RECORD_TEXT_FIELDS) {
    const value = fields[key];
    if (value && !record[key]) {
      record[key] = value;
      filled.push(key);
    }
  }
  return filled;
}
