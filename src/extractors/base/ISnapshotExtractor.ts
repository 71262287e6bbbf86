/**
 * ISnapshotExtractor Interface
 *
 * 목적: 페이지 스냅샷에서 필드 묶음 추출
 * 패턴: Strategy Pattern
 *
 * 구현체는 찾지 못한 필드를 생략한 부분 결과를 반환해야 함
 */

import type { PageSnapshot } from "@/extractors/base/PageSnapshot";

export interface ISnapshotExtractor<TResult> {
  extract(snapshot: PageSnapshot): Promise<TResult>;
}
