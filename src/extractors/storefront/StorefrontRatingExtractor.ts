/**
 * StorefrontRatingExtractor
 *
 * 평균 평점 + 평점 수를 함께 추출
 *
 * 단계 (각 단계는 아직 비어 있는 값만 채움):
 * 1. 텍스트 노드 스캔 ("8.1K Ratings 4.6", "4.6 out of 5 8.1K Ratings", 개별 패턴)
 * 2. 짧은 요소 텍스트 스캔 ("Ratings" / "out of 5" 포함 요소)
 * 3. 본문 렌더링 텍스트 정규식
 *
 * 평균 평점이 5를 넘으면 버림
 */

import type { Logger } from "@/config/logger";
import type { ISnapshotExtractor } from "@/extractors/base/ISnapshotExtractor";
import type { PageSnapshot } from "@/extractors/base/PageSnapshot";
import { isTimeoutError, toErrorMessage } from "@/core/interfaces/ScrapeErrorType";

export interface RatingData {
  average_rating?: string;
  rating_count?: string;
}

const COUNT_THEN_AVERAGE = /(\d+\.?\d*[KMB]?)\s*Ratings?[\s\n]+(\d+\.?\d*)/i;
const AVERAGE_THEN_COUNT = /(\d+\.?\d*)\s+out of 5[\s\n]+(\d+\.?\d*[KMB]?)\s*Ratings?/i;
const AVERAGE_ONLY = /(\d+\.?\d*)\s+out of 5/i;
const COUNT_ONLY = /(\d+\.?\d*[KMB]?)\s*Ratings?/i;

const MAX_AVERAGE_RATING = 5;

export class StorefrontRatingExtractor implements ISnapshotExtractor<RatingData> {
  constructor(private readonly log: Logger) {}

  async extract(snapshot: PageSnapshot): Promise<RatingData> {
    const data: RatingData = {};

    const stages: Array<[string, () => Promise<void>]> = [
      ["text_nodes", async () => this.scanText((await snapshot.textNodes()).join("\n"), data)],
      ["element_texts", async () => this.scanElements(await snapshot.shortElementTexts(), data)],
      ["body_text", async () => this.scanText(await snapshot.bodyText(), data)],
    ];

    for (const [stage, run] of stages) {
      if (this.isComplete(data)) {
        break;
      }
      try {
        await run();
      } catch (error) {
        if (isTimeoutError(error)) throw error;
        this.log.warn(
          { stage, error: toErrorMessage(error) },
          "[StorefrontRating] 단계 실패 - 다음 단계 시도",
        );
      }
    }

    if (!this.isComplete(data)) {
      this.log.debug({ ...data }, "[StorefrontRating] 평점 일부 누락");
    }
    return data;
  }

  /**
   * 결합 패턴 → 개별 패턴 순으로 텍스트 스캔
   */
  scanText(text: string, data: RatingData): void {
    if (!text) {
      return;
    }

    const countFirst = text.match(COUNT_THEN_AVERAGE);
    if (countFirst) {
      this.fillCount(data, countFirst[1]);
      this.fillAverage(data, countFirst[2]);
    }

    if (!this.isComplete(data)) {
      const averageFirst = text.match(AVERAGE_THEN_COUNT);
      if (averageFirst) {
        this.fillAverage(data, averageFirst[1]);
        this.fillCount(data, averageFirst[2]);
      }
    }

    this.fillAverage(data, text.match(AVERAGE_ONLY)?.[1]);
    this.fillCount(data, text.match(COUNT_ONLY)?.[1]);
  }

  private scanElements(texts: string[], data: RatingData): void {
    for (const text of texts) {
      if (this.isComplete(data)) {
        return;
      }
      if (!text.includes("Ratings") && !text.includes("out of 5")) {
        continue;
      }
      this.fillCount(data, text.match(COUNT_ONLY)?.[1]);
      this.fillAverage(data, text.match(AVERAGE_ONLY)?.[1]);
    }
  }

  private fillAverage(data: RatingData, candidate: string | undefined): void {
    const value = candidate?.trim();
    if (data.average_rating || !value) {
      return;
    }
    const parsed = Number.parseFloat(value);
    if (Number.isFinite(parsed) && parsed <= MAX_AVERAGE_RATING) {
      data.average_rating = value;
    }
  }

  private fillCount(data: RatingData, candidate: string | undefined): void {
    const value = candidate?.trim();
    if (!data.rating_count && value) {
      data.rating_count = value;
    }
  }

  private isComplete(data: RatingData): boolean {
    return Boolean(data.average_rating && data.rating_count);
  }
}
