/**
 * 브라우저 세션 실행 헬퍼
 *
 * 초기화 → 작업 → 정리(finally)
 * 정리 실패는 경고 로그만 남기고 작업 결과/에러를 그대로 전달
 */

import type {
  BrowserControllerFactory,
  BrowserInitOptions,
  IBrowserController,
} from "./IBrowserController";
import type { Logger } from "@/config/logger";
import { toErrorMessage } from "@/core/interfaces/ScrapeErrorType";

export async function withBrowser<T>(
  createController: BrowserControllerFactory,
  options: BrowserInitOptions,
  log: Logger,
  work: (controller: IBrowserController) => Promise<T>,
): Promise<T> {
  const controller = createController();
  try {
    await controller.initialize(options);
    return await work(controller);
  } finally {
    try {
      await controller.cleanup();
    } catch (cleanupError) {
      log.warn(
        { error: toErrorMessage(cleanupError) },
        "[Browser] 리소스 정리 실패 - 무시",
      );
    }
  }
}
