/**
 * Browser Launch Arguments
 *
 * 카테고리별 Chromium 플래그 조합
 */

export const BROWSER_ARGS = {
  /**
   * 리소스 절약 플래그
   */
  MEMORY_OPTIMIZED: [
    "--disable-dev-shm-usage", // /dev/shm 사용 최소화
    "--disable-gpu",
    "--disable-extensions",
    "--disable-background-networking",
    "--no-first-run",
  ],

  /**
   * Stealth 플래그 (자동화 제어 표시 제거)
   */
  STEALTH: ["--disable-blink-features=AutomationControlled"],

  /**
   * Sandbox 플래그 (컨테이너 환경)
   */
  SANDBOX: ["--no-sandbox", "--disable-setuid-sandbox"],

  /**
   * headless 실행 조합 (컨테이너 + 메모리 + Stealth)
   */
  get HEADLESS() {
    return [...this.SANDBOX, ...this.MEMORY_OPTIMIZED, ...this.STEALTH];
  },

  /**
   * 화면 표시 실행 조합 (디버깅용)
   */
  get HEADED() {
    return [...this.STEALTH];
  },
} as const;

export function resolveBrowserArgs(headless: boolean): string[] {
  return headless ? BROWSER_ARGS.HEADLESS : BROWSER_ARGS.HEADED;
}
