/**
 * YAML 설정 로더
 * Singleton Pattern 적용
 *
 * SOLID 원칙:
 * - SRP: YAML 파일 로드/검증만 담당
 * - OCP: 소스 URL/selector 변경 시 YAML만 수정
 */

import * as fs from "fs";
import * as path from "path";
import * as yaml from "js-yaml";
import type { z } from "zod";
import {
  DashboardSourceConfig,
  DashboardSourceSchema,
  ScraperConfig,
  ScraperConfigOverrides,
  StorefrontSourceConfig,
  StorefrontSourceSchema,
} from "@/core/domain/ScraperConfig";
import { logger } from "@/config/logger";

const DEFAULT_INTER_REQUEST_DELAY_MS = 2000;

/** 요청 간 최소 간격 (더 작은 값은 이 값으로 올림) */
export const MIN_INTER_REQUEST_DELAY_MS = 500;

/**
 * Config Loader Singleton
 */
export class ConfigLoader {
  private static instance: ConfigLoader;
  private storefrontConfig: StorefrontSourceConfig | null = null;
  private dashboardConfig: DashboardSourceConfig | null = null;

  private constructor(private readonly sourcesDir: string) {}

  /**
   * Singleton 인스턴스 반환
   */
  static getInstance(): ConfigLoader {
    if (!ConfigLoader.instance) {
      ConfigLoader.instance = new ConfigLoader(
        path.join(__dirname, "sources"),
      );
    }
    return ConfigLoader.instance;
  }

  loadStorefrontConfig(): StorefrontSourceConfig {
    if (!this.storefrontConfig) {
      this.storefrontConfig = this.loadSource(
        "storefront",
        StorefrontSourceSchema,
      );
    }
    return this.storefrontConfig;
  }

  loadDashboardConfig(): DashboardSourceConfig {
    if (!this.dashboardConfig) {
      this.dashboardConfig = this.loadSource("dashboard", DashboardSourceSchema);
    }
    return this.dashboardConfig;
  }

  /**
   * 전체 스크래퍼 설정 생성
   *
   * 우선순위: overrides > 환경변수 > 기본값
   */
  getScraperConfig(overrides: ScraperConfigOverrides = {}): ScraperConfig {
    return {
      headless: overrides.headless ?? parseBooleanEnv("SCRAPER_HEADLESS", true),
      interRequestDelayMs: clampDelay(
        overrides.interRequestDelayMs ??
          parseIntegerEnv(
            "SCRAPER_INTER_REQUEST_DELAY_MS",
            DEFAULT_INTER_REQUEST_DELAY_MS,
          ),
      ),
      storefront: this.loadStorefrontConfig(),
      dashboard: this.loadDashboardConfig(),
    };
  }

  /**
   * YAML 파일 로드 + zod 검증
   */
  private loadSource<T>(name: string, schema: z.ZodType<T>): T {
    const configPath = path.join(this.sourcesDir, `${name}.yaml`);

    if (!fs.existsSync(configPath)) {
      throw new Error(`Config file not found: ${configPath}`);
    }

    const fileContent = fs.readFileSync(configPath, "utf8");
    const result = schema.safeParse(yaml.load(fileContent));

    if (!result.success) {
      logger.error(
        { source: name, issues: result.error.issues },
        "[ConfigLoader] 설정 검증 실패",
      );
      throw new Error(
        `Invalid config ${name}.yaml: ${result.error.issues
          .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
          .join(", ")}`,
      );
    }

    return result.data;
  }

  /**
   * 캐시 클리어 (테스트용)
   */
  clearCache(): void {
    this.storefrontConfig = null;
    this.dashboardConfig = null;
  }
}

function parseBooleanEnv(name: string, defaultValue: boolean): boolean {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === "") {
    return defaultValue;
  }
  return !["false", "0", "no"].includes(raw.trim().toLowerCase());
}

function parseIntegerEnv(name: string, defaultValue: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === "") {
    return defaultValue;
  }
  const parsed = Number.parseInt(raw, 10);
  return Number.isFinite(parsed) && parsed >= 0 ? parsed : defaultValue;
}

function clampDelay(delayMs: number): number {
  if (Number.isFinite(delayMs) && delayMs >= MIN_INTER_REQUEST_DELAY_MS) {
    return delayMs;
  }
  logger.warn(
    { requested: delayMs, applied: MIN_INTER_REQUEST_DELAY_MS },
    "[ConfigLoader] 요청 간격이 최소값보다 작음 - 최소값 적용",
  );
  return MIN_INTER_REQUEST_DELAY_MS;
}
