/**
 * 로거 설정
 * Pino 기반 로깅 시스템
 *
 * 기능:
 * - 콘솔 출력 (개발: 색상 포맷, 프로덕션: JSON)
 * - 선택적 파일 출력 (LOG_TO_FILE=true)
 * - 서비스별 로그 파일 분리 (SERVICE_NAME 환경변수 기반)
 * - 일일 로그 로테이션, 30일 보관
 *
 * 파일 출력 구조:
 * - logs/YYYY-MM-DD/{SERVICE_NAME}.log
 * - logs/YYYY-MM-DD/error.log (에러 통합)
 *
 * 테스트 환경(NODE_ENV=test)에서는 LOG_LEVEL 미지정 시 silent
 */

import pino from "pino";
import type { DestinationStream } from "pino";
import { createStream, RotatingFileStream } from "rotating-file-stream";
import path from "path";
import fs from "fs";
import { getTimestampWithTimezone, getDateStringWithDash } from "@/utils/timestamp";

// 환경 변수
const NODE_ENV = process.env.NODE_ENV || "development";
const LOG_LEVEL =
  process.env.LOG_LEVEL ||
  (NODE_ENV === "test"
    ? "silent"
    : NODE_ENV === "production"
      ? "info"
      : "debug");
const LOG_DIR = process.env.LOG_DIR || path.join(process.cwd(), "logs");
const LOG_PRETTY = process.env.LOG_PRETTY === "true";
const LOG_TO_FILE = process.env.LOG_TO_FILE === "true";
const SERVICE_NAME = process.env.SERVICE_NAME || "scraper";

/**
 * 날짜별 디렉터리에 로그 파일 생성
 * 구조: LOG_DIR/YYYY-MM-DD/{prefix}.log
 */
function createRotatingStream(prefix: string): RotatingFileStream {
  return createStream(
    () => {
      const dateDir = getDateStringWithDash();
      const fullDir = path.join(LOG_DIR, dateDir);

      if (!fs.existsSync(fullDir)) {
        fs.mkdirSync(fullDir, { recursive: true });
      }

      return path.join(dateDir, `${prefix}.log`);
    },
    {
      interval: "1d", // 일일 로테이션
      intervalBoundary: true,
      initialRotation: true,
      immutable: true,
      path: LOG_DIR,
      maxFiles: 30,
      compress: false,
      maxSize: "100M",
    },
  );
}

/**
 * 서비스별 라우팅 스트림
 * 에러 레벨은 error.log에도 기록
 */
class ServiceRoutingStream implements DestinationStream {
  private readonly streams = new Map<string, RotatingFileStream>();
  private readonly errorStream = createRotatingStream("error");

  write(chunk: string): boolean {
    let serviceName = SERVICE_NAME;
    let isError = false;

    try {
      const parsed: unknown = JSON.parse(chunk);
      if (typeof parsed === "object" && parsed !== null) {
        const name: unknown = Reflect.get(parsed, "service_name");
        const level: unknown = Reflect.get(parsed, "level");
        if (typeof name === "string") {
          serviceName = name;
        }
        isError = level === "error" || level === "fatal";
      }
    } catch {
      // JSON 파싱 실패 → 기본 서비스 파일에 기록
      serviceName = SERVICE_NAME;
    }

    if (isError) {
      this.errorStream.write(chunk);
    }

    this.getOrCreateStream(serviceName).write(chunk);
    return true;
  }

  private getOrCreateStream(serviceName: string): RotatingFileStream {
    const existing = this.streams.get(serviceName);
    if (existing) {
      return existing;
    }
    const stream = createRotatingStream(serviceName);
    this.streams.set(serviceName, stream);
    return stream;
  }
}

/**
 * Pino 로그 레벨 상수
 */
const LOG_LEVELS = {
  TRACE: 10,
  DEBUG: 20,
  INFO: 30,
  WARN: 40,
  ERROR: 50,
  FATAL: 60,
} as const;

/**
 * 콘솔 출력 포맷터 타입
 */
type ConsoleFormatter = (logObj: Record<string, unknown>, level: number) => void;

/**
 * 개발 환경용 콘솔 포맷터 (색상 + 구조화)
 */
const formatConsolePretty: ConsoleFormatter = (logObj, level) => {
  const msg = typeof logObj.msg === "string" ? logObj.msg : "";
  const time = new Date().toLocaleTimeString("en-US", { hour12: false });
  const levelColor =
    level >= LOG_LEVELS.ERROR
      ? "\x1b[31m"
      : level >= LOG_LEVELS.WARN
        ? "\x1b[33m"
        : "\x1b[32m";
  const levelText =
    level >= LOG_LEVELS.ERROR
      ? "ERROR"
      : level >= LOG_LEVELS.WARN
        ? "WARN"
        : level >= LOG_LEVELS.INFO
          ? "INFO"
          : "DEBUG";

  console.error(
    `[${time}] ${levelColor}${levelText}\x1b[0m \x1b[36m${msg}\x1b[0m`,
  );

  const excludedFields = ["level", "time", "service", "env", "msg"];
  Object.keys(logObj)
    .filter((k) => !excludedFields.includes(k))
    .forEach((field) => {
      const raw = logObj[field];
      const value =
        typeof raw === "object"
          ? JSON.stringify(raw, null, 2)
              .split("\n")
              .map((l) => "  " + l)
              .join("\n")
          : String(raw);
      console.error(`  ${field}: ${value}`);
    });
};

/**
 * 프로덕션 환경용 콘솔 포맷터 (JSON)
 */
const formatConsoleJson: ConsoleFormatter = (logObj, level) => {
  console.log(JSON.stringify({ ...logObj, level }));
};

/**
 * 콘솔 출력 Hook 생성 함수
 * Pino 형식: logger.info(obj, msg) 또는 logger.info(msg)
 */
function createConsoleHook(
  formatter: ConsoleFormatter,
): pino.LoggerOptions["hooks"] {
  return {
    logMethod(inputArgs, method, level) {
      method.apply(this, inputArgs);

      const [first, second] = inputArgs;
      const logObj: Record<string, unknown> = {};

      if (typeof first === "string") {
        logObj.msg = first;
      } else if (typeof first === "object" && first !== null) {
        Object.assign(logObj, first);
        if (typeof second === "string") {
          logObj.msg = second;
        }
      }

      formatter(logObj, level);
    },
  };
}

const baseConfig: pino.LoggerOptions = {
  level: LOG_LEVEL,
  formatters: {
    level: (label: string) => ({ level: label }),
  },
  timestamp: () => `,"time":"${getTimestampWithTimezone()}"`,
  base: {
    service: "app-metrics-scraper",
    env: NODE_ENV,
    service_name: SERVICE_NAME,
  },
  hooks: createConsoleHook(
    NODE_ENV === "development" && LOG_PRETTY
      ? formatConsolePretty
      : formatConsoleJson,
  ),
};

/**
 * 메인 로거 인스턴스
 * 파일 출력이 꺼져 있으면 pino 기본 destination 대신 콘솔 Hook만 사용
 */
const logger: pino.Logger = LOG_TO_FILE
  ? pino(
      baseConfig,
      pino.multistream([
        { level: "debug", stream: new ServiceRoutingStream() },
      ]),
    )
  : pino(baseConfig, { write: () => true });

export { logger };

export type Logger = pino.Logger;
