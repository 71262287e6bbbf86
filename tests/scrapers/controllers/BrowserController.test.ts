/**
 * BrowserController Test
 *
 * 목적: cleanup() 이 page / context 종료 실패와 무관하게 브라우저를 닫는지 검증
 * (playwright-extra 는 in-process 가짜 브라우저로 대체)
 */

import { describe, it, expect, jest, beforeEach } from "@jest/globals";

const mockPageClose = jest.fn<() => Promise<void>>();
const mockContextClose = jest.fn<() => Promise<void>>();
const mockBrowserClose = jest.fn<() => Promise<void>>();

jest.mock("puppeteer-extra-plugin-stealth", () => jest.fn());

jest.mock("playwright-extra", () => ({
  chromium: {
    use: jest.fn(),
    launch: jest.fn(async () => ({
      newContext: async () => ({
        addInitScript: async () => undefined,
        newPage: async () => ({
          close: mockPageClose,
          setDefaultTimeout: () => undefined,
        }),
        close: mockContextClose,
      }),
      close: mockBrowserClose,
    })),
  },
}));

import { BrowserController } from "@/scrapers/controllers/BrowserController";

describe("BrowserController.cleanup()", () => {
  let controller: BrowserController;

  beforeEach(async () => {
    mockPageClose.mockReset().mockResolvedValue(undefined);
    mockContextClose.mockReset().mockResolvedValue(undefined);
    mockBrowserClose.mockReset().mockResolvedValue(undefined);

    controller = new BrowserController();
    await controller.initialize({ headless: true, defaultTimeoutMs: 5000 });
  });

  it("page / context / browser 를 모두 닫아야 함", async () => {
    expect(controller.isInitialized()).toBe(true);

    await controller.cleanup();

    expect(mockPageClose).toHaveBeenCalledTimes(1);
    expect(mockContextClose).toHaveBeenCalledTimes(1);
    expect(mockBrowserClose).toHaveBeenCalledTimes(1);
    expect(controller.isInitialized()).toBe(false);
  });

  it("page.close() 가 실패해도 context 와 browser 를 닫고 에러를 전달해야 함", async () => {
    mockPageClose.mockRejectedValueOnce(new Error("Target page crashed"));

    await expect(controller.cleanup()).rejects.toThrow("Target page crashed");

    expect(mockContextClose).toHaveBeenCalledTimes(1);
    expect(mockBrowserClose).toHaveBeenCalledTimes(1);
    expect(controller.isInitialized()).toBe(false);
  });

  it("context.close() 가 실패해도 browser 를 닫아야 함", async () => {
    mockContextClose.mockRejectedValueOnce(new Error("Context already closed"));

    await expect(controller.cleanup()).rejects.toThrow("Context already closed");

    expect(mockBrowserClose).toHaveBeenCalledTimes(1);
    expect(controller.isInitialized()).toBe(false);
  });

  it("정리 후 다시 호출하면 아무것도 닫지 않아야 함", async () => {
    mockPageClose.mockRejectedValueOnce(new Error("Target page crashed"));
    await expect(controller.cleanup()).rejects.toThrow("Target page crashed");

    await controller.cleanup();

    expect(mockPageClose).toHaveBeenCalledTimes(1);
    expect(mockContextClose).toHaveBeenCalledTimes(1);
    expect(mockBrowserClose).toHaveBeenCalledTimes(1);
  });
});
