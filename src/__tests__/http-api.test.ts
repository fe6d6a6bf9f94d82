/**
 * HTTP API endpoint tests
 *
 * Drives the route handlers with mocked request/response objects against a
 * service running on the fake engine, so no server or browser is started.
 */

import { EventEmitter } from "events";
import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { DEFAULT_CONFIG } from "../config.js";
import { createApiHandlers, type ApiHandlers, type ApiResponse } from "../http-routes.js";
import { MJPEG_CONTENT_TYPE } from "../mjpeg.js";
import { BrowserService } from "../service.js";
import { EXAMPLE_HTML, FakeLauncher, launcherFactory, recordingSleep, silenceConsole } from "./fake-engine.js";

interface MockResponse extends ApiResponse {
  statusCode: number;
  body: unknown;
}

function mockResponse(): MockResponse {
  const res: MockResponse = {
    statusCode: 200,
    body: undefined,
    status(code) {
      res.statusCode = code;
      return res;
    },
    json(data) {
      res.body = data;
      return res;
    },
  };
  return res;
}

class MockStreamResponse extends EventEmitter {
  public statusCode = 0;
  public headers: Record<string, string> = {};
  public readonly chunks: Buffer[] = [];
  public writableEnded = false;

  public writeHead(statusCode: number, headers: Record<string, string>): this {
    this.statusCode = statusCode;
    this.headers = headers;
    return this;
  }

  public write(chunk: Buffer): boolean {
    this.chunks.push(chunk);
    return true;
  }

  public end(): this {
    this.writableEnded = true;
    return this;
  }
}

describe("HTTP API", () => {
  let launcher: FakeLauncher;
  let service: BrowserService;
  let handlers: ApiHandlers;
  let logs: ReturnType<typeof silenceConsole>;

  async function call(handler: keyof Omit<ApiHandlers, "mjpeg">, body?: unknown): Promise<MockResponse> {
    const res = mockResponse();
    await handlers[handler]({ body }, res);
    return res;
  }

  function defaultPage() {
    return launcher.fakeOf(service.registry.getPage("default"));
  }

  beforeEach(() => {
    logs = silenceConsole();
    launcher = new FakeLauncher();
    service = new BrowserService({
      config: DEFAULT_CONFIG,
      launcher: launcherFactory(launcher),
      dispatcher: { settleDelayMs: 0 },
      capture: { sleep: recordingSleep() },
    });
    handlers = createApiHandlers(service);
  });

  afterEach(async () => {
    await service.stop();
    vi.restoreAllMocks();
  });

  describe("GET /api/status", () => {
    it("reports a stopped engine before start", async () => {
      const res = await call("status");

      expect(res.statusCode).toBe(200);
      expect(res.body).toEqual({
        success: true,
        engine: { status: "stopped", browserType: null, headless: null },
        sessions: 0,
        stream: { enabled: false, fps: 30, quality: 80, sessionId: "default", viewers: 0, framesCaptured: 0 },
      });
    });
  });

  describe("POST /api/browser/start", () => {
    it("launches the configured engine and opens the default session", async () => {
      const res = await call("browserStart", {});

      expect(res.body).toEqual({ success: true, browserType: "chromium", headless: true });
      expect(launcher.launchCount).toBe(1);
      expect(service.sessions.get("default")).toBeDefined();
    });

    it("accepts an engine kind and headless flag", async () => {
      const res = await call("browserStart", { browserType: "firefox", headless: false });

      expect(res.body).toEqual({ success: true, browserType: "firefox", headless: false });
      expect(launcher.launches[0]).toEqual({ headless: false, args: [] });
    });

    it("rejects an unknown engine kind with 400", async () => {
      const res = await call("browserStart", { browserType: "lynx" });

      expect(res.statusCode).toBe(400);
      expect(res.body).toMatchObject({ success: false, code: "VALIDATION_ERROR" });
      expect(res.body).toHaveProperty("error", expect.stringMatching(/^browserType: /));
      expect(launcher.launchCount).toBe(0);
    });

    it("returns 500 when the engine cannot launch", async () => {
      launcher.failNext = new Error("Executable doesn't exist");

      const res = await call("browserStart", {});

      expect(res.statusCode).toBe(500);
      expect(res.body).toEqual({
        success: false,
        error: "Failed to launch chromium: Executable doesn't exist",
        code: "ENGINE_LIFECYCLE_ERROR",
      });
      expect(logs.error).toHaveBeenCalledWith("Request failed:", "Failed to launch chromium: Executable doesn't exist");
      expect(service.engine.status).toBe("stopped");
    });
  });

  describe("POST /api/browser/stop", () => {
    it("closes every session and the engine", async () => {
      await call("browserStart", {});
      await call("sessionCreate", {});

      const res = await call("browserStop");

      expect(res.body).toEqual({ success: true });
      expect(service.engine.status).toBe("stopped");
      expect(service.sessions.size).toBe(0);
      expect(launcher.latestBrowser().closed).toBe(true);
      expect(launcher.contexts().every((context) => context.closed)).toBe(true);
    });
  });

  describe("sessions", () => {
    it("creates a session, starting the engine on demand", async () => {
      const res = await call("sessionCreate", { viewport: { width: 800, height: 600 } });

      expect(res.body).toEqual({ success: true, sessionId: expect.any(String) });
      expect(service.engine.isStarted()).toBe(true);

      const list = await call("sessionList");
      expect(list.body).toEqual({
        success: true,
        sessions: [
          expect.objectContaining({ sessionId: "default", contextId: "default" }),
          expect.objectContaining({ sessionId: expect.any(String), contextId: expect.any(String) }),
        ],
      });
    });

    it("rejects an invalid viewport with 400", async () => {
      const res = await call("sessionCreate", { viewport: { width: 0, height: 600 } });

      expect(res.statusCode).toBe(400);
      expect(res.body).toMatchObject({ success: false, code: "VALIDATION_ERROR" });
    });

    it("closes a session", async () => {
      const created = await call("sessionCreate", {});
      const sessionId = service.sessions.list()[1]?.sessionId;
      expect(created.body).toEqual({ success: true, sessionId });

      const res = await call("sessionClose", { sessionId });

      expect(res.body).toEqual({ success: true });
      expect(service.sessions.size).toBe(1);
    });

    it("returns 400 for an unknown session", async () => {
      const res = await call("sessionClose", { sessionId: "nope" });

      expect(res.statusCode).toBe(400);
      expect(res.body).toEqual({ success: false, error: "Invalid session ID: nope", code: "SESSION_NOT_FOUND" });
    });

    it("requires a session id", async () => {
      const res = await call("sessionClose", {});

      expect(res.statusCode).toBe(400);
      expect(res.body).toEqual({ success: false, error: "sessionId is required", code: "VALIDATION_ERROR" });
    });
  });

  describe("page operations", () => {
    beforeEach(async () => {
      await call("browserStart", {});
    });

    it("navigates the default session", async () => {
      const res = await call("navigate", { sessionId: "default", url: "https://example.com/" });

      expect(res.statusCode).toBe(200);
      expect(res.body).toEqual({
        success: true,
        url: "https://example.com/",
        title: "Example Domain",
        status: 200,
        contentLength: EXAMPLE_HTML.length,
      });
      expect(defaultPage().gotoCalls[0]?.options).toEqual({ waitUntil: "load", timeout: 30000 });
    });

    it("requires sessionId and url", async () => {
      const noSession = await call("navigate", { url: "https://example.com/" });
      const noUrl = await call("navigate", { sessionId: "default" });

      expect(noSession.statusCode).toBe(400);
      expect(noSession.body).toEqual({ success: false, error: "sessionId is required", code: "VALIDATION_ERROR" });
      expect(noUrl.statusCode).toBe(400);
      expect(noUrl.body).toEqual({ success: false, error: "url is required", code: "VALIDATION_ERROR" });
    });

    it("treats a missing body as empty", async () => {
      const res = await call("navigate");

      expect(res.statusCode).toBe(400);
      expect(res.body).toEqual({ success: false, error: "sessionId is required", code: "VALIDATION_ERROR" });
    });

    it("returns 400 for an unknown session", async () => {
      const res = await call("navigate", { sessionId: "nope", url: "https://example.com/" });

      expect(res.statusCode).toBe(400);
      expect(res.body).toEqual({ success: false, error: "Invalid session ID: nope", code: "SESSION_NOT_FOUND" });
    });

    it("reports engine failures with 200 and success false", async () => {
      defaultPage().failures.set("click", new Error("Timeout 5000ms exceeded."));

      const res = await call("click", { sessionId: "default", selector: "#missing" });

      expect(res.statusCode).toBe(200);
      expect(res.body).toEqual({ success: false, error: "Timeout 5000ms exceeded." });
    });

    it("clamps screenshot quality", async () => {
      const res = await call("screenshot", { sessionId: "default", quality: 5 });

      expect(res.body).toEqual({ success: true, screenshot: Buffer.from("jpeg-1").toString("base64") });
      expect(defaultPage().screenshotCalls[0]).toMatchObject({ quality: 10, fullPage: true });
    });

    it("executes scripts", async () => {
      defaultPage().evaluateImpl = async () => "Example Domain";

      const res = await call("execute", { sessionId: "default", script: "document.title" });

      expect(res.body).toEqual({ success: true, result: "Example Domain" });
    });

    it("returns a bigint script result as a failed operation", async () => {
      defaultPage().evaluateImpl = async () => 1n;

      const res = await call("execute", { sessionId: "default", script: "1n" });

      expect(res.statusCode).toBe(200);
      expect(res.body).toEqual({ success: false, error: "Do not know how to serialize a BigInt" });
    });

    it("fills inputs by default", async () => {
      const res = await call("type", { sessionId: "default", selector: "#q", text: "hello" });

      expect(res.body).toEqual({ success: true });
      expect(defaultPage().inputs).toEqual([{ method: "fill", selector: "#q", text: "hello" }]);
    });

    it("reads element text and page content", async () => {
      await call("navigate", { sessionId: "default", url: "https://example.com/" });
      defaultPage().elements.set("h1", "Example Domain");

      const element = await call("element", { sessionId: "default", selector: "h1" });
      const content = await call("content", { sessionId: "default", includeHtml: true });

      expect(element.body).toEqual({ success: true, text: "Example Domain" });
      expect(content.body).toEqual({
        success: true,
        url: "https://example.com/",
        title: "Example Domain",
        text_content: "Example Domain",
        html_content: EXAMPLE_HTML,
      });
    });
  });

  describe("stream controls", () => {
    it("starts with clamped settings and stops", async () => {
      const started = await call("streamStart", { fps: 500 });

      expect(started.body).toEqual({ success: true, fps: 60, quality: 80, sessionId: "default" });
      expect(service.capture.isRunning).toBe(true);

      const stopped = await call("streamStop");

      expect(stopped.body).toEqual({ success: true });
      expect(service.capture.isRunning).toBe(false);
    });

    it("rejects streaming an unknown session", async () => {
      const res = await call("streamStart", { sessionId: "nope" });

      expect(res.statusCode).toBe(400);
      expect(res.body).toMatchObject({ success: false, code: "SESSION_NOT_FOUND" });
      expect(service.capture.isRunning).toBe(false);
    });

    it("streams the default session again after a browser restart", async () => {
      await call("sessionCreate", {});
      const sessionId = service.sessions.list()[1]?.sessionId;
      await call("streamStart", { sessionId });
      await call("streamStop");
      await call("browserStop");
      await call("browserStart", {});

      const res = await call("streamStart", {});

      expect(res.statusCode).toBe(200);
      expect(res.body).toEqual({ success: true, fps: 30, quality: 80, sessionId: "default" });
    });

    it("updates settings without starting", async () => {
      const res = await call("streamSettings", { quality: 55 });

      expect(res.body).toEqual({ success: true, fps: 30, quality: 55 });
      expect(service.capture.isRunning).toBe(false);
    });

    it("reports the stream in status", async () => {
      await call("streamStart", { fps: 12, quality: 70 });

      const res = await call("status");

      expect(res.body).toMatchObject({
        engine: { status: "started", browserType: "chromium", headless: true },
        sessions: 1,
        stream: { enabled: true, fps: 12, quality: 70, sessionId: "default", viewers: 0 },
      });
    });
  });

  describe("POST /api/click/stream", () => {
    beforeEach(async () => {
      await call("browserStart", {});
    });

    it("maps viewer coordinates to the viewport", async () => {
      const res = await call("streamClick", { x: 100, y: 100, containerWidth: 640, containerHeight: 360 });

      expect(res.body).toEqual({ success: true, x: 200, y: 200 });
      expect(defaultPage().mouse.clicks).toEqual([{ x: 200, y: 200, button: "left" }]);
    });

    it("uses the viewport as the container by default", async () => {
      const res = await call("streamClick", { x: 100, y: 100, button: "right" });

      expect(res.body).toEqual({ success: true, x: 100, y: 100 });
      expect(defaultPage().mouse.clicks).toEqual([{ x: 100, y: 100, button: "right" }]);
    });

    it("maps against the viewport of the streamed session", async () => {
      await call("sessionCreate", { viewport: { width: 800, height: 600 } });
      const sessionId = service.sessions.list()[1]?.sessionId;
      await call("streamStart", { sessionId });

      const res = await call("streamClick", { x: 400, y: 300, containerWidth: 400, containerHeight: 300 });

      expect(res.body).toEqual({ success: true, x: 800, y: 600 });
    });

    it("rejects a zero-sized container", async () => {
      const res = await call("streamClick", { x: 10, y: 10, containerWidth: 0, containerHeight: 360 });

      expect(res.statusCode).toBe(400);
      expect(res.body).toEqual({
        success: false,
        error: "containerWidth and containerHeight must be greater than 0",
        code: "VALIDATION_ERROR",
      });
      expect(defaultPage().mouse.clicks).toEqual([]);
    });

    it("requires both coordinates", async () => {
      const res = await call("streamClick", { y: 10 });

      expect(res.statusCode).toBe(400);
      expect(res.body).toEqual({ success: false, error: "x is required", code: "VALIDATION_ERROR" });
    });
  });

  describe("GET /api/stream/mjpeg", () => {
    it("streams the latest frame until the viewer disconnects", async () => {
      service.frames.publish(Buffer.from("jpeg-frame"));
      const res = new MockStreamResponse();

      const streaming = handlers.mjpeg({}, res);
      await vi.waitFor(() => expect(res.chunks).toHaveLength(1));

      expect(res.statusCode).toBe(200);
      expect(res.headers["Content-Type"]).toBe(MJPEG_CONTENT_TYPE);
      expect(service.streamStatus().viewers).toBe(1);

      res.emit("close");
      await streaming;

      expect(res.writableEnded).toBe(true);
      expect(service.streamStatus().viewers).toBe(0);
    });
  });
});
