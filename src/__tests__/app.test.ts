/**
 * Express app wiring: CORS and the error middleware, driven through
 * supertest on an in-process server.
 */

import request from "supertest";
import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { DEFAULT_CONFIG } from "../config.js";
import { createApp } from "../index.js";
import { BrowserService } from "../service.js";
import { FakeLauncher, launcherFactory, recordingSleep, silenceConsole } from "./fake-engine.js";

describe("createApp", () => {
  let service: BrowserService;

  beforeEach(() => {
    silenceConsole();
    service = new BrowserService({
      config: DEFAULT_CONFIG,
      launcher: launcherFactory(new FakeLauncher()),
      dispatcher: { settleDelayMs: 0 },
      capture: { sleep: recordingSleep() },
    });
  });

  afterEach(async () => {
    await service.stop();
    vi.restoreAllMocks();
  });

  it("allows any origin on API responses", async () => {
    const res = await request(createApp(service)).get("/api/status");

    expect(res.status).toBe(200);
    expect(res.headers["access-control-allow-origin"]).toBe("*");
  });

  it("answers preflight requests", async () => {
    const res = await request(createApp(service))
      .options("/api/navigate")
      .set("Origin", "http://viewer.test")
      .set("Access-Control-Request-Method", "POST");

    expect(res.status).toBe(204);
    expect(res.headers["access-control-allow-origin"]).toBe("*");
    expect(res.headers["access-control-allow-methods"]).toBe("GET,POST,OPTIONS");
    expect(res.headers["access-control-allow-headers"]).toBe("Content-Type");
  });

  it("rejects malformed JSON with a validation envelope and CORS headers", async () => {
    const res = await request(createApp(service))
      .post("/api/navigate")
      .set("Content-Type", "application/json")
      .send("{bad");

    expect(res.status).toBe(400);
    expect(res.headers["access-control-allow-origin"]).toBe("*");
    expect(res.body).toEqual({ success: false, error: expect.any(String), code: "VALIDATION_ERROR" });
  });

  it("routes requests to the handlers", async () => {
    const res = await request(createApp(service)).post("/api/session/create").send({});

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ success: true, sessionId: expect.any(String) });
    expect(service.sessions.size).toBe(2);
  });
});
