/**
 * Lightweight HTTP client for the browser stream server.
 *
 * Uses only fetch, so callers need neither Playwright nor Express. Engine
 * operation failures come back as `{ success: false, error }` results; HTTP
 * errors (bad input, unknown session, launch failure) are thrown.
 */

import type {
  ActionResult,
  BrowserStartRequest,
  BrowserStartResponse,
  ClickAtResult,
  ClickRequest,
  ContentRequest,
  CreateSessionRequest,
  CreateSessionResponse,
  ElementRequest,
  ElementTextResult,
  EvaluateResult,
  ExecuteRequest,
  NavigateRequest,
  NavigateResult,
  PageContentResult,
  ScreenshotRequest,
  ScreenshotResult,
  SessionListResponse,
  StatusResponse,
  StreamClickRequest,
  StreamSettingsRequest,
  StreamSettingsResponse,
  StreamStartRequest,
  StreamStartResponse,
  SuccessResponse,
  TypeRequest,
} from "./types.js";

type SessionScoped<T> = Omit<T, "sessionId">;

export interface BrowserStreamClient {
  /** Launch the engine (no-op when already running) */
  startBrowser: (options?: BrowserStartRequest) => Promise<BrowserStartResponse>;

  /** Close every session and the engine */
  stopBrowser: () => Promise<void>;

  status: () => Promise<StatusResponse>;

  /** Create a session and return its id */
  createSession: (options?: CreateSessionRequest) => Promise<string>;

  closeSession: (sessionId: string) => Promise<void>;

  listSessions: () => Promise<SessionListResponse["sessions"]>;

  navigate: (sessionId: string, url: string, options?: Omit<SessionScoped<NavigateRequest>, "url">) => Promise<NavigateResult>;

  screenshot: (sessionId: string, options?: SessionScoped<ScreenshotRequest>) => Promise<ScreenshotResult>;

  content: (sessionId: string, options?: SessionScoped<ContentRequest>) => Promise<PageContentResult>;

  execute: (sessionId: string, script: string, options?: Omit<SessionScoped<ExecuteRequest>, "script">) => Promise<EvaluateResult>;

  click: (sessionId: string, selector: string, options?: Omit<SessionScoped<ClickRequest>, "selector">) => Promise<ActionResult>;

  type: (
    sessionId: string,
    selector: string,
    text: string,
    options?: Omit<SessionScoped<TypeRequest>, "selector" | "text">
  ) => Promise<ActionResult>;

  element: (sessionId: string, selector: string, options?: Omit<SessionScoped<ElementRequest>, "selector">) => Promise<ElementTextResult>;

  startStream: (options?: StreamStartRequest) => Promise<StreamStartResponse>;

  stopStream: () => Promise<void>;

  updateStreamSettings: (settings: StreamSettingsRequest) => Promise<StreamSettingsResponse>;

  /** Click on the stream at viewer coordinates */
  clickOnStream: (click: StreamClickRequest) => Promise<ClickAtResult>;

  /** URL of the MJPEG stream, e.g. for an <img> src */
  mjpegUrl: () => string;
}

/**
 * Connect to a browser stream server. No request is made until a method is
 * called.
 */
export function connectLite(serverUrl = "http://localhost:5000"): BrowserStreamClient {
  const baseUrl = serverUrl.replace(/\/+$/, "");

  async function jsonRequest<T>(path: string, options?: RequestInit): Promise<T> {
    const res = await fetch(`${baseUrl}${path}`, {
      ...options,
      headers: {
        "Content-Type": "application/json",
        ...options?.headers,
      },
    });

    if (!res.ok) {
      const error = await res.text();
      throw new Error(`HTTP ${res.status}: ${error}`);
    }

    return res.json() as Promise<T>;
  }

  function post<T>(path: string, body: object = {}): Promise<T> {
    return jsonRequest<T>(path, { method: "POST", body: JSON.stringify(body) });
  }

  return {
    startBrowser(options = {}) {
      return post<BrowserStartResponse>("/api/browser/start", options);
    },

    async stopBrowser() {
      await post<SuccessResponse>("/api/browser/stop");
    },

    status() {
      return jsonRequest<StatusResponse>("/api/status");
    },

    async createSession(options = {}) {
      const result = await post<CreateSessionResponse>("/api/session/create", options);
      return result.sessionId;
    },

    async closeSession(sessionId) {
      await post<SuccessResponse>("/api/session/close", { sessionId });
    },

    async listSessions() {
      const result = await jsonRequest<SessionListResponse>("/api/sessions");
      return result.sessions;
    },

    navigate(sessionId, url, options = {}) {
      return post<NavigateResult>("/api/navigate", { sessionId, url, ...options });
    },

    screenshot(sessionId, options = {}) {
      return post<ScreenshotResult>("/api/screenshot", { sessionId, ...options });
    },

    content(sessionId, options = {}) {
      return post<PageContentResult>("/api/content", { sessionId, ...options });
    },

    execute(sessionId, script, options = {}) {
      return post<EvaluateResult>("/api/execute", { sessionId, script, ...options });
    },

    click(sessionId, selector, options = {}) {
      return post<ActionResult>("/api/click", { sessionId, selector, ...options });
    },

    type(sessionId, selector, text, options = {}) {
      return post<ActionResult>("/api/type", { sessionId, selector, text, ...options });
    },

    element(sessionId, selector, options = {}) {
      return post<ElementTextResult>("/api/element", { sessionId, selector, ...options });
    },

    startStream(options = {}) {
      return post<StreamStartResponse>("/api/stream/start", options);
    },

    async stopStream() {
      await post<SuccessResponse>("/api/stream/stop");
    },

    updateStreamSettings(settings) {
      return post<StreamSettingsResponse>("/api/stream/settings", settings);
    },

    clickOnStream(click) {
      return post<ClickAtResult>("/api/click/stream", click);
    },

    mjpegUrl() {
      return `${baseUrl}/api/stream/mjpeg`;
    },
  };
}
