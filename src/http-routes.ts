/**
 * HTTP route handlers for the browser stream API.
 *
 * Handlers are built by createApiHandlers() so they can be driven without a
 * listening server; registerApiRoutes() mounts them on an Express app:
 * - POST /api/browser/start, /api/browser/stop
 * - GET  /api/status, /api/sessions
 * - POST /api/session/create, /api/session/close
 * - POST /api/navigate, /api/screenshot, /api/content, /api/execute
 * - POST /api/click, /api/type, /api/element
 * - POST /api/stream/start, /api/stream/stop, /api/stream/settings
 * - GET  /api/stream/mjpeg
 * - POST /api/click/stream
 */

import type { Express, NextFunction, Request, Response } from "express";
import { errorMessage, toErrorResponse } from "./errors.js";
import type { StreamSink } from "./mjpeg.js";
import {
  browserStartSchema,
  clickSchema,
  closeSessionSchema,
  contentSchema,
  createSessionSchema,
  elementSchema,
  executeSchema,
  navigateSchema,
  screenshotSchema,
  streamClickSchema,
  streamSettingsSchema,
  streamStartSchema,
  typeSchema,
} from "./schemas.js";
import type { BrowserService } from "./service.js";
import type {
  ActionResult,
  BrowserStartResponse,
  ClickAtResult,
  CreateSessionResponse,
  ElementTextResult,
  EvaluateResult,
  NavigateResult,
  PageContentResult,
  ScreenshotResult,
  SessionListResponse,
  StatusResponse,
  StreamSettingsResponse,
  StreamStartResponse,
  SuccessResponse,
} from "./types.js";

/** The parts of an Express request the handlers read. */
export interface ApiRequest {
  body?: unknown;
}

/** The parts of an Express response the handlers write. */
export interface ApiResponse {
  status(code: number): ApiResponse;
  json(body: unknown): unknown;
}

export type ApiHandler = (req: ApiRequest, res: ApiResponse) => Promise<void>;

/** Run `work` on the request body and send its result, or the error envelope. */
function handle<T>(work: (body: unknown) => Promise<T> | T): ApiHandler {
  return async (req, res) => {
    try {
      res.json(await work(req.body ?? {}));
    } catch (err) {
      const { status, body } = toErrorResponse(err);
      if (status >= 500) {
        console.error("Request failed:", errorMessage(err));
      }
      res.status(status).json(body);
    }
  };
}

export function createApiHandlers(service: BrowserService) {
  const { dispatcher } = service;

  return {
    browserStart: handle(async (body): Promise<BrowserStartResponse> => {
      const { browserType, headless } = browserStartSchema.parse(body);
      await service.start(browserType, headless);
      return {
        success: true,
        browserType: service.engine.kind ?? service.config.browserType,
        headless: service.engine.headless ?? service.config.headless,
      };
    }),

    browserStop: handle(async (): Promise<SuccessResponse> => {
      await service.stop();
      return { success: true };
    }),

    status: handle((): StatusResponse => service.status()),

    sessionCreate: handle(async (body): Promise<CreateSessionResponse> => {
      const session = await service.createSession(createSessionSchema.parse(body));
      return { success: true, sessionId: session.sessionId };
    }),

    sessionClose: handle(async (body): Promise<SuccessResponse> => {
      const { sessionId } = closeSessionSchema.parse(body);
      await service.closeSession(sessionId);
      return { success: true };
    }),

    sessionList: handle((): SessionListResponse => ({ success: true, sessions: service.sessions.list() })),

    navigate: handle((body): Promise<NavigateResult> => {
      const { sessionId, ...options } = navigateSchema.parse(body);
      return dispatcher.navigate(sessionId, options);
    }),

    screenshot: handle((body): Promise<ScreenshotResult> => {
      const { sessionId, ...options } = screenshotSchema.parse(body);
      return dispatcher.screenshot(sessionId, options);
    }),

    content: handle((body): Promise<PageContentResult> => {
      const { sessionId, ...options } = contentSchema.parse(body);
      return dispatcher.readPageContent(sessionId, options);
    }),

    execute: handle((body): Promise<EvaluateResult> => {
      const { sessionId, ...options } = executeSchema.parse(body);
      return dispatcher.evaluate(sessionId, options);
    }),

    click: handle((body): Promise<ActionResult> => {
      const { sessionId, ...options } = clickSchema.parse(body);
      return dispatcher.click(sessionId, options);
    }),

    type: handle((body): Promise<ActionResult> => {
      const { sessionId, ...options } = typeSchema.parse(body);
      return dispatcher.typeText(sessionId, options);
    }),

    element: handle((body): Promise<ElementTextResult> => {
      const { sessionId, ...options } = elementSchema.parse(body);
      return dispatcher.readElementText(sessionId, options);
    }),

    streamStart: handle(async (body): Promise<StreamStartResponse> => {
      const started = await service.startStream(streamStartSchema.parse(body));
      return { success: true, ...started };
    }),

    streamStop: handle(async (): Promise<SuccessResponse> => {
      await service.stopStream();
      return { success: true };
    }),

    streamSettings: handle((body): StreamSettingsResponse => {
      const settings = service.updateStreamSettings(streamSettingsSchema.parse(body));
      return { success: true, ...settings };
    }),

    streamClick: handle((body): Promise<ClickAtResult> => service.clickOnStream(streamClickSchema.parse(body))),

    mjpeg: (_req: ApiRequest, res: StreamSink): Promise<void> => service.multiplexer.pipeTo(res),
  };
}

export type ApiHandlers = ReturnType<typeof createApiHandlers>;

/**
 * Register the API on an Express app. Expects cors() and express.json() to be
 * installed before this call.
 */
export function registerApiRoutes(app: Express, service: BrowserService): ApiHandlers {
  const handlers = createApiHandlers(service);

  app.get("/", handlers.status);
  app.get("/api/status", handlers.status);
  app.post("/api/browser/start", handlers.browserStart);
  app.post("/api/browser/stop", handlers.browserStop);

  app.get("/api/sessions", handlers.sessionList);
  app.post("/api/session/create", handlers.sessionCreate);
  app.post("/api/session/close", handlers.sessionClose);

  app.post("/api/navigate", handlers.navigate);
  app.post("/api/screenshot", handlers.screenshot);
  app.post("/api/content", handlers.content);
  app.post("/api/execute", handlers.execute);
  app.post("/api/click", handlers.click);
  app.post("/api/type", handlers.type);
  app.post("/api/element", handlers.element);

  app.post("/api/stream/start", handlers.streamStart);
  app.post("/api/stream/stop", handlers.streamStop);
  app.post("/api/stream/settings", handlers.streamSettings);
  app.get("/api/stream/mjpeg", (req: Request, res: Response, next: NextFunction) => {
    handlers.mjpeg(req, res).catch(next);
  });
  app.post("/api/click/stream", handlers.streamClick);

  // Malformed JSON bodies and anything else that escaped a handler
  app.use((err: unknown, _req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(err);
      return;
    }
    if (err instanceof SyntaxError) {
      res.status(400).json({ success: false, error: errorMessage(err), code: "VALIDATION_ERROR" });
      return;
    }
    const { status, body } = toErrorResponse(err);
    res.status(status).json(body);
  });

  return handlers;
}
