// API request/response types - shared between client and server

import type { BrowserKind, LauncherFactory } from "./engine-types.js";
import type { BrowserStreamConfig } from "./config.js";
import type { SessionInfo } from "./sessions.js";

export type {
  BrowserStartRequest,
  CreateSessionRequest,
  CloseSessionRequest,
  NavigateRequest,
  ScreenshotRequest,
  ContentRequest,
  ExecuteRequest,
  ClickRequest,
  TypeRequest,
  ElementRequest,
  StreamStartRequest,
  StreamSettingsRequest,
  StreamClickRequest,
} from "./schemas.js";

export interface ServeOptions {
  port?: number;
  host?: string;
  headless?: boolean;
  browserType?: BrowserKind;
  /** Overrides applied on top of loadConfig() */
  config?: Partial<BrowserStreamConfig>;
  /** Engine launcher; defaults to Playwright's browser types */
  launcher?: LauncherFactory;
}

/** Engine operation failures are reported as data, never thrown. */
export interface OperationFailure {
  success: false;
  error: string;
}

export type OperationResult<T extends object = Record<never, never>> = ({ success: true } & T) | OperationFailure;

export type NavigateResult = OperationResult<{
  url: string;
  title: string;
  /** HTTP status of the main document, null for about:blank and same-document navigations */
  status: number | null;
  contentLength: number;
}>;

export type ScreenshotResult = OperationResult<{ screenshot: string }>;

export type EvaluateResult = OperationResult<{ result: unknown }>;

export type ActionResult = OperationResult;

export type ElementTextResult = OperationResult<{ text: string | null }>;

export type PageContentResult = OperationResult<{
  url: string;
  title: string;
  text_content: string;
  html_content?: string;
}>;

export type ClickAtResult = OperationResult<{ x: number; y: number }>;

export interface BrowserStartResponse {
  success: true;
  browserType: BrowserKind;
  headless: boolean;
}

export interface CreateSessionResponse {
  success: true;
  sessionId: string;
}

export interface SuccessResponse {
  success: true;
}

export interface SessionListResponse {
  success: true;
  sessions: SessionInfo[];
}

export interface StreamSettingsResponse {
  success: true;
  fps: number;
  quality: number;
}

export interface StreamStartResponse extends StreamSettingsResponse {
  sessionId: string;
}

export interface StreamStatus {
  enabled: boolean;
  fps: number;
  quality: number;
  sessionId: string;
  viewers: number;
  framesCaptured: number;
}

export interface StatusResponse {
  success: true;
  engine: {
    status: "stopped" | "starting" | "started" | "stopping";
    browserType: BrowserKind | null;
    headless: boolean | null;
  };
  sessions: number;
  stream: StreamStatus;
}

export interface ErrorBody {
  success: false;
  error: string;
  code?: string;
}
