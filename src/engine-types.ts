// The slice of Playwright's API this service drives. Playwright's own
// BrowserType, Browser, BrowserContext and Page satisfy these shapes, and the
// tests substitute in-process fakes.

export type BrowserKind = "chromium" | "firefox" | "webkit";

export type WaitUntil = "load" | "domcontentloaded" | "networkidle";

export type MouseButton = "left" | "right" | "middle";

export interface Viewport {
  width: number;
  height: number;
}

export interface EngineResponse {
  status(): number;
}

export interface EngineConsoleMessage {
  text(): string;
}

export interface EngineRequest {
  resourceType(): string;
}

export interface EngineRoute {
  abort(): Promise<void>;
  continue(): Promise<void>;
}

export interface EngineMouse {
  click(x: number, y: number, options?: { button?: MouseButton }): Promise<void>;
}

export interface EnginePage {
  readonly mouse: EngineMouse;
  goto(url: string, options?: { waitUntil?: WaitUntil; timeout?: number }): Promise<EngineResponse | null>;
  waitForTimeout(timeout: number): Promise<void>;
  url(): string;
  title(): Promise<string>;
  content(): Promise<string>;
  screenshot(options?: {
    type?: "jpeg" | "png";
    quality?: number;
    fullPage?: boolean;
    timeout?: number;
  }): Promise<Buffer>;
  evaluate(script: string): Promise<unknown>;
  click(selector: string, options?: { timeout?: number; button?: MouseButton }): Promise<void>;
  fill(selector: string, value: string, options?: { timeout?: number }): Promise<void>;
  type(selector: string, text: string, options?: { delay?: number; timeout?: number }): Promise<void>;
  textContent(selector: string, options?: { timeout?: number }): Promise<string | null>;
  viewportSize(): Viewport | null;
  setDefaultTimeout(timeout: number): void;
  route(url: string, handler: (route: EngineRoute, request: EngineRequest) => unknown): Promise<void>;
  addInitScript(script: string): Promise<void>;
  on(event: "console", listener: (message: EngineConsoleMessage) => void): unknown;
  on(event: "pageerror", listener: (error: Error) => void): unknown;
  isClosed(): boolean;
  close(): Promise<void>;
}

export interface EngineContextOptions {
  viewport?: Viewport;
  userAgent?: string;
  ignoreHTTPSErrors?: boolean;
  javaScriptEnabled?: boolean;
  bypassCSP?: boolean;
}

export interface EngineContext {
  newPage(): Promise<EnginePage>;
  close(): Promise<void>;
}

export interface EngineBrowser {
  newContext(options?: EngineContextOptions): Promise<EngineContext>;
  close(): Promise<void>;
}

export interface EngineLauncher {
  launch(options: { headless: boolean; args: string[] }): Promise<EngineBrowser>;
}

/** Resolves a launcher for each engine kind; Playwright's are the default. */
export type LauncherFactory = (kind: BrowserKind) => EngineLauncher;
