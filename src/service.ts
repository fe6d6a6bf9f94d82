import { FrameCaptureLoop, type CaptureLoopOptions } from "./capture-loop.js";
import { DEFAULT_CONFIG, type BrowserStreamConfig } from "./config.js";
import { mapStreamClick, type StreamClick } from "./coordinates.js";
import { CommandDispatcher, type DispatcherOptions } from "./dispatcher.js";
import { EngineHandle, playwrightLauncher } from "./engine.js";
import type { BrowserKind, LauncherFactory, MouseButton, Viewport } from "./engine-types.js";
import { SessionNotFoundError } from "./errors.js";
import { LatestFrameSlot } from "./frame-slot.js";
import { StreamMultiplexer } from "./mjpeg.js";
import { ContextPageRegistry, loggingObserver } from "./registry.js";
import { DEFAULT_SESSION_ID, SessionTable, type CreateSessionOptions, type SessionInfo } from "./sessions.js";
import type { CaptureSettings } from "./stream-settings.js";
import type { ClickAtResult, StatusResponse, StreamStatus } from "./types.js";

export interface BrowserServiceOptions {
  config?: BrowserStreamConfig;
  launcher?: LauncherFactory;
  dispatcher?: DispatcherOptions;
  capture?: CaptureLoopOptions;
  /** Poll interval for MJPEG viewers (default: 10) */
  streamPollIntervalMs?: number;
}

export interface StreamStartOptions extends Partial<CaptureSettings> {
  /** Session whose page is streamed (default: "default") */
  sessionId?: string;
}

export interface StreamClickOptions {
  x: number;
  y: number;
  containerWidth?: number;
  containerHeight?: number;
  button?: MouseButton;
}

/**
 * The one object that owns every long-lived resource of the server: engine,
 * registry, sessions, the capture loop and its frame slot. Constructed once
 * and handed to the HTTP layer.
 */
export class BrowserService {
  public readonly config: BrowserStreamConfig;
  public readonly engine: EngineHandle;
  public readonly registry: ContextPageRegistry;
  public readonly sessions: SessionTable;
  public readonly dispatcher: CommandDispatcher;
  public readonly frames = new LatestFrameSlot();
  public readonly capture: FrameCaptureLoop;
  public readonly multiplexer: StreamMultiplexer;

  private starting: Promise<void> | null = null;
  private streamSessionId = DEFAULT_SESSION_ID;
  private streamViewport: Viewport;

  public constructor(options: BrowserServiceOptions = {}) {
    this.config = options.config ?? DEFAULT_CONFIG;
    this.engine = new EngineHandle(options.launcher ?? playwrightLauncher);
    this.registry = new ContextPageRegistry(this.engine, this.config.viewport);
    this.registry.addObserver(loggingObserver);
    this.sessions = new SessionTable(this.registry);
    this.dispatcher = new CommandDispatcher(this.sessions, options.dispatcher);
    this.capture = new FrameCaptureLoop(
      () => this.registry.getPage(this.streamSessionId),
      this.frames,
      this.config.stream,
      options.capture
    );
    this.multiplexer = new StreamMultiplexer(this.frames, { pollIntervalMs: options.streamPollIntervalMs });
    this.streamViewport = { ...this.config.viewport };

    // Registered after the registry, so it runs first on engine stop: the
    // capture loop must not read a page that is being closed.
    this.engine.onStop(async () => {
      await this.capture.stop();
      this.frames.clear();
      this.sessions.stopReaper();
      this.sessions.clear();
      this.retargetStream(DEFAULT_SESSION_ID, { ...this.config.viewport });
    });

    // A closed or reaped stream session hands the stream back to the default session.
    this.sessions.onClosed((sessionId) => {
      if (sessionId === this.streamSessionId && sessionId !== DEFAULT_SESSION_ID) {
        this.retargetStream(DEFAULT_SESSION_ID, this.resolveViewport(DEFAULT_SESSION_ID));
      }
    });
  }

  /**
   * Launch the engine and open the default session. Concurrent callers share
   * one start; a failed start leaves nothing behind and can be retried.
   */
  public start(kind: BrowserKind = this.config.browserType, headless = this.config.headless): Promise<void> {
    if (this.engine.isStarted() && this.sessions.get(DEFAULT_SESSION_ID)) {
      return Promise.resolve();
    }
    if (!this.starting) {
      this.starting = this.startOnce(kind, headless).finally(() => {
        this.starting = null;
      });
    }
    return this.starting;
  }

  /** Lazily start with configured defaults, as session creation does. */
  public ensureStarted(): Promise<void> {
    return this.start();
  }

  public async stop(): Promise<void> {
    if (this.starting) {
      await this.starting.catch(() => undefined);
    }
    await this.engine.stop();
  }

  public async createSession(options: CreateSessionOptions = {}): Promise<SessionInfo> {
    await this.ensureStarted();
    return this.sessions.create(options);
  }

  public closeSession(sessionId: string): Promise<void> {
    return this.sessions.close(sessionId);
  }

  public async startStream(options: StreamStartOptions = {}): Promise<CaptureSettings & { sessionId: string }> {
    await this.ensureStarted();
    const sessionId = options.sessionId ?? this.streamSessionId;
    if (!this.sessions.get(sessionId)) {
      throw new SessionNotFoundError(sessionId);
    }

    this.retargetStream(sessionId, this.resolveViewport(sessionId));

    const settings = this.capture.start({ fps: options.fps, quality: options.quality });
    return { ...settings, sessionId };
  }

  public stopStream(): Promise<void> {
    return this.capture.stop();
  }

  public updateStreamSettings(settings: Partial<CaptureSettings>): CaptureSettings {
    return this.capture.update(settings);
  }

  /** Map a click on the stream viewer to the page and click there. */
  public clickOnStream(click: StreamClickOptions): Promise<ClickAtResult> {
    const viewport = this.streamViewport;
    const mapped = mapStreamClick(this.withContainerDefaults(click, viewport), viewport);
    return this.dispatcher.clickAt(this.streamSessionId, mapped.x, mapped.y, click.button);
  }

  public streamStatus(): StreamStatus {
    const { fps, quality } = this.capture.getSettings();
    return {
      enabled: this.capture.isRunning,
      fps,
      quality,
      sessionId: this.streamSessionId,
      viewers: this.multiplexer.viewerCount,
      framesCaptured: this.capture.frameCount,
    };
  }

  public status(): StatusResponse {
    return {
      success: true,
      engine: {
        status: this.engine.status,
        browserType: this.engine.kind,
        headless: this.engine.headless,
      },
      sessions: this.sessions.size,
      stream: this.streamStatus(),
    };
  }

  /** Viewport used to map stream clicks; fixed until the stream is restarted. */
  public getStreamViewport(): Viewport {
    return { ...this.streamViewport };
  }

  private async startOnce(kind: BrowserKind, headless: boolean): Promise<void> {
    await this.engine.start(kind, headless);
    if (!this.sessions.get(DEFAULT_SESSION_ID)) {
      try {
        await this.sessions.open(DEFAULT_SESSION_ID, DEFAULT_SESSION_ID);
      } catch (err) {
        await this.engine.stop();
        throw err;
      }
    }
    this.sessions.startReaper(this.config.sessionIdleTimeoutMs);
  }

  private retargetStream(sessionId: string, viewport: Viewport): void {
    if (sessionId !== this.streamSessionId) {
      this.frames.clear();
    }
    this.streamSessionId = sessionId;
    this.streamViewport = viewport;
  }

  private resolveViewport(sessionId: string): Viewport {
    const fromPage = this.registry.getPage(sessionId)?.viewportSize();
    if (fromPage) return { ...fromPage };

    const contextId = this.sessions.get(sessionId)?.contextId;
    const fromContext = contextId ? this.registry.getContextViewport(contextId) : undefined;
    return { ...(fromContext ?? this.config.viewport) };
  }

  private withContainerDefaults(click: StreamClickOptions, viewport: Viewport): StreamClick {
    return {
      x: click.x,
      y: click.y,
      containerWidth: click.containerWidth ?? viewport.width,
      containerHeight: click.containerHeight ?? viewport.height,
    };
  }
}
