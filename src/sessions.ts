import { randomUUID } from "crypto";
import type { EnginePage, EngineRequest, EngineRoute, Viewport } from "./engine-types.js";
import { errorMessage, SessionNotFoundError } from "./errors.js";
import { OPTIMIZED_PAGE_SCRIPTS } from "./page-scripts.js";
import type { ContextPageRegistry } from "./registry.js";

export const DEFAULT_SESSION_ID = "default";

export interface SessionInfo {
  sessionId: string;
  contextId: string;
  createdAt: number;
  lastUsedAt: number;
}

export interface CreateSessionOptions {
  viewport?: Viewport;
  userAgent?: string;
  /** Raise the default timeout, install the optimization scripts and block `blockResources` */
  optimize?: boolean;
  /** Playwright resource types to abort, e.g. "image", "font", "media" */
  blockResources?: string[];
}

/** Default timeout applied to optimized pages (ms) */
export const OPTIMIZED_PAGE_TIMEOUT = 60000;

/**
 * Raise the default timeout, install the optimization init scripts and abort
 * requests for the blocked resource types.
 */
async function optimizePage(page: EnginePage, blockResources: string[]): Promise<void> {
  const blocked = new Set(blockResources);
  page.setDefaultTimeout(OPTIMIZED_PAGE_TIMEOUT);
  for (const script of OPTIMIZED_PAGE_SCRIPTS) {
    await page.addInitScript(script);
  }
  await page.route("**/*", (route: EngineRoute, request: EngineRequest) =>
    blocked.has(request.resourceType()) ? route.abort() : route.continue()
  );
}

/**
 * Externally addressable sessions. A session id is also the id of the page it
 * owns in the registry; each session gets its own context.
 */
export class SessionTable {
  private readonly sessions = new Map<string, SessionInfo>();
  private readonly closeListeners: Array<(sessionId: string) => void> = [];
  private reaper: NodeJS.Timeout | null = null;

  public constructor(
    private readonly registry: ContextPageRegistry,
    private readonly now: () => number = Date.now,
    private readonly newId: () => string = randomUUID
  ) {}

  public get size(): number {
    return this.sessions.size;
  }

  public list(): SessionInfo[] {
    return Array.from(this.sessions.values(), (session) => ({ ...session }));
  }

  public get(sessionId: string): SessionInfo | undefined {
    return this.sessions.get(sessionId);
  }

  /** Throws SessionNotFoundError unless both the session and its page exist. */
  public require(sessionId: string): { session: SessionInfo; page: EnginePage } {
    const session = this.sessions.get(sessionId);
    const page = this.registry.getPage(sessionId);
    if (!session || !page) {
      throw new SessionNotFoundError(sessionId);
    }
    return { session, page };
  }

  /** Called synchronously when a session is removed, before its page closes. */
  public onClosed(listener: (sessionId: string) => void): void {
    this.closeListeners.push(listener);
  }

  public touch(sessionId: string): void {
    const session = this.sessions.get(sessionId);
    if (session) {
      session.lastUsedAt = this.now();
    }
  }

  public async create(options: CreateSessionOptions = {}): Promise<SessionInfo> {
    return this.open(this.newId(), this.newId(), options);
  }

  /** Register a session under a fixed id, e.g. the default session. */
  public async open(sessionId: string, contextId: string, options: CreateSessionOptions = {}): Promise<SessionInfo> {
    await this.registry.createContext(contextId, { viewport: options.viewport, userAgent: options.userAgent });

    const page = await this.registry.createPage(sessionId, contextId).catch(async (err: unknown) => {
      await this.registry.closeContext(contextId);
      throw err;
    });

    if (options.optimize) {
      try {
        await optimizePage(page, options.blockResources ?? []);
      } catch (err) {
        await this.registry.closeContext(contextId);
        throw err;
      }
    }

    const createdAt = this.now();
    const session: SessionInfo = { sessionId, contextId, createdAt, lastUsedAt: createdAt };
    this.sessions.set(sessionId, session);
    console.log(`Session created: ${sessionId}`);
    return { ...session };
  }

  /** Close the session's page, then its context. */
  public async close(sessionId: string): Promise<void> {
    const session = this.sessions.get(sessionId);
    if (!session) {
      throw new SessionNotFoundError(sessionId);
    }

    this.sessions.delete(sessionId);
    for (const listener of this.closeListeners) {
      listener(sessionId);
    }
    try {
      await this.registry.closePage(sessionId);
    } finally {
      await this.registry.closeContext(session.contextId);
    }
    console.log(`Session closed: ${sessionId}`);
  }

  /** Forget all sessions without touching the engine (it is going away). */
  public clear(): void {
    this.sessions.clear();
  }

  /**
   * Close sessions idle for at least `idleTimeoutMs`. The default session is
   * never reaped. Returns the ids that were closed.
   */
  public async reapIdle(idleTimeoutMs: number): Promise<string[]> {
    const cutoff = this.now() - idleTimeoutMs;
    const idle = this.list().filter(
      (session) => session.sessionId !== DEFAULT_SESSION_ID && session.lastUsedAt <= cutoff
    );

    const closed: string[] = [];
    for (const { sessionId } of idle) {
      try {
        await this.close(sessionId);
        closed.push(sessionId);
      } catch (err) {
        console.error(`Error reaping session ${sessionId}:`, errorMessage(err));
      }
    }
    return closed;
  }

  public startReaper(idleTimeoutMs: number): void {
    if (idleTimeoutMs <= 0 || this.reaper) return;

    const interval = Math.min(idleTimeoutMs, 60000);
    this.reaper = setInterval(() => {
      this.reapIdle(idleTimeoutMs).then(
        (closed) => {
          if (closed.length > 0) {
            console.log(`Reaped ${closed.length} idle session(s)`);
          }
        },
        (err: unknown) => console.error("Session reaper failed:", errorMessage(err))
      );
    }, interval);
    this.reaper.unref();
  }

  public stopReaper(): void {
    if (this.reaper) {
      clearInterval(this.reaper);
      this.reaper = null;
    }
  }
}
