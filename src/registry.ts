import type { EngineContext, EngineConsoleMessage, EnginePage, Viewport } from "./engine-types.js";
import type { EngineHandle } from "./engine.js";
import { ContextNotFoundError, errorMessage } from "./errors.js";
import { Mutex } from "./mutex.js";

/** Context entry in the registry */
export interface ContextEntry {
  context: EngineContext;
  viewport: Viewport;
  userAgent?: string;
}

/** Page entry in the registry */
export interface PageEntry {
  page: EnginePage;
  contextId: string;
}

export interface CreateContextOptions {
  viewport?: Viewport;
  userAgent?: string;
}

/**
 * Passive page observer. Callbacks only see events; anything they throw is
 * logged and dropped.
 */
export interface PageObserver {
  onConsole?(pageId: string, message: EngineConsoleMessage): void;
  onPageError?(pageId: string, error: Error): void;
}

export const loggingObserver: PageObserver = {
  onConsole(pageId, message) {
    console.log(`Console ${pageId}: ${message.text()}`);
  },
  onPageError(pageId, error) {
    console.log(`Error ${pageId}: ${error.message}`);
  },
};

/**
 * Maps context and page ids to engine objects.
 *
 * Mutations are serialized through one mutex. Map updates happen
 * synchronously before any engine call is awaited, so a lookup never returns
 * a page whose context is being closed.
 */
export class ContextPageRegistry {
  private readonly contexts = new Map<string, ContextEntry>();
  private readonly pages = new Map<string, PageEntry>();
  private readonly observers = new Set<PageObserver>();
  private readonly mutex = new Mutex();

  public constructor(
    private readonly engine: EngineHandle,
    private readonly defaultViewport: Viewport = { width: 1280, height: 720 }
  ) {
    engine.onStop(() => this.closeAll());
  }

  public addObserver(observer: PageObserver): () => void {
    this.observers.add(observer);
    return () => {
      this.observers.delete(observer);
    };
  }

  public getPage(pageId: string): EnginePage | undefined {
    return this.pages.get(pageId)?.page;
  }

  public getPageEntry(pageId: string): PageEntry | undefined {
    return this.pages.get(pageId);
  }

  public hasContext(contextId: string): boolean {
    return this.contexts.has(contextId);
  }

  public getContextViewport(contextId: string): Viewport | undefined {
    return this.contexts.get(contextId)?.viewport;
  }

  public listContexts(): string[] {
    return Array.from(this.contexts.keys());
  }

  public listPages(): string[] {
    return Array.from(this.pages.keys());
  }

  /**
   * Create a context under `contextId`, closing any context already using it.
   * Returns true when an existing context was replaced.
   */
  public createContext(contextId: string, options: CreateContextOptions = {}): Promise<boolean> {
    return this.mutex.runExclusive(async () => {
      const browser = this.engine.browser();
      const replaced = await this.closeContextUnlocked(contextId);

      const viewport = options.viewport ?? this.defaultViewport;
      const context = await browser.newContext({
        viewport,
        userAgent: options.userAgent,
        ignoreHTTPSErrors: true,
        javaScriptEnabled: true,
        bypassCSP: true,
      });
      this.contexts.set(contextId, { context, viewport, userAgent: options.userAgent });
      console.log(`Created context: ${contextId}`);
      return replaced;
    });
  }

  /** Close a context and every page it owns. Returns false when unknown. */
  public closeContext(contextId: string): Promise<boolean> {
    return this.mutex.runExclusive(() => this.closeContextUnlocked(contextId));
  }

  public createPage(pageId: string, contextId: string): Promise<EnginePage> {
    return this.mutex.runExclusive(async () => {
      const entry = this.contexts.get(contextId);
      if (!entry) {
        throw new ContextNotFoundError(contextId);
      }

      await this.closePageUnlocked(pageId);

      const page = await entry.context.newPage();
      // The context may have been closed while newPage was in flight.
      if (this.contexts.get(contextId) !== entry) {
        await page.close();
        throw new ContextNotFoundError(contextId);
      }

      this.pages.set(pageId, { page, contextId });
      this.wireObservers(pageId, page);
      console.log(`Created page: ${pageId} in context: ${contextId}`);
      return page;
    });
  }

  public closePage(pageId: string): Promise<boolean> {
    return this.mutex.runExclusive(() => this.closePageUnlocked(pageId));
  }

  /** Close every context. Used on engine stop. */
  public closeAll(): Promise<void> {
    return this.mutex.runExclusive(async () => {
      for (const contextId of this.listContexts()) {
        try {
          await this.closeContextUnlocked(contextId);
        } catch (err) {
          console.error(`Error closing context ${contextId}:`, errorMessage(err));
        }
      }
      this.pages.clear();
    });
  }

  private async closeContextUnlocked(contextId: string): Promise<boolean> {
    const entry = this.contexts.get(contextId);
    if (!entry) return false;

    for (const [pageId, pageEntry] of this.pages) {
      if (pageEntry.contextId === contextId) {
        this.pages.delete(pageId);
      }
    }
    this.contexts.delete(contextId);

    await entry.context.close();
    console.log(`Closed context: ${contextId}`);
    return true;
  }

  private async closePageUnlocked(pageId: string): Promise<boolean> {
    const entry = this.pages.get(pageId);
    if (!entry) return false;

    this.pages.delete(pageId);
    if (!entry.page.isClosed()) {
      await entry.page.close();
    }
    console.log(`Closed page: ${pageId}`);
    return true;
  }

  private wireObservers(pageId: string, page: EnginePage): void {
    page.on("console", (message) => {
      this.notify((observer) => observer.onConsole?.(pageId, message));
    });
    page.on("pageerror", (error) => {
      this.notify((observer) => observer.onPageError?.(pageId, error));
    });
  }

  private notify(call: (observer: PageObserver) => void): void {
    for (const observer of this.observers) {
      try {
        call(observer);
      } catch (err) {
        console.warn("Page observer failed:", errorMessage(err));
      }
    }
  }
}
