import type { EnginePage, MouseButton } from "./engine-types.js";
import { errorMessage } from "./errors.js";
import type {
  ClickOptions,
  ContentOptions,
  ElementOptions,
  ExecuteOptions,
  NavigateOptions,
  ScreenshotOptions,
  TypeOptions,
} from "./schemas.js";
import type { SessionTable } from "./sessions.js";
import { withTimeout } from "./timeouts.js";
import type {
  ActionResult,
  ClickAtResult,
  ElementTextResult,
  EvaluateResult,
  NavigateResult,
  OperationResult,
  PageContentResult,
  ScreenshotResult,
} from "./types.js";

export interface DispatcherOptions {
  /** Pause after navigation so page scripts can run (default: 500) */
  settleDelayMs?: number;
  /** Timeout for screenshots (default: 30000) */
  screenshotTimeoutMs?: number;
}

export const PAGE_TEXT_SCRIPT = "document.body ? document.body.innerText : ''";

/**
 * Single-shot page commands addressed by session id.
 *
 * An unknown session throws SessionNotFoundError before the engine is
 * touched. Anything the engine throws after that comes back as
 * `{ success: false, error }`.
 */
export class CommandDispatcher {
  private readonly settleDelayMs: number;
  private readonly screenshotTimeoutMs: number;

  public constructor(
    private readonly sessions: SessionTable,
    options: DispatcherOptions = {}
  ) {
    this.settleDelayMs = options.settleDelayMs ?? 500;
    this.screenshotTimeoutMs = options.screenshotTimeoutMs ?? 30000;
  }

  public navigate(sessionId: string, { url, waitUntil, timeout }: NavigateOptions): Promise<NavigateResult> {
    return this.run(sessionId, async (page) => {
      const response = await page.goto(url, { waitUntil, timeout });
      if (this.settleDelayMs > 0) {
        await page.waitForTimeout(this.settleDelayMs);
      }
      const title = await page.title();
      const content = await page.content();
      return {
        url: page.url(),
        title,
        status: response ? response.status() : null,
        contentLength: content.length,
      };
    });
  }

  public screenshot(sessionId: string, { fullPage, quality }: ScreenshotOptions): Promise<ScreenshotResult> {
    return this.run(sessionId, async (page) => {
      const buffer = await page.screenshot({
        type: "jpeg",
        quality,
        fullPage,
        timeout: this.screenshotTimeoutMs,
      });
      return { screenshot: buffer.toString("base64") };
    });
  }

  public evaluate(sessionId: string, { script, timeout }: ExecuteOptions): Promise<EvaluateResult> {
    return this.run(sessionId, async (page) => {
      const result = await withTimeout(page.evaluate(script), timeout, `Script evaluation timed out after ${timeout}ms`);
      // undefined would vanish from the JSON body; a bigint throws here rather than in the response
      const json: string | undefined = JSON.stringify(result);
      const parsed: unknown = json === undefined ? null : JSON.parse(json);
      return { result: parsed };
    });
  }

  public click(sessionId: string, { selector, timeout, button }: ClickOptions): Promise<ActionResult> {
    return this.run(sessionId, async (page) => {
      await page.click(selector, { timeout, button });
      return {};
    });
  }

  public typeText(sessionId: string, { selector, text, delay, timeout }: TypeOptions): Promise<ActionResult> {
    return this.run(sessionId, async (page) => {
      if (delay > 0) {
        await page.type(selector, text, { delay, timeout });
      } else {
        await page.fill(selector, text, { timeout });
      }
      return {};
    });
  }

  public readElementText(sessionId: string, { selector, timeout }: ElementOptions): Promise<ElementTextResult> {
    return this.run(sessionId, async (page) => ({
      text: await page.textContent(selector, { timeout }),
    }));
  }

  public readPageContent(sessionId: string, { includeHtml }: ContentOptions): Promise<PageContentResult> {
    return this.run(sessionId, async (page) => {
      const title = await page.title();
      const text = await page.evaluate(PAGE_TEXT_SCRIPT);
      const result: { url: string; title: string; text_content: string; html_content?: string } = {
        url: page.url(),
        title,
        text_content: typeof text === "string" ? text : "",
      };
      if (includeHtml) {
        result.html_content = await page.content();
      }
      return result;
    });
  }

  /** Mouse click at engine viewport coordinates. */
  public clickAt(sessionId: string, x: number, y: number, button: MouseButton = "left"): Promise<ClickAtResult> {
    return this.run(sessionId, async (page) => {
      await page.mouse.click(x, y, { button });
      return { x, y };
    });
  }

  private async run<T extends object>(
    sessionId: string,
    action: (page: EnginePage) => Promise<T>
  ): Promise<OperationResult<T>> {
    const { page } = this.sessions.require(sessionId);
    try {
      const result = await action(page);
      this.sessions.touch(sessionId);
      return { success: true as const, ...result };
    } catch (err) {
      return { success: false, error: errorMessage(err) };
    }
  }
}
