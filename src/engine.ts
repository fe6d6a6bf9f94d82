import { chromium, firefox, webkit } from "playwright";
import type { BrowserKind, EngineBrowser, EngineLauncher, LauncherFactory } from "./engine-types.js";
import { EngineLifecycleError, EngineNotStartedError, errorMessage } from "./errors.js";

/**
 * Chromium flags used for every launch. Sandboxing and site isolation are
 * switched off on purpose: pages driven through this service run with
 * cross-origin access and without the setuid sandbox, which containers
 * usually cannot provide. Do not expose the service to untrusted networks.
 */
export const CHROMIUM_ARGS = [
  "--disable-gpu",
  "--disable-dev-shm-usage",
  "--disable-setuid-sandbox",
  "--no-sandbox",
  "--disable-web-security",
  "--disable-features=IsolateOrigins,site-per-process",
  "--disable-site-isolation-trials",
];

export const playwrightLauncher: LauncherFactory = (kind: BrowserKind): EngineLauncher => {
  switch (kind) {
    case "chromium":
      return chromium;
    case "firefox":
      return firefox;
    case "webkit":
      return webkit;
  }
};

export function launchArgs(kind: BrowserKind): string[] {
  return kind === "chromium" ? [...CHROMIUM_ARGS] : [];
}

type EngineState =
  | { status: "stopped" }
  | { status: "starting"; promise: Promise<EngineBrowser> }
  | { status: "started"; browser: EngineBrowser; kind: BrowserKind; headless: boolean }
  | { status: "stopping"; promise: Promise<void> };

export type StopHook = () => Promise<void> | void;

/**
 * Owns the single launched engine process.
 *
 * `start` happens once: concurrent callers share the in-flight launch promise
 * instead of racing a started flag. `stop` runs the registered stop hooks in
 * reverse registration order before the browser itself is closed.
 */
export class EngineHandle {
  private state: EngineState = { status: "stopped" };
  private readonly stopHooks: StopHook[] = [];

  public constructor(private readonly launcherFor: LauncherFactory = playwrightLauncher) {}

  public get status(): EngineState["status"] {
    return this.state.status;
  }

  public isStarted(): boolean {
    return this.state.status === "started";
  }

  public get kind(): BrowserKind | null {
    return this.state.status === "started" ? this.state.kind : null;
  }

  public get headless(): boolean | null {
    return this.state.status === "started" ? this.state.headless : null;
  }

  /** The running browser; throws when the engine has not been started. */
  public browser(): EngineBrowser {
    if (this.state.status !== "started") {
      throw new EngineNotStartedError();
    }
    return this.state.browser;
  }

  public onStop(hook: StopHook): () => void {
    this.stopHooks.push(hook);
    return () => {
      const index = this.stopHooks.indexOf(hook);
      if (index >= 0) this.stopHooks.splice(index, 1);
    };
  }

  public async start(kind: BrowserKind = "chromium", headless = true): Promise<void> {
    switch (this.state.status) {
      case "started":
        return;
      case "starting":
        await this.state.promise;
        return;
      case "stopping":
        await this.state.promise;
        return this.start(kind, headless);
      case "stopped":
        break;
    }

    const promise = this.launch(kind, headless);
    this.state = { status: "starting", promise };

    try {
      const browser = await promise;
      this.state = { status: "started", browser, kind, headless };
      console.log(`Browser started: ${kind} (headless: ${headless})`);
    } catch (err) {
      this.state = { status: "stopped" };
      throw err;
    }
  }

  public async stop(): Promise<void> {
    switch (this.state.status) {
      case "stopped":
        return;
      case "stopping":
        return this.state.promise;
      case "starting":
        // Let the launch settle so the process is not leaked.
        try {
          await this.state.promise;
        } catch {
          return;
        }
        return this.stop();
      case "started":
        break;
    }

    const { browser } = this.state;
    const promise = this.shutdown(browser);
    this.state = { status: "stopping", promise };

    try {
      await promise;
    } finally {
      this.state = { status: "stopped" };
    }
  }

  private async launch(kind: BrowserKind, headless: boolean): Promise<EngineBrowser> {
    try {
      return await this.launcherFor(kind).launch({ headless, args: launchArgs(kind) });
    } catch (err) {
      throw new EngineLifecycleError(`Failed to launch ${kind}: ${errorMessage(err)}`, { cause: err });
    }
  }

  private async shutdown(browser: EngineBrowser): Promise<void> {
    for (const hook of [...this.stopHooks].reverse()) {
      try {
        await hook();
      } catch (err) {
        console.error("Error during browser shutdown:", errorMessage(err));
      }
    }

    try {
      await browser.close();
    } catch (err) {
      throw new EngineLifecycleError(`Failed to close browser: ${errorMessage(err)}`, { cause: err });
    }
    console.log("Browser stopped");
  }
}
