import type { EnginePage } from "./engine-types.js";
import { errorMessage } from "./errors.js";
import type { LatestFrameSlot } from "./frame-slot.js";
import { clampFps, clampQuality, type CaptureSettings } from "./stream-settings.js";

export type PageSource = () => EnginePage | undefined;

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export interface CaptureLoopOptions {
  /** Delay while no page is available (default: 100) */
  idleDelayMs?: number;
  /** Delay after a failed capture (default: 500) */
  errorBackoffMs?: number;
  /** Per-capture timeout passed to the engine (default: 30000) */
  captureTimeoutMs?: number;
  sleep?: Sleep;
}

/**
 * Background task that keeps the frame slot filled with JPEG captures of one
 * page.
 *
 * Stopped -> Running -> Stopped. Starting while running only updates fps and
 * quality. Stopping sets a flag the task checks before each capture; an
 * in-flight capture is allowed to finish but its frame is discarded.
 */
export class FrameCaptureLoop {
  private settings: CaptureSettings;
  private running = false;
  private generation = 0;
  private task: Promise<void> | null = null;
  private activeTasks = 0;
  private framesCaptured = 0;

  private readonly idleDelayMs: number;
  private readonly errorBackoffMs: number;
  private readonly captureTimeoutMs: number;
  private readonly sleep: Sleep;

  public constructor(
    private readonly pageSource: PageSource,
    private readonly slot: LatestFrameSlot,
    defaults: CaptureSettings = { fps: 30, quality: 80 },
    options: CaptureLoopOptions = {}
  ) {
    this.settings = { fps: clampFps(defaults.fps), quality: clampQuality(defaults.quality) };
    this.idleDelayMs = options.idleDelayMs ?? 100;
    this.errorBackoffMs = options.errorBackoffMs ?? 500;
    this.captureTimeoutMs = options.captureTimeoutMs ?? 30000;
    this.sleep = options.sleep ?? sleep;
  }

  public get isRunning(): boolean {
    return this.running;
  }

  /** Number of capture tasks that have not exited yet. */
  public get taskCount(): number {
    return this.activeTasks;
  }

  public get frameCount(): number {
    return this.framesCaptured;
  }

  public getSettings(): CaptureSettings {
    return { ...this.settings };
  }

  /** Clamp and apply new parameters; takes effect on the next iteration. */
  public update(settings: Partial<CaptureSettings> = {}): CaptureSettings {
    this.settings = {
      fps: settings.fps !== undefined ? clampFps(settings.fps, this.settings.fps) : this.settings.fps,
      quality:
        settings.quality !== undefined ? clampQuality(settings.quality, this.settings.quality) : this.settings.quality,
    };
    return this.getSettings();
  }

  public start(settings: Partial<CaptureSettings> = {}): CaptureSettings {
    const applied = this.update(settings);
    if (this.running) {
      return applied;
    }

    this.running = true;
    const generation = ++this.generation;
    this.task = this.run(generation);
    console.log(`Streaming started at ${applied.fps} FPS with quality ${applied.quality}`);
    return applied;
  }

  /** Stop capturing. Resolves once the current task has exited. */
  public stop(): Promise<void> {
    if (!this.running) {
      return this.task ?? Promise.resolve();
    }

    this.running = false;
    this.generation++;
    console.log("Streaming stopped");
    return this.task ?? Promise.resolve();
  }

  private isCurrent(generation: number): boolean {
    return this.running && generation === this.generation;
  }

  private async run(generation: number): Promise<void> {
    this.activeTasks++;
    try {
      while (this.isCurrent(generation)) {
        await this.tick(generation);
      }
    } finally {
      this.activeTasks--;
    }
  }

  private async tick(generation: number): Promise<void> {
    try {
      const page = this.pageSource();
      if (!page || page.isClosed()) {
        await this.sleep(this.idleDelayMs);
        return;
      }

      const data = await page.screenshot({
        type: "jpeg",
        quality: this.settings.quality,
        timeout: this.captureTimeoutMs,
      });
      if (!this.isCurrent(generation)) return;

      this.slot.publish(data);
      this.framesCaptured++;
      await this.sleep(1000 / this.settings.fps);
    } catch (err) {
      console.error(`Screenshot error: ${errorMessage(err)}`);
      await this.sleep(this.errorBackoffMs);
    }
  }
}
