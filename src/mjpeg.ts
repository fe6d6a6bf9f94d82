import { sleep as defaultSleep, type Sleep } from "./capture-loop.js";
import type { LatestFrameSlot } from "./frame-slot.js";

export const BOUNDARY = "frame";
export const MJPEG_CONTENT_TYPE = `multipart/x-mixed-replace; boundary=${BOUNDARY}`;

/** The parts of an HTTP response the multiplexer writes to. */
export interface StreamSink {
  writeHead(statusCode: number, headers: Record<string, string>): unknown;
  write(chunk: Buffer): boolean;
  end(): unknown;
  readonly writableEnded: boolean;
  on(event: "close" | "drain", listener: () => void): unknown;
  off(event: "close" | "drain", listener: () => void): unknown;
}

/** One multipart part: boundary line, part headers, JPEG bytes. */
export function encodePart(jpeg: Buffer): Buffer {
  const head = `--${BOUNDARY}\r\nContent-Type: image/jpeg\r\nContent-Length: ${jpeg.length}\r\n\r\n`;
  return Buffer.concat([Buffer.from(head, "latin1"), jpeg, Buffer.from("\r\n", "latin1")]);
}

function waitForDrain(sink: StreamSink, signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    const done = () => {
      sink.off("drain", done);
      signal.removeEventListener("abort", done);
      resolve();
    };
    sink.on("drain", done);
    signal.addEventListener("abort", done, { once: true });
  });
}

/**
 * Serves the latest-frame slot to any number of viewers.
 *
 * Every viewer polls the slot on its own schedule and only ever reads it, so
 * viewers attach and detach without touching the capture loop, and a slow
 * viewer only delays itself.
 */
export class StreamMultiplexer {
  private viewers = 0;
  private readonly pollIntervalMs: number;
  private readonly sleep: Sleep;

  public constructor(
    private readonly slot: LatestFrameSlot,
    options: { pollIntervalMs?: number; sleep?: Sleep } = {}
  ) {
    this.pollIntervalMs = options.pollIntervalMs ?? 10;
    this.sleep = options.sleep ?? defaultSleep;
  }

  public get viewerCount(): number {
    return this.viewers;
  }

  /**
   * Independent, endless sequence of multipart parts. A part is emitted
   * whenever the slot holds a frame this viewer has not seen yet; a new
   * viewer gets the current frame first. Ends when `signal` aborts.
   */
  public async *openStream(signal?: AbortSignal): AsyncGenerator<Buffer, void, undefined> {
    let lastSequence = 0;
    this.viewers++;
    try {
      while (!signal?.aborted) {
        const frame = this.slot.snapshot();
        if (frame && frame.sequence !== lastSequence) {
          lastSequence = frame.sequence;
          yield encodePart(frame.data);
        }
        await this.sleep(this.pollIntervalMs);
      }
    } finally {
      this.viewers--;
    }
  }

  /** Write the stream to an HTTP response until the client disconnects. */
  public async pipeTo(sink: StreamSink): Promise<void> {
    const controller = new AbortController();
    const onClose = () => controller.abort();
    sink.on("close", onClose);

    sink.writeHead(200, {
      "Content-Type": MJPEG_CONTENT_TYPE,
      "Cache-Control": "no-cache, no-store, must-revalidate",
      Pragma: "no-cache",
      Connection: "close",
    });

    try {
      for await (const part of this.openStream(controller.signal)) {
        if (!sink.write(part)) {
          await waitForDrain(sink, controller.signal);
        }
      }
    } finally {
      sink.off("close", onClose);
      if (!sink.writableEnded) {
        sink.end();
      }
    }
  }
}
