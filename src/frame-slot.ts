export interface Frame {
  readonly data: Buffer;
  readonly capturedAt: number;
  /** Increases by one per published frame, starting at 1 */
  readonly sequence: number;
}

/**
 * Holds the most recent captured frame. Publishing swaps in a new frozen
 * object, so a reader holding a snapshot keeps a complete frame even while
 * the next one is being published.
 */
export class LatestFrameSlot {
  private current: Frame | null = null;
  private sequence = 0;

  public publish(data: Buffer, capturedAt: number = Date.now()): Frame {
    const frame: Frame = Object.freeze({ data, capturedAt, sequence: ++this.sequence });
    this.current = frame;
    return frame;
  }

  public snapshot(): Frame | null {
    return this.current;
  }

  public clear(): void {
    this.current = null;
  }
}
