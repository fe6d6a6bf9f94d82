export const FPS_RANGE = { min: 1, max: 60 } as const;
export const QUALITY_RANGE = { min: 10, max: 100 } as const;

export interface CaptureSettings {
  fps: number;
  quality: number;
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}

/** Clamp to 1-60 frames per second. Non-finite input falls back to the default. */
export function clampFps(fps: number, fallback = 30): number {
  return Number.isFinite(fps) ? Math.round(clamp(fps, FPS_RANGE.min, FPS_RANGE.max)) : fallback;
}

/** Clamp to JPEG quality 10-100. Non-finite input falls back to the default. */
export function clampQuality(quality: number, fallback = 80): number {
  return Number.isFinite(quality) ? Math.round(clamp(quality, QUALITY_RANGE.min, QUALITY_RANGE.max)) : fallback;
}

export function clampSettings(settings: CaptureSettings): CaptureSettings {
  return { fps: clampFps(settings.fps), quality: clampQuality(settings.quality) };
}
