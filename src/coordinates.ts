import type { Viewport } from "./engine-types.js";
import { ValidationError } from "./errors.js";

export interface StreamClick {
  /** Click position inside the viewer's container, origin top-left */
  x: number;
  y: number;
  containerWidth: number;
  containerHeight: number;
}

export interface Point {
  x: number;
  y: number;
}

/**
 * Translate a click on the displayed stream into engine viewport pixels.
 * The two axes scale independently, so a letterboxed or stretched viewer
 * still lands on the right element.
 */
export function mapStreamClick(click: StreamClick, viewport: Viewport): Point {
  const { x, y, containerWidth, containerHeight } = click;

  if (!Number.isFinite(containerWidth) || !Number.isFinite(containerHeight)) {
    throw new ValidationError("containerWidth and containerHeight must be finite numbers");
  }
  if (containerWidth <= 0 || containerHeight <= 0) {
    throw new ValidationError("containerWidth and containerHeight must be greater than 0");
  }
  if (!Number.isFinite(x) || !Number.isFinite(y)) {
    throw new ValidationError("x and y must be finite numbers");
  }

  const scaleX = viewport.width / containerWidth;
  const scaleY = viewport.height / containerHeight;
  return { x: x * scaleX, y: y * scaleY };
}
