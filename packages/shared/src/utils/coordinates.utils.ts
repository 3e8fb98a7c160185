import {
  BoundingBox,
  CalibrationOffset,
  Coordinates,
} from "../types/action.types";

/**
 * Upper bound of the model's normalized coordinate space. Models report
 * positions in [0, NORMALIZED_MAX] on both axes regardless of resolution.
 */
export const NORMALIZED_MAX = 1000;

/**
 * Scale a normalized point to primary-monitor pixels.
 *
 * Out-of-range input is not rejected here; bounds are enforced by the
 * executor right before input is injected.
 */
export function toPixels(
  normX: number,
  normY: number,
  screenWidth: number,
  screenHeight: number,
): Coordinates {
  return {
    x: Math.round((normX / NORMALIZED_MAX) * screenWidth),
    y: Math.round((normY / NORMALIZED_MAX) * screenHeight),
  };
}

/**
 * Inverse of {@link toPixels}. Used by calibration tooling.
 */
export function toNormalized(
  px: number,
  py: number,
  screenWidth: number,
  screenHeight: number,
): Coordinates {
  if (screenWidth <= 0 || screenHeight <= 0) {
    return { x: 0, y: 0 };
  }
  return {
    x: Math.round((px / screenWidth) * NORMALIZED_MAX),
    y: Math.round((py / screenHeight) * NORMALIZED_MAX),
  };
}

export function clampNormalized(value: number): number {
  if (!Number.isFinite(value)) {
    return 0;
  }
  return Math.min(NORMALIZED_MAX, Math.max(0, value));
}

export function isNormalizedInRange(point: Coordinates): boolean {
  return (
    point.x >= 0 &&
    point.x <= NORMALIZED_MAX &&
    point.y >= 0 &&
    point.y <= NORMALIZED_MAX
  );
}

export function isWithinScreen(
  point: Coordinates,
  screenWidth: number,
  screenHeight: number,
): boolean {
  return (
    point.x >= 0 &&
    point.x < screenWidth &&
    point.y >= 0 &&
    point.y < screenHeight
  );
}

/**
 * Nearest in-bounds pixel: x in [0, width - 1], y in [0, height - 1].
 */
export function clampToScreen(
  point: Coordinates,
  screenWidth: number,
  screenHeight: number,
): Coordinates {
  const clamp = (value: number, max: number) =>
    Math.min(Math.max(0, Math.round(value)), Math.max(0, max - 1));
  return {
    x: clamp(point.x, screenWidth),
    y: clamp(point.y, screenHeight),
  };
}

export function applyOffset(
  point: Coordinates,
  offset: CalibrationOffset,
): Coordinates {
  return { x: point.x + offset.dx, y: point.y + offset.dy };
}

export function boundingBoxCenter(box: BoundingBox): Coordinates {
  const [x1, y1, x2, y2] = box;
  return { x: Math.round((x1 + x2) / 2), y: Math.round((y1 + y2) / 2) };
}

export function boundingBoxWidth(box: BoundingBox): number {
  return Math.abs(box[2] - box[0]);
}

export function boundingBoxHeight(box: BoundingBox): number {
  return Math.abs(box[3] - box[1]);
}

/**
 * Converts a normalized `[x1, y1, x2, y2]` region to pixel corners.
 */
export function boundingBoxToPixels(
  box: BoundingBox,
  screenWidth: number,
  screenHeight: number,
): BoundingBox {
  const topLeft = toPixels(box[0], box[1], screenWidth, screenHeight);
  const bottomRight = toPixels(box[2], box[3], screenWidth, screenHeight);
  return [topLeft.x, topLeft.y, bottomRight.x, bottomRight.y];
}

/**
 * Pixel center of a normalized region.
 */
export function pixelBoundingBoxCenter(
  box: BoundingBox,
  screenWidth: number,
  screenHeight: number,
): Coordinates {
  return boundingBoxCenter(boundingBoxToPixels(box, screenWidth, screenHeight));
}

const COORDINATE_PATTERNS: RegExp[] = [
  // {"x": 120, "y": 340}
  /"x"\s*:\s*(-?\d+(?:\.\d+)?)\s*,\s*"y"\s*:\s*(-?\d+(?:\.\d+)?)/,
  // x: 120, y: 340 / x=120 y=340
  /\bx\s*[:=]\s*(-?\d+(?:\.\d+)?)\s*,?\s*y\s*[:=]\s*(-?\d+(?:\.\d+)?)/i,
  // (120, 340)
  /\(\s*(-?\d+(?:\.\d+)?)\s*,\s*(-?\d+(?:\.\d+)?)\s*\)/,
];

/**
 * Pulls the first coordinate pair out of free text. Returns null when the
 * text mentions no recognizable pair.
 */
export function extractCoordinatesFromText(text: string): Coordinates | null {
  for (const pattern of COORDINATE_PATTERNS) {
    const match = pattern.exec(text);
    if (match) {
      const x = Number(match[1]);
      const y = Number(match[2]);
      if (Number.isFinite(x) && Number.isFinite(y)) {
        return { x, y };
      }
    }
  }
  return null;
}
