import {
  applyOffset,
  boundingBoxCenter,
  boundingBoxHeight,
  boundingBoxToPixels,
  boundingBoxWidth,
  clampNormalized,
  clampToScreen,
  extractCoordinatesFromText,
  isNormalizedInRange,
  isWithinScreen,
  pixelBoundingBoxCenter,
  toNormalized,
  toPixels,
} from "./coordinates.utils";

describe("toPixels", () => {
  it("maps the corners and center of a 1920x1080 screen", () => {
    expect(toPixels(0, 0, 1920, 1080)).toEqual({ x: 0, y: 0 });
    expect(toPixels(1000, 1000, 1920, 1080)).toEqual({ x: 1920, y: 1080 });
    expect(toPixels(500, 500, 1920, 1080)).toEqual({ x: 960, y: 540 });
  });

  it("rounds to the nearest pixel", () => {
    // 333 / 1000 * 1366 = 454.878
    expect(toPixels(333, 0, 1366, 768)).toEqual({ x: 455, y: 0 });
  });

  it("does not reject out-of-range input", () => {
    expect(toPixels(1200, -100, 1000, 1000)).toEqual({ x: 1200, y: -100 });
  });
});

describe("toNormalized", () => {
  it("round-trips every normalized point within one unit", () => {
    const screens = [
      [1920, 1080],
      [1366, 768],
      [2560, 1440],
      [3840, 2160],
      [1280, 1024],
    ];

    for (const [width, height] of screens) {
      for (let x = 0; x <= 1000; x += 7) {
        for (let y = 0; y <= 1000; y += 13) {
          const pixel = toPixels(x, y, width, height);
          const back = toNormalized(pixel.x, pixel.y, width, height);
          expect(Math.abs(back.x - x)).toBeLessThanOrEqual(1);
          expect(Math.abs(back.y - y)).toBeLessThanOrEqual(1);
        }
      }
    }
  });

  it("returns the origin for a zero-sized screen", () => {
    expect(toNormalized(10, 10, 0, 0)).toEqual({ x: 0, y: 0 });
  });
});

describe("clamping", () => {
  it("clamps pixels into [0, dimension - 1]", () => {
    expect(clampToScreen({ x: 1920, y: 1080 }, 1920, 1080)).toEqual({
      x: 1919,
      y: 1079,
    });
    expect(clampToScreen({ x: -5, y: 2000 }, 1920, 1080)).toEqual({
      x: 0,
      y: 1079,
    });
    expect(clampToScreen({ x: 10, y: 20 }, 1920, 1080)).toEqual({
      x: 10,
      y: 20,
    });
  });

  it("treats the far edge as outside the screen", () => {
    expect(isWithinScreen({ x: 1919, y: 1079 }, 1920, 1080)).toBe(true);
    expect(isWithinScreen({ x: 1920, y: 0 }, 1920, 1080)).toBe(false);
    expect(isWithinScreen({ x: 0, y: -1 }, 1920, 1080)).toBe(false);
  });

  it("clamps normalized values into [0, 1000]", () => {
    expect(clampNormalized(1500)).toBe(1000);
    expect(clampNormalized(-3)).toBe(0);
    expect(clampNormalized(Number.NaN)).toBe(0);
    expect(clampNormalized(420)).toBe(420);
  });

  it("accepts both ends of the normalized range", () => {
    expect(isNormalizedInRange({ x: 0, y: 1000 })).toBe(true);
    expect(isNormalizedInRange({ x: 1001, y: 500 })).toBe(false);
    expect(isNormalizedInRange({ x: 500, y: -1 })).toBe(false);
  });
});

describe("bounding boxes", () => {
  it("computes center, width and height", () => {
    expect(boundingBoxCenter([100, 200, 300, 400])).toEqual({ x: 200, y: 300 });
    expect(boundingBoxWidth([100, 200, 300, 400])).toBe(200);
    expect(boundingBoxHeight([100, 200, 300, 400])).toBe(200);
  });

  it("converts a normalized box to pixel corners", () => {
    expect(boundingBoxToPixels([250, 500, 750, 1000], 1920, 1080)).toEqual([
      480, 540, 1440, 1080,
    ]);
  });

  it("finds the pixel center of a normalized box", () => {
    expect(pixelBoundingBoxCenter([250, 500, 750, 1000], 1920, 1080)).toEqual({
      x: 960,
      y: 810,
    });
  });
});

describe("applyOffset", () => {
  it("adds the calibration delta", () => {
    expect(applyOffset({ x: 960, y: 540 }, { dx: -4, dy: 7 })).toEqual({
      x: 956,
      y: 547,
    });
  });
});

describe("extractCoordinatesFromText", () => {
  it("reads a JSON-style pair", () => {
    expect(extractCoordinatesFromText('target at {"x": 120, "y": 340}')).toEqual(
      { x: 120, y: 340 },
    );
  });

  it("reads labelled and tuple pairs", () => {
    expect(extractCoordinatesFromText("click x: 55, y: 66 now")).toEqual({
      x: 55,
      y: 66,
    });
    expect(extractCoordinatesFromText("the button is at (700, 810)")).toEqual({
      x: 700,
      y: 810,
    });
  });

  it("returns null when no pair is present", () => {
    expect(extractCoordinatesFromText("nothing to see here")).toBeNull();
  });
});
