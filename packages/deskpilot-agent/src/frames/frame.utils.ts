import sharp from 'sharp';
import { Frame } from '../actions/input.capability';

/** Per-channel difference ignored as compression or anti-aliasing noise. */
export const PIXEL_TOLERANCE = 10;

export interface EncodedFrame {
  base64: string;
  width: number;
  height: number;
}

const FRAME_CHANNELS: readonly Frame['channels'][] = [1, 2, 3, 4];

export function toFrameChannels(channels: number): Frame['channels'] {
  const match = FRAME_CHANNELS.find((candidate) => candidate === channels);
  if (match === undefined) {
    throw new Error(`Unsupported channel count: ${channels}`);
  }
  return match;
}

/**
 * Fraction of pixels whose first three channels differ by more than the
 * tolerance in any channel. Frames must share dimensions.
 */
export function diffRatio(
  a: Frame,
  b: Frame,
  tolerance: number = PIXEL_TOLERANCE,
): number {
  if (a.width !== b.width || a.height !== b.height) {
    throw new Error(
      `Frame size mismatch: ${a.width}x${a.height} vs ${b.width}x${b.height}`,
    );
  }

  const pixels = a.width * a.height;
  if (pixels === 0) {
    return 0;
  }

  const compared = Math.min(3, a.channels, b.channels);
  let changed = 0;
  for (let i = 0; i < pixels; i++) {
    const offsetA = i * a.channels;
    const offsetB = i * b.channels;
    for (let c = 0; c < compared; c++) {
      if (Math.abs(a.data[offsetA + c] - b.data[offsetB + c]) > tolerance) {
        changed++;
        break;
      }
    }
  }
  return changed / pixels;
}

export async function resizeFrame(
  frame: Frame,
  width: number,
  height: number,
): Promise<Frame> {
  if (frame.width === width && frame.height === height) {
    return frame;
  }

  const { data, info } = await sharp(frame.data, {
    raw: {
      width: frame.width,
      height: frame.height,
      channels: frame.channels,
    },
  })
    .resize(width, height, { fit: 'fill' })
    .raw()
    .toBuffer({ resolveWithObject: true });

  return {
    data,
    width: info.width,
    height: info.height,
    channels: toFrameChannels(info.channels),
  };
}

/**
 * PNG-encodes a frame for the model, shrinking it so its longest edge is
 * at most `maxSize` while keeping the aspect ratio.
 */
export async function encodeFramePng(
  frame: Frame,
  maxSize: number,
): Promise<EncodedFrame> {
  const { data, info } = await sharp(frame.data, {
    raw: {
      width: frame.width,
      height: frame.height,
      channels: frame.channels,
    },
  })
    .resize(maxSize, maxSize, {
      fit: 'inside',
      withoutEnlargement: true,
      kernel: sharp.kernel.lanczos3,
    })
    .png()
    .toBuffer({ resolveWithObject: true });

  return {
    base64: data.toString('base64'),
    width: info.width,
    height: info.height,
  };
}
