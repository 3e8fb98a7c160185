import { Frame } from '../actions/input.capability';

export type FrameSource = () => Promise<Frame>;

export interface StabilityOptions {
  /** Max diff ratio still counted as unchanged. */
  threshold: number;
  maxWaitMs: number;
  checkIntervalMs: number;
  minStableFrames: number;
}

export interface StabilityResult {
  stable: boolean;
  elapsedMs: number;
}

export interface ReadyResult {
  ready: boolean;
  reason: string;
}
