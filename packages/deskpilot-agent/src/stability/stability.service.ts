import { Inject, Injectable, Logger, Optional } from '@nestjs/common';
import { AgentConfigService } from '../config/agent-config.service';
import {
  BUSY_CURSOR_PROBE,
  BusyCursorProbe,
  Frame,
  SCREEN_CAPTURE,
  ScreenCapture,
} from '../actions/input.capability';
import { diffRatio, resizeFrame } from '../frames/frame.utils';
import { errorMessage } from '../utils/errors';
import {
  FrameSource,
  ReadyResult,
  StabilityOptions,
  StabilityResult,
} from './stability.types';

/**
 * Decides when the UI has stopped visibly changing. A timeout is a normal
 * outcome, reported through the result rather than thrown.
 */
@Injectable()
export class StabilityService {
  private readonly logger = new Logger(StabilityService.name);

  constructor(
    @Inject(SCREEN_CAPTURE) private readonly screen: ScreenCapture,
    private readonly config: AgentConfigService,
    @Optional()
    @Inject(BUSY_CURSOR_PROBE)
    private readonly busyCursor?: BusyCursorProbe,
  ) {}

  /**
   * Fraction of differing pixels; the second frame is resized to the first
   * when their sizes differ.
   */
  async difference(a: Frame, b: Frame): Promise<number> {
    const comparable =
      a.width === b.width && a.height === b.height
        ? b
        : await resizeFrame(b, a.width, a.height);
    return diffRatio(a, comparable);
  }

  async waitStable(
    capture: FrameSource = () => this.screen.capture(),
    overrides: Partial<StabilityOptions> = {},
  ): Promise<StabilityResult> {
    const options = this.resolveOptions(overrides);
    const start = Date.now();
    let previous: Frame | null = null;
    let stableCount = 0;

    while (Date.now() - start < options.maxWaitMs) {
      const current = await capture();

      if (previous) {
        const ratio = await this.difference(previous, current);
        if (ratio <= options.threshold) {
          stableCount++;
          this.logger.debug(
            `Screen stable (diff=${(ratio * 100).toFixed(1)}%, ${stableCount}/${options.minStableFrames})`,
          );
          if (stableCount >= options.minStableFrames) {
            const elapsedMs = Date.now() - start;
            this.logger.log(`Screen stabilized after ${elapsedMs}ms`);
            return { stable: true, elapsedMs };
          }
        } else {
          stableCount = 0;
          this.logger.debug(
            `Screen changing (diff=${(ratio * 100).toFixed(1)}%)`,
          );
        }
      }

      previous = current;
      await this.delay(options.checkIntervalMs);
    }

    const elapsedMs = Date.now() - start;
    this.logger.warn(`Screen did not stabilize within ${options.maxWaitMs}ms`);
    return { stable: false, elapsedMs };
  }

  /**
   * Waits for a busy cursor to clear, then for the frames to settle.
   */
  async ready(
    capture?: FrameSource,
    overrides: Partial<StabilityOptions> = {},
  ): Promise<ReadyResult> {
    const options = this.resolveOptions(overrides);
    try {
      if (!(await this.waitForCursor(options))) {
        return { ready: false, reason: 'Loading cursor timeout' };
      }

      const { stable, elapsedMs } = await this.waitStable(capture, options);
      return stable
        ? { ready: true, reason: `Ready after ${(elapsedMs / 1000).toFixed(2)}s` }
        : { ready: false, reason: 'Screen did not stabilize' };
    } catch (error) {
      this.logger.warn(`Stability check failed: ${errorMessage(error)}`);
      return {
        ready: false,
        reason: `Stability check failed: ${errorMessage(error)}`,
      };
    }
  }

  private async waitForCursor(options: StabilityOptions): Promise<boolean> {
    if (!this.busyCursor || !(await this.busyCursor.isBusyCursorVisible())) {
      return true;
    }

    this.logger.debug('Loading cursor visible, waiting for it to clear');
    const start = Date.now();
    while (Date.now() - start < options.maxWaitMs) {
      await this.delay(options.checkIntervalMs);
      if (!(await this.busyCursor.isBusyCursorVisible())) {
        return true;
      }
    }
    return false;
  }

  private resolveOptions(overrides: Partial<StabilityOptions>): StabilityOptions {
    const { threshold, maxWaitMs, checkIntervalMs, minStableFrames } =
      this.config.stability;
    return {
      threshold,
      maxWaitMs,
      checkIntervalMs,
      minStableFrames,
      ...overrides,
    };
  }

  private async delay(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}
