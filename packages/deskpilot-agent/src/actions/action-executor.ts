import { Logger } from '@nestjs/common';
import {
  ActionIntent,
  ActionOutcome,
  ActionRecord,
  ClipboardKind,
  Coordinates,
  ScreenSize,
  clampToScreen,
  intentPoints,
  isWithinScreen,
  mapIntentPoints,
  requiresPoint,
} from '@deskpilot/shared';
import { getPlatformModifierKey } from '../utils/platform';
import { errorMessage } from '../utils/errors';
import { ActionHistory, DEFAULT_HISTORY_LIMIT } from './action-history';
import { ActionError, FailsafeTriggeredError } from './action.errors';
import { InputCapability } from './input.capability';

export interface ActionExecutorOptions {
  screen: ScreenSize;
  /** Intents below this confidence are skipped. */
  confidenceThreshold: number;
  postActionDelayMs: number;
  preActionPauseMs: number;
  failsafe: boolean;
  historyLimit?: number;
}

const CLIPBOARD_KEYS: Record<ClipboardKind, string> = {
  COPY: 'c',
  PASTE: 'v',
  CUT: 'x',
  SELECT_ALL: 'a',
};

const FOCUS_CLICK_SETTLE_MS = 100;
const DETAIL_LIMIT = 50;

/**
 * Runs one intent at a time against the input layer. Pixel coordinates
 * are clamped to the screen before use, and every attempt lands in the
 * bounded history.
 */
export class ActionExecutor {
  private readonly logger = new Logger(ActionExecutor.name);
  readonly history: ActionHistory;

  constructor(
    private readonly input: InputCapability,
    private readonly options: ActionExecutorOptions,
  ) {
    this.history = new ActionHistory(
      options.historyLimit ?? DEFAULT_HISTORY_LIMIT,
    );
  }

  get screen(): ScreenSize {
    return this.options.screen;
  }

  /**
   * @returns false when the intent was skipped by the confidence gate.
   * @throws ActionError when the intent cannot be executed as given.
   * @throws FailsafeTriggeredError when the operator requested a stop.
   */
  async execute(intent: ActionIntent): Promise<boolean> {
    if (intent.confidence < this.options.confidenceThreshold) {
      this.logger.log(
        `Skipping ${intent.kind} on '${intent.target ?? 'unknown'}': confidence ${intent.confidence} below ${this.options.confidenceThreshold}`,
      );
      this.record(intent, 'skipped');
      return false;
    }

    let resolved: ActionIntent = intent;
    try {
      resolved = this.validateCoordinates(intent);

      if (this.options.failsafe && (await this.input.failsafeTriggered())) {
        throw new FailsafeTriggeredError();
      }

      if (this.options.preActionPauseMs > 0) {
        await this.delay(this.options.preActionPauseMs);
      }

      await this.dispatch(resolved);

      if (this.options.postActionDelayMs > 0) {
        await this.delay(this.options.postActionDelayMs);
      }
    } catch (error) {
      this.logger.error(
        `${intent.kind} on '${intent.target ?? 'unknown'}' failed: ${errorMessage(error)}`,
      );
      this.record(resolved, 'failed', errorMessage(error));
      throw error;
    }

    this.record(resolved, 'executed');
    return true;
  }

  private validateCoordinates(intent: ActionIntent): ActionIntent {
    if (requiresPoint(intent.kind) && !('point' in intent && intent.point)) {
      throw new ActionError(`${intent.kind} requires coordinates`, intent.kind);
    }
    if (intent.kind === 'DRAG' && !intent.end) {
      throw new ActionError('DRAG requires end coordinates', intent.kind);
    }

    const { width, height } = this.options.screen;
    return mapIntentPoints(intent, (point) => {
      if (isWithinScreen(point, width, height)) {
        return point;
      }
      const clamped = clampToScreen(point, width, height);
      this.logger.warn(
        `Clamped ${intent.kind} coordinates (${point.x}, ${point.y}) to (${clamped.x}, ${clamped.y}) for ${width}x${height} screen`,
      );
      return clamped;
    });
  }

  private async dispatch(intent: ActionIntent): Promise<void> {
    this.logger.log(
      `Executing ${intent.kind} on '${intent.target ?? 'unknown'}'${this.describePoints(intent)}`,
    );

    switch (intent.kind) {
      case 'CLICK':
        return this.input.click(this.pointOf(intent), 'left', 1);
      case 'DOUBLE_CLICK':
        return this.input.click(this.pointOf(intent), 'left', 2);
      case 'TRIPLE_CLICK':
        return this.input.click(this.pointOf(intent), 'left', 3);
      case 'RIGHT_CLICK':
        return this.input.click(this.pointOf(intent), 'right', 1);
      case 'MOVE':
        return this.input.moveTo(this.pointOf(intent));
      case 'DRAG': {
        if (!intent.end) {
          throw new ActionError('DRAG requires end coordinates', intent.kind);
        }
        return this.input.drag(
          this.pointOf(intent),
          intent.end,
          intent.duration * 1000,
        );
      }
      case 'SCROLL':
        return this.input.scroll(intent.amount, intent.point);
      case 'TYPE': {
        if (!intent.text) {
          throw new ActionError('TYPE requires text', intent.kind);
        }
        if (intent.point) {
          await this.input.click(intent.point, 'left', 1);
          await this.delay(FOCUS_CLICK_SETTLE_MS);
        }
        return this.input.typeText(intent.text);
      }
      case 'PRESS':
        if (!intent.key) {
          throw new ActionError('PRESS requires a key', intent.kind);
        }
        return this.input.pressKey(intent.key);
      case 'HOTKEY':
        if (intent.keys.length === 0) {
          throw new ActionError('HOTKEY requires keys', intent.kind);
        }
        return this.input.hotkey(intent.keys);
      case 'COPY':
      case 'PASTE':
      case 'CUT':
      case 'SELECT_ALL':
        return this.input.hotkey([
          getPlatformModifierKey(),
          CLIPBOARD_KEYS[intent.kind],
        ]);
      case 'FOCUS_WINDOW':
        if (!intent.title) {
          throw new ActionError('FOCUS_WINDOW requires a window title', intent.kind);
        }
        return this.input.focusWindow(intent.title);
      case 'MINIMIZE':
        return this.input.windowCommand('minimize');
      case 'MAXIMIZE':
        return this.input.windowCommand('maximize');
      case 'CLOSE_WINDOW':
        return this.input.windowCommand('close');
      case 'LAUNCH_APP':
        if (!intent.appName) {
          throw new ActionError('LAUNCH_APP requires an app name', intent.kind);
        }
        return this.input.launchApp(intent.appName);
      case 'OPEN_URL':
        if (!intent.url) {
          throw new ActionError('OPEN_URL requires a URL', intent.kind);
        }
        return this.input.openUrl(intent.url);
      case 'WAIT':
        return this.delay(intent.duration * 1000);
      default:
        return this.unknownKind(intent);
    }
  }

  private pointOf(intent: ActionIntent): Coordinates {
    const [point] = intentPoints(intent);
    if (!point) {
      throw new ActionError(`${intent.kind} requires coordinates`, intent.kind);
    }
    return point;
  }

  private unknownKind(intent: never): never {
    throw new ActionError(`Unknown action kind in ${JSON.stringify(intent)}`);
  }

  private describePoints(intent: ActionIntent): string {
    const points = intentPoints(intent);
    if (points.length === 0) {
      return '';
    }
    return ` at ${points.map((p) => `(${p.x}, ${p.y})`).join(' -> ')}`;
  }

  private record(
    intent: ActionIntent,
    outcome: ActionOutcome,
    detail?: string,
  ): void {
    const [point] = intentPoints(intent);
    const record: ActionRecord = {
      kind: intent.kind,
      target: intent.target ?? 'unknown',
      point,
      outcome,
      detail: detail?.slice(0, DETAIL_LIMIT),
      timestamp: Date.now(),
    };
    this.history.push(record);
  }

  private async delay(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}
