// src/nut/nut.service.ts
import { Injectable, Logger } from '@nestjs/common';
import {
  Button,
  getActiveWindow,
  getWindows,
  Key,
  keyboard,
  mouse,
  Point,
  screen,
} from '@nut-tree-fork/nut-js';
import { spawn } from 'child_process';
import { Coordinates, ScreenSize } from '@deskpilot/shared';
import { ActionError } from '../actions/action.errors';
import {
  BusyCursorProbe,
  Frame,
  InputCapability,
  MouseButton,
  ScreenCapture,
  WindowCommand,
  WindowContextProvider,
} from '../actions/input.capability';
import { resizeFrame, toFrameChannels } from '../frames/frame.utils';
import { errorMessage } from '../utils/errors';
import {
  getUrlOpener,
  getWindowCommandShortcut,
  isMacOS,
  isWindows,
  logPlatformInfo,
} from '../utils/platform';
import keymap from './keymap.json';

const NUT_KEYS: Array<[string, Key]> = Object.entries(Key).filter(
  (entry): entry is [string, Key] => typeof entry[1] === 'number',
);

// Lowercase nut-js key name -> key
const NutKeyMapLowercase = new Map<string, Key>(
  NUT_KEYS.map(([name, value]) => [name.toLowerCase(), value]),
);

const KEY_ALIASES: Record<string, string> = keymap.aliases;
const CHARACTER_KEYS: Record<string, string> = keymap.characters;
const SHIFTED_CHARACTER_KEYS: Record<string, string> = keymap.shiftedCharacters;

const BUTTONS: Record<MouseButton, Button> = {
  left: Button.LEFT,
  right: Button.RIGHT,
  middle: Button.MIDDLE,
};

const KEYSTROKE_HOLD_MS = 50;
const CHORD_HOLD_MS = 100;
const DRAG_STEP_MS = 20;
const LAUNCHER_OPEN_MS = 500;
const LAUNCHER_SEARCH_MS = 2000;
const CORNER_MARGIN_PX = 1;
const MAX_LISTED_WINDOWS = 5;

export const WINDOW_CONTEXT_UNAVAILABLE = 'Window context unavailable';

/**
 * Desktop access through nut-js: input injection, primary-display capture
 * and window inspection.
 */
@Injectable()
export class NutService
  implements
    InputCapability,
    ScreenCapture,
    BusyCursorProbe,
    WindowContextProvider
{
  private readonly logger = new Logger(NutService.name);

  constructor() {
    logPlatformInfo(this.logger);

    mouse.config.autoDelayMs = 100;
    keyboard.config.autoDelayMs = 100;
  }

  async click(
    point: Coordinates,
    button: MouseButton,
    count: number,
  ): Promise<void> {
    this.logger.log(
      `[MOUSE] ${button} click x${count} at (${point.x}, ${point.y})`,
    );
    await mouse.setPosition(new Point(point.x, point.y));
    if (count === 2) {
      await mouse.doubleClick(BUTTONS[button]);
      return;
    }
    for (let i = 0; i < count; i++) {
      await mouse.click(BUTTONS[button]);
    }
  }

  async moveTo(point: Coordinates): Promise<void> {
    this.logger.log(`[MOUSE] Moving to (${point.x}, ${point.y})`);
    await mouse.setPosition(new Point(point.x, point.y));
  }

  /**
   * Press at `from`, glide to `to` over `durationMs`, release.
   */
  async drag(
    from: Coordinates,
    to: Coordinates,
    durationMs: number,
  ): Promise<void> {
    this.logger.log(
      `[MOUSE] Dragging (${from.x}, ${from.y}) -> (${to.x}, ${to.y}) over ${durationMs}ms`,
    );
    await mouse.setPosition(new Point(from.x, from.y));
    await mouse.pressButton(Button.LEFT);
    try {
      const steps = Math.max(1, Math.round(durationMs / DRAG_STEP_MS));
      for (let step = 1; step <= steps; step++) {
        const x = Math.round(from.x + ((to.x - from.x) * step) / steps);
        const y = Math.round(from.y + ((to.y - from.y) * step) / steps);
        await mouse.setPosition(new Point(x, y));
        if (step < steps) {
          await this.delay(durationMs / steps);
        }
      }
    } finally {
      await mouse.releaseButton(Button.LEFT);
    }
  }

  async scroll(amount: number, at?: Coordinates): Promise<void> {
    this.logger.log(`[MOUSE] Scrolling ${amount}`);
    if (at) {
      await mouse.setPosition(new Point(at.x, at.y));
    }
    if (amount > 0) {
      await mouse.scrollUp(amount);
    } else if (amount < 0) {
      await mouse.scrollDown(-amount);
    }
  }

  async pressKey(key: string): Promise<void> {
    await this.hotkey([key]);
  }

  /**
   * Holds every key of the chord, then releases them in reverse order.
   * Entries may be compound, e.g. "ctrl+shift+p".
   */
  async hotkey(keys: string[]): Promise<void> {
    const nutKeys = keys
      .flatMap((key) => this.parseKeyInput(key))
      .map((key) => this.validateKey(key));
    if (nutKeys.length === 0) {
      throw new ActionError('No keys to press');
    }

    this.logger.log(`[KEYBOARD] Sending keys: ${keys.join(',')}`);
    await keyboard.pressKey(...nutKeys);
    await this.delay(CHORD_HOLD_MS);
    await keyboard.releaseKey(...[...nutKeys].reverse());
  }

  async typeText(text: string): Promise<void> {
    this.logger.log(
      `[KEYBOARD] Typing "${text.substring(0, 100)}" (${text.length} chars)`,
    );

    if (isWindows()) {
      await this.delay(500);
    }

    for (let i = 0; i < text.length; i++) {
      const char = text[i];
      if (char === '\r' && text[i + 1] === '\n') {
        continue;
      }

      const keyInfo = this.charToKeyInfo(char);
      if (!keyInfo) {
        throw new ActionError(`No key mapping found for character: ${char}`);
      }

      const chord = keyInfo.withShift
        ? [Key.LeftShift, keyInfo.keyCode]
        : [keyInfo.keyCode];
      await keyboard.pressKey(...chord);
      await this.delay(KEYSTROKE_HOLD_MS);
      await keyboard.releaseKey(...chord);
    }
  }

  async focusWindow(title: string): Promise<void> {
    const wanted = title.toLowerCase();
    for (const win of await getWindows()) {
      const winTitle = await win.title;
      if (winTitle.toLowerCase().includes(wanted)) {
        this.logger.log(`[WINDOW] Focusing '${winTitle}'`);
        await win.focus();
        return;
      }
    }
    throw new ActionError(`No window matching '${title}'`, 'FOCUS_WINDOW');
  }

  async windowCommand(command: WindowCommand): Promise<void> {
    this.logger.log(`[WINDOW] ${command}`);
    await this.hotkey(getWindowCommandShortcut(command));
  }

  /**
   * Opens the OS launcher, searches for the app and starts the first hit.
   */
  async launchApp(name: string): Promise<void> {
    this.logger.log(`[LAUNCH] Launching '${name}'`);
    await this.hotkey(isMacOS() ? ['Meta', 'Space'] : ['Super']);
    await this.delay(LAUNCHER_OPEN_MS);
    await this.typeText(name);
    await this.delay(LAUNCHER_SEARCH_MS);
    await this.pressKey('Enter');
  }

  async openUrl(url: string): Promise<void> {
    const { command, args } = getUrlOpener(url);
    this.logger.log(`[LAUNCH] Opening ${url} via ${command}`);

    await new Promise<void>((resolve, reject) => {
      const child = spawn(command, args, {
        detached: true,
        stdio: 'ignore',
      });
      child.once('error', reject);
      child.once('spawn', () => {
        child.unref();
        resolve();
      });
    });
  }

  async failsafeTriggered(): Promise<boolean> {
    const [position, size] = await Promise.all([
      mouse.getPosition(),
      this.screenSize(),
    ]);
    const nearX =
      position.x <= CORNER_MARGIN_PX ||
      position.x >= size.width - 1 - CORNER_MARGIN_PX;
    const nearY =
      position.y <= CORNER_MARGIN_PX ||
      position.y >= size.height - 1 - CORNER_MARGIN_PX;
    return nearX && nearY;
  }

  /**
   * RGB capture of the primary display in logical pixels.
   */
  async capture(): Promise<Frame> {
    const image = await (await screen.grab()).toRGB();
    const frame: Frame = {
      data: image.data,
      width: image.width,
      height: image.height,
      channels: toFrameChannels(image.channels),
    };

    const size = await this.screenSize();
    if (frame.width === size.width && frame.height === size.height) {
      return frame;
    }
    this.logger.debug(
      `Scaling capture ${frame.width}x${frame.height} to ${size.width}x${size.height}`,
    );
    return resizeFrame(frame, size.width, size.height);
  }

  async screenSize(): Promise<ScreenSize> {
    const [width, height] = await Promise.all([screen.width(), screen.height()]);
    return { width, height };
  }

  // nut-js exposes no cursor shape.
  async isBusyCursorVisible(): Promise<boolean> {
    return false;
  }

  async describeWindows(): Promise<string> {
    try {
      const [windows, active] = await Promise.all([
        getWindows(),
        getActiveWindow(),
      ]);
      const activeTitle = await active.title;
      const lines = [
        `Foreground Window: '${activeTitle}'`,
        'Visible Windows (Top-most first):',
      ];

      let listed = 0;
      for (const win of windows) {
        if (listed >= MAX_LISTED_WINDOWS) {
          break;
        }
        const title = await win.title;
        if (!title.trim()) {
          continue;
        }
        const { left, top, width, height } = await win.region;
        listed++;
        const status = title === activeTitle ? ' (ACTIVE)' : '';
        lines.push(
          `${listed}. '${title}'${status} - Bounds: (${left}, ${top}, ${left + width}, ${top + height})`,
        );
      }
      return lines.join('\n');
    } catch (error) {
      this.logger.warn(`Could not read window list: ${errorMessage(error)}`);
      return WINDOW_CONTEXT_UNAVAILABLE;
    }
  }

  private validateKey(key: string): Key {
    const lowerKey = key.toLowerCase();
    const alias = KEY_ALIASES[lowerKey];
    const nutKey = NutKeyMapLowercase.get(
      alias ? alias.toLowerCase() : lowerKey,
    );
    if (nutKey === undefined) {
      throw new ActionError(
        `Invalid key: '${key}'. Key not found in available key mappings.`,
      );
    }
    return nutKey;
  }

  private parseKeyInput(keyInput: string): string[] {
    if (!keyInput) {
      return [];
    }
    if (keyInput.length > 1 && keyInput.includes('+')) {
      return keyInput
        .split('+')
        .map((segment) => segment.trim())
        .filter((segment) => segment.length > 0);
    }
    return [keyInput.trim() || keyInput];
  }

  private charToKeyInfo(
    char: string,
  ): { keyCode: Key; withShift: boolean } | null {
    if (/^[a-z0-9]$/.test(char)) {
      return { keyCode: this.validateKey(char), withShift: false };
    }
    if (/^[A-Z]$/.test(char)) {
      return { keyCode: this.validateKey(char), withShift: true };
    }

    const plain = CHARACTER_KEYS[char];
    if (plain) {
      return { keyCode: this.validateKey(plain), withShift: false };
    }
    const shifted = SHIFTED_CHARACTER_KEYS[char];
    if (shifted) {
      return { keyCode: this.validateKey(shifted), withShift: true };
    }
    return null;
  }

  private async delay(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}
