import { Coordinates, ScreenSize } from '@deskpilot/shared';

export type MouseButton = 'left' | 'right' | 'middle';
export type WindowCommand = 'minimize' | 'maximize' | 'close';

/**
 * Simulated input on the host. Coordinates are primary-monitor pixels.
 */
export interface InputCapability {
  click(point: Coordinates, button: MouseButton, count: number): Promise<void>;
  moveTo(point: Coordinates): Promise<void>;
  drag(from: Coordinates, to: Coordinates, durationMs: number): Promise<void>;
  /** Positive scrolls up. */
  scroll(amount: number, at?: Coordinates): Promise<void>;
  pressKey(key: string): Promise<void>;
  hotkey(keys: string[]): Promise<void>;
  typeText(text: string): Promise<void>;
  focusWindow(title: string): Promise<void>;
  windowCommand(command: WindowCommand): Promise<void>;
  launchApp(name: string): Promise<void>;
  openUrl(url: string): Promise<void>;
  /** True when the operator has requested an emergency stop. */
  failsafeTriggered(): Promise<boolean>;
}

/**
 * A raw screen capture in RGB(A), top-left origin.
 */
export interface Frame {
  data: Buffer;
  width: number;
  height: number;
  channels: 1 | 2 | 3 | 4;
}

export interface ScreenCapture {
  capture(): Promise<Frame>;
  screenSize(): Promise<ScreenSize>;
}

export interface BusyCursorProbe {
  isBusyCursorVisible(): Promise<boolean>;
}

export interface WindowContextProvider {
  describeWindows(): Promise<string>;
}

export const INPUT_CAPABILITY = 'INPUT_CAPABILITY';
export const SCREEN_CAPTURE = 'SCREEN_CAPTURE';
export const BUSY_CURSOR_PROBE = 'BUSY_CURSOR_PROBE';
export const WINDOW_CONTEXT = 'WINDOW_CONTEXT';
