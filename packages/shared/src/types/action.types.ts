export type Coordinates = { x: number; y: number };

/** `[x1, y1, x2, y2]`, top-left then bottom-right. */
export type BoundingBox = [number, number, number, number];

export type ScreenSize = { width: number; height: number };

export type CalibrationOffset = { dx: number; dy: number };

export const ACTION_KINDS = [
  "CLICK",
  "DOUBLE_CLICK",
  "RIGHT_CLICK",
  "TRIPLE_CLICK",
  "MOVE",
  "DRAG",
  "SCROLL",
  "TYPE",
  "PRESS",
  "HOTKEY",
  "COPY",
  "PASTE",
  "CUT",
  "SELECT_ALL",
  "FOCUS_WINDOW",
  "MINIMIZE",
  "MAXIMIZE",
  "CLOSE_WINDOW",
  "LAUNCH_APP",
  "OPEN_URL",
  "WAIT",
] as const;

export type ActionKind = (typeof ACTION_KINDS)[number];

export type ClickKind = "CLICK" | "DOUBLE_CLICK" | "RIGHT_CLICK" | "TRIPLE_CLICK";
export type ClipboardKind = "COPY" | "PASTE" | "CUT" | "SELECT_ALL";
export type WindowCommandKind = "MINIMIZE" | "MAXIMIZE" | "CLOSE_WINDOW";

type BaseIntent = {
  target?: string;
  /** Model-reported confidence in [0, 1]. */
  confidence: number;
  thought?: string;
};

export type ClickIntent = BaseIntent & {
  kind: ClickKind;
  point?: Coordinates;
};

export type MoveIntent = BaseIntent & {
  kind: "MOVE";
  point?: Coordinates;
};

export type DragIntent = BaseIntent & {
  kind: "DRAG";
  point?: Coordinates;
  end?: Coordinates;
  /** Seconds. */
  duration: number;
};

export type ScrollIntent = BaseIntent & {
  kind: "SCROLL";
  /** Positive scrolls up, negative scrolls down. */
  amount: number;
  point?: Coordinates;
};

export type TypeIntent = BaseIntent & {
  kind: "TYPE";
  text?: string;
  /** Clicked first to focus the field. */
  point?: Coordinates;
};

export type PressIntent = BaseIntent & {
  kind: "PRESS";
  key?: string;
};

export type HotkeyIntent = BaseIntent & {
  kind: "HOTKEY";
  keys: string[];
};

export type ClipboardIntent = BaseIntent & {
  kind: ClipboardKind;
};

export type FocusWindowIntent = BaseIntent & {
  kind: "FOCUS_WINDOW";
  title?: string;
};

export type WindowCommandIntent = BaseIntent & {
  kind: WindowCommandKind;
};

export type LaunchAppIntent = BaseIntent & {
  kind: "LAUNCH_APP";
  appName?: string;
};

export type OpenUrlIntent = BaseIntent & {
  kind: "OPEN_URL";
  url?: string;
};

export type WaitIntent = BaseIntent & {
  kind: "WAIT";
  /** Seconds. */
  duration: number;
};

export type ActionIntent =
  | ClickIntent
  | MoveIntent
  | DragIntent
  | ScrollIntent
  | TypeIntent
  | PressIntent
  | HotkeyIntent
  | ClipboardIntent
  | FocusWindowIntent
  | WindowCommandIntent
  | LaunchAppIntent
  | OpenUrlIntent
  | WaitIntent;

export type ActionOutcome = "executed" | "failed" | "skipped";

export type ActionRecord = {
  kind: ActionKind;
  target: string;
  /** Resolved pixel coordinates, when the action had a point. */
  point?: Coordinates;
  outcome: ActionOutcome;
  /** Failure reason, truncated. */
  detail?: string;
  timestamp: number;
};
