import {
  ACTION_KINDS,
  ActionIntent,
  ActionKind,
  ClickKind,
  Coordinates,
} from "../types/action.types";

const ACTION_KIND_SET: ReadonlySet<string> = new Set(ACTION_KINDS);

export function isActionKind(value: string): value is ActionKind {
  return ACTION_KIND_SET.has(value);
}

const CLICK_KINDS: readonly ClickKind[] = [
  "CLICK",
  "DOUBLE_CLICK",
  "RIGHT_CLICK",
  "TRIPLE_CLICK",
];

/**
 * Kinds that cannot run without a target point.
 */
export function requiresPoint(kind: ActionKind): boolean {
  return (
    kind === "MOVE" ||
    kind === "DRAG" ||
    CLICK_KINDS.some((clickKind) => clickKind === kind)
  );
}

/**
 * Maps every point carried by an intent through `transform`, preserving the
 * rest of the payload.
 */
export function mapIntentPoints(
  intent: ActionIntent,
  transform: (point: Coordinates) => Coordinates,
): ActionIntent {
  if (intent.kind === "DRAG") {
    return {
      ...intent,
      point: intent.point && transform(intent.point),
      end: intent.end && transform(intent.end),
    };
  }
  if ("point" in intent) {
    return { ...intent, point: intent.point && transform(intent.point) };
  }
  return intent;
}

/**
 * Points an intent carries, in order (start then end for drags).
 */
export function intentPoints(intent: ActionIntent): Coordinates[] {
  const points: Coordinates[] = [];
  if ("point" in intent && intent.point) {
    points.push(intent.point);
  }
  if ("end" in intent && intent.end) {
    points.push(intent.end);
  }
  return points;
}
