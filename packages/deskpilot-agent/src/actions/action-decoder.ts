import {
  ActionIntent,
  ActionKind,
  BoundingBox,
  Coordinates,
  boundingBoxCenter,
  clampNormalized,
  extractCoordinatesFromText,
  isActionKind,
  requiresPoint,
} from '@deskpilot/shared';
import { z } from 'zod';
import { ActionDecodeError } from './action.errors';

export const DEFAULT_CONFIDENCE = 1.0;
/** Seconds. */
export const DEFAULT_DURATION = 0.5;
export const DEFAULT_SCROLL_AMOUNT = 3;

// Numeric strings are accepted; null, blanks and booleans are not.
const numeric = z
  .union([z.number(), z.string().trim().min(1).pipe(z.coerce.number())])
  .refine((value) => Number.isFinite(value), 'must be a finite number');

const pointSchema = z.object({ x: numeric, y: numeric });

const actionPayloadSchema = z
  .object({
    action: z.string().trim().min(1, 'action is required'),
    target: z.string().nullish(),
    coordinates: pointSchema.nullish(),
    x: numeric.nullish(),
    y: numeric.nullish(),
    bbox_2d: z.array(numeric).length(4).nullish(),
    end_x: numeric.nullish(),
    end_y: numeric.nullish(),
    end_coordinates: pointSchema.nullish(),
    text: z.string().nullish(),
    value: z.string().nullish(),
    url: z.string().nullish(),
    app_name: z.string().nullish(),
    title: z.string().nullish(),
    key: z.string().nullish(),
    keys: z.union([z.array(z.string()), z.string()]).nullish(),
    scroll: numeric.nullish(),
    scroll_amount: numeric.nullish(),
    duration: numeric.nullish(),
    confidence: numeric.nullish(),
    thought: z.string().nullish(),
  })
  .passthrough();

type ActionPayload = z.infer<typeof actionPayloadSchema>;

export interface DecodeOptions {
  /** Searched for a coordinate pair when a pointer action arrives without one. */
  fallbackText?: string;
}

/**
 * Upper-cases and joins words so "double click" and "double-click" both
 * read as DOUBLE_CLICK.
 */
export function normalizeActionKind(raw: string): string {
  return raw.trim().toUpperCase().replace(/[\s-]+/g, '_');
}

/**
 * Turns the model's action object into a typed intent. Coordinates stay in
 * normalized space, clamped to [0, 1000].
 *
 * @throws ActionDecodeError for unknown kinds, malformed fields and pointer
 * actions without a resolvable point.
 */
export function decodeAction(
  plan: Record<string, unknown>,
  options: DecodeOptions = {},
): ActionIntent {
  const parsed = actionPayloadSchema.safeParse(plan);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ActionDecodeError(`Malformed action payload: ${issues}`);
  }

  const payload = parsed.data;
  const kind = normalizeActionKind(payload.action);
  if (!isActionKind(kind)) {
    throw new ActionDecodeError(`Unknown action kind: ${payload.action}`, kind);
  }

  let point = resolvePoint(payload);
  if (!point && requiresPoint(kind) && options.fallbackText) {
    const recovered = extractCoordinatesFromText(options.fallbackText);
    point = recovered ? clampPoint(recovered) : undefined;
  }
  if (!point && requiresPoint(kind)) {
    throw new ActionDecodeError(`${kind} requires coordinates`, kind);
  }

  return buildIntent(kind, payload, point);
}

function buildIntent(
  kind: ActionKind,
  payload: ActionPayload,
  point: Coordinates | undefined,
): ActionIntent {
  const base = {
    target: nonEmpty(payload.target),
    confidence: clampUnit(payload.confidence ?? DEFAULT_CONFIDENCE),
    thought: nonEmpty(payload.thought),
  };

  switch (kind) {
    case 'CLICK':
    case 'DOUBLE_CLICK':
    case 'RIGHT_CLICK':
    case 'TRIPLE_CLICK':
      return { ...base, kind, point };
    case 'MOVE':
      return { ...base, kind, point };
    case 'DRAG': {
      const end = resolveEndPoint(payload);
      if (!end) {
        throw new ActionDecodeError('DRAG requires end coordinates', kind);
      }
      return { ...base, kind, point, end, duration: resolveDuration(payload) };
    }
    case 'SCROLL':
      return {
        ...base,
        kind,
        point,
        amount: Math.round(
          payload.scroll ?? payload.scroll_amount ?? DEFAULT_SCROLL_AMOUNT,
        ),
      };
    case 'TYPE':
      return {
        ...base,
        kind,
        point,
        text: firstText(payload.text, payload.value),
      };
    case 'PRESS':
      return {
        ...base,
        kind,
        key: firstText(payload.key, payload.value, singleKey(payload.keys)),
      };
    case 'HOTKEY':
      return { ...base, kind, keys: resolveKeys(payload) };
    case 'COPY':
    case 'PASTE':
    case 'CUT':
    case 'SELECT_ALL':
      return { ...base, kind };
    case 'FOCUS_WINDOW':
      return {
        ...base,
        kind,
        title: firstText(
          payload.title,
          payload.text,
          payload.value,
          payload.target,
        ),
      };
    case 'MINIMIZE':
    case 'MAXIMIZE':
    case 'CLOSE_WINDOW':
      return { ...base, kind };
    case 'LAUNCH_APP':
      return {
        ...base,
        kind,
        appName: firstText(payload.app_name, payload.text, payload.value),
      };
    case 'OPEN_URL':
      return {
        ...base,
        kind,
        url: firstText(payload.url, payload.text, payload.value),
      };
    case 'WAIT':
      return { ...base, kind, duration: resolveDuration(payload) };
  }
}

function resolvePoint(payload: ActionPayload): Coordinates | undefined {
  if (payload.coordinates) {
    return clampPoint(payload.coordinates);
  }
  if (isPresent(payload.x) && isPresent(payload.y)) {
    return clampPoint({ x: payload.x, y: payload.y });
  }
  if (payload.bbox_2d) {
    const [x1, y1, x2, y2] = payload.bbox_2d;
    const box: BoundingBox = [x1, y1, x2, y2];
    return clampPoint(boundingBoxCenter(box));
  }
  return undefined;
}

function resolveEndPoint(payload: ActionPayload): Coordinates | undefined {
  if (payload.end_coordinates) {
    return clampPoint(payload.end_coordinates);
  }
  if (isPresent(payload.end_x) && isPresent(payload.end_y)) {
    return clampPoint({ x: payload.end_x, y: payload.end_y });
  }
  return undefined;
}

function resolveDuration(payload: ActionPayload): number {
  return Math.max(0, payload.duration ?? DEFAULT_DURATION);
}

function resolveKeys(payload: ActionPayload): string[] {
  const raw = payload.keys ?? payload.key ?? '';
  const keys = Array.isArray(raw) ? raw : raw.split('+');
  return keys.map((key) => key.trim()).filter((key) => key.length > 0);
}

function singleKey(keys: ActionPayload['keys']): string | undefined {
  if (Array.isArray(keys)) {
    return keys.length === 1 ? keys[0] : undefined;
  }
  return keys ?? undefined;
}

function clampPoint(point: Coordinates): Coordinates {
  return { x: clampNormalized(point.x), y: clampNormalized(point.y) };
}

function clampUnit(value: number): number {
  return Math.min(1, Math.max(0, value));
}

function isPresent<T>(value: T | null | undefined): value is T {
  return value !== null && value !== undefined;
}

function nonEmpty(value: string | null | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function firstText(
  ...candidates: (string | null | undefined)[]
): string | undefined {
  for (const candidate of candidates) {
    const value = nonEmpty(candidate);
    if (value) {
      return value;
    }
  }
  return undefined;
}
