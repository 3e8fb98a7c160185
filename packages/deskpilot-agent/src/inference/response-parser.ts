import { ParsedPlan } from './inference.types';

const FENCED_BLOCK = /```(?:json|JSON)?[^\S\n]*\n?([\s\S]*?)```/g;

function isRecord(value: unknown): value is ParsedPlan {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function tryParseObject(candidate: string): ParsedPlan | null {
  try {
    const value: unknown = JSON.parse(candidate);
    return isRecord(value) ? value : null;
  } catch {
    return null;
  }
}

/**
 * Finds the JSON object in free-form model output: each fenced code block
 * in order, then the span from the first `{` to the last `}`.
 */
export function extractJson(text: string): ParsedPlan | null {
  for (const fenced of text.matchAll(FENCED_BLOCK)) {
    const parsed = tryParseObject(fenced[1].trim());
    if (parsed) {
      return parsed;
    }
  }

  const start = text.indexOf('{');
  const end = text.lastIndexOf('}');
  if (start !== -1 && end > start) {
    return tryParseObject(text.slice(start, end + 1));
  }

  return null;
}

/**
 * Contents of the first `<tag>...</tag>` section, trimmed.
 */
export function extractTaggedSection(text: string, tag: string): string | null {
  const pattern = new RegExp(`<${tag}>([\\s\\S]*?)</${tag}>`, 'i');
  const match = pattern.exec(text);
  if (!match) {
    return null;
  }
  const content = match[1].trim();
  return content.length > 0 ? content : null;
}
