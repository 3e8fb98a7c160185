import { ActionRecord } from '@deskpilot/shared';

export const DEFAULT_HISTORY_LIMIT = 10;

/**
 * Bounded record of attempted actions, oldest first.
 */
export class ActionHistory {
  private readonly records: ActionRecord[] = [];

  constructor(readonly limit: number = DEFAULT_HISTORY_LIMIT) {}

  push(record: ActionRecord): void {
    this.records.push(record);
    if (this.records.length > this.limit) {
      this.records.splice(0, this.records.length - this.limit);
    }
  }

  entries(): readonly ActionRecord[] {
    return [...this.records];
  }

  recent(count: number): readonly ActionRecord[] {
    return count <= 0 ? [] : this.records.slice(-count);
  }

  get size(): number {
    return this.records.length;
  }

  clear(): void {
    this.records.length = 0;
  }
}

/**
 * `KIND: target at (x, y) -> outcome`
 */
export function formatActionRecord(record: ActionRecord): string {
  const at = record.point ? ` at (${record.point.x}, ${record.point.y})` : '';
  const outcome =
    record.outcome === 'failed' && record.detail
      ? `failed: ${record.detail}`
      : record.outcome;
  return `${record.kind}: ${record.target}${at} -> ${outcome}`;
}
