import { vi } from 'vitest';

export interface FakeResult {
  rows: Record<string, unknown>[];
  rowCount: number;
}

/** Stands in for a pg client: answers queries from a queue, empty results once it runs dry. */
export function fakeClient(...results: Array<FakeResult | Error>) {
  const queue = [...results];
  const query = vi.fn(async (_sql: string, _params?: unknown[]): Promise<FakeResult> => {
    const next = queue.shift() ?? { rows: [], rowCount: 0 };
    if (next instanceof Error) throw next;
    return next;
  });
  return { query };
}

export function rows(...items: Record<string, unknown>[]): FakeResult {
  return { rows: items, rowCount: items.length };
}

export function affected(rowCount: number): FakeResult {
  return { rows: [], rowCount };
}

export function pgError(code: string, message: string): Error {
  return Object.assign(new Error(message), { code });
}
