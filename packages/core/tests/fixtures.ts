import type { DataResult } from '../src/types/results.js';

/** Data of a successful result; throws on anything else so the test fails loudly */
export function unwrap<T>(result: DataResult<T>): T {
  if (result.type !== 'success') throw new Error(`expected success, got ${JSON.stringify(result)}`);
  return result.data;
}

/** Timestamps a fixed number of minutes apart, for deterministic created-at ordering */
export function minutesAfter(base: Date, minutes: number): Date {
  return new Date(base.getTime() + minutes * 60_000);
}
