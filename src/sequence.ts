/**
 * Per-batch counters, one per (output directory, pattern) scope.
 */

import { resolve } from "node:path";

export function scopeKeyFor(outputDir: string, pattern: string): string {
  return `${resolve(outputDir)}\0${pattern}`;
}

export function formatCounter(value: number, padding: number): string {
  return String(value).padStart(padding, "0");
}

export class SequenceRegistry {
  private readonly counters = new Map<string, number>();
  readonly start: number;

  constructor(start = 1) {
    if (!Number.isInteger(start) || start < 0) {
      throw new RangeError(`Counter start must be a non-negative integer, got ${start}`);
    }
    this.start = start;
  }

  /**
   * Issue the next value for a scope. Read and increment happen in one
   * synchronous step, so concurrent async callers never see a repeat.
   */
  next(scopeKey: string): number {
    const value = this.counters.get(scopeKey) ?? this.start;
    this.counters.set(scopeKey, value + 1);
    return value;
  }

  peek(scopeKey: string): number {
    return this.counters.get(scopeKey) ?? this.start;
  }
}
