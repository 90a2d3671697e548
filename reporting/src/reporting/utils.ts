import { performance } from "node:perf_hooks";

export interface TimedResult<T> {
  result: T;
  durationMs: number;
}

export function measure<T>(fn: () => T): TimedResult<T> {
  const start = performance.now();
  const result = fn();
  return { result, durationMs: performance.now() - start };
}

export async function measureAsync<T>(fn: () => Promise<T>): Promise<TimedResult<T>> {
  const start = performance.now();
  const result = await fn();
  const durationMs = performance.now() - start;
  return { result, durationMs };
}

export function roundMs(durationMs: number): number {
  return Number(durationMs.toFixed(2));
}
