export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

export function roundTo(value: number, digits: number = 2): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

/**
 * Elapsed milliseconds since a `performance.now()` mark.
 */
export function elapsedMs(startMark: number): number {
  return performance.now() - startMark;
}
