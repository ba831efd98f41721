// Scale and path helpers for the SVG line charts

export interface ScreenPoint {
  x: number;
  y: number | null;
}

export type Scale = (value: number) => number;

export function linearScale(domain: [number, number], range: [number, number]): Scale {
  const [d0, d1] = domain;
  const [r0, r1] = range;
  const span = d1 - d0 || 1;
  return (value: number) => r0 + ((value - d0) / span) * (r1 - r0);
}

/** Min and max in one pass; null for no values */
export function extent(values: Iterable<number>): [number, number] | null {
  let min = Infinity;
  let max = -Infinity;
  for (const value of values) {
    if (value < min) min = value;
    if (value > max) max = value;
  }
  return min <= max ? [min, max] : null;
}

function cleanNumber(value: number): number {
  return Number(value.toFixed(10));
}

/**
 * Round numbers for axis ticks: a step of 1, 2, 5 or 10 times a power of ten
 * giving about `count` intervals, and a domain widened to whole steps.
 */
export function niceTicks(
  min: number,
  max: number,
  count = 5
): { domain: [number, number]; ticks: number[] } {
  let lo = min;
  let hi = max;
  if (lo === hi) {
    lo -= 1;
    hi += 1;
  }

  const rawStep = (hi - lo) / count;
  const magnitude = Math.pow(10, Math.floor(Math.log10(rawStep)));
  const residual = rawStep / magnitude;
  const step = (residual <= 1 ? 1 : residual <= 2 ? 2 : residual <= 5 ? 5 : 10) * magnitude;

  const start = Math.floor(cleanNumber(lo / step));
  const end = Math.ceil(cleanNumber(hi / step));

  const ticks: number[] = [];
  for (let i = start; i <= end; i++) {
    ticks.push(cleanNumber(i * step));
  }

  return { domain: [ticks[0], ticks[ticks.length - 1]], ticks };
}

/** Evenly spaced time ticks across [start, end] */
export function timeTicks(start: number, end: number, count = 6): number[] {
  if (start === end || count < 2) return [start];
  const ticks: number[] = [];
  for (let i = 0; i < count; i++) {
    ticks.push(start + ((end - start) * i) / (count - 1));
  }
  return ticks;
}

/**
 * SVG path through the points; a missing y lifts the pen so gaps stay visible.
 */
export function createSegmentedPath(points: ScreenPoint[]): string {
  const parts: string[] = [];
  let penDown = false;

  for (const point of points) {
    if (point.y === null) {
      penDown = false;
      continue;
    }
    parts.push(`${penDown ? 'L' : 'M'} ${point.x.toFixed(1)} ${point.y.toFixed(1)}`);
    penDown = true;
  }

  return parts.join(' ');
}
