const SUFFIXES: ReadonlyArray<[number, string]> = [
  [1e12, 'T'],
  [1e9, 'B'],
  [1e6, 'M'],
  [1e3, 'K'],
];

export function formatCompact(value: number, digits: number = 2): string {
  const abs = Math.abs(value);
  for (const [scale, suffix] of SUFFIXES) {
    if (abs >= scale) return `${(value / scale).toFixed(digits)}${suffix}`;
  }
  return value.toFixed(digits);
}

export function formatUsd(value: number): string {
  return `$${formatCompact(value)}`;
}
