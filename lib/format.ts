function trimZero(value: string): string {
  return value.endsWith('.0') ? value.slice(0, -2) : value;
}

/** 0, 42, 1.2K, 15K, 1.5M */
export function formatLikesCount(count: number): string {
  const n = Math.max(0, Math.floor(count));
  if (n < 1000) return String(n);
  if (n < 10_000) return `${trimZero((Math.floor(n / 100) / 10).toFixed(1))}K`;
  if (n < 1_000_000) return `${Math.floor(n / 1000)}K`;
  return `${trimZero((Math.floor(n / 100_000) / 10).toFixed(1))}M`;
}
