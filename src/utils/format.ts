export const formatBytes = (bytes: number): string => {
  if (bytes < 0) return `-${formatBytes(-bytes)}`;
  if (bytes === 0) return "0 B";
  const units = ["B", "KB", "MB", "GB"];
  const index = Math.min(
    Math.floor(Math.log(bytes) / Math.log(1024)),
    units.length - 1
  );
  const value = bytes / 1024 ** index;
  return `${value.toFixed(value < 10 ? 2 : 1)} ${units[index]}`;
};

/**
 * Share of `before` saved by shrinking it to `after`, or null when there was
 * nothing to shrink.
 */
export const reductionPercent = (before: number, after: number): number | null => {
  if (before <= 0) return null;
  return (1 - after / before) * 100;
};

export const formatPercent = (value: number | null): string =>
  value === null ? "n/a" : `${value.toFixed(1)}%`;

export const pad = (value: number, width: number = 2): string =>
  String(value).padStart(width, "0");
