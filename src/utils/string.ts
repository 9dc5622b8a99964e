const BYTE_UNITS: Array<[number, string]> = [
  [1_000_000_000, "GB"],
  [1_000_000, "MB"],
  [1_000, "kB"],
];

/**
 * Human readable byte count with two decimals, using decimal prefixes
 * (`1500` -> `"1.50 kB"`).
 */
export const formatBytes = (bytes: number): string => {
  for (const [factor, unit] of BYTE_UNITS) {
    if (bytes > factor) {
      return `${(bytes / factor).toFixed(2)} ${unit}`;
    }
  }
  return `${bytes.toFixed(2)} B`;
};
