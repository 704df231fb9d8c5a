const STRIP_PATTERN = /[,\s₹$%]/g;

/**
 * Parses numbers as scraped pages print them: `1,234.50`, `₹3,852.40`,
 * `12.5%`. Returns null for anything that is not a finite number after
 * separators and currency marks are removed.
 */
export function parseLooseNumber(text: string | null | undefined): number | null {
  if (text === null || text === undefined) return null;
  const cleaned = String(text).replace(STRIP_PATTERN, '');
  if (!cleaned || !/^[-+]?(\d+\.?\d*|\.\d+)(e[-+]?\d+)?$/i.test(cleaned)) return null;
  const value = Number(cleaned);
  return Number.isFinite(value) ? value : null;
}
