/**
 * Converts a Date to its UTC calendar date (YYYY-MM-DD), dropping time of day.
 */
export const toIsoDate = (value: Date): string =>
  value.toISOString().slice(0, 10);

/**
 * Parses a provider date-only string as UTC midnight; returns null when unparseable.
 */
export const parseIsoDate = (raw: string | undefined): Date | null => {
  const trimmed = raw?.trim();
  if (!trimmed || !/^\d{4}-\d{2}-\d{2}/.test(trimmed)) {
    return null;
  }

  const parsed = new Date(`${trimmed.slice(0, 10)}T00:00:00.000Z`);
  return Number.isNaN(parsed.getTime()) ? null : parsed;
};
