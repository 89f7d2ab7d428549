/**
 * Turns an arbitrary provider label into an identifier-safe column name.
 * Output only contains `[a-z0-9_]`, never starts or ends with `_` and never contains `__`.
 */
export const normalizeColumnName = (label: unknown): string =>
  String(label)
    .toLowerCase()
    .replace(/[^a-z0-9_]+/g, "_")
    .replace(/_+/g, "_")
    .replace(/^_+|_+$/g, "");
