/**
 * Upper-cases a ticker and appends the exchange suffix unless it already carries it.
 */
export const normalizeTicker = (raw: string, exchangeSuffix: string): string => {
  const ticker = raw.trim().toUpperCase();
  const suffix = exchangeSuffix.trim().toUpperCase();

  if (!suffix || ticker.endsWith(suffix)) {
    return ticker;
  }

  return `${ticker}${suffix}`;
};

/**
 * Reads one ticker per line, ignoring blank lines.
 */
export const parseTickerList = (
  contents: string,
  exchangeSuffix: string,
): string[] =>
  contents
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter(Boolean)
    .map((line) => normalizeTicker(line, exchangeSuffix));
