export interface SplitCommaSeparatedListOptions {
  maxLen: number;
  maxItems: number;
}

const DEFAULT_OPTS: SplitCommaSeparatedListOptions = {
  maxLen: 64 * 1024,
  maxItems: 1024,
};

/**
 * Splits a comma-separated list, trimming whitespace around each entry and skipping empty entries.
 */
export function splitCommaSeparatedList(raw: string, opts: Partial<SplitCommaSeparatedListOptions> = {}): string[] {
  const maxLen = opts.maxLen ?? DEFAULT_OPTS.maxLen;
  const maxItems = opts.maxItems ?? DEFAULT_OPTS.maxItems;

  if (raw.length > maxLen) throw new Error("Value too long");

  const out: string[] = [];
  let i = 0;
  while (i < raw.length) {
    const start = i;
    while (i < raw.length && raw.charCodeAt(i) !== 0x2c) i += 1; // ','
    const end = i;
    if (i < raw.length) i += 1;

    const token = raw.slice(start, end).trim();
    if (token.length > 0) out.push(token);
    if (out.length > maxItems) throw new Error("Too many entries");
  }

  return out;
}
