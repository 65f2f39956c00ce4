/**
 * Line-oriented KEY=VALUE format.
 *
 * Always a flat mapping. Lines that look like fragments of another format are
 * skipped: decryption fallbacks can leave YAML or JSON lines in the text.
 */

export type EnvMap = Record<string, string>;

/**
 * Check whether a trimmed line is a comment or a foreign-format fragment.
 */
function isIgnoredLine(line: string): boolean {
  return (
    line === '' ||
    line.startsWith('#') ||
    line.startsWith('{') ||
    line.startsWith('[') ||
    line.startsWith('---') ||
    line.startsWith('sops:') ||
    line.includes(': |')
  );
}

/**
 * Strip one matching pair of surrounding single or double quotes.
 */
function unquote(value: string): string {
  if (value.length < 2) {
    return value;
  }
  const first = value[0];
  const last = value[value.length - 1];
  if ((first === '"' || first === "'") && first === last) {
    return value.slice(1, -1);
  }
  return value;
}

/**
 * Parse env text. Lines without `=` or with an empty key are skipped; a later
 * duplicate key replaces an earlier one. Every key becomes an own property,
 * `__proto__` included.
 */
export function parseEnv(text: string): EnvMap {
  const result = new Map<string, string>();

  for (const rawLine of text.split('\n')) {
    const line = rawLine.trim();
    if (isIgnoredLine(line)) continue;

    const idx = line.indexOf('=');
    if (idx <= 0) continue;

    const key = line.slice(0, idx).trim();
    if (key === '') continue;

    result.set(key, unquote(line.slice(idx + 1).trim()));
  }

  return Object.fromEntries(result);
}

/**
 * Whether parseEnv would alter the value if written bare.
 */
function needsQuoting(value: string): boolean {
  if (value !== value.trim()) {
    return true;
  }
  return unquote(value) !== value;
}

/**
 * Render env entries sorted by key, one `KEY=VALUE` line each.
 */
export function renderEnv(entries: EnvMap): string {
  const keys = Object.keys(entries).sort();
  let out = '';
  for (const key of keys) {
    const value = entries[key];
    out += `${key}=${needsQuoting(value) ? `"${value}"` : value}\n`;
  }
  return out;
}
