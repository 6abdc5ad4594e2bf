/**
 * Placeholder substitution over a fixed grammar: {{ token }} where token is
 * [A-Za-z_][A-Za-z0-9_.]*. Tokens without a value are left exactly as
 * written, so templates may carry fields this build does not know yet.
 */

const PLACEHOLDER_RE = /\{\{\s*([A-Za-z_][A-Za-z0-9_.]*)\s*\}\}/g;

export type TokenValues = Readonly<Record<string, string>>;

export function substitute(text: string, values: TokenValues): string {
  return text.replace(PLACEHOLDER_RE, (match, token: string) =>
    Object.hasOwn(values, token) ? values[token] : match
  );
}

export function listPlaceholders(text: string): string[] {
  return Array.from(text.matchAll(PLACEHOLDER_RE), m => m[1]);
}
