/**
 * Glob patterns for expected output and case-name filters
 *
 * `*` matches any run of characters except a newline, `?` matches exactly one
 * such character, and `\*` / `\?` stand for the literal characters. Everything
 * else matches itself.
 */

const REGEX_SPECIALS = /[.*+?^${}()|[\]\\]/g;

function escapeRegex(text: string): string {
  return text.replace(REGEX_SPECIALS, '\\$&');
}

export function globToRegex(pattern: string): RegExp {
  let source = '';
  for (let i = 0; i < pattern.length; i++) {
    const char = pattern.charAt(i);
    const next = pattern.charAt(i + 1);
    if (char === '\\' && (next === '*' || next === '?')) {
      source += escapeRegex(next);
      i++;
    } else if (char === '*') {
      source += '[^\\n]*';
    } else if (char === '?') {
      source += '[^\\n]';
    } else {
      source += escapeRegex(char);
    }
  }
  return new RegExp(`^${source}$`);
}

export function hasGlobSyntax(pattern: string): boolean {
  return /(^|[^\\])[*?]/.test(pattern);
}

/** Drops the backslash from `\*` and `\?`, for patterns used as plain text. */
export function unescapeGlob(pattern: string): string {
  return pattern.replace(/\\([*?])/g, '$1');
}

export function matchesGlob(pattern: string, text: string): boolean {
  return globToRegex(pattern).test(text);
}
