export function indent(text: string, width: number): string {
  const pad = ' '.repeat(width);
  return text
    .split('\n')
    .map((line) => pad + line)
    .join('\n');
}

/**
 * Last `max` lines of `text`, ignoring trailing line breaks, plus how many
 * earlier lines were dropped.
 */
export function tailLines(text: string, max: number): { lines: string[]; omitted: number } {
  const trimmed = text.replace(/(?:\r?\n)+$/, '');
  if (trimmed === '') {
    return { lines: [], omitted: 0 };
  }
  const all = trimmed.split(/\r?\n/);
  const omitted = Math.max(0, all.length - max);
  return { lines: all.slice(omitted), omitted };
}

export function formatDuration(ms: number): string {
  return ms < 1000 ? `${ms}ms` : `${(ms / 1000).toFixed(2)}s`;
}
