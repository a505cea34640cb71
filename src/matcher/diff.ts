/**
 * Line diff between expected and actual output, rendered as unified-diff hunks
 */

export interface DiffLine {
  type: 'equal' | 'delete' | 'insert';
  text: string;
}

export type LineEquivalence = (expected: string, actual: string) => boolean;

const sameLine: LineEquivalence = (expected, actual) => expected === actual;

/**
 * Longest-common-subsequence alignment. Equal lines carry the actual text so
 * that glob lines show what they matched.
 */
export function diffLines(
  expected: readonly string[],
  actual: readonly string[],
  equivalent: LineEquivalence = sameLine
): DiffLine[] {
  const m = expected.length;
  const n = actual.length;

  // lcs[i][j]: length of the LCS of expected[i..] and actual[j..]
  const lcs: number[][] = Array.from({ length: m + 1 }, () => new Array<number>(n + 1).fill(0));
  for (let i = m - 1; i >= 0; i--) {
    for (let j = n - 1; j >= 0; j--) {
      const row = lcs[i] ?? [];
      const below = lcs[i + 1] ?? [];
      row[j] = equivalent(expected[i] ?? '', actual[j] ?? '')
        ? (below[j + 1] ?? 0) + 1
        : Math.max(below[j] ?? 0, row[j + 1] ?? 0);
    }
  }

  const at = (i: number, j: number): number => lcs[i]?.[j] ?? 0;
  const lines: DiffLine[] = [];
  let i = 0;
  let j = 0;
  while (i < m && j < n) {
    const e = expected[i] ?? '';
    const a = actual[j] ?? '';
    if (equivalent(e, a)) {
      lines.push({ type: 'equal', text: a });
      i++;
      j++;
    } else if (at(i + 1, j) >= at(i, j + 1)) {
      lines.push({ type: 'delete', text: e });
      i++;
    } else {
      lines.push({ type: 'insert', text: a });
      j++;
    }
  }
  for (; i < m; i++) {
    lines.push({ type: 'delete', text: expected[i] ?? '' });
  }
  for (; j < n; j++) {
    lines.push({ type: 'insert', text: actual[j] ?? '' });
  }
  return lines;
}

interface Hunk {
  start: number;
  end: number; // inclusive
}

function collectHunks(lines: readonly DiffLine[], context: number): Hunk[] {
  const hunks: Hunk[] = [];
  lines.forEach((line, index) => {
    if (line.type === 'equal') {
      return;
    }
    const start = Math.max(0, index - context);
    const end = Math.min(lines.length - 1, index + context);
    const last = hunks[hunks.length - 1];
    if (last && start <= last.end + 1) {
      last.end = end;
    } else {
      hunks.push({ start, end });
    }
  });
  return hunks;
}

/**
 * Returns '' when the two texts are line-for-line equivalent.
 */
export function unifiedDiff(
  expected: string,
  actual: string,
  equivalent: LineEquivalence = sameLine,
  context = 2
): string {
  const lines = diffLines(expected.split('\n'), actual.split('\n'), equivalent);
  const hunks = collectHunks(lines, context);
  if (hunks.length === 0) {
    return '';
  }

  const out = ['--- expected', '+++ actual'];
  for (const hunk of hunks) {
    let oldStart = 1;
    let newStart = 1;
    for (const line of lines.slice(0, hunk.start)) {
      if (line.type !== 'insert') oldStart++;
      if (line.type !== 'delete') newStart++;
    }

    const body = lines.slice(hunk.start, hunk.end + 1);
    const oldCount = body.filter((line) => line.type !== 'insert').length;
    const newCount = body.filter((line) => line.type !== 'delete').length;

    out.push(`@@ -${oldStart},${oldCount} +${newStart},${newCount} @@`);
    for (const line of body) {
      const marker = line.type === 'equal' ? ' ' : line.type === 'delete' ? '-' : '+';
      out.push(`${marker}${line.text}`);
    }
  }
  return out.join('\n');
}
