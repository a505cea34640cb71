/**
 * Configuration errors
 */

export interface ConfigIssue {
  /** Location in the document, e.g. `tests[2].expect.stdout_mode`; empty for the file itself. */
  readonly path: string;
  readonly message: string;
}

/**
 * Raised (as a Result error) when a config file cannot be read or fails
 * validation. Carries every problem found, not only the first.
 */
export class ConfigError extends Error {
  readonly issues: readonly ConfigIssue[];

  constructor(
    readonly source: string,
    issues: readonly ConfigIssue[]
  ) {
    super(formatConfigError(source, issues));
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

export function formatIssue(issue: ConfigIssue): string {
  return issue.path === '' ? issue.message : `${issue.path}: ${issue.message}`;
}

function formatConfigError(source: string, issues: readonly ConfigIssue[]): string {
  const noun = issues.length === 1 ? 'problem' : 'problems';
  const lines = [`Invalid config ${source} (${issues.length} ${noun}):`];
  for (const issue of issues) {
    lines.push(`  - ${formatIssue(issue)}`);
  }
  return lines.join('\n');
}
