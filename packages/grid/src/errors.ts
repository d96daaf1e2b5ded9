/**
 * Base class for contract violations raised by the heatmap widget.
 *
 * Degenerate data (negative column indices, zero columns, missing adapters)
 * never throws; only caller misuse does.
 */
export class HeatmapError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export type HeatmapConfigIssue = {
  path: string;
  message: string;
};

export class HeatmapConfigError extends HeatmapError {
  readonly issues: readonly HeatmapConfigIssue[];

  constructor(subject: string, issues: readonly HeatmapConfigIssue[]) {
    const detail = issues.map((issue) => (issue.path ? `${issue.path}: ${issue.message}` : issue.message)).join("; ");
    super(`Invalid heatmap ${subject}: ${detail}`);
    this.issues = issues;
  }
}

/**
 * Thrown when an adapter or click listener tries to rebind data, restyle, or
 * repaint the widget that is currently invoking it.
 */
export class HeatmapReentrancyError extends HeatmapError {
  readonly operation: string;

  constructor(operation: string, phase: string) {
    super(`Cannot call ${operation}() while the heatmap is ${phase}.`);
    this.operation = operation;
  }
}
