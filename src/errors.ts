import type { ZodIssue } from "zod";

/** One problem found while validating a layout snapshot */
export interface LayoutIssue {
  path: string;
  message: string;
}

/**
 * The layout snapshot is missing geometry or style fields, or breaks an
 * ordering rule. Detection stops without a partial result.
 */
export class InvalidLayoutData extends Error {
  readonly issues: LayoutIssue[];

  constructor(issues: LayoutIssue[]) {
    const first = issues[0];
    const summary = first ? `${first.path || "<root>"}: ${first.message}` : "unknown problem";
    const more = issues.length > 1 ? ` (+${issues.length - 1} more)` : "";
    super(`Invalid layout data: ${summary}${more}`);
    this.name = "InvalidLayoutData";
    this.issues = issues;
  }

  static fromZodIssues(issues: ZodIssue[]): InvalidLayoutData {
    return new InvalidLayoutData(
      issues.map((issue) => ({
        path: issue.path.join("."),
        message: issue.message,
      })),
    );
  }
}

export type RenderFailureKind = "invalid_html" | "navigation" | "timeout";

/** The layout provider could not render the page. Never retried here. */
export class RenderFailure extends Error {
  readonly kind: RenderFailureKind;
  readonly target: string;

  constructor(kind: RenderFailureKind, target: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "RenderFailure";
    this.kind = kind;
    this.target = target;
  }
}
