/**
 * Cap on reasons listed per attempt, so a badly broken reply does not blow
 * up the next prompt.
 */
export const MAX_REASONS_IN_FEEDBACK = 5;

export function buildRetryFeedback(reasons: readonly string[]): string {
  const shown = reasons.slice(0, MAX_REASONS_IN_FEEDBACK);
  const hidden = reasons.length - shown.length;
  const list = shown.join("; ") + (hidden > 0 ? ` (and ${hidden} more)` : "");
  return `Previous attempt failed because: ${list}. Correct and respond again.`;
}

/** One line per failed attempt, oldest first, after any caller-supplied context. */
export function buildRetryContext(
  failures: ReadonlyArray<readonly string[]>,
  callerContext?: string
): string | undefined {
  const lines = failures.map(buildRetryFeedback);
  if (callerContext) lines.unshift(callerContext);
  return lines.length ? lines.join("\n") : undefined;
}
