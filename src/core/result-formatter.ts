import {
  describeWorkItem,
  isOutcomeSuccess,
  type AggregateOutcome,
  type WorkItemOutcome,
} from '../types/delegation.js';

export const STATUS_SUCCEEDED = 'Succeeded';
export const STATUS_FAILED = 'Failed';

function formatErrorLines(outcomes: readonly WorkItemOutcome[]): string[] {
  return outcomes
    .filter((outcome) => !isOutcomeSuccess(outcome))
    .map((outcome) => {
      const message =
        outcome.exception?.message ?? outcome.childResult?.errorMessage ?? 'Unknown error';
      return `- [${describeWorkItem(outcome)}]: ${message}`;
    });
}

function formatResultSummary(outcomes: readonly WorkItemOutcome[]): string {
  const results = outcomes
    .filter((outcome) => isOutcomeSuccess(outcome) && !!outcome.childResult?.result)
    .map((outcome, index) => `${index + 1}. ${outcome.childResult?.result ?? ''}`);
  return results.length > 0 ? results.join('\n') : 'No successful results.';
}

function formatSuccessSummary(aggregate: AggregateOutcome): string {
  const { completedCount, totalCount } = aggregate;
  switch (aggregate.strategy) {
    case 'stream-individual':
      return `Streamed ${completedCount}/${totalCount} parallel sessions.`;
    case 'wait-for-all':
      return `Completed ${completedCount}/${totalCount} parallel sessions:\n${formatResultSummary(aggregate.outcomes)} ${STATUS_SUCCEEDED}`;
    case 'first-result-wins': {
      const winner = aggregate.outcomes.find(isOutcomeSuccess);
      return `First result: ${winner?.childResult?.result ?? 'No result.'}`;
    }
  }
}

/** Renders an aggregate as the text handed back to the delegating model. */
export function formatParallelResult(aggregate: AggregateOutcome): string {
  const lines: string[] = [];
  const errorLines = formatErrorLines(aggregate.outcomes);

  if (aggregate.success) {
    lines.push(formatSuccessSummary(aggregate));
    if (aggregate.failedCount > 0 && errorLines.length > 0) {
      lines.push('', `Errors (${aggregate.failedCount} failed):`, ...errorLines);
    }
  } else {
    const details =
      aggregate.errorMessage ??
      `Completed ${aggregate.completedCount}/${aggregate.totalCount} sessions, ${aggregate.failedCount} failed`;
    lines.push(`Parallel execution failed: ${details}`);
    if (errorLines.length > 0) {
      lines.push('', ...errorLines);
    }
  }

  return lines.join('\n').trimEnd();
}

export function formatFailure(message: string): string {
  return message.trim() ? `${STATUS_FAILED}: ${message}` : STATUS_FAILED;
}
