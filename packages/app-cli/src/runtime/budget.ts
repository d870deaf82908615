// packages/app-cli/src/runtime/budget.ts

/**
 * Time one tool call may take when it makes `requests` HTTP calls in a row,
 * each allowed every retry and the backoff between them (250ms doubling).
 */
export function toolBudgetMs(opts: { requestTimeoutMs: number; retries: number; requests: number }) {
  const backoff = 250 * (Math.pow(2, opts.retries) - 1);
  const perRequest = (opts.retries + 1) * opts.requestTimeoutMs + backoff;
  return perRequest * opts.requests;
}
