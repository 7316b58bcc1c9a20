/**
 * Calls fn until it succeeds or maxRetries attempts have failed,
 * waiting baseDelayMs * 2^(attempt-1) between attempts
 * @param label - Provider name used in warnings
 */
export async function callWithRetry<T>(
  label: string,
  maxRetries: number,
  baseDelayMs: number,
  fn: () => Promise<T>
): Promise<T> {
  let lastError: Error | undefined;
  const attempts = Math.max(1, maxRetries);

  for (let attempt = 1; attempt <= attempts; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));
      console.warn(`[llm] ${label} attempt ${attempt} failed: ${lastError.message}`);

      if (attempt < attempts) {
        // Exponential backoff
        await new Promise((resolve) => setTimeout(resolve, Math.pow(2, attempt - 1) * baseDelayMs));
      }
    }
  }

  throw lastError ?? new Error(`${label} call failed after retries`);
}
