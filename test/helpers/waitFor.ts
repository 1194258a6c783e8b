/**
 * Poll until `condition` holds; rejects after `timeoutMs`
 */
export async function waitFor(condition: () => boolean, timeoutMs: number = 2000, intervalMs: number = 5): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!condition()) {
    if (Date.now() > deadline) {
      throw new Error(`Condition not met within ${timeoutMs}ms`);
    }
    await new Promise<void>(resolve => setTimeout(resolve, intervalMs));
  }
}

export function sleep(ms: number): Promise<void> {
  return new Promise<void>(resolve => setTimeout(resolve, ms));
}
