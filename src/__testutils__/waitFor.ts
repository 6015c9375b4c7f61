import { setTimeout as delay } from 'node:timers/promises';

/**
 * Poll until `condition` holds or `timeoutMs` passes.
 *
 * @throws Error naming `description` on timeout
 */
export async function waitFor(
  condition: () => boolean,
  description: string,
  timeoutMs = 1000
): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!condition()) {
    if (Date.now() > deadline) {
      throw new Error(`Timed out waiting for ${description}`);
    }
    await delay(5);
  }
}
