/**
 * Node fires any setTimeout delay above 2^31 - 1 ms after 1 ms, so long
 * waits are capped at that value (about 24.8 days).
 */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

export function clampTimerDelay(ms: number): number {
  if (Number.isNaN(ms)) {
    return 0;
  }
  return Math.min(Math.max(0, ms), MAX_TIMER_DELAY_MS);
}
