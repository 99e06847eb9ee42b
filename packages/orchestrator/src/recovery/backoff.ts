import type { RetryPolicy } from "@warden/shared";

export type RandomSource = () => number;

const JITTER_FRACTION = 0.1;

/**
 * Delay before the attempt following failed attempt `attempt` (1-based).
 * Jitter perturbs the clamped delay by up to ±10%.
 */
export function computeBackoffDelay(
  policy: RetryPolicy,
  attempt: number,
  random: RandomSource = Math.random
): number {
  const a = Math.max(1, Math.floor(attempt));
  let delay: number;
  switch (policy.backoff) {
    case "Linear":
      delay = policy.baseDelayMs * a;
      break;
    case "Exponential":
      delay = policy.baseDelayMs * 2 ** (a - 1);
      break;
    default:
      delay = policy.baseDelayMs;
  }
  delay = Math.min(delay, policy.maxDelayMs);
  if (policy.jitter) {
    delay += (random() * 2 - 1) * JITTER_FRACTION * delay;
  }
  return Math.max(0, delay);
}
