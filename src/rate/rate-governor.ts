import type { Clock } from "../cache/cache-store.js";
import type { RatePolicy } from "../config/app-config.js";

export type QuotaTier = "ample" | "low" | "critical";

export type RateState = {
  remainingQuota: number | undefined;
  lastObservedAt: number | undefined;
  cooldownUntil: number | undefined;
};

/**
 * Adaptive pacing from the remote's remaining-quota hint.
 *
 * Unknown quota paces at the base delay. An explicit rejection starts a fixed
 * cooldown that {@link nextDelay} reports until it has elapsed.
 */
export class RateGovernor {
  private state: RateState = {
    remainingQuota: undefined,
    lastObservedAt: undefined,
    cooldownUntil: undefined,
  };

  constructor(
    private readonly policy: RatePolicy,
    private readonly clock: Clock = Date.now,
  ) {}

  observe(remainingQuota: number | undefined): void {
    const now = this.clock();
    this.state = {
      ...this.state,
      remainingQuota:
        remainingQuota === undefined || Number.isNaN(remainingQuota)
          ? undefined
          : Math.max(0, remainingQuota),
      lastObservedAt: now,
    };
    console.debug(
      "[RateGovernor:observe] quota observed",
      this.state.remainingQuota,
      this.tier(),
    );
  }

  /** Records an explicit "quota exhausted" answer and returns the cooldown to wait. */
  recordRejection(retryAfterMs?: number): number {
    const cooldownMs = Math.max(this.policy.cooldownMs, retryAfterMs ?? 0);
    const now = this.clock();
    this.state = {
      remainingQuota: 0,
      lastObservedAt: now,
      cooldownUntil: now + cooldownMs,
    };
    console.warn("[RateGovernor:recordRejection] cooldown started", cooldownMs);
    return cooldownMs;
  }

  tier(): QuotaTier {
    const remaining = this.state.remainingQuota;
    if (remaining === undefined || remaining >= this.policy.lowQuotaThreshold) {
      return "ample";
    }
    if (remaining >= this.policy.criticalQuotaThreshold) {
      return "low";
    }
    return "critical";
  }

  nextDelay(): number {
    const tierDelay = this.delayForTier(this.tier());
    const cooldownUntil = this.state.cooldownUntil;
    if (cooldownUntil === undefined) {
      return tierDelay;
    }

    const cooldownLeft = cooldownUntil - this.clock();
    return Math.max(tierDelay, cooldownLeft);
  }

  snapshot(): RateState {
    return { ...this.state };
  }

  reset(): void {
    this.state = {
      remainingQuota: undefined,
      lastObservedAt: undefined,
      cooldownUntil: undefined,
    };
  }

  private delayForTier(tier: QuotaTier): number {
    switch (tier) {
      case "ample":
        return this.policy.baseDelayMs;
      case "low":
        return Math.max(this.policy.baseDelayMs, this.policy.moderateDelayMs);
      case "critical":
        return Math.max(
          this.policy.baseDelayMs,
          this.policy.moderateDelayMs,
          this.policy.maxDelayMs,
        );
    }
  }
}
