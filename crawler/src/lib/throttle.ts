export interface AutoThrottleOptions {
  enabled: boolean;
  minDelayMs: number;
  startDelayMs: number;
  maxDelayMs: number;
  targetConcurrency: number;
}

/**
 * Latency-driven request spacing. Each observed response pulls the delay halfway towards
 * `latency / targetConcurrency`, never below that target and always within [min, max].
 * Error responses may raise the delay but never lower it.
 */
export class AutoThrottle {
  private current: number;

  constructor(private readonly options: AutoThrottleOptions) {
    this.current = Math.min(Math.max(options.minDelayMs, options.startDelayMs), options.maxDelayMs);
  }

  get delayMs(): number {
    return this.options.enabled ? this.current : this.options.minDelayMs;
  }

  observe(latencyMs: number, status: number | undefined): void {
    if (!this.options.enabled) {
      return;
    }

    const target = latencyMs / this.options.targetConcurrency;
    const averaged = Math.max(target, (this.current + target) / 2);
    const next = Math.min(Math.max(this.options.minDelayMs, averaged), this.options.maxDelayMs);

    if (status !== 200 && next <= this.current) {
      return;
    }
    this.current = next;
  }
}
