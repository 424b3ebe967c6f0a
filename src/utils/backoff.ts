/** Tuning for {@link ExponentialBackoff}. */
export interface ExponentialBackoffOptions {
  /**
   * First delay in milliseconds.
   * @default 500
   */
  initialInterval?: number;
  /**
   * Growth factor applied after each delay.
   * @default 1.5
   */
  multiplier?: number;
  /**
   * Spread of each delay around the current interval, as a fraction of it.
   * `0` makes the delays deterministic.
   * @default 0.5
   */
  randomizationFactor?: number;
  /**
   * Ceiling for the (unrandomized) interval.
   * @default 60_000
   */
  maxInterval?: number;
  /**
   * Source of randomness in `[0, 1)`.
   * @default Math.random
   */
  random?: () => number;
}

/**
 * Exponential backoff policy.
 *
 * Each delay is drawn uniformly from `current ± randomizationFactor × current`, after which
 * `current` grows by `multiplier` until it reaches `maxInterval`.
 */
export class ExponentialBackoff {
  #multiplier: number;
  #randomizationFactor: number;
  #maxInterval: number;
  #random: () => number;
  #current: number;

  /** Creates a backoff policy with the standard defaults for anything not given. */
  constructor(opts: ExponentialBackoffOptions = {}) {
    this.#multiplier = opts.multiplier ?? 1.5;
    this.#randomizationFactor = opts.randomizationFactor ?? 0.5;
    this.#maxInterval = opts.maxInterval ?? 60_000;
    this.#random = opts.random ?? Math.random;
    this.#current = opts.initialInterval ?? 500;
  }

  /**
   * Returns the next delay in milliseconds and advances the interval.
   */
  next(): number {
    const delta = this.#randomizationFactor * this.#current;
    const min = this.#current - delta;
    const max = this.#current + delta;
    const delay = min + this.#random() * (max - min);

    if (this.#current >= this.#maxInterval / this.#multiplier) {
      this.#current = this.#maxInterval;
    } else {
      this.#current *= this.#multiplier;
    }

    return Math.round(delay);
  }
}
