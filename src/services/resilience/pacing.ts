/**
 * Pacing helpers that space out remote calls to stay under upstream rate limits
 * @module services/resilience/pacing
 */

/**
 * Sleep for the given number of milliseconds; resolves immediately for 0
 */
export function sleep(ms: number): Promise<void> {
  if (ms <= 0) {
    return Promise.resolve()
  }
  return new Promise((resolve) => setTimeout(resolve, ms))
}

/**
 * Enforces a fixed pause between consecutive calls.
 * The first call through a pacer never waits.
 *
 * @example
 * ```typescript
 * const pacer = new Pacer(500)
 * for (const channel of channels) {
 *   await pacer.wait()
 *   await service.listChannelMembers(channel)
 * }
 * ```
 */
export class Pacer {
  private readonly delayMs: number
  private calls = 0

  constructor(delayMs: number) {
    this.delayMs = delayMs
  }

  /** Number of calls that went through this pacer */
  get callCount(): number {
    return this.calls
  }

  /**
   * Waits the configured delay unless this is the first call
   */
  async wait(): Promise<void> {
    if (this.calls > 0) {
      await sleep(this.delayMs)
    }
    this.calls++
  }
}
