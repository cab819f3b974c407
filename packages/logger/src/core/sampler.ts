import type { Severity } from "../ports/log-level"

export type SamplerOptions = {
  tickMs?: number
  first?: number
  thereafter?: number
  now?: () => number
}

/**
 * Caps repeated records. Within each tick the first `first` records with the
 * same severity and message pass, then every `thereafter`-th one.
 */
export class Sampler {
  private readonly tickMs: number
  private readonly first: number
  private readonly thereafter: number
  private readonly now: () => number

  private tick = Number.NaN
  private readonly counts = new Map<string, number>()

  constructor(opts: SamplerOptions = {}) {
    this.tickMs = opts.tickMs ?? 1000
    this.first = opts.first ?? 100
    this.thereafter = opts.thereafter ?? 100
    this.now = opts.now ?? Date.now
  }

  allow(severity: Severity, message: string): boolean {
    const tick = Math.floor(this.now() / this.tickMs)

    if (tick !== this.tick) {
      this.tick = tick
      this.counts.clear()
    }

    const key = `${severity}:${message}`
    const count = (this.counts.get(key) ?? 0) + 1
    this.counts.set(key, count)

    if (count <= this.first) return true
    if (this.thereafter <= 0) return false

    return (count - this.first) % this.thereafter === 0
  }
}
