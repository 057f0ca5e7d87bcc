// Seeded random stream shared by every draw a generator makes

import type { WeightedTable } from './constants'

// Seeded PRNG (mulberry32)
function mulberry32(seed: number): () => number {
  return () => {
    seed |= 0
    seed = (seed + 0x6d2b79f5) | 0
    let t = Math.imul(seed ^ (seed >>> 15), 1 | seed)
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296
  }
}

export function randomSeed(): number {
  return Math.floor(Math.random() * 4294967296) >>> 0
}

export class RandomSource {
  private readonly next: () => number

  constructor(seed: number) {
    this.next = mulberry32(seed)
  }

  /** Uniform in [0, 1). */
  uniform(): number {
    return this.next()
  }

  /** Uniform integer in [0, max]. */
  integer(max: number): number {
    return Math.floor(this.next() * (max + 1))
  }

  pick<T>(options: readonly T[]): T {
    return options[Math.floor(this.next() * options.length)]
  }

  weighted<T extends string>(table: WeightedTable<T>): T {
    const total = table.weights.reduce((sum, w) => sum + w, 0)
    const r = this.next() * total
    let acc = 0
    for (let i = 0; i < table.options.length; i++) {
      acc += table.weights[i]
      if (r < acc) return table.options[i]
    }
    return table.options[table.options.length - 1]
  }

  /** Standard normal via Box–Muller; consumes two draws. */
  normal(): number {
    const u1 = 1 - this.next()  // (0, 1], keeps log finite
    const u2 = this.next()
    return Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2)
  }

  logNormal(mu: number, sigma: number): number {
    return Math.exp(mu + sigma * this.normal())
  }

  bernoulli(p: number): boolean {
    return this.next() < p
  }

  /** Uppercase hex string of the given length, 24 bits per draw. */
  hex(length: number): string {
    let out = ''
    while (out.length < length) {
      out += Math.floor(this.next() * 0x1000000).toString(16).padStart(6, '0')
    }
    return out.slice(0, length).toUpperCase()
  }
}
