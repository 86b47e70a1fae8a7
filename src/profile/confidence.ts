/**
 * A belief strength bounded to [0, 1].
 *
 * Values are immutable. The only way to move one is {@link Confidence.toward},
 * an exponential moving average step, so no single observation can set a
 * weight outright.
 */
export class Confidence {
  static readonly NEUTRAL = new Confidence(0.5)

  private constructor(readonly value: number) {}

  static of(value: number): Confidence {
    if (!Number.isFinite(value)) {
      throw new RangeError(`Confidence must be a finite number, got ${value}`)
    }
    return new Confidence(Math.min(1, Math.max(0, value)))
  }

  /** `w' = w + step * (target - w)` */
  toward(target: 0 | 1, step: number): Confidence {
    if (!(step > 0 && step <= 1)) {
      throw new RangeError(`Confidence step must be in (0, 1], got ${step}`)
    }
    return Confidence.of(this.value + step * (target - this.value))
  }

  toJSON(): number {
    return this.value
  }
}

export function confidenceOrNeutral(map: ReadonlyMap<string, Confidence>, key: string): Confidence {
  return map.get(key) ?? Confidence.NEUTRAL
}
