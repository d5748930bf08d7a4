// u32 algebra behind the baseline chain: a + a² + (a+1) = (a+1)², all mod 2³².

export function square32(a: number): number {
  return Math.imul(a, a) >>> 0;
}

/** Next square from the previous one by adding the gnomon `a + (a+1)`. */
export function gnomonStep(square: number, a: number): number {
  return (square + a + a + 1) >>> 0;
}

export interface MlIdentity {
  readonly b: number;
  readonly lhs: number;
}

/** `b = a + 1` and `lhs = a + a² + b`, which equals `b²` for every u32 `a`. */
export function mlIdentity(a: number): MlIdentity {
  const b = (a + 1) >>> 0;
  return { b, lhs: (a + square32(a) + b) >>> 0 };
}

export function identityHolds(a: number, aSquared: number, b: number, bSquared: number): boolean {
  const a32 = a >>> 0;
  return (
    b >>> 0 === (a32 + 1) >>> 0 &&
    aSquared >>> 0 === square32(a32) &&
    (a32 + aSquared + b) >>> 0 === bSquared >>> 0
  );
}
