import { ProvablyFairContext, IProvablyFairService } from "@toto-sim/core-provably-fair";

/** Uniform source yielding values in [0, 1). */
export type RandomSource = () => number;

export interface IRngService {
  rollFloat(ctx: ProvablyFairContext, nonce: number): number;
}

export const RNG_SERVICE = Symbol("RNG_SERVICE");

export class ProvablyFairRngService implements IRngService {
  constructor(private readonly service: IProvablyFairService) {}

  rollFloat(ctx: ProvablyFairContext, nonce: number): number {
    return this.service.rollFloat(ctx, nonce);
  }
}

export interface SeededSource {
  next: RandomSource;
  /** Nonce the next call to `next()` will consume. */
  nonce(): number;
}

/**
 * Walks the provably-fair stream one nonce per call, starting at `ctx.nonce`.
 * Two sources built from the same seeds replay the same sequence.
 */
export function createSeededSource(rng: IRngService, ctx: ProvablyFairContext): SeededSource {
  let cursor = ctx.nonce;
  return {
    next: () => {
      const value = rng.rollFloat(ctx, cursor);
      cursor += 1;
      return value;
    },
    nonce: () => cursor,
  };
}
