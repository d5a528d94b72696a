import { randomBytes, createHmac, createHash } from "crypto";
import { LotteryName, ProvablyFairInfo } from "@toto-sim/core-types";

export interface ProvablyFairContext {
  game: LotteryName;
  serverSeed: string;
  serverSeedHash: string;
  clientSeed: string;
  nonce: number;
}

export interface IProvablyFairService {
  generateServerSeed(): string;
  hashServerSeed(serverSeed: string): string;
  initContext(params: { game: LotteryName; serverSeed?: string; clientSeed?: string; nonce?: number }): ProvablyFairContext;
  rollFloat(ctx: ProvablyFairContext, nonce: number): number;
}

export const PROVABLY_FAIR_SERVICE = Symbol("PROVABLY_FAIR_SERVICE");

// 13 hex digits = 52 bits, the widest slice a double holds exactly.
const ROLL_HEX_DIGITS = 13;

export class ProvablyFairService implements IProvablyFairService {
  generateServerSeed(): string {
    return randomBytes(32).toString("hex");
  }

  hashServerSeed(serverSeed: string): string {
    return createHash("sha256").update(serverSeed).digest("hex");
  }

  initContext(params: { game: LotteryName; serverSeed?: string; clientSeed?: string; nonce?: number }): ProvablyFairContext {
    const serverSeed = params.serverSeed ?? this.generateServerSeed();
    const nonce = params.nonce ?? 0;
    if (!Number.isSafeInteger(nonce) || nonce < 0) {
      throw new Error("ProvablyFair: nonce must be a non-negative safe integer");
    }
    return {
      game: params.game,
      serverSeed,
      serverSeedHash: this.hashServerSeed(serverSeed),
      clientSeed: params.clientSeed ?? randomBytes(16).toString("hex"),
      nonce,
    };
  }

  rollFloat(ctx: ProvablyFairContext, nonce: number): number {
    const payload = `${ctx.clientSeed}:${nonce}`;
    const digest = createHmac("sha256", ctx.serverSeed).update(payload).digest("hex");
    const slice = digest.slice(0, ROLL_HEX_DIGITS);
    const decimal = parseInt(slice, 16);
    const max = Math.pow(16, slice.length);
    return decimal / max;
  }
}

/** Seeds are single-use, so the server seed is revealed alongside its hash. */
export function toProvablyFairInfo(ctx: ProvablyFairContext): ProvablyFairInfo {
  return {
    serverSeed: ctx.serverSeed,
    serverSeedHash: ctx.serverSeedHash,
    clientSeed: ctx.clientSeed,
    nonce: ctx.nonce,
  };
}
