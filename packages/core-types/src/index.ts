export type LotteryName = "toto";

export interface ProvablyFairInfo {
  serverSeed: string;
  serverSeedHash: string;
  clientSeed: string;
  nonce: number;
}
