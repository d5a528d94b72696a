import { Controller, Get, Inject, ServiceUnavailableException } from "@nestjs/common";
import { PROVABLY_FAIR_SERVICE } from "@toto-sim/core-provably-fair";
import type { IProvablyFairService } from "@toto-sim/core-provably-fair";
import { RNG_SERVICE } from "@toto-sim/core-rng";
import type { IRngService } from "@toto-sim/core-rng";

interface HealthCheckResult {
  ok: boolean;
  error?: string;
}

@Controller()
export class HealthController {
  constructor(
    @Inject(PROVABLY_FAIR_SERVICE) private readonly provablyFair: IProvablyFairService,
    @Inject(RNG_SERVICE) private readonly rng: IRngService,
  ) {}

  @Get("toto/health")
  health() {
    const checks: Record<string, HealthCheckResult> = {
      rng: this.runCheck(() => this.probeRng()),
    };

    const unhealthy = Object.values(checks).filter((result) => !result.ok);
    if (unhealthy.length) {
      throw new ServiceUnavailableException({ status: "error", checks });
    }

    return { status: "ok", checks };
  }

  private runCheck(fn: () => void): HealthCheckResult {
    try {
      fn();
      return { ok: true };
    } catch (error) {
      return { ok: false, error: error instanceof Error ? error.message : String(error) };
    }
  }

  private probeRng(): void {
    const ctx = this.provablyFair.initContext({ game: "toto" });
    const value = this.rng.rollFloat(ctx, ctx.nonce);
    if (!(value >= 0 && value < 1)) {
      throw new Error(`rng produced ${value} outside [0, 1)`);
    }
  }
}
