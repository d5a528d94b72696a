import { Global, Module } from "@nestjs/common";
import { LottoError, LottoErrorCode } from "@toto-sim/core-errors";

export interface SimulatorConfig {
  defaultMaxDraws: number;
  maxDrawsLimit: number;
  apiPort: number;
}

export const SIMULATOR_CONFIG = Symbol("SIMULATOR_CONFIG");

export const DEFAULT_SIMULATOR_CONFIG: Readonly<SimulatorConfig> = Object.freeze({
  defaultMaxDraws: 1_000_000,
  maxDrawsLimit: 2_000_000,
  apiPort: 3000,
});

export function loadSimulatorConfig(env: NodeJS.ProcessEnv = process.env): SimulatorConfig {
  const defaultMaxDraws = parsePositiveInt("TOTO_DEFAULT_MAX_DRAWS", env.TOTO_DEFAULT_MAX_DRAWS) ?? DEFAULT_SIMULATOR_CONFIG.defaultMaxDraws;
  const maxDrawsLimit = parsePositiveInt("TOTO_MAX_DRAWS_LIMIT", env.TOTO_MAX_DRAWS_LIMIT) ?? DEFAULT_SIMULATOR_CONFIG.maxDrawsLimit;
  if (defaultMaxDraws > maxDrawsLimit) {
    throw new LottoError(LottoErrorCode.INVALID_CONFIG, "TOTO_DEFAULT_MAX_DRAWS must not exceed TOTO_MAX_DRAWS_LIMIT", {
      defaultMaxDraws,
      maxDrawsLimit,
    });
  }

  const portName = env.TOTO_API_PORT != null ? "TOTO_API_PORT" : "PORT";
  const apiPort = parsePositiveInt(portName, env.TOTO_API_PORT ?? env.PORT) ?? DEFAULT_SIMULATOR_CONFIG.apiPort;
  if (apiPort > 65_535) {
    throw new LottoError(LottoErrorCode.INVALID_CONFIG, `${portName} must be between 1 and 65535`, { value: apiPort });
  }

  return { defaultMaxDraws, maxDrawsLimit, apiPort };
}

function parsePositiveInt(name: string, raw: string | undefined): number | undefined {
  if (raw == null || raw.trim() === "") {
    return undefined;
  }
  const value = Number(raw.replace(/_/g, ""));
  if (!Number.isSafeInteger(value) || value <= 0) {
    throw new LottoError(LottoErrorCode.INVALID_CONFIG, `${name} must be a positive integer`, { value: raw });
  }
  return value;
}

@Global()
@Module({
  providers: [
    {
      provide: SIMULATOR_CONFIG,
      useFactory: (): SimulatorConfig => loadSimulatorConfig(),
    },
  ],
  exports: [SIMULATOR_CONFIG],
})
export class SimulatorConfigModule {}
