import { invalidInput } from "@toto-sim/core-errors";

export type SimulatorCommand = "draw" | "simulate";

export const COMMANDS: readonly SimulatorCommand[] = ["draw", "simulate"];

export interface DrawOptions {
  numbers: number[];
  serverSeed?: string;
  clientSeed?: string;
}

export interface SimulateOptions extends DrawOptions {
  maxDraws: number;
}

/** Client seed used when only `--seed` is given, so the seed alone fixes the stream. */
export const DEFAULT_CLIENT_SEED = "toto";

/** Every token up to the next flag belongs to that flag, so `--numbers 1 2 3 4 5 6` needs no quoting. */
export function parseArgs(args: string[]): Record<string, string> {
  const result: Record<string, string> = {};
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg.startsWith("--")) {
      const key = toCamelCase(arg.replace(/^--/, ""));
      const values: string[] = [];
      while (i + 1 < args.length && !args[i + 1].startsWith("--")) {
        values.push(args[i + 1]);
        i++;
      }
      result[key] = values.length ? values.join(" ") : "true";
    }
  }
  return result;
}

export function isCommand(value: string | undefined): value is SimulatorCommand {
  return value === "draw" || value === "simulate";
}

/** Accepts "1,2,3,4,5,6" or "1 2 3 4 5 6". Range and uniqueness are checked by the classifier. */
export function parseNumbers(raw: string | undefined): number[] {
  if (raw == null || raw === "true") {
    throw invalidInput("--numbers is required, e.g. --numbers 1,2,3,4,5,6");
  }
  const parts = raw.split(/[\s,]+/).filter((part) => part.length > 0);
  return parts.map((part) => {
    if (!/^\d+$/.test(part)) {
      throw invalidInput(`Invalid number '${part}'`, { value: part });
    }
    return Number(part);
  });
}

export function parseMaxDraws(raw: string | undefined, fallback: number): number {
  if (raw == null) {
    return fallback;
  }
  const value = Number(raw.replace(/_/g, ""));
  if (!Number.isSafeInteger(value) || value < 1) {
    throw invalidInput("--max-draws must be a positive integer", { value: raw });
  }
  return value;
}

export function toDrawOptions(args: Record<string, string>): DrawOptions {
  const serverSeed = optionalString(args.seed);
  const clientSeed = optionalString(args.clientSeed);
  return {
    numbers: parseNumbers(args.numbers),
    serverSeed,
    clientSeed: clientSeed ?? (serverSeed != null ? DEFAULT_CLIENT_SEED : undefined),
  };
}

export function toSimulateOptions(args: Record<string, string>, defaultMaxDraws: number): SimulateOptions {
  return {
    ...toDrawOptions(args),
    maxDraws: parseMaxDraws(args.maxDraws, defaultMaxDraws),
  };
}

function optionalString(value: string | undefined): string | undefined {
  return value == null || value === "true" ? undefined : value;
}

function toCamelCase(key: string): string {
  return key.replace(/-([a-z])/g, (_, letter: string) => letter.toUpperCase());
}
