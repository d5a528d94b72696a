import { ILogger } from "@toto-sim/core-logging";
import { IRngService } from "@toto-sim/core-rng";
import { ProvablyFairContext } from "@toto-sim/core-provably-fair";

export interface LogEntry {
  level: "info" | "warn" | "error";
  msg: string;
  meta: Record<string, unknown>;
}

export class InMemoryLogger implements ILogger {
  readonly entries: LogEntry[] = [];

  info(msg: string, meta: Record<string, unknown> = {}): void {
    this.entries.push({ level: "info", msg, meta });
  }

  warn(msg: string, meta: Record<string, unknown> = {}): void {
    this.entries.push({ level: "warn", msg, meta });
  }

  error(msg: string, meta: Record<string, unknown> = {}): void {
    this.entries.push({ level: "error", msg, meta });
  }

  find(msg: string): LogEntry | undefined {
    return this.entries.find((entry) => entry.msg === msg);
  }
}

/**
 * Scripted rng: replays queued values, then keeps returning the last one.
 * With the default of 0 every draw comes out as 1-6 with supplementary 7.
 */
export class TestRngService implements IRngService {
  private fallback = 0;
  private queue: number[] = [];

  setNext(...values: number[]): void {
    this.queue = [...values];
  }

  rollFloat(_ctx: ProvablyFairContext, _nonce: number): number {
    return this.consume();
  }

  private consume(): number {
    const next = this.queue.shift();
    if (next !== undefined) {
      this.fallback = next;
    }
    return this.fallback;
  }
}
