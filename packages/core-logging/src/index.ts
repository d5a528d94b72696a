import { CallHandler, ExecutionContext, Global, Inject, Injectable, Module, NestInterceptor } from "@nestjs/common";
import pino, { DestinationStream, LevelWithSilent, Logger as PinoLoggerInstance } from "pino";
import { randomUUID } from "crypto";
import { Observable, tap } from "rxjs";

export interface ILogger {
  info(msg: string, meta?: Record<string, unknown>): void;
  warn(msg: string, meta?: Record<string, unknown>): void;
  error(msg: string, meta?: Record<string, unknown>): void;
}

export interface LogContext extends Record<string, unknown> {
  traceId?: string;
  game?: string;
}

export const LOGGER = Symbol("LOGGER");

export interface PinoLoggerOptions {
  level?: LevelWithSilent;
  /** File descriptor to write to; the CLI uses 2 so stdout stays machine-readable. */
  destination?: 1 | 2;
  stream?: DestinationStream;
  base?: LogContext;
}

export class PinoLogger implements ILogger {
  private readonly logger: PinoLoggerInstance;

  constructor(options: PinoLoggerOptions = {}) {
    const stream = options.stream ?? pino.destination({ dest: options.destination ?? 1, sync: true });
    this.logger = pino(
      {
        level: options.level ?? process.env.LOG_LEVEL ?? "info",
        base: { service: "toto-simulator", ...options.base },
      },
      stream,
    );
  }

  info(msg: string, meta: Record<string, unknown> = {}): void {
    this.logger.info(meta, msg);
  }

  warn(msg: string, meta: Record<string, unknown> = {}): void {
    this.logger.warn(meta, msg);
  }

  error(msg: string, meta: Record<string, unknown> = {}): void {
    this.logger.error(meta, msg);
  }
}

export class NoopLogger implements ILogger {
  info(): void {}
  warn(): void {}
  error(): void {}
}

interface TraceableRequest {
  headers: Record<string, string | string[] | undefined>;
  method?: string;
  url?: string;
  traceId?: string;
}

@Injectable()
export class CorrelationIdInterceptor implements NestInterceptor {
  constructor(@Inject(LOGGER) private readonly logger: ILogger) {}

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const http = context.switchToHttp();
    const request = http.getRequest<TraceableRequest>();
    const response = http.getResponse<{ setHeader?: (key: string, value: string) => void }>();

    const traceIdHeader = request.headers["x-trace-id"];
    const traceId = (Array.isArray(traceIdHeader) ? traceIdHeader[0] : traceIdHeader) ?? randomUUID();
    request.traceId = traceId;
    if (typeof response.setHeader === "function") {
      response.setHeader("x-trace-id", traceId);
    }

    const route = { method: request.method, url: request.url };
    const start = Date.now();
    return next.handle().pipe(
      tap({
        next: () => this.logger.info("request.completed", { traceId, ...route, durationMs: Date.now() - start }),
        error: (err: unknown) =>
          this.logger.error("request.error", {
            traceId,
            ...route,
            durationMs: Date.now() - start,
            err: err instanceof Error ? err.message : String(err),
          }),
      }),
    );
  }
}

@Global()
@Module({
  providers: [
    {
      provide: LOGGER,
      useFactory: (): ILogger => new PinoLogger(),
    },
    CorrelationIdInterceptor,
  ],
  exports: [LOGGER, CorrelationIdInterceptor],
})
export class LoggingModule {}
