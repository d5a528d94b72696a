import { BadRequestException, PipeTransform } from "@nestjs/common";
import { ClassConstructor, plainToInstance } from "class-transformer";
import { ValidationError, validate } from "class-validator";
import { LottoErrorCode, lottoErrorPayload } from "@toto-sim/core-errors";

/**
 * Validates a request body against an explicit DTO class, so validation does
 * not depend on emitted parameter metadata.
 */
export class ValidateBodyPipe<T extends object> implements PipeTransform<unknown, Promise<T>> {
  constructor(private readonly dtoClass: ClassConstructor<T>) {}

  async transform(value: unknown): Promise<T> {
    if (typeof value !== "object" || value === null || Array.isArray(value)) {
      throw new BadRequestException(lottoErrorPayload(LottoErrorCode.INVALID_INPUT, "Request body must be a JSON object"));
    }

    const instance = plainToInstance(this.dtoClass, value);
    const errors = await validate(instance, { whitelist: true, forbidUnknownValues: true });
    if (errors.length) {
      throw new BadRequestException(
        lottoErrorPayload(LottoErrorCode.INVALID_INPUT, "Request validation failed", { violations: flattenErrors(errors) }),
      );
    }
    return instance;
  }
}

function flattenErrors(errors: ValidationError[]): string[] {
  return errors.flatMap((error) => [...Object.values(error.constraints ?? {}), ...flattenErrors(error.children ?? [])]);
}
