import { applyDecorators } from '@nestjs/common';
import { ApiExtension, ApiProduces } from '@nestjs/swagger';
import type { ErrorCode } from '../errors/error-codes';

/** Lists the problem `code` values an operation can answer with under `x-error-codes`. */
export function ApiErrorCodes(codes: ReadonlyArray<ErrorCode | string>) {
  const unique = [...new Set(codes)];
  return applyDecorators(
    ApiProduces('application/json', 'application/problem+json'),
    ApiExtension('x-error-codes', unique),
  );
}
