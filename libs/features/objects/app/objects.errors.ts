import type { ErrorCode } from '../../../shared/error-codes';
import type { ObjectsErrorCode } from './objects.error-codes';

export type ObjectsIssue = Readonly<{ field?: string; message: string }>;

export type ObjectsErrorCodeValue = ObjectsErrorCode | ErrorCode;

export class ObjectsError extends Error {
  readonly status: number;
  readonly code: ObjectsErrorCodeValue;
  readonly issues?: ReadonlyArray<ObjectsIssue>;

  constructor(params: {
    status: number;
    code: ObjectsErrorCodeValue;
    message?: string;
    issues?: ReadonlyArray<ObjectsIssue>;
    cause?: unknown;
  }) {
    super(
      params.message ?? params.code,
      params.cause !== undefined ? { cause: params.cause } : undefined,
    );
    this.name = 'ObjectsError';
    this.status = params.status;
    this.code = params.code;
    this.issues = params.issues;
  }
}
