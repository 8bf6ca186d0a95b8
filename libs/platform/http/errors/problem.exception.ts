import { HttpException } from '@nestjs/common';
import { ErrorCode } from './error-codes';

export type ProblemIssue = { field?: string; message: string };

export class ProblemException extends HttpException {
  constructor(
    status: number,
    options: {
      title?: string;
      detail?: string;
      code?: ErrorCode | string;
      type?: string;
      errors?: Array<ProblemIssue>;
    } = {},
  ) {
    const { title, detail, code, type, errors } = options;
    super({ title, detail, code, type, errors }, status);
  }

  static validation(detail?: string, errors?: Array<ProblemIssue>) {
    return new ProblemException(400, {
      title: 'Validation Failed',
      detail,
      code: ErrorCode.VALIDATION_FAILED,
      errors,
    });
  }

  static notFound(detail?: string) {
    return new ProblemException(404, { title: 'Not Found', detail, code: ErrorCode.NOT_FOUND });
  }

  static payloadTooLarge(detail?: string) {
    return new ProblemException(413, {
      title: 'Payload Too Large',
      detail,
      code: ErrorCode.PAYLOAD_TOO_LARGE,
    });
  }

  static storageUnavailable(detail?: string, errors?: Array<ProblemIssue>) {
    return new ProblemException(503, {
      title: 'Service Unavailable',
      detail,
      code: ErrorCode.STORAGE_UNAVAILABLE,
      errors,
    });
  }

  static internal(detail?: string) {
    return new ProblemException(500, {
      title: 'Internal Server Error',
      detail,
      code: ErrorCode.INTERNAL,
    });
  }
}
