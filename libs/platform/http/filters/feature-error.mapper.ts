import { ErrorCode } from '../errors/error-codes';
import { ProblemException } from '../errors/problem.exception';

export type FeatureErrorIssue = Readonly<{ field?: string; message: string }>;

type MapFeatureErrorToProblemParams = Readonly<{
  status: number;
  code: ErrorCode | string;
  detail?: string;
  issues?: ReadonlyArray<FeatureErrorIssue>;
}>;

function statusTitle(status: number): string {
  switch (status) {
    case 400:
      return 'Bad Request';
    case 404:
      return 'Not Found';
    case 413:
      return 'Payload Too Large';
    case 502:
      return 'Bad Gateway';
    case 503:
      return 'Service Unavailable';
    default:
      return status >= 500 ? 'Internal Server Error' : 'Error';
  }
}

function resolveTitle(status: number, code: ErrorCode | string): string {
  if (code === ErrorCode.VALIDATION_FAILED) return 'Validation Failed';
  return statusTitle(status);
}

export function mapFeatureErrorToProblem(params: MapFeatureErrorToProblemParams): ProblemException {
  return new ProblemException(params.status, {
    title: resolveTitle(params.status, params.code),
    detail: params.detail,
    code: params.code,
    errors: params.issues ? [...params.issues] : undefined,
  });
}
