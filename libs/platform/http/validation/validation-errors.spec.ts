import type { ValidationError } from 'class-validator';
import { ErrorCode } from '../errors/error-codes';
import { flattenValidationErrors, validationProblem } from './validation-errors';

const errors: ValidationError[] = [
  {
    property: 'key',
    constraints: { isString: 'key must be a string' },
    children: [],
  },
  {
    property: 'upload',
    children: [
      {
        property: 'contentLength',
        constraints: {
          isInt: 'contentLength must be an integer number',
          min: 'contentLength must not be less than 0',
        },
        children: [],
      },
    ],
  },
];

describe('flattenValidationErrors', () => {
  it('emits one entry per constraint with dotted paths for nested properties', () => {
    expect(flattenValidationErrors(errors)).toEqual([
      { field: 'key', message: 'key must be a string' },
      { field: 'upload.contentLength', message: 'contentLength must be an integer number' },
      { field: 'upload.contentLength', message: 'contentLength must not be less than 0' },
    ]);
  });
});

describe('validationProblem', () => {
  it('builds a 400 VALIDATION_FAILED problem', () => {
    const problem = validationProblem(errors.slice(0, 1));

    expect(problem.getStatus()).toBe(400);
    expect(problem.getResponse()).toEqual({
      title: 'Validation Failed',
      detail: 'Request validation failed',
      code: ErrorCode.VALIDATION_FAILED,
      type: undefined,
      errors: [{ field: 'key', message: 'key must be a string' }],
    });
  });
});
