import { ArgumentsHost, Catch, ExceptionFilter } from '@nestjs/common';
import { mapFeatureErrorToProblem } from '../../../../platform/http/filters/feature-error.mapper';
import { ProblemDetailsFilter } from '../../../../platform/http/filters/problem-details.filter';
import { ObjectsError } from '../../app/objects.errors';

@Catch(ObjectsError)
export class ObjectsErrorFilter implements ExceptionFilter {
  private readonly problemDetailsFilter = new ProblemDetailsFilter();

  catch(exception: ObjectsError, host: ArgumentsHost): void {
    const mapped = mapFeatureErrorToProblem({
      status: exception.status,
      code: exception.code,
      detail: exception.message,
      issues: exception.issues,
    });

    this.problemDetailsFilter.catch(mapped, host);
  }
}
