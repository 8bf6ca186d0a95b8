import { Controller, Get } from '@nestjs/common';
import {
  ApiOkResponse,
  ApiOperation,
  ApiServiceUnavailableResponse,
  ApiTags,
} from '@nestjs/swagger';
import { SkipEnvelope } from '../http/decorators/skip-envelope.decorator';
import { ErrorCode } from '../http/errors/error-codes';
import { ApiErrorCodes } from '../http/openapi/api-error-codes.decorator';
import { ReadinessService, type HealthReport } from './readiness.service';

@ApiTags('Health')
@Controller('health')
export class HealthController {
  constructor(private readonly readiness: ReadinessService) {}

  @Get()
  @SkipEnvelope()
  @ApiOperation({
    operationId: 'health.get',
    summary: 'Health check',
    description: 'Reports whether the process is up and the object store bucket is reachable.',
  })
  @ApiErrorCodes([ErrorCode.STORAGE_UNAVAILABLE, ErrorCode.INTERNAL])
  @ApiOkResponse({
    description: 'Service and object storage are healthy.',
    schema: {
      type: 'object',
      properties: {
        status: { type: 'string', example: 'ok' },
        storage: {
          type: 'object',
          properties: { reachable: { type: 'boolean', example: true } },
          required: ['reachable'],
        },
      },
      required: ['status', 'storage'],
    },
  })
  @ApiServiceUnavailableResponse({ description: 'Object storage is unreachable.' })
  getHealth(): Promise<HealthReport> {
    return this.readiness.check();
  }
}
