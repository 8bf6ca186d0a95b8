import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  Param,
  Post,
  Query,
  Req,
  Res,
  StreamableFile,
  UseFilters,
} from '@nestjs/common';
import {
  ApiConsumes,
  ApiCreatedResponse,
  ApiOkResponse,
  ApiOperation,
  ApiParam,
  ApiProduces,
  ApiTags,
} from '@nestjs/swagger';
import type { MultipartFile } from '@fastify/multipart';
import type { FastifyReply, FastifyRequest } from 'fastify';
import { PinoLogger } from 'nestjs-pino';
import { ErrorCode } from '../../../../platform/http/errors/error-codes';
import { ApiErrorCodes } from '../../../../platform/http/openapi/api-error-codes.decorator';
import { ObjectsErrorCode } from '../../app/objects.error-codes';
import { ObjectsError } from '../../app/objects.errors';
import { ObjectsService } from '../../app/objects.service';
import type { UploadedObjectView } from '../../app/objects.types';
import { attachmentDisposition } from './content-disposition';
import {
  DeletedObjectEnvelopeDto,
  ObjectMetadataEnvelopeDto,
  PresignDownloadRequestDto,
  PresignUploadRequestDto,
  PresignedDownloadEnvelopeDto,
  PresignedUploadEnvelopeDto,
  UploadQueryDto,
  UploadedObjectEnvelopeDto,
} from './dtos/objects.dto';
import { ObjectsErrorFilter } from './objects-error.filter';

const UPLOAD_FIELD = 'file';

const STORAGE_FAILURE_CODES = [
  ErrorCode.STORAGE_UNAVAILABLE,
  ErrorCode.STORAGE_ACCESS_DENIED,
  ErrorCode.STORAGE_ERROR,
] as const;

const KEY_PARAM = {
  name: 'key',
  description: 'Object key; a key containing "/" is sent percent-encoded (a%2Fb.txt).',
  example: 'hello.txt',
} as const;

function fileRequired(message: string): ObjectsError {
  return new ObjectsError({
    status: 400,
    code: ObjectsErrorCode.OBJECTS_FILE_REQUIRED,
    message,
    issues: [{ field: UPLOAD_FIELD, message }],
  });
}

/** Aborts when the client goes away before the response was fully written. */
function abortOnDisconnect(reply: FastifyReply): AbortController {
  const controller = new AbortController();
  reply.raw.once('close', () => {
    if (!reply.raw.writableFinished) controller.abort();
  });
  return controller;
}

/** Also aborts once the part hits the size cap, so a cut-short body is never committed. */
function abortOnDisconnectOrLimit(reply: FastifyReply, part: MultipartFile): AbortController {
  const controller = abortOnDisconnect(reply);
  if (part.file.truncated) {
    controller.abort();
  } else {
    part.file.once('limit', () => controller.abort());
  }
  return controller;
}

@ApiTags('Files')
@Controller('files')
@UseFilters(ObjectsErrorFilter)
export class ObjectsController {
  constructor(
    private readonly objects: ObjectsService,
    private readonly logger: PinoLogger,
  ) {
    this.logger.setContext(ObjectsController.name);
  }

  @Post('upload')
  @ApiConsumes('multipart/form-data')
  @ApiOperation({
    operationId: 'files.upload',
    summary: 'Upload a file',
    description:
      'Streams the multipart field "file" to object storage. The key defaults to the file name.',
  })
  @ApiErrorCodes([
    ErrorCode.VALIDATION_FAILED,
    ObjectsErrorCode.OBJECTS_FILE_REQUIRED,
    ErrorCode.PAYLOAD_TOO_LARGE,
    ...STORAGE_FAILURE_CODES,
    ErrorCode.INTERNAL,
  ])
  @ApiCreatedResponse({ type: UploadedObjectEnvelopeDto })
  async upload(
    @Query() query: UploadQueryDto,
    @Req() req: FastifyRequest,
    @Res({ passthrough: true }) reply: FastifyReply,
  ) {
    if (!req.isMultipart()) {
      throw fileRequired('Expected a multipart/form-data body');
    }

    const part: MultipartFile | undefined = await req.file();
    if (!part) {
      throw fileRequired(`Multipart field "${UPLOAD_FIELD}" is required`);
    }
    if (part.fieldname !== UPLOAD_FIELD) {
      part.file.resume();
      throw fileRequired(`Multipart field "${UPLOAD_FIELD}" is required`);
    }

    const abort = abortOnDisconnectOrLimit(reply, part);
    let uploaded: UploadedObjectView;
    try {
      uploaded = await this.objects.upload({
        key: query.key,
        source: {
          stream: part.file,
          filename: part.filename || undefined,
          mimetype: part.mimetype || undefined,
          exceededLimit: () => part.file.truncated,
        },
        abortSignal: abort.signal,
      });
    } catch (err: unknown) {
      // Drain whatever was not consumed so the request can complete.
      part.file.resume();
      throw err;
    }

    this.logger.info(
      { key: uploaded.key, contentType: uploaded.contentType },
      'Object uploaded',
    );
    return uploaded;
  }

  @Post('presign/upload')
  @HttpCode(200)
  @ApiOperation({
    operationId: 'files.presign.upload',
    summary: 'Create a presigned upload URL',
    description:
      'Signs a PUT URL bound to the key, Content-Type and Content-Length; the store is not called.',
  })
  @ApiErrorCodes([ErrorCode.VALIDATION_FAILED, ...STORAGE_FAILURE_CODES, ErrorCode.INTERNAL])
  @ApiOkResponse({ type: PresignedUploadEnvelopeDto })
  presignUpload(@Body() body: PresignUploadRequestDto) {
    return this.objects.presignUpload(body);
  }

  @Post('presign/download')
  @HttpCode(200)
  @ApiOperation({
    operationId: 'files.presign.download',
    summary: 'Create a presigned download URL',
    description: 'Signs a GET URL for the key. Whether the object exists is not checked.',
  })
  @ApiErrorCodes([ErrorCode.VALIDATION_FAILED, ...STORAGE_FAILURE_CODES, ErrorCode.INTERNAL])
  @ApiOkResponse({ type: PresignedDownloadEnvelopeDto })
  presignDownload(@Body() body: PresignDownloadRequestDto) {
    return this.objects.presignDownload(body);
  }

  @Get(':key/metadata')
  @ApiParam(KEY_PARAM)
  @ApiOperation({
    operationId: 'files.metadata',
    summary: 'Get file metadata',
    description: 'Returns size, content type, ETag and last-modified time without the body.',
  })
  @ApiErrorCodes([
    ErrorCode.VALIDATION_FAILED,
    ErrorCode.NOT_FOUND,
    ...STORAGE_FAILURE_CODES,
    ErrorCode.INTERNAL,
  ])
  @ApiOkResponse({ type: ObjectMetadataEnvelopeDto })
  metadata(@Param('key') key: string) {
    return this.objects.metadata(key);
  }

  @Get(':key')
  @ApiParam(KEY_PARAM)
  @ApiProduces('application/octet-stream')
  @ApiOperation({
    operationId: 'files.download',
    summary: 'Download a file',
    description: 'Streams the object body as an attachment.',
  })
  @ApiErrorCodes([
    ErrorCode.VALIDATION_FAILED,
    ErrorCode.NOT_FOUND,
    ...STORAGE_FAILURE_CODES,
    ErrorCode.INTERNAL,
  ])
  @ApiOkResponse({ description: 'Object bytes.' })
  async download(
    @Param('key') key: string,
    @Res({ passthrough: true }) reply: FastifyReply,
  ): Promise<StreamableFile> {
    const abort = abortOnDisconnect(reply);
    const object = await this.objects.download(key, { abortSignal: abort.signal });

    if (object.etag) reply.header('ETag', object.etag);
    if (object.lastModified) reply.header('Last-Modified', object.lastModified.toUTCString());

    return new StreamableFile(object.body, {
      type: object.contentType,
      length: object.contentLength,
      disposition: attachmentDisposition(object.filename),
    });
  }

  @Delete(':key')
  @ApiParam(KEY_PARAM)
  @ApiOperation({
    operationId: 'files.delete',
    summary: 'Delete a file',
    description: 'Removes the object. Deleting a missing key succeeds.',
  })
  @ApiErrorCodes([ErrorCode.VALIDATION_FAILED, ...STORAGE_FAILURE_CODES, ErrorCode.INTERNAL])
  @ApiOkResponse({ type: DeletedObjectEnvelopeDto })
  async delete(@Param('key') key: string) {
    const deleted = await this.objects.delete(key);
    this.logger.info({ key: deleted.key }, 'Object deleted');
    return deleted;
  }
}
