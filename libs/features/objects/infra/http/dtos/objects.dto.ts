import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Transform, Type } from 'class-transformer';
import { IsInt, IsNotEmpty, IsOptional, IsString, Min } from 'class-validator';

const trimString = ({ value }: { value: unknown }) =>
  typeof value === 'string' ? value.trim() : value;

const blankToUndefined = ({ value }: { value: unknown }) => {
  if (typeof value !== 'string') return value;
  const trimmed = value.trim();
  return trimmed !== '' ? trimmed : undefined;
};

export class UploadQueryDto {
  @ApiPropertyOptional({
    example: 'docs/report.pdf',
    description: 'Object key. Defaults to the uploaded file name when absent or blank.',
  })
  @Transform(blankToUndefined)
  @IsOptional()
  @IsString()
  key?: string;
}

export class PresignUploadRequestDto {
  @ApiProperty({ example: 'docs/report.pdf' })
  @IsString()
  @IsNotEmpty()
  key!: string;

  @ApiProperty({
    example: 'application/pdf',
    description: 'Content-Type the upload must be sent with.',
  })
  @Transform(trimString)
  @IsString()
  @IsNotEmpty()
  contentType!: string;

  @ApiProperty({
    example: 524288,
    minimum: 0,
    description: 'Exact size of the upload in bytes; bounded by the configured upload limit.',
  })
  @Type(() => Number)
  @IsInt()
  @Min(0)
  contentLength!: number;

  @ApiPropertyOptional({
    example: 900,
    minimum: 1,
    description: 'URL lifetime. Defaults to the configured TTL; bounded by the configured maximum.',
  })
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  expiresInSeconds?: number;
}

export class PresignDownloadRequestDto {
  @ApiProperty({ example: 'docs/report.pdf' })
  @IsString()
  @IsNotEmpty()
  key!: string;

  @ApiPropertyOptional({ example: 900, minimum: 1 })
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  expiresInSeconds?: number;
}

export class UploadedObjectDto {
  @ApiProperty({ example: 'docs/report.pdf' })
  key!: string;

  @ApiProperty({ example: 'report.pdf' })
  filename!: string;

  @ApiProperty({ example: 'application/pdf' })
  contentType!: string;

  @ApiPropertyOptional({ example: '"9b2cf535f27731c974343645a3985328"' })
  etag?: string;
}

export class UploadedObjectEnvelopeDto {
  @ApiProperty({ type: UploadedObjectDto })
  data!: UploadedObjectDto;
}

export class DeletedObjectDto {
  @ApiProperty({ example: 'docs/report.pdf' })
  key!: string;

  @ApiProperty({ enum: [true], example: true })
  deleted!: true;
}

export class DeletedObjectEnvelopeDto {
  @ApiProperty({ type: DeletedObjectDto })
  data!: DeletedObjectDto;
}

export class ObjectMetadataDto {
  @ApiProperty({ example: 'docs/report.pdf' })
  key!: string;

  @ApiProperty({ example: 524288 })
  contentLength!: number;

  @ApiProperty({ example: 'application/pdf' })
  contentType!: string;

  @ApiProperty({ type: String, nullable: true, example: '"9b2cf535f27731c974343645a3985328"' })
  etag!: string | null;

  @ApiProperty({
    type: String,
    nullable: true,
    format: 'date-time',
    example: '2026-01-10T12:34:56.000Z',
  })
  lastModified!: string | null;
}

export class ObjectMetadataEnvelopeDto {
  @ApiProperty({ type: ObjectMetadataDto })
  data!: ObjectMetadataDto;
}

export class PresignedUploadDto {
  @ApiProperty({ enum: ['PUT'], example: 'PUT' })
  method!: 'PUT';

  @ApiProperty({ example: 'http://localhost:9000/uploads/docs/report.pdf?X-Amz-Signature=...' })
  url!: string;

  @ApiProperty({
    type: Object,
    example: { 'Content-Type': 'application/pdf', 'Content-Length': '524288' },
    description: 'Headers that must be sent with the upload request.',
  })
  headers!: Record<string, string>;

  @ApiProperty({ example: '2026-01-10T12:49:56.789Z', format: 'date-time' })
  expiresAt!: string;
}

export class PresignedUploadEnvelopeDto {
  @ApiProperty({ type: PresignedUploadDto })
  data!: PresignedUploadDto;
}

export class PresignedDownloadDto {
  @ApiProperty({ enum: ['GET'], example: 'GET' })
  method!: 'GET';

  @ApiProperty({ example: 'http://localhost:9000/uploads/docs/report.pdf?X-Amz-Signature=...' })
  url!: string;

  @ApiProperty({ example: '2026-01-10T12:49:56.789Z', format: 'date-time' })
  expiresAt!: string;
}

export class PresignedDownloadEnvelopeDto {
  @ApiProperty({ type: PresignedDownloadDto })
  data!: PresignedDownloadDto;
}
