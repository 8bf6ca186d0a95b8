import type { Readable } from 'node:stream';

export type ObjectsPolicy = Readonly<{
  presignDefaultTtlSeconds: number;
  presignMaxTtlSeconds: number;
  uploadMaxBytes: number;
}>;

/**
 * A file part being received; `exceededLimit` turns true once bytes past the cap were dropped.
 * The caller is expected to abort the upload signal at that moment so nothing is stored.
 */
export type UploadSource = Readonly<{
  stream: Readable;
  filename?: string;
  mimetype?: string;
  exceededLimit: () => boolean;
}>;

export type UploadedObjectView = Readonly<{
  key: string;
  filename: string;
  contentType: string;
  etag?: string;
}>;

export type DeletedObjectView = Readonly<{
  key: string;
  deleted: true;
}>;

export type ObjectMetadataView = Readonly<{
  key: string;
  contentLength: number;
  contentType: string;
  etag: string | null;
  lastModified: string | null;
}>;

export type ObjectDownload = Readonly<{
  key: string;
  filename: string;
  body: Readable;
  contentType: string;
  contentLength?: number;
  etag?: string;
  lastModified?: Date;
}>;

export type PresignedUploadView = Readonly<{
  method: 'PUT';
  url: string;
  headers: Readonly<Record<string, string>>;
  expiresAt: string;
}>;

export type PresignedDownloadView = Readonly<{
  method: 'GET';
  url: string;
  expiresAt: string;
}>;
