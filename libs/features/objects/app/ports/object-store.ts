import type { ObjectStorageClient } from '../../../../platform/storage/object-storage.types';

/**
 * Object store operations the objects feature depends on. Implementations reject with
 * `ObjectStorageError` only.
 */
export type ObjectStorePort = Pick<
  ObjectStorageClient,
  | 'putObject'
  | 'getObject'
  | 'headObject'
  | 'deleteObject'
  | 'presignPutObject'
  | 'presignGetObject'
>;
