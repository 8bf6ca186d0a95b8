export enum ObjectsErrorCode {
  OBJECTS_FILE_REQUIRED = 'OBJECTS_FILE_REQUIRED',
}
