export const OBJECT_STORAGE_SLEEP = Symbol('OBJECT_STORAGE_SLEEP');
