export const STORAGE_ADMIN = Symbol('STORAGE_ADMIN');
export const PROVISIONING_SLEEP = Symbol('PROVISIONING_SLEEP');
