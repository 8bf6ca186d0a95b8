import type { PolicyDocument } from '../bucket-policy';

/** `already_exists` covers resources that exist or bindings that are already in place. */
export type AdminStepOutcome = 'applied' | 'already_exists';

export interface StorageAdmin {
  /** Resolves once the admin endpoint answers with the configured credentials. */
  ping(): Promise<void>;
  createBucket(bucket: string): Promise<AdminStepOutcome>;
  addUser(accessKeyId: string, secretAccessKey: string): Promise<AdminStepOutcome>;
  createPolicy(name: string, document: PolicyDocument): Promise<AdminStepOutcome>;
  attachPolicy(name: string, accessKeyId: string): Promise<AdminStepOutcome>;
}
