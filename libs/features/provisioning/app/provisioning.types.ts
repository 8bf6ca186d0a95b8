import type { AdminStepOutcome } from './ports/storage-admin';

export type ProvisioningState = 'idle' | 'waiting' | 'provisioning' | 'done' | 'failed';

export type ProvisioningStep = 'createBucket' | 'addUser' | 'createPolicy' | 'attachPolicy';

export type ProvisioningPlan = Readonly<{
  bucket: string;
  appAccessKeyId: string;
  appSecretAccessKey: string;
  policyName: string;
  maxAttempts: number;
  retryIntervalMs: number;
}>;

export type StepReport = Readonly<{ step: ProvisioningStep; outcome: AdminStepOutcome }>;

export type ProvisioningResult =
  | Readonly<{ status: 'done'; attempts: number; steps: ReadonlyArray<StepReport> }>
  | Readonly<{ status: 'failed'; stage: 'waiting'; attempts: number; error: unknown }>
  | Readonly<{
      status: 'failed';
      stage: 'provisioning';
      step: ProvisioningStep;
      steps: ReadonlyArray<StepReport>;
      error: unknown;
    }>;
