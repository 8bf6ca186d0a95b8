import { waitUntilReady } from '../../../shared/readiness-wait';
import type { Sleep } from '../../../shared/time';
import { renderBucketReadWritePolicy } from './bucket-policy';
import type { AdminStepOutcome, StorageAdmin } from './ports/storage-admin';
import { ProvisioningInProgressError } from './provisioning.errors';
import type {
  ProvisioningPlan,
  ProvisioningResult,
  ProvisioningState,
  ProvisioningStep,
  StepReport,
} from './provisioning.types';

export type ProvisioningLogger = Readonly<{
  info(payload: Record<string, unknown>, message: string): void;
  warn(payload: Record<string, unknown>, message: string): void;
  error(payload: Record<string, unknown>, message: string): void;
}>;

export class ProvisioningService {
  private current: ProvisioningState = 'idle';

  constructor(
    private readonly admin: StorageAdmin,
    private readonly plan: ProvisioningPlan,
    private readonly logger: ProvisioningLogger,
    private readonly sleep: Sleep,
  ) {}

  get state(): ProvisioningState {
    return this.current;
  }

  async run(): Promise<ProvisioningResult> {
    if (this.current === 'waiting' || this.current === 'provisioning') {
      throw new ProvisioningInProgressError();
    }

    this.transition('waiting');
    const wait = await waitUntilReady({
      probe: () => this.admin.ping(),
      maxAttempts: this.plan.maxAttempts,
      intervalMs: this.plan.retryIntervalMs,
      sleep: this.sleep,
      onAttemptFailed: ({ attempt, maxAttempts, error }) => {
        this.logger.warn({ err: error, attempt, maxAttempts }, 'Object store admin not ready yet');
      },
    });

    if (wait.status === 'timed_out') {
      this.transition('failed');
      this.logger.error(
        { err: wait.lastError, attempts: wait.attempts },
        'Object store admin endpoint never became ready',
      );
      return { status: 'failed', stage: 'waiting', attempts: wait.attempts, error: wait.lastError };
    }

    this.transition('provisioning');
    const { bucket, appAccessKeyId, appSecretAccessKey, policyName } = this.plan;
    const steps: Array<[ProvisioningStep, () => Promise<AdminStepOutcome>]> = [
      ['createBucket', () => this.admin.createBucket(bucket)],
      ['addUser', () => this.admin.addUser(appAccessKeyId, appSecretAccessKey)],
      [
        'createPolicy',
        () => this.admin.createPolicy(policyName, renderBucketReadWritePolicy(bucket)),
      ],
      ['attachPolicy', () => this.admin.attachPolicy(policyName, appAccessKeyId)],
    ];

    const reports: StepReport[] = [];
    for (const [step, apply] of steps) {
      try {
        const outcome = await apply();
        reports.push({ step, outcome });
        this.logger.info({ step, outcome }, 'Provisioning step completed');
      } catch (error: unknown) {
        this.transition('failed');
        this.logger.error({ err: error, step }, 'Provisioning step failed');
        return { status: 'failed', stage: 'provisioning', step, steps: reports, error };
      }
    }

    this.transition('done');
    this.logger.info(
      { bucket, user: appAccessKeyId, policy: policyName },
      'Object store provisioned',
    );
    return { status: 'done', attempts: wait.attempts, steps: reports };
  }

  private transition(next: ProvisioningState): void {
    this.logger.info({ from: this.current, to: next }, 'Provisioning state changed');
    this.current = next;
  }
}
