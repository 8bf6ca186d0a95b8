import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { runBestEffort } from '../../../../platform/logging/best-effort';
import type { PolicyDocument } from '../../app/bucket-policy';
import type { AdminStepOutcome, StorageAdmin } from '../../app/ports/storage-admin';
import type { CommandResult, CommandRunner } from './command-runner';

export type McTarget = Readonly<{
  binary: string;
  alias: string;
  endpoint: string;
  accessKeyId: string;
  secretAccessKey: string;
  timeoutMs?: number;
}>;

type McLogger = Readonly<{
  warn(payload: Record<string, unknown>, message: string): void;
}>;

// `mc` reports conflicts in prose: "already exists", "you already own it" for buckets,
// and "The specified policy change is already in effect." for a repeated attach.
const ALREADY_EXISTS_PATTERN = /already (exists|own|in effect|attached|been attached)/i;

export class McCommandError extends Error {
  /** Subcommand only; later arguments can carry credentials. */
  readonly command: string;

  constructor(
    args: ReadonlyArray<string>,
    readonly result: CommandResult,
  ) {
    const command = args.slice(0, args[0] === 'admin' ? 3 : 1).join(' ');
    const output = (result.stderr || result.stdout).trim() || 'no output';
    super(`mc ${command} failed with exit code ${result.exitCode}: ${output}`);
    this.name = 'McCommandError';
    this.command = command;
  }
}

/** Builds the `MC_HOST_<alias>` URL; credentials ride in the userinfo part. */
export function mcHostUrl(target: McTarget): string {
  const url = new URL(target.endpoint);
  const user = encodeURIComponent(target.accessKeyId);
  const secret = encodeURIComponent(target.secretAccessKey);
  return `${url.protocol}//${user}:${secret}@${url.host}`;
}

export function isAlreadyExists(result: CommandResult): boolean {
  return ALREADY_EXISTS_PATTERN.test(`${result.stdout}\n${result.stderr}`);
}

/** Drives the MinIO client CLI; admin credentials travel in the environment, never in argv. */
export class McStorageAdmin implements StorageAdmin {
  constructor(
    private readonly runner: CommandRunner,
    private readonly target: McTarget,
    private readonly logger: McLogger,
  ) {}

  async ping(): Promise<void> {
    const args = ['admin', 'info', this.target.alias];
    const result = await this.exec(args);
    if (result.exitCode !== 0) throw new McCommandError(args, result);
  }

  createBucket(bucket: string): Promise<AdminStepOutcome> {
    return this.idempotent(['mb', `${this.target.alias}/${bucket}`]);
  }

  addUser(accessKeyId: string, secretAccessKey: string): Promise<AdminStepOutcome> {
    return this.idempotent([
      'admin',
      'user',
      'add',
      this.target.alias,
      accessKeyId,
      secretAccessKey,
    ]);
  }

  async createPolicy(name: string, document: PolicyDocument): Promise<AdminStepOutcome> {
    const dir = await mkdtemp(join(tmpdir(), 'mc-policy-'));
    const file = join(dir, `${name}.json`);
    try {
      await writeFile(file, JSON.stringify(document, null, 2), 'utf8');
      return await this.idempotent(['admin', 'policy', 'create', this.target.alias, name, file]);
    } finally {
      await runBestEffort({
        logger: this.logger,
        operation: 'provisioning.removePolicyFile',
        run: () => rm(dir, { recursive: true, force: true }),
        context: { dir },
      });
    }
  }

  attachPolicy(name: string, accessKeyId: string): Promise<AdminStepOutcome> {
    return this.idempotent([
      'admin',
      'policy',
      'attach',
      this.target.alias,
      name,
      '--user',
      accessKeyId,
    ]);
  }

  private async idempotent(args: ReadonlyArray<string>): Promise<AdminStepOutcome> {
    const result = await this.exec(args);
    if (result.exitCode === 0) return 'applied';
    if (isAlreadyExists(result)) return 'already_exists';
    throw new McCommandError(args, result);
  }

  private exec(args: ReadonlyArray<string>): Promise<CommandResult> {
    return this.runner.run(this.target.binary, args, {
      env: { [`MC_HOST_${this.target.alias}`]: mcHostUrl(this.target) },
      timeoutMs: this.target.timeoutMs,
    });
  }
}
