import { plainToInstance } from 'class-transformer';
import { validateSync } from 'class-validator';
import { NodeEnv } from './env.enums';
import { EnvVars } from './env.schema';
import {
  assertPresignConfigConsistency,
  assertProvisioningConfigPresent,
  assertStorageConfigPresent,
  requireInProductionLike,
} from './env.invariants';

export { NodeEnv };
export type { EnvVars };

function formatValidationErrors(errors: unknown[]): string {
  const messages: string[] = [];

  for (const error of errors) {
    if (!error || typeof error !== 'object') continue;
    const e = error as {
      property?: string;
      constraints?: Record<string, string>;
      children?: unknown[];
    };

    const property = typeof e.property === 'string' ? e.property : 'unknown';
    if (e.constraints) {
      for (const msg of Object.values(e.constraints)) {
        messages.push(`${property}: ${msg}`);
      }
    }

    if (Array.isArray(e.children) && e.children.length > 0) {
      messages.push(formatValidationErrors(e.children));
    }
  }

  return messages.filter((m) => m.trim() !== '').join('; ');
}

export function validateEnv(config: Record<string, unknown>): EnvVars {
  const validated = plainToInstance(EnvVars, config, { enableImplicitConversion: true });
  const errors = validateSync(validated, {
    skipMissingProperties: false,
  });

  if (errors.length > 0) {
    throw new Error(`Invalid environment variables: ${formatValidationErrors(errors)}`);
  }

  requireInProductionLike(validated);
  assertStorageConfigPresent(validated);
  assertPresignConfigConsistency(validated);
  return validated;
}

export function validateProvisionerEnv(config: Record<string, unknown>): EnvVars {
  const validated = validateEnv(config);
  assertProvisioningConfigPresent(validated);
  return validated;
}
