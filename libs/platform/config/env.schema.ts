import { EnvVarsProvisioning } from './env.schema.provisioning';

export class EnvVars extends EnvVarsProvisioning {}
