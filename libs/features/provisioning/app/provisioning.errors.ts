export class ProvisioningInProgressError extends Error {
  constructor() {
    super('Provisioning is already running');
    this.name = 'ProvisioningInProgressError';
  }
}
