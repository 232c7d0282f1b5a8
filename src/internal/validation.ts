import { ProvisioningValidationError } from '../errors.js';
import type { WaitOptions } from '../types.js';

export function validateInstanceName(name: string): void {
  if (!name || name.trim().length === 0) {
    throw new ProvisioningValidationError('name', 'Instance name cannot be empty');
  }
}

export function validateInstanceId(id: string): void {
  if (!id || id.trim().length === 0) {
    throw new ProvisioningValidationError('id', 'Instance id cannot be empty');
  }
}

export function validateCredential(field: 'clientId' | 'clientSecret', value: string): void {
  if (!value) {
    throw new ProvisioningValidationError(field, `${field} cannot be empty`);
  }
}

export function validateWaitOptions(options: WaitOptions): void {
  if (options.timeout !== undefined && !(options.timeout >= 0)) {
    throw new ProvisioningValidationError('timeout', 'Wait timeout must be a non-negative number');
  }
  if (options.pollInterval !== undefined && !(options.pollInterval > 0)) {
    throw new ProvisioningValidationError('pollInterval', 'Poll interval must be a positive number');
  }
}
