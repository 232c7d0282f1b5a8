// Classes
export { ProvisioningClient } from './client.js';
export { AuthToken } from './auth.js';

// Types
export type {
  ProvisioningClientOptions,
  InstanceStatus,
  InstanceDetails,
  InstanceSpecificDetails,
  InstanceCreateDetails,
  Tenant,
  CreateInstanceOptions,
  WaitOptions,
  LogFn,
} from './types.js';

// Errors
export {
  ProvisioningError,
  ProvisioningAPIError,
  ProvisioningConnectionError,
  ProvisioningDecodeError,
  ProvisioningValidationError,
  TenantResolutionError,
} from './errors.js';

// Constants
export { InstanceState, INSTANCE_DEFAULTS, API_VERSION } from './constants.js';
