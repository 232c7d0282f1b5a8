export const API_VERSION = 1;

export const DEFAULT_BASE_URL = 'https://api.neo4j.io';
export const TOKEN_PATH = '/oauth/token';
export const API_PREFIX = `/v${API_VERSION}`;

export const DEFAULT_TIMEOUT_MS = 30_000;
export const DEFAULT_TOKEN_EXPIRY_SKEW_MS = 30_000;

export const DEFAULT_WAIT_TIMEOUT_MS = 600_000; // 10 min
export const DEFAULT_POLL_INTERVAL_MS = 5_000;

/** Fixed configuration sent on instance creation unless overridden. */
export const INSTANCE_DEFAULTS = {
  memory: '8GB',
  version: '5',
  region: 'europe-west1',
  type: 'professional-ds',
  cloudProvider: 'gcp',
} as const;

export enum InstanceState {
  Pending = 'PENDING',
  Creating = 'CREATING',
  Running = 'RUNNING',
  Deleting = 'DELETING',
}
