import type { InstanceState } from './constants.js';

/** Debug sink; receives one formatted line per event. */
export type LogFn = (message: string) => void;

export interface ProvisioningClientOptions {
  /** OAuth client id */
  clientId: string;
  /** OAuth client secret */
  clientSecret: string;
  /** API origin (default: "https://api.neo4j.io") */
  baseUrl?: string;
  /** Request timeout in milliseconds (default: 30_000) */
  timeout?: number;
  /** Refresh the access token this many milliseconds before it expires (default: 30_000) */
  tokenExpirySkew?: number;
  /** Debug logger (default: no-op) */
  logger?: LogFn;
}

/** Known lifecycle states; the server may report others. */
export type InstanceStatus = `${InstanceState}` | (string & {});

export interface InstanceDetails {
  readonly id: string;
  readonly name: string;
  readonly tenantId: string;
  readonly cloudProvider: string;
}

export interface InstanceSpecificDetails extends InstanceDetails {
  readonly status: InstanceStatus;
  /** Empty until the server has assigned one */
  readonly connectionUrl: string;
  readonly memory: string;
}

/** Creation result. Holds one-time credentials that cannot be fetched later. */
export interface InstanceCreateDetails extends InstanceDetails {
  readonly username: string;
  readonly password: string;
  readonly connectionUrl: string;
}

export interface Tenant {
  readonly id: string;
  readonly name: string;
}

export interface CreateInstanceOptions {
  /** Memory size (default: "8GB") */
  memory?: string;
  /** Database version (default: "5") */
  version?: string;
  /** Region (default: "europe-west1") */
  region?: string;
  /** Instance tier (default: "professional-ds") */
  type?: string;
  /** Cloud provider (default: "gcp") */
  cloudProvider?: string;
  /** Skip tenant lookup and provision under this tenant */
  tenantId?: string;
}

export interface WaitOptions {
  /** Give up after this many milliseconds (default: 600_000) */
  timeout?: number;
  /** Delay between polls in milliseconds (default: 5_000) */
  pollInterval?: number;
}
