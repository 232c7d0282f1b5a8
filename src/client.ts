import { z } from 'zod';
import { TokenManager } from './auth.js';
import { request, type HttpMethod } from './internal/http.js';
import { sleep } from './internal/sleep.js';
import {
  validateCredential,
  validateInstanceId,
  validateInstanceName,
  validateWaitOptions,
} from './internal/validation.js';
import {
  decode,
  decodeData,
  InstanceCreateDetailsSchema,
  InstanceDetailsSchema,
  InstanceSpecificDetailsSchema,
  TenantSchema,
} from './schemas.js';
import type {
  CreateInstanceOptions,
  InstanceCreateDetails,
  InstanceDetails,
  InstanceSpecificDetails,
  LogFn,
  ProvisioningClientOptions,
  Tenant,
  WaitOptions,
} from './types.js';
import {
  API_PREFIX,
  DEFAULT_BASE_URL,
  DEFAULT_POLL_INTERVAL_MS,
  DEFAULT_TIMEOUT_MS,
  DEFAULT_TOKEN_EXPIRY_SKEW_MS,
  DEFAULT_WAIT_TIMEOUT_MS,
  INSTANCE_DEFAULTS,
  InstanceState,
} from './constants.js';
import { ProvisioningAPIError, TenantResolutionError } from './errors.js';

const noop: LogFn = () => {};

export class ProvisioningClient {
  readonly baseUrl: string;
  readonly timeout: number;

  private readonly tokens: TokenManager;
  private readonly log: LogFn;

  constructor(options: ProvisioningClientOptions) {
    validateCredential('clientId', options.clientId);
    validateCredential('clientSecret', options.clientSecret);

    this.baseUrl = (options.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, '');
    this.timeout = options.timeout ?? DEFAULT_TIMEOUT_MS;
    this.log = options.logger ?? noop;
    this.tokens = new TokenManager({
      baseUrl: this.baseUrl,
      clientId: options.clientId,
      clientSecret: options.clientSecret,
      timeout: this.timeout,
      expirySkew: options.tokenExpirySkew ?? DEFAULT_TOKEN_EXPIRY_SKEW_MS,
      logger: this.log,
    });
  }

  // ─── Auth ───

  /**
   * Get a bearer token, exchanging client credentials only when none is
   * cached or the cached one has expired.
   */
  async getToken(): Promise<string> {
    return this.tokens.getAccessToken();
  }

  /** Drop the cached token; the next call performs a fresh exchange. */
  clearToken(): void {
    this.tokens.clear();
  }

  // ─── Tenants ───

  async listTenants(): Promise<Tenant[]> {
    const body = await this.fetch('GET', `${API_PREFIX}/tenants`);
    return decodeData(z.array(TenantSchema), body, 'tenant list');
  }

  /**
   * Id of the caller's only tenant.
   * The count is checked before any entry is decoded, so a list of the wrong
   * length always raises TenantResolutionError.
   */
  async getTenantId(): Promise<string> {
    const body = await this.fetch('GET', `${API_PREFIX}/tenants`);
    const entries = decodeData(z.array(z.unknown()), body, 'tenant list');
    if (entries.length !== 1) {
      throw new TenantResolutionError(entries.length);
    }
    return decode(TenantSchema, entries[0], 'tenant list', ['data', 0]).id;
  }

  // ─── Instances ───

  /**
   * Provision a new instance.
   * The returned username/password are only available here.
   */
  async createInstance(name: string, options?: CreateInstanceOptions): Promise<InstanceCreateDetails> {
    validateInstanceName(name);
    const tenantId = options?.tenantId ?? (await this.getTenantId());
    const body = {
      name,
      memory: options?.memory ?? INSTANCE_DEFAULTS.memory,
      version: options?.version ?? INSTANCE_DEFAULTS.version,
      region: options?.region ?? INSTANCE_DEFAULTS.region,
      type: options?.type ?? INSTANCE_DEFAULTS.type,
      tenant_id: tenantId,
      cloud_provider: options?.cloudProvider ?? INSTANCE_DEFAULTS.cloudProvider,
    };
    const response = await this.fetch('POST', `${API_PREFIX}/instances`, body);
    return decodeData(InstanceCreateDetailsSchema, response, 'created instance');
  }

  /** Delete an instance. Returns its last known details. */
  async deleteInstance(id: string): Promise<InstanceSpecificDetails> {
    validateInstanceId(id);
    const body = await this.fetch('DELETE', `${API_PREFIX}/instances/${encodeURIComponent(id)}`);
    return decodeData(InstanceSpecificDetailsSchema, body, 'deleted instance');
  }

  /** List all instances visible to these credentials, in server order. */
  async listInstances(): Promise<InstanceDetails[]> {
    const body = await this.fetch('GET', `${API_PREFIX}/instances`);
    return decodeData(z.array(InstanceDetailsSchema), body, 'instance list');
  }

  /** Fetch one instance. Resolves to undefined when the server answers 404. */
  async getInstance(id: string): Promise<InstanceSpecificDetails | undefined> {
    validateInstanceId(id);
    let body: unknown;
    try {
      body = await this.fetch('GET', `${API_PREFIX}/instances/${encodeURIComponent(id)}`);
    } catch (err) {
      if (err instanceof ProvisioningAPIError && err.isNotFound()) {
        return undefined;
      }
      throw err;
    }
    return decodeData(InstanceSpecificDetailsSchema, body, 'instance');
  }

  /**
   * Poll until the instance is RUNNING.
   *
   * Resolves true once running, false if the instance disappears, starts
   * deleting, or the timeout elapses first.
   */
  async waitForRunning(id: string, options?: WaitOptions): Promise<boolean> {
    validateInstanceId(id);
    validateWaitOptions(options ?? {});
    const timeout = options?.timeout ?? DEFAULT_WAIT_TIMEOUT_MS;
    const pollInterval = options?.pollInterval ?? DEFAULT_POLL_INTERVAL_MS;
    const deadline = Date.now() + timeout;

    for (;;) {
      const instance = await this.getInstance(id);
      if (!instance || instance.status === InstanceState.Deleting) {
        return false;
      }
      if (instance.status === InstanceState.Running) {
        return true;
      }

      const remaining = deadline - Date.now();
      if (remaining <= 0) {
        this.log(`[wait] instance ${id} not running after ${timeout}ms (status=${instance.status})`);
        return false;
      }

      const delay = Math.min(pollInterval, remaining);
      this.log(`[wait] instance ${id} is ${instance.status}, retry in ${delay}ms`);
      await sleep(delay);
    }
  }

  // ─── Internal ───

  private async fetch(method: HttpMethod, path: string, body?: unknown): Promise<unknown> {
    const token = await this.tokens.getAccessToken();
    return request(this.baseUrl, {
      method,
      path,
      body,
      auth: { type: 'bearer', token },
      timeout: this.timeout,
    });
  }
}
