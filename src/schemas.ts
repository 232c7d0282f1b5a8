import { z } from 'zod';
import { ProvisioningDecodeError } from './errors.js';
import type {
  InstanceCreateDetails,
  InstanceDetails,
  InstanceSpecificDetails,
  Tenant,
} from './types.js';

// Wire shapes are snake_case; records handed to callers are camelCase and frozen.

const InstanceBaseSchema = z.object({
  id: z.string(),
  name: z.string(),
  tenant_id: z.string(),
  cloud_provider: z.string(),
});

export const InstanceDetailsSchema = InstanceBaseSchema.transform(
  (raw): InstanceDetails =>
    Object.freeze({
      id: raw.id,
      name: raw.name,
      tenantId: raw.tenant_id,
      cloudProvider: raw.cloud_provider,
    })
);

export const InstanceSpecificDetailsSchema = InstanceBaseSchema.extend({
  status: z.string(),
  // null while the instance is still being provisioned
  connection_url: z
    .string()
    .nullish()
    .transform((url) => url ?? ''),
  memory: z.string(),
}).transform(
  (raw): InstanceSpecificDetails =>
    Object.freeze({
      id: raw.id,
      name: raw.name,
      tenantId: raw.tenant_id,
      cloudProvider: raw.cloud_provider,
      status: raw.status,
      connectionUrl: raw.connection_url,
      memory: raw.memory,
    })
);

export const InstanceCreateDetailsSchema = InstanceBaseSchema.extend({
  name: z.string().default(''),
  username: z.string(),
  password: z.string(),
  connection_url: z.string(),
}).transform(
  (raw): InstanceCreateDetails =>
    Object.freeze({
      id: raw.id,
      name: raw.name,
      tenantId: raw.tenant_id,
      cloudProvider: raw.cloud_provider,
      username: raw.username,
      password: raw.password,
      connectionUrl: raw.connection_url,
    })
);

export const TenantSchema = z
  .object({
    id: z.string(),
    name: z.string().default(''),
  })
  .transform((raw): Tenant => Object.freeze({ id: raw.id, name: raw.name }));

export const TokenResponseSchema = z.object({
  access_token: z.string(),
  token_type: z.string(),
  expires_in: z.number(),
});

export type TokenResponse = z.infer<typeof TokenResponseSchema>;

const DataEnvelopeSchema = z.object({ data: z.unknown() });

/** Parse `value` with `schema`, throwing ProvisioningDecodeError on any issue. */
export function decode<T extends z.ZodTypeAny>(
  schema: T,
  value: unknown,
  context: string,
  path: (string | number)[] = []
): z.output<T> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new ProvisioningDecodeError(
      context,
      result.error.issues.map((issue) => formatIssue(issue, path))
    );
  }
  return result.data;
}

/** Responses wrap their payload as `{ "data": ... }`. */
export function decodeData<T extends z.ZodTypeAny>(schema: T, body: unknown, context: string): z.output<T> {
  const { data } = decode(DataEnvelopeSchema, body, context);
  return decode(schema, data, context, ['data']);
}

function formatIssue(issue: z.ZodIssue, prefix: (string | number)[]): string {
  const path = [...prefix, ...issue.path];
  return `${path.length > 0 ? path.join('.') : '(root)'}: ${issue.message}`;
}
