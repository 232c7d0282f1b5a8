import { describe, expect, it } from 'vitest';
import {
  decode,
  decodeData,
  InstanceSpecificDetailsSchema,
  TokenResponseSchema,
} from '../schemas.js';
import { ProvisioningDecodeError } from '../errors.js';

describe('decode', () => {
  it('reports every missing key with its path', () => {
    const err = (() => {
      try {
        return decodeData(InstanceSpecificDetailsSchema, { data: { id: 'i1', name: 'db1' } }, 'instance');
      } catch (e) {
        return e;
      }
    })();

    expect(err).toBeInstanceOf(ProvisioningDecodeError);
    expect(err).toMatchObject({
      context: 'instance',
      issues: [
        'data.tenant_id: Required',
        'data.cloud_provider: Required',
        'data.status: Required',
        'data.memory: Required',
      ],
    });
  });

  it('rejects a wrongly typed field', () => {
    expect(() =>
      decode(TokenResponseSchema, { access_token: 'test-token', token_type: 'bearer', expires_in: '60' }, 'token')
    ).toThrow('Failed to decode token: expires_in: Expected number, received string');
  });

  it('reports a missing body at the root', () => {
    expect(() => decode(TokenResponseSchema, undefined, 'token')).toThrow(
      'Failed to decode token: (root): Required'
    );
  });
});
