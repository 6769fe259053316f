import type { GetSecretValueCommandInput, GetSecretValueCommandOutput } from '@aws-sdk/client-secrets-manager';
import { describe, it, expect, vi } from 'vitest';

import { SecretResolutionError } from '../../errors/index.js';
import { MasterPasswordResolver, extractPassword, type SecretsApi } from '../index.js';

function secretsReturning(output: Omit<GetSecretValueCommandOutput, '$metadata'>) {
  return {
    getSecretValue: vi.fn(
      async (_input: GetSecretValueCommandInput): Promise<GetSecretValueCommandOutput> => ({ ...output, $metadata: {} })
    ),
  } satisfies SecretsApi;
}

describe('MasterPasswordResolver', () => {
  it('returns a literal password without calling Secrets Manager', async () => {
    const api = secretsReturning({ SecretString: 'unused' });
    const resolver = new MasterPasswordResolver({ type: 'literal', password: 'test-password' }, api);

    await expect(resolver.getMasterPassword()).resolves.toBe('test-password');
    expect(api.getSecretValue).not.toHaveBeenCalled();
  });

  it('fetches a plain secret string', async () => {
    const api = secretsReturning({ SecretString: 'test-password' });
    const resolver = new MasterPasswordResolver({ type: 'secret', secretId: 'dwh/master' }, api);

    await expect(resolver.getMasterPassword()).resolves.toBe('test-password');
    expect(api.getSecretValue).toHaveBeenCalledWith({ SecretId: 'dwh/master' });
  });

  it('reads the password field of a JSON secret', async () => {
    const api = secretsReturning({ SecretString: '{"username":"dwhuser","password":"test-password"}' });
    const resolver = new MasterPasswordResolver({ type: 'secret', secretId: 'dwh/master' }, api);

    await expect(resolver.getMasterPassword()).resolves.toBe('test-password');
  });

  it('rejects a binary secret', async () => {
    const api = secretsReturning({ SecretBinary: new Uint8Array([1, 2, 3]) });
    const resolver = new MasterPasswordResolver({ type: 'secret', secretId: 'dwh/master' }, api);

    await expect(resolver.getMasterPassword()).rejects.toThrow(
      'Failed to resolve secret dwh/master: secret value is empty or binary'
    );
  });

  it('wraps lookup failures', async () => {
    const api: SecretsApi = {
      getSecretValue: async () => {
        throw new Error('Secrets Manager can not find the specified secret.');
      },
    };
    const resolver = new MasterPasswordResolver({ type: 'secret', secretId: 'dwh/master' }, api);

    const error = await resolver.getMasterPassword().catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(SecretResolutionError);
    expect(error).toHaveProperty(
      'message',
      'Failed to resolve secret dwh/master: Secrets Manager can not find the specified secret.'
    );
    expect(error).toHaveProperty('cause');
  });

  it('needs a client for secret lookups', async () => {
    const resolver = new MasterPasswordResolver({ type: 'secret', secretId: 'dwh/master' });

    await expect(resolver.getMasterPassword()).rejects.toBeInstanceOf(SecretResolutionError);
  });
});

describe('extractPassword', () => {
  it('keeps non-JSON strings as they are', () => {
    expect(extractPassword('id', ' spaced password ')).toBe(' spaced password ');
  });

  it('rejects malformed JSON', () => {
    expect(() => extractPassword('id', '{"password":')).toThrow(SecretResolutionError);
  });

  it('rejects JSON without a password', () => {
    expect(() => extractPassword('id', '{"username":"dwhuser"}')).toThrow(
      'Failed to resolve secret id: secret JSON must contain a non-empty "password" field'
    );
    expect(() => extractPassword('id', '{"password":""}')).toThrow(SecretResolutionError);
  });
});
