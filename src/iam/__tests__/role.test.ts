import {
  NoSuchEntityException,
  type AttachRolePolicyCommandInput,
  type AttachRolePolicyCommandOutput,
  type CreateRoleCommandInput,
  type CreateRoleCommandOutput,
  type DeleteRoleCommandInput,
  type DeleteRoleCommandOutput,
  type DetachRolePolicyCommandInput,
  type DetachRolePolicyCommandOutput,
  type GetRoleCommandInput,
  type GetRoleCommandOutput,
  type Role,
} from '@aws-sdk/client-iam';
import { beforeEach, describe, it, expect } from 'vitest';

import { S3_READ_ONLY_POLICY_ARN } from '../../config/index.js';
import { ControlPlaneError, DwhErrorCode } from '../../errors/index.js';
import { RoleService, redshiftTrustPolicy, type IamRoleApi } from '../index.js';

const ACCOUNT = '123456789012';

function notFound(roleName: string | undefined): NoSuchEntityException {
  return new NoSuchEntityException({
    message: `The role with name ${roleName} cannot be found.`,
    $metadata: { httpStatusCode: 404 },
  });
}

/**
 * In-memory IAM that records every call.
 */
class FakeIam implements IamRoleApi {
  readonly roles = new Map<string, Role>();
  readonly policies = new Map<string, string[]>();
  readonly calls: string[] = [];
  readonly created: CreateRoleCommandInput[] = [];
  failWith?: Error;
  failAttachWith?: Error;
  failDeleteWith?: Error;

  addRole(roleName: string): Role {
    const role: Role = {
      Path: '/',
      RoleName: roleName,
      RoleId: `AROA${roleName.toUpperCase()}`,
      Arn: `arn:aws:iam::${ACCOUNT}:role/${roleName}`,
      CreateDate: new Date('2024-01-01T00:00:00Z'),
    };
    this.roles.set(roleName, role);
    return role;
  }

  async getRole(input: GetRoleCommandInput): Promise<GetRoleCommandOutput> {
    this.calls.push('GetRole');
    if (this.failWith) {
      throw this.failWith;
    }
    const role = this.roles.get(input.RoleName ?? '');
    if (!role) {
      throw notFound(input.RoleName);
    }
    return { Role: role, $metadata: {} };
  }

  async createRole(input: CreateRoleCommandInput): Promise<CreateRoleCommandOutput> {
    this.calls.push('CreateRole');
    this.created.push(input);
    const role = this.addRole(input.RoleName ?? '');
    role.Description = input.Description;
    return { Role: role, $metadata: {} };
  }

  async attachRolePolicy(input: AttachRolePolicyCommandInput): Promise<AttachRolePolicyCommandOutput> {
    this.calls.push('AttachRolePolicy');
    if (this.failAttachWith) {
      throw this.failAttachWith;
    }
    const roleName = input.RoleName ?? '';
    this.policies.set(roleName, [...(this.policies.get(roleName) ?? []), input.PolicyArn ?? '']);
    return { $metadata: {} };
  }

  async detachRolePolicy(input: DetachRolePolicyCommandInput): Promise<DetachRolePolicyCommandOutput> {
    this.calls.push('DetachRolePolicy');
    const roleName = input.RoleName ?? '';
    const attached = this.policies.get(roleName) ?? [];
    if (!attached.includes(input.PolicyArn ?? '')) {
      throw notFound(roleName);
    }
    this.policies.set(
      roleName,
      attached.filter((arn) => arn !== input.PolicyArn)
    );
    return { $metadata: {} };
  }

  async deleteRole(input: DeleteRoleCommandInput): Promise<DeleteRoleCommandOutput> {
    this.calls.push('DeleteRole');
    if (this.failDeleteWith) {
      throw this.failDeleteWith;
    }
    if (!this.roles.delete(input.RoleName ?? '')) {
      throw notFound(input.RoleName);
    }
    return { $metadata: {} };
  }
}

describe('RoleService', () => {
  let iam: FakeIam;
  let roles: RoleService;

  beforeEach(() => {
    iam = new FakeIam();
    roles = new RoleService(iam);
  });

  describe('getRole', () => {
    it('returns undefined for a missing role', async () => {
      await expect(roles.getRole('dwhRole')).resolves.toBeUndefined();
      expect(iam.calls).toEqual(['GetRole']);
    });

    it('returns an existing role', async () => {
      iam.addRole('dwhRole');

      const role = await roles.getRole('dwhRole');

      expect(role).toEqual({
        arn: `arn:aws:iam::${ACCOUNT}:role/dwhRole`,
        roleName: 'dwhRole',
        roleId: 'AROADWHROLE',
        path: '/',
        createDate: new Date('2024-01-01T00:00:00Z'),
        description: undefined,
      });
    });

    it('wraps other failures', async () => {
      iam.failWith = Object.assign(new Error('User is not authorized to perform iam:GetRole'), {
        name: 'AccessDenied',
        $fault: 'client',
        $metadata: { httpStatusCode: 403 },
      });

      const error = await roles.getRole('dwhRole').catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(ControlPlaneError);
      expect(error).toMatchObject({ code: DwhErrorCode.ACCESS_DENIED, operation: 'GetRole', service: 'iam' });
    });
  });

  describe('createRole', () => {
    it('issues one create call and one attach call', async () => {
      const role = await roles.createRole('dwhRole');

      expect(iam.calls).toEqual(['CreateRole', 'AttachRolePolicy']);
      expect(iam.policies.get('dwhRole')).toEqual([S3_READ_ONLY_POLICY_ARN]);
      expect(role.arn).toBe(`arn:aws:iam::${ACCOUNT}:role/dwhRole`);
    });

    it('trusts the Redshift service principal', async () => {
      await roles.createRole('dwhRole');

      const [input] = iam.created;
      expect(input?.Path).toBe('/');
      expect(input?.Description).toBe('Allows Redshift clusters to call AWS services on your behalf.');
      expect(JSON.parse(input?.AssumeRolePolicyDocument ?? '')).toEqual({
        Version: '2012-10-17',
        Statement: [
          { Action: 'sts:AssumeRole', Effect: 'Allow', Principal: { Service: 'redshift.amazonaws.com' } },
        ],
      });
      expect(JSON.parse(input?.AssumeRolePolicyDocument ?? '')).toEqual(redshiftTrustPolicy());
    });

    it('attaches a custom policy when configured', async () => {
      const custom = new RoleService(iam, undefined, 'arn:aws:iam::aws:policy/AmazonS3FullAccess');

      await custom.createRole('dwhRole');

      expect(iam.policies.get('dwhRole')).toEqual(['arn:aws:iam::aws:policy/AmazonS3FullAccess']);
    });

    it('reports a failed attach as AttachRolePolicy', async () => {
      iam.failAttachWith = new Error('policy limit');

      await expect(roles.createRole('dwhRole')).rejects.toMatchObject({
        operation: 'AttachRolePolicy',
        message: 'iam:AttachRolePolicy failed: policy limit',
      });
    });

    it('removes the role again when the attach fails', async () => {
      iam.failAttachWith = new Error('policy limit');

      await expect(roles.createRole('dwhRole')).rejects.toBeInstanceOf(ControlPlaneError);

      expect(iam.calls).toEqual(['CreateRole', 'AttachRolePolicy', 'DeleteRole']);
      expect(iam.roles.has('dwhRole')).toBe(false);
    });

    it('keeps the attach error when the removal fails too', async () => {
      iam.failAttachWith = new Error('policy limit');
      iam.failDeleteWith = new Error('throttled');

      await expect(roles.createRole('dwhRole')).rejects.toMatchObject({
        operation: 'AttachRolePolicy',
        message: 'iam:AttachRolePolicy failed: policy limit',
      });
    });
  });

  describe('ensureRole', () => {
    it('creates the role with its policy after a failed attach', async () => {
      iam.failAttachWith = new Error('policy limit');
      await expect(roles.ensureRole('dwhRole')).rejects.toBeInstanceOf(ControlPlaneError);
      iam.failAttachWith = undefined;

      const retry = await roles.ensureRole('dwhRole');

      expect(retry.created).toBe(true);
      expect(iam.policies.get('dwhRole')).toEqual([S3_READ_ONLY_POLICY_ARN]);
    });

    it('creates the role only once', async () => {
      const first = await roles.ensureRole('dwhRole');
      const second = await roles.ensureRole('dwhRole');

      expect(first.created).toBe(true);
      expect(second.created).toBe(false);
      expect(second.role.arn).toBe(first.role.arn);
      expect(iam.calls.filter((call) => call === 'CreateRole')).toHaveLength(1);
      expect(iam.calls.filter((call) => call === 'AttachRolePolicy')).toHaveLength(1);
    });
  });

  describe('deleteRole', () => {
    it('detaches the policy before deleting', async () => {
      await roles.createRole('dwhRole');
      iam.calls.length = 0;

      await expect(roles.deleteRole('dwhRole')).resolves.toBe(true);

      expect(iam.calls).toEqual(['DetachRolePolicy', 'DeleteRole']);
      expect(iam.roles.has('dwhRole')).toBe(false);
    });

    it('returns false for a missing role', async () => {
      await expect(roles.deleteRole('dwhRole')).resolves.toBe(false);
    });
  });
});
