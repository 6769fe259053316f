/**
 * AWS IAM Role Service
 *
 * Looks up, creates and removes the role a Redshift cluster assumes to read
 * from S3.
 *
 * @module iam/role
 */

import {
  AttachRolePolicyCommand,
  CreateRoleCommand,
  DeleteRoleCommand,
  DetachRolePolicyCommand,
  GetRoleCommand,
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
  type IAMClient,
  type Role,
} from '@aws-sdk/client-iam';

import { S3_READ_ONLY_POLICY_ARN } from '../config/index.js';
import { ControlPlaneError, wrapAwsError } from '../errors/index.js';
import { NoopLogger, logOperation, type Logger } from '../logging/index.js';
import { ROLE_DESCRIPTION, ROLE_PATH, redshiftTrustPolicy } from './policy.js';

/**
 * IAM role information
 */
export interface RoleInfo {
  /** The ARN of the role */
  arn: string;
  /** The name of the role */
  roleName: string;
  /** The ID of the role */
  roleId?: string;
  /** The path to the role */
  path?: string;
  /** When the role was created */
  createDate?: Date;
  /** Description of the role */
  description?: string;
}

/**
 * IAM operations the role service issues.
 */
export interface IamRoleApi {
  getRole(input: GetRoleCommandInput): Promise<GetRoleCommandOutput>;
  createRole(input: CreateRoleCommandInput): Promise<CreateRoleCommandOutput>;
  attachRolePolicy(input: AttachRolePolicyCommandInput): Promise<AttachRolePolicyCommandOutput>;
  detachRolePolicy(input: DetachRolePolicyCommandInput): Promise<DetachRolePolicyCommandOutput>;
  deleteRole(input: DeleteRoleCommandInput): Promise<DeleteRoleCommandOutput>;
}

/**
 * Adapts an SDK IAM client to {@link IamRoleApi}.
 */
export function iamRoleApi(client: IAMClient): IamRoleApi {
  return {
    getRole: (input) => client.send(new GetRoleCommand(input)),
    createRole: (input) => client.send(new CreateRoleCommand(input)),
    attachRolePolicy: (input) => client.send(new AttachRolePolicyCommand(input)),
    detachRolePolicy: (input) => client.send(new DetachRolePolicyCommand(input)),
    deleteRole: (input) => client.send(new DeleteRoleCommand(input)),
  };
}

/**
 * Role lookup and lifecycle operations the cluster controller depends on.
 */
export interface RoleGateway {
  /** Returns the role, or undefined when no role has that name */
  getRole(roleName: string): Promise<RoleInfo | undefined>;
  /** Creates the role and attaches the S3 read-only policy */
  createRole(roleName: string): Promise<RoleInfo>;
  /** Detaches the policy and deletes the role; false when it did not exist */
  deleteRole(roleName: string): Promise<boolean>;
}

/**
 * AWS IAM Role Service
 *
 * @example
 * ```typescript
 * const roles = new RoleService(iamRoleApi(clients.iam), logger);
 *
 * const existing = await roles.getRole('dwhRole');
 * const role = existing ?? (await roles.createRole('dwhRole'));
 * console.log(`Role ARN: ${role.arn}`);
 * ```
 */
export class RoleService implements RoleGateway {
  private readonly api: IamRoleApi;
  private readonly logger: Logger;
  private readonly policyArn: string;

  /**
   * @param api - IAM operations
   * @param logger - Progress logger
   * @param policyArn - Managed policy attached to created roles
   */
  constructor(api: IamRoleApi, logger: Logger = new NoopLogger(), policyArn: string = S3_READ_ONLY_POLICY_ARN) {
    this.api = api;
    this.logger = logger;
    this.policyArn = policyArn;
  }

  /**
   * Get IAM role information
   *
   * @returns Role information, or undefined if the role does not exist
   * @throws {ControlPlaneError} If the lookup fails for any other reason
   */
  async getRole(roleName: string): Promise<RoleInfo | undefined> {
    this.logger.info('Looking up IAM role', { roleName });
    const started = Date.now();
    try {
      const response = await this.api.getRole({ RoleName: roleName });
      logOperation(this.logger, 'iam', 'GetRole', Date.now() - started);
      if (!response.Role) {
        return undefined;
      }
      return toRoleInfo(response.Role, roleName);
    } catch (error) {
      if (error instanceof NoSuchEntityException) {
        this.logger.debug('IAM role does not exist', { roleName });
        return undefined;
      }
      throw wrapAwsError('iam', 'GetRole', error);
    }
  }

  /**
   * Create the access role
   *
   * Issues one CreateRole call with a trust policy for the Redshift service
   * principal, then one AttachRolePolicy call for the managed policy. A role
   * whose policy could not be attached is deleted again, so a later lookup
   * never finds a role without S3 access.
   *
   * @throws {ControlPlaneError} If either call fails
   */
  async createRole(roleName: string): Promise<RoleInfo> {
    this.logger.info('Creating IAM role', { roleName });
    let role: Role;
    try {
      const response = await this.api.createRole({
        Path: ROLE_PATH,
        RoleName: roleName,
        Description: ROLE_DESCRIPTION,
        AssumeRolePolicyDocument: JSON.stringify(redshiftTrustPolicy()),
      });
      if (!response.Role) {
        throw new ControlPlaneError('iam', 'CreateRole', 'response did not include the created role');
      }
      role = response.Role;
    } catch (error) {
      throw wrapAwsError('iam', 'CreateRole', error);
    }

    this.logger.info('Attaching policy to IAM role', { roleName, policyArn: this.policyArn });
    try {
      await this.api.attachRolePolicy({ RoleName: roleName, PolicyArn: this.policyArn });
    } catch (error) {
      const attachError = wrapAwsError('iam', 'AttachRolePolicy', error);
      await this.rollbackRole(roleName);
      throw attachError;
    }

    return toRoleInfo(role, roleName);
  }

  /**
   * Delete the access role
   *
   * IAM refuses to delete a role with attached policies, so the managed
   * policy is detached first.
   *
   * @returns false if the role did not exist
   * @throws {ControlPlaneError} If a call fails
   */
  async deleteRole(roleName: string): Promise<boolean> {
    this.logger.info('Deleting IAM role', { roleName });
    try {
      await this.api.detachRolePolicy({ RoleName: roleName, PolicyArn: this.policyArn });
    } catch (error) {
      // Role already gone, or the policy was never attached
      if (!(error instanceof NoSuchEntityException)) {
        throw wrapAwsError('iam', 'DetachRolePolicy', error);
      }
      this.logger.debug('Policy not attached to IAM role', { roleName, policyArn: this.policyArn });
    }

    try {
      await this.api.deleteRole({ RoleName: roleName });
      return true;
    } catch (error) {
      if (error instanceof NoSuchEntityException) {
        this.logger.debug('IAM role does not exist', { roleName });
        return false;
      }
      throw wrapAwsError('iam', 'DeleteRole', error);
    }
  }

  private async rollbackRole(roleName: string): Promise<void> {
    this.logger.warn('Removing IAM role after failed policy attachment', { roleName });
    try {
      await this.api.deleteRole({ RoleName: roleName });
    } catch (error) {
      this.logger.error('Failed to remove IAM role; delete it before retrying', {
        roleName,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  /**
   * Returns the existing role or creates it.
   */
  async ensureRole(roleName: string): Promise<{ role: RoleInfo; created: boolean }> {
    const existing = await this.getRole(roleName);
    if (existing) {
      return { role: existing, created: false };
    }
    return { role: await this.createRole(roleName), created: true };
  }
}

function toRoleInfo(role: Role, fallbackName: string): RoleInfo {
  if (!role.Arn) {
    throw new ControlPlaneError('iam', 'GetRole', `role ${fallbackName} has no ARN`);
  }
  return {
    arn: role.Arn,
    roleName: role.RoleName ?? fallbackName,
    roleId: role.RoleId,
    path: role.Path,
    createDate: role.CreateDate,
    description: role.Description,
  };
}
