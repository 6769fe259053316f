/**
 * IAM access role management.
 *
 * @module iam
 */

export {
  RoleService,
  iamRoleApi,
  type RoleInfo,
  type RoleGateway,
  type IamRoleApi,
} from './role.js';

export {
  redshiftTrustPolicy,
  ROLE_PATH,
  ROLE_DESCRIPTION,
  REDSHIFT_SERVICE_PRINCIPAL,
  type PolicyDocument,
  type PolicyStatement,
} from './policy.js';
