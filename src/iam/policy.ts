/**
 * Trust policy for the warehouse access role.
 *
 * @module iam/policy
 */

export const ROLE_PATH = '/';

export const ROLE_DESCRIPTION = 'Allows Redshift clusters to call AWS services on your behalf.';

export const REDSHIFT_SERVICE_PRINCIPAL = 'redshift.amazonaws.com';

/**
 * IAM policy document
 */
export interface PolicyDocument {
  Version: '2012-10-17';
  Statement: PolicyStatement[];
}

export interface PolicyStatement {
  Effect: 'Allow' | 'Deny';
  Action: string | string[];
  Principal?: { Service: string | string[] };
}

/**
 * Trust policy letting the Redshift service assume the role.
 */
export function redshiftTrustPolicy(): PolicyDocument {
  return {
    Version: '2012-10-17',
    Statement: [
      {
        Action: 'sts:AssumeRole',
        Effect: 'Allow',
        Principal: { Service: REDSHIFT_SERVICE_PRINCIPAL },
      },
    ],
  };
}
