/**
 * Redshift cluster types.
 *
 * @module cluster/types
 */

import type { ClusterType } from '../config/index.js';

/**
 * Status reported for a cluster that does not exist.
 */
export const CLUSTER_ABSENT = 'unknown';

/**
 * Statuses the Redshift control plane reports for provisioned clusters.
 */
export type KnownClusterStatus =
  | 'available'
  | 'available, prep-for-resize'
  | 'available, resize-cleanup'
  | 'cancelling-resize'
  | 'creating'
  | 'deleting'
  | 'final-snapshot'
  | 'hardware-failure'
  | 'incompatible-hsm'
  | 'incompatible-network'
  | 'incompatible-parameters'
  | 'incompatible-restore'
  | 'insufficient-capacity'
  | 'modifying'
  | 'paused'
  | 'rebooting'
  | 'renaming'
  | 'resizing'
  | 'rotating-keys'
  | 'storage-full'
  | 'updating-hsm';

/**
 * Cluster status string. `'unknown'` ({@link CLUSTER_ABSENT}) means the
 * cluster does not exist; other values come from the control plane as-is.
 */
export type ClusterStatus = typeof CLUSTER_ABSENT | KnownClusterStatus | (string & {});

/**
 * Parameters of a create-cluster call.
 */
export interface ClusterSpec {
  clusterIdentifier: string;
  clusterType: ClusterType;
  nodeType: string;
  /** Only sent for multi-node clusters */
  numberOfNodes?: number;
  dbName: string;
  port?: number;
  masterUsername: string;
  masterUserPassword: string;
  /** Roles the cluster may assume (for S3 access) */
  iamRoleArns: string[];
}

/**
 * Cluster endpoint.
 */
export interface ClusterEndpoint {
  address: string;
  port: number;
}

/**
 * Cluster description.
 */
export interface ClusterInfo {
  clusterIdentifier: string;
  status: ClusterStatus;
  nodeType?: string;
  numberOfNodes?: number;
  dbName?: string;
  masterUsername?: string;
  endpoint?: ClusterEndpoint;
  iamRoleArns: string[];
  createTime?: Date;
}
