/**
 * Lifecycle controller types.
 *
 * @module lifecycle/types
 */

import type { ClusterStatus } from '../cluster/index.js';
import type { RoleInfo } from '../iam/index.js';

/**
 * Operation selected on the command line.
 */
export type LifecycleOperation = 'create' | 'delete' | 'status';

/**
 * Options shared by operations that poll.
 */
export interface PollingOptions {
  /** Poll until the target status (default: true) */
  wait?: boolean;
  /** Cancels polling */
  signal?: AbortSignal;
}

export interface DeleteOptions extends PollingOptions {
  /** Also delete the access role once the cluster is gone */
  deleteRole?: boolean;
}

/**
 * Result of a create run.
 */
export type CreateOutcome =
  | {
      kind: 'created';
      role: RoleInfo;
      roleCreated: boolean;
      /** Last observed status: 'available', or the acknowledged status without waiting */
      status: ClusterStatus;
      /** Status checks performed while waiting */
      attempts: number;
    }
  | {
      /** The cluster already existed; no create call was issued */
      kind: 'skipped';
      role: RoleInfo;
      roleCreated: boolean;
      status: ClusterStatus;
    };

/**
 * Result of a delete run.
 */
export type DeleteOutcome =
  | {
      kind: 'deleted';
      /** 'unknown' once gone, or the acknowledged status without waiting */
      status: ClusterStatus;
      attempts: number;
      roleDeleted: boolean;
    }
  | {
      /** The cluster was not 'available'; no delete call was issued */
      kind: 'skipped';
      status: ClusterStatus;
      roleDeleted: boolean;
    };
