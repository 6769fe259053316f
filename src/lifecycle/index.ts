/**
 * Cluster lifecycle orchestration.
 *
 * @module lifecycle
 */

export { ClusterLifecycleController, CLUSTER_AVAILABLE, type LifecycleDependencies } from './controller.js';
export type {
  LifecycleOperation,
  PollingOptions,
  DeleteOptions,
  CreateOutcome,
  DeleteOutcome,
} from './types.js';
