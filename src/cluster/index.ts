/**
 * Redshift cluster control-plane operations.
 *
 * @module cluster
 */

export {
  ClusterService,
  redshiftClusterApi,
  toCreateClusterInput,
  type ClusterGateway,
  type RedshiftClusterApi,
} from './service.js';

export {
  CLUSTER_ABSENT,
  type ClusterStatus,
  type KnownClusterStatus,
  type ClusterSpec,
  type ClusterInfo,
  type ClusterEndpoint,
} from './types.js';
