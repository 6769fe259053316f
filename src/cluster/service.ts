/**
 * Redshift Cluster Service
 *
 * Creates, deletes and describes a provisioned cluster through the Redshift
 * control-plane API.
 *
 * @module cluster/service
 */

import {
  ClusterNotFoundFault,
  CreateClusterCommand,
  DeleteClusterCommand,
  DescribeClustersCommand,
  type Cluster,
  type CreateClusterCommandInput,
  type CreateClusterCommandOutput,
  type DeleteClusterCommandInput,
  type DeleteClusterCommandOutput,
  type DescribeClustersCommandInput,
  type DescribeClustersCommandOutput,
  type RedshiftClient,
} from '@aws-sdk/client-redshift';

import { ControlPlaneError, wrapAwsError } from '../errors/index.js';
import { NoopLogger, logOperation, type Logger } from '../logging/index.js';
import { CLUSTER_ABSENT, type ClusterInfo, type ClusterSpec, type ClusterStatus } from './types.js';

/**
 * Redshift operations the cluster service issues.
 */
export interface RedshiftClusterApi {
  describeClusters(
    input: DescribeClustersCommandInput,
    options?: { abortSignal?: AbortSignal }
  ): Promise<DescribeClustersCommandOutput>;
  createCluster(input: CreateClusterCommandInput): Promise<CreateClusterCommandOutput>;
  deleteCluster(input: DeleteClusterCommandInput): Promise<DeleteClusterCommandOutput>;
}

/**
 * Adapts an SDK Redshift client to {@link RedshiftClusterApi}.
 */
export function redshiftClusterApi(client: RedshiftClient): RedshiftClusterApi {
  return {
    describeClusters: (input, options) => client.send(new DescribeClustersCommand(input), options),
    createCluster: (input) => client.send(new CreateClusterCommand(input)),
    deleteCluster: (input) => client.send(new DeleteClusterCommand(input)),
  };
}

/**
 * Cluster operations the lifecycle controller depends on.
 */
export interface ClusterGateway {
  /** Current status; `'unknown'` when the cluster does not exist */
  describeClusterStatus(clusterIdentifier: string, signal?: AbortSignal): Promise<ClusterStatus>;
  createCluster(spec: ClusterSpec): Promise<ClusterInfo>;
  deleteCluster(clusterIdentifier: string): Promise<ClusterInfo>;
}

/**
 * Redshift Cluster Service
 *
 * @example
 * ```typescript
 * const clusters = new ClusterService(redshiftClusterApi(clients.redshift), logger);
 *
 * const status = await clusters.describeClusterStatus('dwh-cluster');
 * if (status === 'unknown') {
 *   await clusters.createCluster({ ... });
 * }
 * ```
 */
export class ClusterService implements ClusterGateway {
  private readonly api: RedshiftClusterApi;
  private readonly logger: Logger;

  constructor(api: RedshiftClusterApi, logger: Logger = new NoopLogger()) {
    this.api = api;
    this.logger = logger;
  }

  /**
   * Describes a cluster.
   *
   * @param signal - Cancels the request in flight
   * @returns The cluster, or undefined if it does not exist
   * @throws {ControlPlaneError} If the call fails for any other reason
   */
  async describeCluster(clusterIdentifier: string, signal?: AbortSignal): Promise<ClusterInfo | undefined> {
    const started = Date.now();
    try {
      const response = await this.api.describeClusters(
        { ClusterIdentifier: clusterIdentifier },
        { abortSignal: signal }
      );
      logOperation(this.logger, 'redshift', 'DescribeClusters', Date.now() - started);
      const cluster = response.Clusters?.[0];
      return cluster ? toClusterInfo(cluster, clusterIdentifier) : undefined;
    } catch (error) {
      if (error instanceof ClusterNotFoundFault) {
        return undefined;
      }
      throw wrapAwsError('redshift', 'DescribeClusters', error);
    }
  }

  /**
   * Returns the cluster status, or `'unknown'` if it does not exist.
   *
   * @throws {ControlPlaneError} If the call fails for any reason other than
   * the cluster being absent
   */
  async describeClusterStatus(clusterIdentifier: string, signal?: AbortSignal): Promise<ClusterStatus> {
    this.logger.debug('Getting Redshift cluster status', { clusterIdentifier });
    const cluster = await this.describeCluster(clusterIdentifier, signal);
    return cluster?.status ?? CLUSTER_ABSENT;
  }

  /**
   * Issues the create-cluster call. Returns as soon as the control plane
   * acknowledges; the cluster is typically still `creating`.
   *
   * @throws {ControlPlaneError} If the call fails
   */
  async createCluster(spec: ClusterSpec): Promise<ClusterInfo> {
    this.logger.info('Creating Redshift cluster', {
      clusterIdentifier: spec.clusterIdentifier,
      clusterType: spec.clusterType,
      nodeType: spec.nodeType,
      numberOfNodes: spec.clusterType === 'multi-node' ? spec.numberOfNodes : 1,
    });

    const started = Date.now();
    try {
      const response = await this.api.createCluster(toCreateClusterInput(spec));
      logOperation(this.logger, 'redshift', 'CreateCluster', Date.now() - started);
      return acknowledged(response.Cluster, 'CreateCluster', spec.clusterIdentifier);
    } catch (error) {
      throw wrapAwsError('redshift', 'CreateCluster', error);
    }
  }

  /**
   * Issues the delete-cluster call, skipping the final snapshot.
   *
   * @throws {ControlPlaneError} If the call fails
   */
  async deleteCluster(clusterIdentifier: string): Promise<ClusterInfo> {
    this.logger.info('Deleting Redshift cluster', { clusterIdentifier });

    const started = Date.now();
    try {
      const response = await this.api.deleteCluster({
        ClusterIdentifier: clusterIdentifier,
        SkipFinalClusterSnapshot: true,
      });
      logOperation(this.logger, 'redshift', 'DeleteCluster', Date.now() - started);
      return acknowledged(response.Cluster, 'DeleteCluster', clusterIdentifier);
    } catch (error) {
      throw wrapAwsError('redshift', 'DeleteCluster', error);
    }
  }
}

/**
 * Builds the CreateCluster request. NumberOfNodes is only valid for
 * multi-node clusters; Redshift rejects it for single-node ones.
 */
export function toCreateClusterInput(spec: ClusterSpec): CreateClusterCommandInput {
  const input: CreateClusterCommandInput = {
    ClusterType: spec.clusterType,
    NodeType: spec.nodeType,

    // Identifiers & credentials
    DBName: spec.dbName,
    ClusterIdentifier: spec.clusterIdentifier,
    MasterUsername: spec.masterUsername,
    MasterUserPassword: spec.masterUserPassword,

    // Roles (for S3 access)
    IamRoles: [...spec.iamRoleArns],
  };

  if (spec.clusterType === 'multi-node' && spec.numberOfNodes !== undefined) {
    input.NumberOfNodes = spec.numberOfNodes;
  }
  if (spec.port !== undefined) {
    input.Port = spec.port;
  }

  return input;
}

function acknowledged(cluster: Cluster | undefined, operation: string, clusterIdentifier: string): ClusterInfo {
  if (!cluster) {
    throw new ControlPlaneError('redshift', operation, `response did not describe cluster ${clusterIdentifier}`);
  }
  return toClusterInfo(cluster, clusterIdentifier);
}

function toClusterInfo(cluster: Cluster, fallbackIdentifier: string): ClusterInfo {
  // 'unknown' is reserved for absent clusters
  if (!cluster.ClusterStatus) {
    throw new ControlPlaneError('redshift', 'DescribeClusters', `cluster ${fallbackIdentifier} reported no status`);
  }
  const info: ClusterInfo = {
    clusterIdentifier: cluster.ClusterIdentifier ?? fallbackIdentifier,
    status: cluster.ClusterStatus,
    nodeType: cluster.NodeType,
    numberOfNodes: cluster.NumberOfNodes,
    dbName: cluster.DBName,
    masterUsername: cluster.MasterUsername,
    iamRoleArns: (cluster.IamRoles ?? [])
      .map((role) => role.IamRoleArn)
      .filter((arn): arn is string => typeof arn === 'string'),
    createTime: cluster.ClusterCreateTime,
  };

  if (cluster.Endpoint?.Address && cluster.Endpoint.Port !== undefined) {
    info.endpoint = { address: cluster.Endpoint.Address, port: cluster.Endpoint.Port };
  }

  return info;
}
