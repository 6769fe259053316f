/**
 * Cluster Lifecycle Controller
 *
 * Drives the create, delete and status operations against the IAM and
 * Redshift control planes, one operation per command run.
 *
 * @module lifecycle/controller
 */

import { CLUSTER_ABSENT, type ClusterGateway, type ClusterSpec, type ClusterStatus } from '../cluster/index.js';
import type { DwhConfig } from '../config/index.js';
import type { RoleGateway } from '../iam/index.js';
import { NoopLogger, type Logger } from '../logging/index.js';
import type { PasswordSource } from '../secrets/index.js';
import { waitForStatus } from '../wait/index.js';
import type { CreateOutcome, DeleteOptions, DeleteOutcome, PollingOptions } from './types.js';

/**
 * Status a cluster must reach before it can be used or deleted.
 */
export const CLUSTER_AVAILABLE = 'available';

/**
 * Collaborators of the controller.
 */
export interface LifecycleDependencies {
  roles: RoleGateway;
  clusters: ClusterGateway;
  passwords: PasswordSource;
  logger?: Logger;
}

/**
 * Cluster Lifecycle Controller
 *
 * @example
 * ```typescript
 * const controller = new ClusterLifecycleController(config, {
 *   roles: new RoleService(iamRoleApi(clients.iam), logger),
 *   clusters: new ClusterService(redshiftClusterApi(clients.redshift), logger),
 *   passwords: new MasterPasswordResolver(config.cluster.masterPassword, secretsApi(clients.secretsManager)),
 *   logger,
 * });
 *
 * const outcome = await controller.create({ signal: abortController.signal });
 * ```
 */
export class ClusterLifecycleController {
  private readonly config: DwhConfig;
  private readonly roles: RoleGateway;
  private readonly clusters: ClusterGateway;
  private readonly passwords: PasswordSource;
  private readonly logger: Logger;

  constructor(config: DwhConfig, dependencies: LifecycleDependencies) {
    this.config = config;
    this.roles = dependencies.roles;
    this.clusters = dependencies.clusters;
    this.passwords = dependencies.passwords;
    this.logger = dependencies.logger ?? new NoopLogger();
  }

  /**
   * Current cluster status; `'unknown'` when the cluster does not exist.
   */
  async status(signal?: AbortSignal): Promise<ClusterStatus> {
    return this.clusters.describeClusterStatus(this.config.cluster.identifier, signal);
  }

  /**
   * Ensures the access role exists, then creates the cluster if it is
   * absent and waits for it to become available.
   *
   * @throws {ControlPlaneError} If an AWS call fails
   * @throws {WaitTimeoutError} If the cluster is not available within the polling budget
   * @throws {WaitAbortedError} If `signal` is aborted while waiting
   */
  async create(options: PollingOptions = {}): Promise<CreateOutcome> {
    const { cluster } = this.config;

    const existingRole = await this.roles.getRole(cluster.iamRoleName);
    const role = existingRole ?? (await this.roles.createRole(cluster.iamRoleName));
    const roleCreated = existingRole === undefined;
    this.logger.info(roleCreated ? 'Created IAM role' : 'Using existing IAM role', {
      roleName: role.roleName,
      arn: role.arn,
    });

    const current = await this.status(options.signal);
    if (current !== CLUSTER_ABSENT) {
      this.logger.info('Cluster already exists; not creating', {
        clusterIdentifier: cluster.identifier,
        status: current,
      });
      return { kind: 'skipped', role, roleCreated, status: current };
    }

    const spec: ClusterSpec = {
      clusterIdentifier: cluster.identifier,
      clusterType: cluster.clusterType,
      nodeType: cluster.nodeType,
      numberOfNodes: cluster.numberOfNodes,
      dbName: cluster.dbName,
      port: cluster.port,
      masterUsername: cluster.masterUsername,
      masterUserPassword: await this.passwords.getMasterPassword(),
      iamRoleArns: [role.arn],
    };
    const acknowledged = await this.clusters.createCluster(spec);

    if (options.wait === false) {
      return { kind: 'created', role, roleCreated, status: acknowledged.status, attempts: 0 };
    }

    const outcome = await this.waitFor(CLUSTER_AVAILABLE, this.config.polling.initialDelayMs, options.signal);
    this.logger.info('Cluster is available', {
      clusterIdentifier: cluster.identifier,
      attempts: outcome.attempts,
      elapsedMs: outcome.elapsedMs,
    });
    return { kind: 'created', role, roleCreated, status: outcome.status, attempts: outcome.attempts };
  }

  /**
   * Deletes the cluster if it is available and waits for it to disappear.
   * With `deleteRole`, removes the access role once the cluster is gone.
   *
   * @throws {ControlPlaneError} If an AWS call fails
   * @throws {WaitTimeoutError} If the cluster is still present after the polling budget
   * @throws {WaitAbortedError} If `signal` is aborted while waiting
   */
  async delete(options: DeleteOptions = {}): Promise<DeleteOutcome> {
    const { cluster } = this.config;

    const current = await this.status(options.signal);
    if (current !== CLUSTER_AVAILABLE) {
      this.logger.info('Cluster is not available; not deleting', {
        clusterIdentifier: cluster.identifier,
        status: current,
      });
      // Only an absent cluster is guaranteed not to need the role
      const roleDeleted = current === CLUSTER_ABSENT && options.deleteRole ? await this.deleteRole() : false;
      return { kind: 'skipped', status: current, roleDeleted };
    }

    const acknowledged = await this.clusters.deleteCluster(cluster.identifier);

    if (options.wait === false) {
      if (options.deleteRole) {
        this.logger.warn('Not deleting the IAM role while the cluster may still use it', {
          roleName: cluster.iamRoleName,
        });
      }
      return { kind: 'deleted', status: acknowledged.status, attempts: 0, roleDeleted: false };
    }

    const outcome = await this.waitFor(CLUSTER_ABSENT, 0, options.signal);
    this.logger.info('Cluster deleted', {
      clusterIdentifier: cluster.identifier,
      attempts: outcome.attempts,
      elapsedMs: outcome.elapsedMs,
    });

    const roleDeleted = options.deleteRole ? await this.deleteRole() : false;
    return { kind: 'deleted', status: outcome.status, attempts: outcome.attempts, roleDeleted };
  }

  private async deleteRole(): Promise<boolean> {
    const deleted = await this.roles.deleteRole(this.config.cluster.iamRoleName);
    this.logger.info(deleted ? 'Deleted IAM role' : 'IAM role did not exist', {
      roleName: this.config.cluster.iamRoleName,
    });
    return deleted;
  }

  private waitFor(target: ClusterStatus, initialDelayMs: number, signal?: AbortSignal) {
    const { identifier } = this.config.cluster;
    const { intervalMs, maxAttempts } = this.config.polling;
    return waitForStatus((probeSignal) => this.status(probeSignal), target, {
      intervalMs,
      maxAttempts,
      initialDelayMs,
      signal,
      onStatus: (status, attempt) => {
        this.logger.info('Cluster status', { clusterIdentifier: identifier, status, attempt, maxAttempts });
      },
    });
  }
}
