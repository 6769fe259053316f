/**
 * Warehouse provisioning
 *
 * Cluster lifecycle control for an Amazon Redshift warehouse and the SQL
 * catalog of its song-play ETL pipeline.
 *
 * @example
 * ```typescript
 * import {
 *   ConsoleLogger,
 *   createAwsController,
 *   createSqlCatalog,
 *   loadConfig,
 *   sqlCatalogConfigFrom,
 * } from 'dwh-provisioner';
 *
 * const config = await loadConfig({ path: 'dwh.cfg' });
 * const { controller, dispose } = createAwsController(config, new ConsoleLogger());
 * try {
 *   console.log(await controller.status());
 * } finally {
 *   dispose();
 * }
 *
 * const catalog = createSqlCatalog(sqlCatalogConfigFrom(config));
 * ```
 *
 * @module dwh-provisioner
 */

export * from './errors/index.js';
export * from './logging/index.js';
export * from './config/index.js';
export * from './aws/index.js';
export * from './iam/index.js';
export * from './cluster/index.js';
export * from './secrets/index.js';
export * from './wait/index.js';
export * from './lifecycle/index.js';
export * from './sql/index.js';

export {
  runCli,
  selectOperation,
  createProgram,
  createAwsController,
  EXIT_OK,
  EXIT_FAILURE,
  EXIT_USAGE,
  EXIT_TIMEOUT,
  EXIT_ABORTED,
} from './cli/index.js';
export type { CliDependencies, CliOutput, ControllerHandle, OperationFlags } from './cli/index.js';
