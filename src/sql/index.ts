/**
 * ETL statement catalog for the song-play warehouse.
 * @module dwh-provisioner/sql
 */

export { createSqlCatalog, sqlCatalogConfigFrom } from './catalog.js';
export type { SqlCatalog, SqlCatalogConfig } from './catalog.js';

export { renderCopyStatement, validateS3Path } from './copy.js';
export type { CopyStatementOptions } from './copy.js';

export * from './tables.js';
export * from './insert.js';
