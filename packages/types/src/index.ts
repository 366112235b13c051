/**
 * @mip65/types
 *
 * Wire schemas shared by the API and its clients
 */

export * from './ledger.schema.js';
export * from './role.schema.js';
