/**
 * @mip65/core - Domain logic for the MIP65 portfolio ledger
 *
 * Role-based access control and the append-only ledger engine.
 * Transport layers (HTTP, CLI) consume these through explicit instances;
 * nothing here holds process-wide state.
 */

export * from './access-control/index.js';
export * from './ledger/index.js';
