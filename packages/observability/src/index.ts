/**
 * @mip65/observability
 *
 * Structured logging for the portfolio ledger.
 */

export { createLogger, logger, toLoggable, toLoggableRecord } from './logger.js';
export type { Logger } from './logger.js';
