/**
 * JSON presentation of ledger values
 *
 * Fixed-point numbers are rendered as decimal strings; dates stay unix seconds.
 */

import { formatFixed, type AssetDetails, type AuditRecord } from '@mip65/core';
import type { AssetDetailsResponse } from '@mip65/types';

export function presentAuditRecord(record: AuditRecord): Record<string, unknown> {
  const json: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(record)) {
    json[key] = typeof value === 'bigint' ? formatFixed(value) : value;
  }
  return json;
}

export function presentAssetDetails(assetId: string, details: AssetDetails): AssetDetailsResponse {
  return {
    assetId,
    qty: formatFixed(details.qty),
    nav: formatFixed(details.nav),
    yield: formatFixed(details.yield),
    duration: formatFixed(details.duration),
    maturity: formatFixed(details.maturity),
  };
}
