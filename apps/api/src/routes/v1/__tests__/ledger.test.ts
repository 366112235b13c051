/**
 * Integration tests for /v1/ledger
 * Net asset value, cash and the audit trail
 */

import { describe, it, expect, beforeEach } from 'vitest';
import {
  DATA,
  GUARDIAN,
  OPS,
  YESTERDAY,
  buildTestApp,
  makeRequest,
  readJson,
  type TestApp,
} from '../../../test/helpers.js';

describe('/v1/ledger', () => {
  let app: TestApp;

  beforeEach(() => {
    ({ app } = buildTestApp());
  });

  async function seedPortfolio() {
    await makeRequest(app, 'POST', '/v1/cash/capital-in', {
      principal: OPS,
      body: { date: YESTERDAY, amount: '1000' },
    });
    await makeRequest(app, 'POST', '/v1/assets', {
      principal: GUARDIAN,
      body: { assetId: 'UST-2030' },
    });
    await makeRequest(app, 'POST', '/v1/assets/UST-2030/buy', {
      principal: OPS,
      body: { date: YESTERDAY, qty: '10', price: '100' },
    });
    await makeRequest(app, 'POST', '/v1/assets/UST-2030/valuation', {
      principal: DATA,
      body: { date: YESTERDAY, nav: '135', yield: '0.04', duration: '4', maturity: '6' },
    });
  }

  describe('GET /v1/ledger/value', () => {
    it('should be zero for an empty ledger', async () => {
      const res = await makeRequest(app, 'GET', '/v1/ledger/value');

      expect(res.status).toBe(200);
      expect(await readJson(res)).toEqual({ value: '0' });
    });

    it('should add position value at nav to cash', async () => {
      await seedPortfolio();

      const value = await makeRequest(app, 'GET', '/v1/ledger/value');
      const cash = await makeRequest(app, 'GET', '/v1/ledger/cash');

      expect(await readJson(value)).toEqual({ value: '1350' });
      expect(await readJson(cash)).toEqual({ cash: '0' });
    });
  });

  describe('GET /v1/ledger/audit', () => {
    it('should return every record in order', async () => {
      await seedPortfolio();

      const res = await makeRequest(app, 'GET', '/v1/ledger/audit');
      const body = await readJson(res);

      expect(res.status).toBe(200);
      expect(body.lastSequence).toBe(4);
      expect(body.records).toEqual([
        expect.objectContaining({ sequence: 1, type: 'CapitalIn', amount: '1000' }),
        expect.objectContaining({ sequence: 2, type: 'AssetInit', assetId: 'UST-2030' }),
        expect.objectContaining({ sequence: 3, type: 'AssetBuy', qty: '10', price: '100' }),
        expect.objectContaining({ sequence: 4, type: 'AssetUpdate', nav: '135', yield: '0.04' }),
      ]);
    });

    it('should page with fromSequence and limit', async () => {
      await seedPortfolio();

      const res = await makeRequest(app, 'GET', '/v1/ledger/audit?fromSequence=2&limit=2');
      const body = await readJson(res);

      expect(body.records).toEqual([
        expect.objectContaining({ sequence: 2 }),
        expect.objectContaining({ sequence: 3 }),
      ]);
      expect(body.lastSequence).toBe(4);
    });

    it('should not record rejected calls', async () => {
      await makeRequest(app, 'POST', '/v1/assets', {
        principal: OPS,
        body: { assetId: 'UST-2030' },
      });

      const res = await makeRequest(app, 'GET', '/v1/ledger/audit');

      expect(await readJson(res)).toEqual({ records: [], lastSequence: 0 });
    });

    it('should reject a zero limit', async () => {
      const res = await makeRequest(app, 'GET', '/v1/ledger/audit?limit=0');

      expect(res.status).toBe(400);
      expect((await readJson(res)).error).toBe('Validation failed');
    });
  });
});
