/**
 * Integration tests for /v1/cash
 */

import { describe, it, expect, beforeEach } from 'vitest';
import {
  GUARDIAN,
  OPS,
  YESTERDAY,
  buildTestApp,
  makeRequest,
  readJson,
  type TestApp,
} from '../../../test/helpers.js';

describe('/v1/cash', () => {
  let app: TestApp;

  beforeEach(() => {
    ({ app } = buildTestApp());
  });

  async function cashBalance(): Promise<unknown> {
    const res = await makeRequest(app, 'GET', '/v1/ledger/cash');
    return (await readJson(res)).cash;
  }

  it('should add and remove capital', async () => {
    const added = await makeRequest(app, 'POST', '/v1/cash/capital-in', {
      principal: OPS,
      body: { date: YESTERDAY, amount: '1000.5' },
    });
    const removed = await makeRequest(app, 'POST', '/v1/cash/capital-out', {
      principal: OPS,
      body: { date: YESTERDAY, amount: '200' },
    });

    expect(added.status).toBe(201);
    expect(removed.status).toBe(201);
    expect((await readJson(added)).record).toMatchObject({
      type: 'CapitalIn',
      amount: '1000.5',
      date: YESTERDAY,
    });
    expect((await readJson(removed)).record).toMatchObject({ type: 'CapitalOut', amount: '200' });
    expect(await cashBalance()).toBe('800.5');
  });

  it('should record expenses and income with their reason', async () => {
    const expense = await makeRequest(app, 'POST', '/v1/cash/expenses', {
      principal: OPS,
      body: { date: YESTERDAY, amount: '12.25', reason: 'custody fee' },
    });
    await makeRequest(app, 'POST', '/v1/cash/income', {
      principal: OPS,
      body: { date: YESTERDAY, amount: '40', reason: 'coupon' },
    });

    expect((await readJson(expense)).record).toMatchObject({
      type: 'Expense',
      amount: '12.25',
      reason: 'custody fee',
      sequence: 1,
    });
    expect(await cashBalance()).toBe('27.75');
  });

  it('should cancel an entry with a negated correction', async () => {
    await makeRequest(app, 'POST', '/v1/cash/capital-in', {
      principal: OPS,
      body: { date: YESTERDAY, amount: '500' },
    });
    const res = await makeRequest(app, 'POST', '/v1/cash/capital-in', {
      principal: OPS,
      body: { date: YESTERDAY, amount: '-500', correctionOf: 1 },
    });

    expect(res.status).toBe(201);
    expect((await readJson(res)).record).toMatchObject({ amount: '-500', correctionOf: 1 });
    expect(await cashBalance()).toBe('0');
  });

  it('should return 404 when the corrected record does not exist', async () => {
    const res = await makeRequest(app, 'POST', '/v1/cash/capital-out', {
      principal: OPS,
      body: { date: YESTERDAY, amount: '1', correctionOf: 9 },
    });

    expect(res.status).toBe(404);
    expect(await readJson(res)).toEqual({
      error: 'Audit record not found: 9',
      code: 'UNKNOWN_RECORD',
    });
  });

  it('should reject dates that are not in the past', async () => {
    const res = await makeRequest(app, 'POST', '/v1/cash/income', {
      principal: OPS,
      body: { date: YESTERDAY + 2 * 86400, amount: '1', reason: 'early' },
    });

    expect(res.status).toBe(400);
    expect(await readJson(res)).toEqual({
      error: `Invalid date ${YESTERDAY + 2 * 86400}: date must be in the past`,
      code: 'INVALID_DATE',
    });
  });

  it('should reject a zero date', async () => {
    const res = await makeRequest(app, 'POST', '/v1/cash/capital-in', {
      principal: OPS,
      body: { date: 0, amount: '1' },
    });

    expect(res.status).toBe(400);
    expect((await readJson(res)).error).toBe('Invalid date 0: date must not be zero');
  });

  it('should require a reason for expenses', async () => {
    const res = await makeRequest(app, 'POST', '/v1/cash/expenses', {
      principal: OPS,
      body: { date: YESTERDAY, amount: '1', reason: '   ' },
    });

    expect(res.status).toBe(400);
    expect((await readJson(res)).error).toBe('Validation failed');
  });

  it('should return 403 for callers without OPS', async () => {
    const res = await makeRequest(app, 'POST', '/v1/cash/capital-in', {
      principal: GUARDIAN,
      body: { date: YESTERDAY, amount: '1' },
    });

    expect(res.status).toBe(403);
    expect(await readJson(res)).toEqual({
      error: 'Principal "guardian" is missing role OPS',
      code: 'UNAUTHORIZED',
    });
    expect(await cashBalance()).toBe('0');
  });

  it('should check the role before the date', async () => {
    const res = await makeRequest(app, 'POST', '/v1/cash/capital-in', {
      principal: 'stranger',
      body: { date: 0, amount: '1' },
    });

    expect(res.status).toBe(403);
  });
});
