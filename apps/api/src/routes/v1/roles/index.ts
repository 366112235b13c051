/**
 * Role administration routes
 *
 * GET /v1/roles/:role/members - Members of a role
 * GET /v1/roles/:role/members/:principal - Membership check
 * PUT /v1/roles/:role/members/:principal - Grant (caller needs the role's admin role)
 * DELETE /v1/roles/:role/members/:principal - Revoke (same authorization)
 *
 * Grants and revocations are stored in the role log and survive restarts.
 */

import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import { RoleMemberParamsSchema, RoleParamsSchema } from '@mip65/types';
import { toErrorResponse } from '../../../lib/error-response.js';
import { requirePrincipal } from '../../../middleware/principal.js';
import type { AppBindings } from '../../../types/context.js';

const rolesRoute = new Hono<AppBindings>();

rolesRoute.get(
  '/:role/members',
  zValidator('param', RoleParamsSchema, (result, c) => {
    if (!result.success) {
      return c.json({ error: 'Validation failed', issues: result.error.issues }, 400);
    }
  }),
  (c) => {
    const { role } = c.req.valid('param');
    const access = c.get('access');

    return c.json({
      role,
      adminRole: access.getRoleAdmin(role),
      members: access.getRoleMembers(role),
    });
  }
);

rolesRoute.get(
  '/:role/members/:principal',
  zValidator('param', RoleMemberParamsSchema, (result, c) => {
    if (!result.success) {
      return c.json({ error: 'Validation failed', issues: result.error.issues }, 400);
    }
  }),
  (c) => {
    const { role, principal } = c.req.valid('param');
    return c.json({ role, principal, hasRole: c.get('access').hasRole(role, principal) });
  }
);

rolesRoute.put(
  '/:role/members/:principal',
  requirePrincipal,
  zValidator('param', RoleMemberParamsSchema, (result, c) => {
    if (!result.success) {
      return c.json({ error: 'Validation failed', issues: result.error.issues }, 400);
    }
  }),
  async (c) => {
    const { role, principal } = c.req.valid('param');
    const access = c.get('access');

    try {
      await access.grantRole(c.get('principal'), role, principal);
      return c.json({ role, principal, hasRole: access.hasRole(role, principal) });
    } catch (error) {
      const mapped = toErrorResponse(error);
      if (mapped) {
        return c.json(mapped.body, mapped.status);
      }
      throw error;
    }
  }
);

rolesRoute.delete(
  '/:role/members/:principal',
  requirePrincipal,
  zValidator('param', RoleMemberParamsSchema, (result, c) => {
    if (!result.success) {
      return c.json({ error: 'Validation failed', issues: result.error.issues }, 400);
    }
  }),
  async (c) => {
    const { role, principal } = c.req.valid('param');
    const access = c.get('access');

    try {
      await access.revokeRole(c.get('principal'), role, principal);
      return c.json({ role, principal, hasRole: access.hasRole(role, principal) });
    } catch (error) {
      const mapped = toErrorResponse(error);
      if (mapped) {
        return c.json(mapped.body, mapped.status);
      }
      throw error;
    }
  }
);

export { rolesRoute };
