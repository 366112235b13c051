/**
 * Role administration schemas
 */

import { z } from 'zod';
import { ROLES } from '@mip65/core';

export const RoleSchema = z.enum(ROLES);

export const PrincipalSchema = z.string().trim().min(1).max(128);

export const RoleMemberParamsSchema = z.object({
  role: RoleSchema,
  principal: PrincipalSchema,
});

export const RoleParamsSchema = z.object({
  role: RoleSchema,
});

export type RoleMemberParams = z.infer<typeof RoleMemberParamsSchema>;
