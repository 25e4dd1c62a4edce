import { z } from "zod";
import { TENANT_ROLES } from "./auth.js";

export const tenantRoleSchema = z.enum(TENANT_ROLES);

export const tenantMembershipSchema = z.object({
  userSubject: z.string().min(1),
  tenantId: z.string().min(1),
  role: tenantRoleSchema
});

export const tenantMembershipFileSchema = z.array(tenantMembershipSchema);

export const membershipRowSchema = z.object({
  user_subject: z.string(),
  tenant_id: z.string(),
  role: z.string()
});

export const tenantParamsSchema = z.object({
  tenantId: z.string().trim().min(1).max(200)
});
