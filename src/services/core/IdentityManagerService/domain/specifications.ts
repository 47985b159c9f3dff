import { ExpressionSpecification, type Specification } from "../../../../common/specifications/index.js";
import type { User } from "./user.js";
import type { OrganizationUnit } from "./organization-unit.js";
import type { UserOrganizationUnit } from "./user-organization-unit.js";

function escapeRegExp(value: string): string {
	return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

// ─────────────────────────────────────────────────────────────────────────────
// Usuarios
// ─────────────────────────────────────────────────────────────────────────────

export function userIdIn(ids: readonly string[]): Specification<User> {
	const set = new Set(ids);
	return new ExpressionSpecification<User>((u) => set.has(u.id), { id: { $in: [...set] } });
}

// ─────────────────────────────────────────────────────────────────────────────
// Unidades organizativas
// ─────────────────────────────────────────────────────────────────────────────

export function organizationUnitIdIn(ids: readonly string[]): Specification<OrganizationUnit> {
	const set = new Set(ids);
	return new ExpressionSpecification<OrganizationUnit>((ou) => set.has(ou.id), { id: { $in: [...set] } });
}

/**
 * Unidades cuyo código empieza por `code` (la propia unidad y sus descendientes)
 */
export function organizationUnitCodeStartsWith(code: string): Specification<OrganizationUnit> {
	return new ExpressionSpecification<OrganizationUnit>((ou) => ou.code.startsWith(code), { code: { $regex: `^${escapeRegExp(code)}` } });
}

export function organizationUnitInTenant(tenantId: number | null): Specification<OrganizationUnit> {
	return new ExpressionSpecification<OrganizationUnit>((ou) => ou.tenantId === tenantId, { tenantId });
}

// ─────────────────────────────────────────────────────────────────────────────
// Membresías
// ─────────────────────────────────────────────────────────────────────────────

export function membershipOfUser(userId: string): Specification<UserOrganizationUnit> {
	return new ExpressionSpecification<UserOrganizationUnit>((m) => m.userId === userId, { userId });
}

export function membershipInUnit(organizationUnitId: string): Specification<UserOrganizationUnit> {
	return new ExpressionSpecification<UserOrganizationUnit>((m) => m.organizationUnitId === organizationUnitId, { organizationUnitId });
}

export function membershipInUnits(organizationUnitIds: readonly string[]): Specification<UserOrganizationUnit> {
	const set = new Set(organizationUnitIds);
	return new ExpressionSpecification<UserOrganizationUnit>((m) => set.has(m.organizationUnitId), { organizationUnitId: { $in: [...set] } });
}
