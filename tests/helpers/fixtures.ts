import { Logger } from "../../src/utils/logger/Logger.js";
import { MultiTenancySide } from "../../src/common/types/multiTenancy.js";
import { createInMemoryStores } from "../../src/services/core/IdentityManagerService/dao/memory.js";
import { PermissionCatalog } from "../../src/services/core/IdentityManagerService/domain/catalog.js";
import { SimpleFeatureDependency, StaticFeatureChecker } from "../../src/services/core/IdentityManagerService/domain/features.js";
import { SettingManager } from "../../src/services/core/IdentityManagerService/domain/settings.js";
import { TenantContextResolver, hostContext, tenantContext } from "../../src/services/core/IdentityManagerService/domain/tenancy.js";
import { UserPermissionCache } from "../../src/services/core/IdentityManagerService/domain/permission-cache.js";
import { RoleManager } from "../../src/services/core/IdentityManagerService/domain/roles.js";
import { UserManager } from "../../src/services/core/IdentityManagerService/domain/users.js";
import { PermissionManager } from "../../src/services/core/IdentityManagerService/domain/permissions.js";
import { OrganizationUnitManager } from "../../src/services/core/IdentityManagerService/domain/organization-units.js";
import type { User } from "../../src/services/core/IdentityManagerService/domain/user.js";
import type { Role } from "../../src/services/core/IdentityManagerService/domain/role.js";
import type { OrganizationUnit } from "../../src/services/core/IdentityManagerService/domain/organization-unit.js";
import type { IPasswordValidator } from "../../src/services/core/IdentityManagerService/types.js";

Logger.setLevel("NONE");

/**
 * Catálogo de prueba, en este orden:
 * - Orders.Approve: solo tenant
 * - Orders.View: host y tenant
 * - Host.Tenants: solo host
 * - Reports.Export: solo tenant, requiere la feature "Reports"
 * - Audit.Read: host y tenant, requiere la feature "Audit"
 */
export function createCatalog(): PermissionCatalog {
	return new PermissionCatalog([
		{ name: "Orders.Approve", multiTenancySides: MultiTenancySide.TENANT },
		{ name: "Orders.View", multiTenancySides: MultiTenancySide.ALL },
		{ name: "Host.Tenants", multiTenancySides: MultiTenancySide.HOST },
		{ name: "Reports.Export", multiTenancySides: MultiTenancySide.TENANT, featureDependency: new SimpleFeatureDependency("Reports") },
		{ name: "Audit.Read", multiTenancySides: MultiTenancySide.ALL, featureDependency: new SimpleFeatureDependency("Audit") },
	]);
}

export interface FixtureOptions {
	multiTenancyEnabled?: boolean;
	passwordValidators?: readonly IPasswordValidator[];
}

export function createFixture(options: FixtureOptions = {}) {
	const logger = Logger.getLogger("test");
	const stores = createInMemoryStores();
	const catalog = createCatalog();
	const settings = new SettingManager();
	const featureChecker = new StaticFeatureChecker();
	const tenancy = new TenantContextResolver(options.multiTenancyEnabled ?? true);
	const cache = new UserPermissionCache();

	const roles = new RoleManager(stores.roles, catalog, logger);
	const users = new UserManager(
		{
			userStore: stores.users,
			membershipStore: stores.userOrganizationUnits,
			roleManager: roles,
			settings,
			tenancy,
			permissionCache: cache,
			passwordValidators: options.passwordValidators,
		},
		logger
	);
	const permissions = new PermissionManager(users, roles, catalog, tenancy, featureChecker, cache, logger);
	const organizationUnits = new OrganizationUnitManager(stores.users, stores.organizationUnits, stores.userOrganizationUnits, settings, logger);

	return { stores, catalog, settings, featureChecker, tenancy, cache, roles, users, permissions, organizationUnits };
}

export type Fixture = ReturnType<typeof createFixture>;

export async function seedRole(fixture: Fixture, name: string, tenantId: number | null, grants: readonly string[] = []): Promise<Role> {
	const role = await fixture.roles.createRole({ name, tenantId });
	for (const permission of grants) {
		await fixture.roles.grantPermission(role, permission);
	}
	return role;
}

export async function seedUser(fixture: Fixture, userName: string, tenantId: number | null, roleNames: readonly string[] = []): Promise<User> {
	const context = tenantId === null ? hostContext() : tenantContext(tenantId);
	const user = await fixture.users.create(context, { userName, emailAddress: `${userName}@example.com` });
	for (const roleName of roleNames) {
		await fixture.users.addToRole(user, roleName);
	}
	return user;
}

let unitSequence = 0;

export async function seedOrganizationUnit(fixture: Fixture, code: string, tenantId: number | null): Promise<OrganizationUnit> {
	unitSequence++;
	const organizationUnit: OrganizationUnit = {
		id: `ou-${unitSequence}`,
		tenantId,
		parentId: null,
		code,
		displayName: `Unidad ${code}`,
		createdAt: new Date(),
	};
	await fixture.stores.organizationUnits.create(organizationUnit);
	return organizationUnit;
}

export function names(items: ReadonlyArray<{ name: string }>): string[] {
	return items.map((item) => item.name);
}
