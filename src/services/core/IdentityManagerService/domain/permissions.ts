import { MultiTenancySide, hasFlags, sideName } from "../../../../common/types/multiTenancy.js";
import type { ILogger } from "../../../../interfaces/utils/ILogger.js";
import type { Permission } from "./permission.js";
import type { User } from "./user.js";
import type { RoleManager } from "./roles.js";
import type { UserManager } from "./users.js";
import type { TenantContextResolver } from "./tenancy.js";
import type { UserPermissionCache, UserPermissionCacheItem } from "./permission-cache.js";
import type { IFeatureChecker, IPermissionCatalog, ResolvedTenancy, TenantContext } from "../types.js";

/**
 * PermissionManager - Evaluación y modificación de permisos de usuario
 *
 * Orden de evaluación de `isGranted` (cada paso puede cortar con `false`):
 * lado → feature (solo lado tenant) → cache → concesión de usuario →
 * prohibición de usuario → concesión de algún rol → denegado.
 *
 * Toda escritura en el store invalida las entradas de cache del usuario
 * antes de la siguiente lectura.
 */
export class PermissionManager {
	constructor(
		private readonly userManager: UserManager,
		private readonly roleManager: RoleManager,
		private readonly catalog: IPermissionCatalog,
		private readonly tenancy: TenantContextResolver,
		private readonly featureChecker: IFeatureChecker,
		private readonly cache: UserPermissionCache,
		private readonly logger: ILogger
	) {}

	// ─────────────────────────────────────────────────────────────────────────────
	// Chequeo de permisos
	// ─────────────────────────────────────────────────────────────────────────────

	/**
	 * Verifica si un usuario tiene un permiso. Un usuario inexistente no tiene ninguno.
	 * @param permission - Permiso o nombre de permiso del catálogo
	 */
	async isGranted(context: TenantContext, userId: string, permission: Permission | string): Promise<boolean> {
		return this.#isGranted(this.tenancy.resolve(context), userId, this.#resolvePermission(permission));
	}

	/**
	 * Evalúa todo el catálogo para el usuario
	 */
	async getGrantedPermissions(context: TenantContext, user: User): Promise<Permission[]> {
		return this.#getGrantedPermissions(this.tenancy.resolve(context), user);
	}

	getUserPermissionCacheItem(context: TenantContext, userId: string): Promise<UserPermissionCacheItem | null> {
		return this.#getCacheItem(this.tenancy.resolve(context), userId);
	}

	async #isGranted(tenancy: ResolvedTenancy, userId: string, permission: Permission): Promise<boolean> {
		if (!hasFlags(permission.multiTenancySides, tenancy.side)) {
			return false;
		}

		if (permission.featureDependency && tenancy.side === MultiTenancySide.TENANT) {
			const satisfied = await permission.featureDependency.isSatisfied({ tenantId: tenancy.tenantId, featureChecker: this.featureChecker });
			if (!satisfied) return false;
		}

		const item = await this.#getCacheItem(tenancy, userId);
		if (!item) return false;

		if (item.grantedPermissions.has(permission.name)) return true;
		if (item.prohibitedPermissions.has(permission.name)) return false;

		for (const roleId of item.roleIds) {
			if (await this.roleManager.isGranted(roleId, permission)) return true;
		}

		return false;
	}

	async #getGrantedPermissions(tenancy: ResolvedTenancy, user: User): Promise<Permission[]> {
		const granted: Permission[] = [];
		for (const permission of this.catalog.getAllPermissions()) {
			if (await this.#isGranted(tenancy, user.id, permission)) granted.push(permission);
		}
		return granted;
	}

	#getCacheItem(tenancy: ResolvedTenancy, userId: string): Promise<UserPermissionCacheItem | null> {
		return this.cache.get(userId, tenancy.tenantId, () => this.#populate(userId));
	}

	async #populate(userId: string): Promise<UserPermissionCacheItem | null> {
		const store = this.userManager.store;
		const user = await store.findById(userId);
		if (!user) return null;

		const roleIds = new Set<string>();
		for (const roleName of await store.getRoleNames(user)) {
			const role = await this.roleManager.getRoleByName(roleName, user.tenantId);
			roleIds.add(role.id);
		}

		const grantedPermissions = new Set<string>();
		const prohibitedPermissions = new Set<string>();
		for (const permission of await store.getPermissions(userId)) {
			if (permission.isGranted) grantedPermissions.add(permission.name);
			else prohibitedPermissions.add(permission.name);
		}

		return { userId, roleIds, grantedPermissions, prohibitedPermissions };
	}

	// ─────────────────────────────────────────────────────────────────────────────
	// Modificación de permisos
	// ─────────────────────────────────────────────────────────────────────────────

	/**
	 * Concede el permiso. Solo crea el registro si no está ya concedido (p.ej. por un rol).
	 */
	async grantPermission(context: TenantContext, user: User, permission: Permission | string): Promise<void> {
		await this.#grant(this.tenancy.resolve(context), user, this.#resolvePermission(permission));
	}

	/**
	 * Prohíbe el permiso. Solo crea el registro si sigue concedido tras quitar la concesión.
	 */
	async prohibitPermission(context: TenantContext, user: User, permission: Permission | string): Promise<void> {
		await this.#prohibit(this.tenancy.resolve(context), user, this.#resolvePermission(permission));
	}

	/**
	 * Elimina todas las concesiones y prohibiciones explícitas del usuario
	 */
	async resetAllPermissions(user: User): Promise<void> {
		await this.userManager.store.removeAllPermissionSettings(user);
		this.cache.invalidateUser(user.id);
		this.logger.logDebug(`Permisos explícitos de ${user.userName} eliminados`);
	}

	/**
	 * Prohíbe explícitamente cada permiso del catálogo
	 */
	async prohibitAllPermissions(context: TenantContext, user: User): Promise<void> {
		const tenancy = this.tenancy.resolve(context);
		for (const permission of this.catalog.getAllPermissions()) {
			await this.#prohibit(tenancy, user, permission);
		}
	}

	/**
	 * Deja concedidos exactamente los permisos indicados
	 */
	async setGrantedPermissions(context: TenantContext, user: User, permissions: ReadonlyArray<Permission | string>): Promise<void> {
		const tenancy = this.tenancy.resolve(context);
		const target = permissions.map((p) => this.#resolvePermission(p));
		const targetNames = new Set(target.map((p) => p.name));

		const current = await this.#getGrantedPermissions(tenancy, user);
		const currentNames = new Set(current.map((p) => p.name));

		for (const permission of current) {
			if (!targetNames.has(permission.name)) await this.#prohibit(tenancy, user, permission);
		}
		for (const permission of target) {
			if (!currentNames.has(permission.name)) await this.#grant(tenancy, user, permission);
		}
	}

	invalidateUser(userId: string): void {
		this.cache.invalidateUser(userId);
	}

	async #grant(tenancy: ResolvedTenancy, user: User, permission: Permission): Promise<void> {
		const store = this.userManager.store;
		await store.removePermission(user, { name: permission.name, isGranted: false });
		this.cache.invalidateUser(user.id);

		if (await this.#isGranted(tenancy, user.id, permission)) return;

		await store.addPermission(user, { name: permission.name, isGranted: true });
		this.cache.invalidateUser(user.id);
		this.logger.logDebug(`Permiso ${permission.name} concedido a ${user.userName} (${sideName(tenancy.side)})`);
	}

	async #prohibit(tenancy: ResolvedTenancy, user: User, permission: Permission): Promise<void> {
		const store = this.userManager.store;
		await store.removePermission(user, { name: permission.name, isGranted: true });
		this.cache.invalidateUser(user.id);

		if (!(await this.#isGranted(tenancy, user.id, permission))) return;

		await store.addPermission(user, { name: permission.name, isGranted: false });
		this.cache.invalidateUser(user.id);
		this.logger.logDebug(`Permiso ${permission.name} prohibido a ${user.userName} (${sideName(tenancy.side)})`);
	}

	#resolvePermission(permission: Permission | string): Permission {
		return typeof permission === "string" ? this.catalog.getPermission(permission) : permission;
	}
}
