import { IdentityError } from "../../../../common/types/custom-errors/IdentityError.js";
import { SingleFlightCache, type SingleFlightCacheOptions } from "../../../../utils/cache/SingleFlightCache.js";
import type { ILogger } from "../../../../interfaces/utils/ILogger.js";
import type { Role } from "./role.js";
import type { Permission } from "./permission.js";
import type { IPermissionCatalog, IRoleStore } from "../types.js";
import { generateId } from "../utils/crypto.js";

/**
 * Permisos concedidos a un rol
 */
export interface RolePermissionCacheItem {
	roleId: string;
	grantedPermissions: Set<string>;
}

export interface CreateRoleInput {
	name: string;
	displayName?: string;
	tenantId: number | null;
	isStatic?: boolean;
}

export class RoleManager {
	#cache: SingleFlightCache<RolePermissionCacheItem | null>;

	constructor(
		private readonly roleStore: IRoleStore,
		private readonly catalog: IPermissionCatalog,
		private readonly logger: ILogger,
		cacheOptions: SingleFlightCacheOptions = {}
	) {
		this.#cache = new SingleFlightCache(cacheOptions);
	}

	// ─────────────────────────────────────────────────────────────────────────────
	// Consultas
	// ─────────────────────────────────────────────────────────────────────────────

	findById(roleId: string): Promise<Role | null> {
		return this.roleStore.findById(roleId);
	}

	async getRoleById(roleId: string): Promise<Role> {
		const role = await this.roleStore.findById(roleId);
		if (!role) {
			throw new IdentityError(404, "ROLE_NOT_FOUND", `Rol ${roleId} no encontrado`, { roleId });
		}
		return role;
	}

	findByName(name: string, tenantId: number | null): Promise<Role | null> {
		return this.roleStore.findByName(name, tenantId);
	}

	async getRoleByName(name: string, tenantId: number | null): Promise<Role> {
		const role = await this.roleStore.findByName(name, tenantId);
		if (!role) {
			throw new IdentityError(404, "ROLE_NOT_FOUND", `Rol ${name} no encontrado`, { roleName: name });
		}
		return role;
	}

	async createRole(input: CreateRoleInput): Promise<Role> {
		const role: Role = {
			id: generateId(),
			tenantId: input.tenantId,
			name: input.name,
			displayName: input.displayName ?? input.name,
			isStatic: input.isStatic ?? false,
			createdAt: new Date(),
		};
		await this.roleStore.create(role);
		this.logger.logDebug(`Rol creado: ${role.name}`);
		return role;
	}

	// ─────────────────────────────────────────────────────────────────────────────
	// Permisos
	// ─────────────────────────────────────────────────────────────────────────────

	/**
	 * Comprueba si el rol concede el permiso. Un rol inexistente no concede nada.
	 */
	async isGranted(roleId: string, permission: Permission | string): Promise<boolean> {
		const name = typeof permission === "string" ? permission : permission.name;
		const item = await this.getRolePermissionCacheItem(roleId);
		return item?.grantedPermissions.has(name) ?? false;
	}

	getRolePermissionCacheItem(roleId: string): Promise<RolePermissionCacheItem | null> {
		return this.#cache.getOrPopulate(roleId, async () => {
			const role = await this.roleStore.findById(roleId);
			if (!role) return null;

			const grantedPermissions = new Set<string>();
			for (const permission of await this.roleStore.getPermissions(roleId)) {
				if (permission.isGranted) grantedPermissions.add(permission.name);
			}
			return { roleId, grantedPermissions };
		});
	}

	async getGrantedPermissions(role: Role): Promise<Permission[]> {
		const granted: Permission[] = [];
		for (const permission of this.catalog.getAllPermissions()) {
			if (await this.isGranted(role.id, permission)) granted.push(permission);
		}
		return granted;
	}

	async grantPermission(role: Role, permission: Permission | string): Promise<void> {
		const name = this.#permissionName(permission);
		if (await this.isGranted(role.id, name)) return;

		await this.roleStore.addPermission(role, { name, isGranted: true });
		this.invalidate(role.id);
		this.logger.logDebug(`Permiso ${name} concedido al rol ${role.name}`);
	}

	/**
	 * Retira la concesión del rol. Los roles no tienen prohibiciones explícitas:
	 * sin registro de concesión el permiso queda denegado.
	 */
	async prohibitPermission(role: Role, permission: Permission | string): Promise<void> {
		const name = this.#permissionName(permission);
		if (!(await this.isGranted(role.id, name))) return;

		await this.roleStore.removePermission(role, { name, isGranted: true });
		this.invalidate(role.id);
		this.logger.logDebug(`Permiso ${name} retirado del rol ${role.name}`);
	}

	invalidate(roleId: string): void {
		this.#cache.invalidate(roleId);
	}

	clearCache(): void {
		this.#cache.clear();
	}

	#permissionName(permission: Permission | string): string {
		return typeof permission === "string" ? this.catalog.getPermission(permission).name : permission.name;
	}
}
