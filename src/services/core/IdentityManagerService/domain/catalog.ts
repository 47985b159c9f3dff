import { IdentityError } from "../../../../common/types/custom-errors/IdentityError.js";
import { MultiTenancySide } from "../../../../common/types/multiTenancy.js";
import type { Permission } from "./permission.js";
import type { IPermissionCatalog } from "../types.js";

/**
 * Catálogo de permisos definido al arrancar la aplicación
 */
export class PermissionCatalog implements IPermissionCatalog {
	#permissions = new Map<string, Permission>();

	constructor(permissions: readonly Permission[] = []) {
		for (const permission of permissions) this.define(permission);
	}

	/**
	 * Registra un permiso. Sin `multiTenancySides` aplica a host y tenant.
	 */
	define(permission: Omit<Permission, "multiTenancySides"> & Partial<Pick<Permission, "multiTenancySides">>): Permission {
		if (this.#permissions.has(permission.name)) {
			throw new Error(`Permiso ${permission.name} ya definido`);
		}
		const defined: Permission = { ...permission, multiTenancySides: permission.multiTenancySides ?? MultiTenancySide.ALL };
		this.#permissions.set(defined.name, defined);
		return defined;
	}

	getPermission(name: string): Permission {
		const permission = this.#permissions.get(name);
		if (!permission) {
			throw new IdentityError(404, "PERMISSION_NOT_FOUND", `Permiso ${name} no encontrado`, { name });
		}
		return permission;
	}

	getPermissionOrNull(name: string): Permission | null {
		return this.#permissions.get(name) ?? null;
	}

	getAllPermissions(): readonly Permission[] {
		return [...this.#permissions.values()];
	}
}
