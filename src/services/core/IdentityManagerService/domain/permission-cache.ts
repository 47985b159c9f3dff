import { SingleFlightCache, type SingleFlightCacheOptions } from "../../../../utils/cache/SingleFlightCache.js";

/**
 * Instantánea de los permisos de un usuario en un tenant
 */
export interface UserPermissionCacheItem {
	userId: string;
	roleIds: Set<string>;
	grantedPermissions: Set<string>;
	prohibitedPermissions: Set<string>;
}

/**
 * Clave de cache: `userId@tenantId`, con 0 para el host
 */
export function userPermissionCacheKey(userId: string, tenantId: number | null): string {
	return `${userId}@${tenantId ?? 0}`;
}

/**
 * Cache de permisos de usuario. `null` representa un usuario inexistente.
 */
export class UserPermissionCache {
	#cache: SingleFlightCache<UserPermissionCacheItem | null>;

	constructor(options: SingleFlightCacheOptions = {}) {
		this.#cache = new SingleFlightCache(options);
	}

	get(userId: string, tenantId: number | null, populate: () => Promise<UserPermissionCacheItem | null>): Promise<UserPermissionCacheItem | null> {
		return this.#cache.getOrPopulate(userPermissionCacheKey(userId, tenantId), populate);
	}

	/**
	 * Invalida las entradas del usuario en todos los tenants
	 */
	invalidateUser(userId: string): void {
		this.#cache.invalidatePrefix(`${userId}@`);
	}

	clear(): void {
		this.#cache.clear();
	}
}
