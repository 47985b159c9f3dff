import { IdentityError } from "../../../../common/types/custom-errors/IdentityError.js";
import type { ILogger } from "../../../../interfaces/utils/ILogger.js";
import { ADMIN_USER_NAME, StaticRoleName } from "../defaults/staticRoles.js";
import { SettingNames, type SettingName } from "../settings.js";
import { IdentityResult, type IdentityResultError } from "./identity-result.js";
import type { User } from "./user.js";
import type { RoleManager } from "./roles.js";
import type { TenantContextResolver } from "./tenancy.js";
import type { UserPermissionCache } from "./permission-cache.js";
import { getSettingValue } from "./settings.js";
import { membershipOfUser } from "./specifications.js";
import { PasswordComplexityValidator } from "./validators.js";
import { Pbkdf2PasswordHasher, generateId } from "../utils/crypto.js";
import {
	isUserPermissionStore,
	type IdentityOptions,
	type IPasswordHasher,
	type IPasswordValidator,
	type ISettingProvider,
	type IUserOrganizationUnitStore,
	type IUserStore,
	type PermissionCapableUserStore,
	type TenantContext,
} from "../types.js";

export interface CreateUserInput {
	userName: string;
	emailAddress: string;
	name?: string;
	surname?: string;
	/** Si se omite se usa el tenant actual */
	tenantId?: number | null;
	isLockoutEnabled?: boolean;
}

export interface UserManagerDependencies {
	userStore: IUserStore;
	membershipStore: IUserOrganizationUnitStore;
	roleManager: RoleManager;
	settings: ISettingProvider;
	tenancy: TenantContextResolver;
	permissionCache: UserPermissionCache;
	passwordValidators?: readonly IPasswordValidator[];
	passwordHasher?: IPasswordHasher;
}

export function defaultIdentityOptions(): IdentityOptions {
	return {
		lockout: { allowedForNewUsers: true, defaultLockoutSeconds: 300, maxFailedAccessAttempts: 5 },
		password: { requireDigit: false, requireLowercase: false, requireNonAlphanumeric: false, requireUppercase: false, requiredLength: 3 },
	};
}

/**
 * UserManager - Ciclo de vida de usuarios y asignación de roles
 */
export class UserManager {
	/** Store de usuarios con capacidad de permisos, verificada al construir */
	readonly store: PermissionCapableUserStore;
	options: IdentityOptions = defaultIdentityOptions();

	readonly #membershipStore: IUserOrganizationUnitStore;
	readonly #roleManager: RoleManager;
	readonly #settings: ISettingProvider;
	readonly #tenancy: TenantContextResolver;
	readonly #permissionCache: UserPermissionCache;
	readonly #passwordValidators: readonly IPasswordValidator[];
	readonly #passwordHasher: IPasswordHasher;

	constructor(
		dependencies: UserManagerDependencies,
		private readonly logger: ILogger
	) {
		if (!isUserPermissionStore(dependencies.userStore)) {
			throw new IdentityError(500, "STORE_NOT_PERMISSION_CAPABLE", "El store de usuarios no implementa IUserPermissionStore");
		}
		this.store = dependencies.userStore;
		this.#membershipStore = dependencies.membershipStore;
		this.#roleManager = dependencies.roleManager;
		this.#settings = dependencies.settings;
		this.#tenancy = dependencies.tenancy;
		this.#permissionCache = dependencies.permissionCache;
		this.#passwordValidators = dependencies.passwordValidators ?? [new PasswordComplexityValidator()];
		this.#passwordHasher = dependencies.passwordHasher ?? new Pbkdf2PasswordHasher();
	}

	// ─────────────────────────────────────────────────────────────────────────────
	// Consultas
	// ─────────────────────────────────────────────────────────────────────────────

	findById(userId: string): Promise<User | null> {
		return this.store.findById(userId);
	}

	async getUserById(userId: string): Promise<User> {
		const user = await this.store.findById(userId);
		if (!user) {
			throw new IdentityError(404, "USER_NOT_FOUND", `Usuario ${userId} no encontrado`, { userId });
		}
		return user;
	}

	/**
	 * Busca por nombre de usuario y, si no hay coincidencia, por email
	 */
	async findByNameOrEmail(userNameOrEmailAddress: string, tenantId: number | null): Promise<User | null> {
		return (await this.store.findByName(userNameOrEmailAddress, tenantId)) ?? (await this.store.findByEmail(userNameOrEmailAddress, tenantId));
	}

	getRoles(user: User): Promise<string[]> {
		return this.store.getRoleNames(user);
	}

	async isInRole(user: User, roleName: string): Promise<boolean> {
		const role = await this.#roleManager.findByName(roleName, user.tenantId);
		await this.#reloadRoles(user);
		return role !== null && user.roles.some((r) => r.roleId === role.id);
	}

	// ─────────────────────────────────────────────────────────────────────────────
	// Ciclo de vida
	// ─────────────────────────────────────────────────────────────────────────────

	async create(context: TenantContext, input: CreateUserInput): Promise<User> {
		const tenantId = input.tenantId ?? this.#tenancy.getCurrentTenantId(context);
		const now = new Date();
		const user: User = {
			id: generateId(),
			tenantId,
			userName: input.userName,
			emailAddress: input.emailAddress,
			name: input.name,
			surname: input.surname,
			passwordHash: null,
			isActive: true,
			isLockoutEnabled: input.isLockoutEnabled ?? this.options.lockout.allowedForNewUsers,
			roles: [],
			createdAt: now,
			updatedAt: now,
		};

		await this.checkDuplicateUsernameOrEmailAddress(user.id, user.userName, user.emailAddress, tenantId);
		await this.store.create(user);
		this.#permissionCache.invalidateUser(user.id);
		this.logger.logDebug(`Usuario creado: ${user.userName}`);
		return user;
	}

	async update(user: User): Promise<void> {
		await this.checkDuplicateUsernameOrEmailAddress(user.id, user.userName, user.emailAddress, user.tenantId);

		if (user.userName !== ADMIN_USER_NAME && (await this.store.getUserNameFromDatabase(user.id)) === ADMIN_USER_NAME) {
			throw new IdentityError(400, "CANNOT_RENAME_ADMIN_USER", `No se puede renombrar al usuario ${ADMIN_USER_NAME}`, { userName: ADMIN_USER_NAME });
		}

		user.updatedAt = new Date();
		await this.store.update(user);
		this.#permissionCache.invalidateUser(user.id);
		this.logger.logDebug(`Usuario actualizado: ${user.userName}`);
	}

	/**
	 * Elimina el usuario junto con sus permisos explícitos y membresías
	 */
	async delete(user: User): Promise<void> {
		if (user.userName === ADMIN_USER_NAME) {
			throw new IdentityError(400, "CANNOT_DELETE_ADMIN_USER", `No se puede eliminar al usuario ${ADMIN_USER_NAME}`, { userName: ADMIN_USER_NAME });
		}

		await this.store.removeAllPermissionSettings(user);
		const removed = await this.#membershipStore.delete(membershipOfUser(user.id));
		await this.store.delete(user.id);
		this.#permissionCache.invalidateUser(user.id);
		this.logger.logDebug(`Usuario eliminado: ${user.userName} (${removed} membresías)`);
	}

	/**
	 * Lanza DUPLICATE_USER_NAME / DUPLICATE_EMAIL si otro usuario del tenant ya los usa
	 */
	async checkDuplicateUsernameOrEmailAddress(expectedUserId: string | null, userName: string, emailAddress: string, tenantId: number | null): Promise<void> {
		const byName = await this.store.findByName(userName, tenantId);
		if (byName && byName.id !== expectedUserId) {
			throw new IdentityError(409, "DUPLICATE_USER_NAME", `El nombre de usuario ${userName} ya está en uso`, { userName });
		}

		const byEmail = await this.store.findByEmail(emailAddress, tenantId);
		if (byEmail && byEmail.id !== expectedUserId) {
			throw new IdentityError(409, "DUPLICATE_EMAIL", `El email ${emailAddress} ya está en uso`, { emailAddress });
		}
	}

	// ─────────────────────────────────────────────────────────────────────────────
	// Contraseñas y opciones
	// ─────────────────────────────────────────────────────────────────────────────

	/**
	 * Ejecuta todos los validadores y devuelve todos sus errores juntos
	 */
	async changePassword(user: User, newPassword: string): Promise<IdentityResult> {
		const errors: IdentityResultError[] = [];
		for (const validator of this.#passwordValidators) {
			const result = await validator.validate(user, newPassword, this.options);
			if (!result.succeeded) errors.push(...result.errors);
		}

		if (errors.length > 0) {
			return IdentityResult.failed(...errors);
		}

		const passwordHash = this.#passwordHasher.hashPassword(user, newPassword);
		await this.store.setPasswordHash(user.id, passwordHash);
		user.passwordHash = passwordHash;
		this.logger.logDebug(`Contraseña cambiada: ${user.userName}`);
		return IdentityResult.success();
	}

	verifyPassword(user: User, password: string): boolean {
		return user.passwordHash !== null && this.#passwordHasher.verifyHashedPassword(user, user.passwordHash, password);
	}

	/**
	 * Carga las opciones de bloqueo y complejidad de contraseña del tenant
	 */
	async initializeOptions(tenantId: number | null): Promise<IdentityOptions> {
		const setting = <K extends SettingName>(name: K) => getSettingValue(this.#settings, name, tenantId);

		this.options = {
			lockout: {
				allowedForNewUsers: await setting(SettingNames.UserLockOut.IsEnabled),
				defaultLockoutSeconds: await setting(SettingNames.UserLockOut.DefaultAccountLockoutSeconds),
				maxFailedAccessAttempts: await setting(SettingNames.UserLockOut.MaxFailedAccessAttemptsBeforeLockout),
			},
			password: {
				requireDigit: await setting(SettingNames.PasswordComplexity.RequireDigit),
				requireLowercase: await setting(SettingNames.PasswordComplexity.RequireLowercase),
				requireNonAlphanumeric: await setting(SettingNames.PasswordComplexity.RequireNonAlphanumeric),
				requireUppercase: await setting(SettingNames.PasswordComplexity.RequireUppercase),
				requiredLength: await setting(SettingNames.PasswordComplexity.RequiredLength),
			},
		};
		return this.options;
	}

	// ─────────────────────────────────────────────────────────────────────────────
	// Roles
	// ─────────────────────────────────────────────────────────────────────────────

	async addToRole(user: User, roleName: string): Promise<IdentityResult> {
		const role = await this.#roleManager.getRoleByName(roleName, user.tenantId);
		await this.#reloadRoles(user);
		if (user.roles.some((r) => r.roleId === role.id)) {
			return IdentityResult.failed({ code: "USER_ALREADY_IN_ROLE", description: `El usuario ${user.userName} ya tiene el rol ${roleName}` });
		}

		const userRole = { tenantId: user.tenantId, roleId: role.id };
		await this.store.addToRole(user.id, userRole);
		user.roles.push(userRole);
		this.#permissionCache.invalidateUser(user.id);
		this.logger.logDebug(`Rol ${roleName} asignado a ${user.userName}`);
		return IdentityResult.success();
	}

	async removeFromRole(user: User, roleName: string): Promise<IdentityResult> {
		const role = await this.#roleManager.getRoleByName(roleName, user.tenantId);
		await this.#reloadRoles(user);
		if (!user.roles.some((r) => r.roleId === role.id)) {
			return IdentityResult.failed({ code: "USER_NOT_IN_ROLE", description: `El usuario ${user.userName} no tiene el rol ${roleName}` });
		}
		if (user.userName === ADMIN_USER_NAME && role.name === StaticRoleName.ADMIN) {
			return IdentityResult.failed({ code: "CANNOT_REMOVE_ADMIN_ROLE", description: `No se puede quitar el rol ${StaticRoleName.ADMIN} al usuario ${ADMIN_USER_NAME}` });
		}

		await this.store.removeFromRole(user.id, role.id);
		user.roles = user.roles.filter((r) => r.roleId !== role.id);
		this.#permissionCache.invalidateUser(user.id);
		this.logger.logDebug(`Rol ${roleName} retirado a ${user.userName}`);
		return IdentityResult.success();
	}

	/**
	 * Sincroniza los roles del usuario con `roleNames`: primero quita, luego añade.
	 * El primer fallo corta la sincronización y se devuelve tal cual; los cambios
	 * previos no se deshacen.
	 */
	async setRoles(user: User, roleNames: readonly string[]): Promise<IdentityResult> {
		await this.#reloadRoles(user);

		for (const userRole of [...user.roles]) {
			const role = await this.#roleManager.findById(userRole.roleId);
			if (!role) {
				this.logger.logWarn(`Rol ${userRole.roleId} asignado a ${user.userName} no existe`);
				continue;
			}
			if (!roleNames.includes(role.name)) {
				const result = await this.removeFromRole(user, role.name);
				if (!result.succeeded) return result;
			}
		}

		for (const roleName of roleNames) {
			const role = await this.#roleManager.getRoleByName(roleName, user.tenantId);
			if (!user.roles.some((r) => r.roleId === role.id)) {
				const result = await this.addToRole(user, roleName);
				if (!result.succeeded) return result;
			}
		}

		return IdentityResult.success();
	}

	/**
	 * Las decisiones de rol se toman sobre los roles persistidos, no sobre la copia recibida
	 */
	async #reloadRoles(user: User): Promise<void> {
		user.roles = (await this.getUserById(user.id)).roles;
	}
}
