import type { ISpecification } from "../../../common/specifications/index.js";
import type { User, UserRole } from "./domain/user.js";
import type { Role } from "./domain/role.js";
import type { Permission, PermissionGrantInfo } from "./domain/permission.js";
import type { OrganizationUnit } from "./domain/organization-unit.js";
import type { UserOrganizationUnit } from "./domain/user-organization-unit.js";
import type { IdentityResult } from "./domain/identity-result.js";
import type { IdentitySettings, SettingName } from "./settings.js";
import type { ResolvedSide } from "../../../common/types/multiTenancy.js";

// ─────────────────────────────────────────────────────────────────────────────
// Stores
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Persistencia de usuarios. Las búsquedas por nombre y email son exactas dentro
 * del tenant indicado (null = host).
 */
export interface IUserStore {
	findById(userId: string): Promise<User | null>;
	findByName(userName: string, tenantId: number | null): Promise<User | null>;
	findByEmail(emailAddress: string, tenantId: number | null): Promise<User | null>;
	findAll(specification?: ISpecification<User>): Promise<User[]>;
	/** Nombre persistido, ignorando cambios en memoria del usuario */
	getUserNameFromDatabase(userId: string): Promise<string | null>;
	/** Nombres de los roles asignados al usuario */
	getRoleNames(user: User): Promise<string[]>;
	create(user: User): Promise<void>;
	update(user: User): Promise<void>;
	delete(userId: string): Promise<void>;
	addToRole(userId: string, role: UserRole): Promise<void>;
	removeFromRole(userId: string, roleId: string): Promise<void>;
	setPasswordHash(userId: string, passwordHash: string): Promise<void>;
}

/**
 * Capacidad de almacenar permisos explícitos por usuario
 */
export interface IUserPermissionStore {
	getPermissions(userId: string): Promise<PermissionGrantInfo[]>;
	addPermission(user: User, permission: PermissionGrantInfo): Promise<void>;
	removePermission(user: User, permission: PermissionGrantInfo): Promise<void>;
	removeAllPermissionSettings(user: User): Promise<void>;
}

export type PermissionCapableUserStore = IUserStore & IUserPermissionStore;

export function isUserPermissionStore(store: IUserStore): store is PermissionCapableUserStore {
	return (
		"getPermissions" in store &&
		typeof store.getPermissions === "function" &&
		"addPermission" in store &&
		typeof store.addPermission === "function" &&
		"removePermission" in store &&
		typeof store.removePermission === "function" &&
		"removeAllPermissionSettings" in store &&
		typeof store.removeAllPermissionSettings === "function"
	);
}

export interface IRoleStore {
	findById(roleId: string): Promise<Role | null>;
	findByName(name: string, tenantId: number | null): Promise<Role | null>;
	findAll(specification?: ISpecification<Role>): Promise<Role[]>;
	create(role: Role): Promise<void>;
	getPermissions(roleId: string): Promise<PermissionGrantInfo[]>;
	addPermission(role: Role, permission: PermissionGrantInfo): Promise<void>;
	removePermission(role: Role, permission: PermissionGrantInfo): Promise<void>;
}

export interface IOrganizationUnitStore {
	/** Lanza ORGANIZATION_UNIT_NOT_FOUND si no existe */
	get(organizationUnitId: string): Promise<OrganizationUnit>;
	findById(organizationUnitId: string): Promise<OrganizationUnit | null>;
	findAll(specification?: ISpecification<OrganizationUnit>): Promise<OrganizationUnit[]>;
	create(organizationUnit: OrganizationUnit): Promise<void>;
}

export interface IUserOrganizationUnitStore {
	findAll(specification: ISpecification<UserOrganizationUnit>): Promise<UserOrganizationUnit[]>;
	count(specification: ISpecification<UserOrganizationUnit>): Promise<number>;
	insert(record: UserOrganizationUnit): Promise<void>;
	/** Devuelve el número de registros eliminados */
	delete(specification: ISpecification<UserOrganizationUnit>): Promise<number>;
}

export interface IdentityStores {
	users: IUserStore;
	roles: IRoleStore;
	organizationUnits: IOrganizationUnitStore;
	userOrganizationUnits: IUserOrganizationUnitStore;
}

// ─────────────────────────────────────────────────────────────────────────────
// Colaboradores
// ─────────────────────────────────────────────────────────────────────────────

export interface IPermissionCatalog {
	/** Lanza PERMISSION_NOT_FOUND si no existe */
	getPermission(name: string): Permission;
	getPermissionOrNull(name: string): Permission | null;
	getAllPermissions(): readonly Permission[];
}

export interface ISettingProvider {
	getSettingValueForApplication<K extends SettingName>(name: K): IdentitySettings[K];
	getSettingValueForTenant<K extends SettingName>(name: K, tenantId: number): IdentitySettings[K];
	getSettingValueForApplicationAsync<K extends SettingName>(name: K): Promise<IdentitySettings[K]>;
	getSettingValueForTenantAsync<K extends SettingName>(name: K, tenantId: number): Promise<IdentitySettings[K]>;
}

export interface IFeatureChecker {
	isEnabled(tenantId: number | null, featureName: string): Promise<boolean>;
}

export interface IPasswordHasher {
	hashPassword(user: User, password: string): string;
	verifyHashedPassword(user: User, passwordHash: string, password: string): boolean;
}

export interface IdentityOptions {
	lockout: {
		allowedForNewUsers: boolean;
		defaultLockoutSeconds: number;
		maxFailedAccessAttempts: number;
	};
	password: {
		requireDigit: boolean;
		requireLowercase: boolean;
		requireNonAlphanumeric: boolean;
		requireUppercase: boolean;
		requiredLength: number;
	};
}

export interface IPasswordValidator {
	validate(user: User, password: string, options: IdentityOptions): Promise<IdentityResult>;
}

// ─────────────────────────────────────────────────────────────────────────────
// Contexto de tenant
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Contexto explícito de la llamada. Si hay unidad de trabajo activa, su tenant
 * manda sobre el de la sesión.
 */
export interface TenantContext {
	unitOfWork?: { tenantId: number | null } | null;
	session: { tenantId: number | null; multiTenancySide: ResolvedSide };
}

export interface ResolvedTenancy {
	tenantId: number | null;
	side: ResolvedSide;
}

// ─────────────────────────────────────────────────────────────────────────────
// Configuración
// ─────────────────────────────────────────────────────────────────────────────

export interface IdentityManagerConfig {
	multiTenancy: { isEnabled: boolean };
	permissionCache: { maxSize: number; ttlMs: number };
	settings: Partial<IdentitySettings>;
	mongo: { uri?: string };
}
