import * as path from "node:path";
import { fileURLToPath } from "node:url";
import { BaseService, type BaseServiceOptions } from "../../BaseService.js";
import MongoProvider, { DEFAULT_MONGO_URI } from "../../../providers/object/mongo/index.js";
import type { User } from "./domain/user.js";
import type { Role } from "./domain/role.js";
import type { Permission } from "./domain/permission.js";
import type { OrganizationUnit } from "./domain/organization-unit.js";
import type { IdentityResult } from "./domain/identity-result.js";
import { PermissionManager } from "./domain/permissions.js";
import { UserPermissionCache } from "./domain/permission-cache.js";
import { RoleManager, type CreateRoleInput } from "./domain/roles.js";
import { UserManager, type CreateUserInput } from "./domain/users.js";
import { OrganizationUnitManager, type OrganizationUnitRef, type UserRef } from "./domain/organization-units.js";
import { TenantContextResolver } from "./domain/tenancy.js";
import { SettingManager, readSettings } from "./domain/settings.js";
import { StaticFeatureChecker } from "./domain/features.js";
import { createMongoStores } from "./dao/index.js";
import type {
	IdentityManagerConfig,
	IdentityStores,
	IFeatureChecker,
	IPasswordHasher,
	IPasswordValidator,
	IPermissionCatalog,
	ISettingProvider,
	TenantContext,
} from "./types.js";

export interface IdentityManagerServiceOptions extends BaseServiceOptions {
	catalog: IPermissionCatalog;
	/** Si se omiten se conecta a MongoDB */
	stores?: IdentityStores;
	settings?: ISettingProvider;
	featureChecker?: IFeatureChecker;
	passwordValidators?: readonly IPasswordValidator[];
	passwordHasher?: IPasswordHasher;
}

interface IdentityManagers {
	users: UserManager;
	roles: RoleManager;
	permissions: PermissionManager;
	organizationUnits: OrganizationUnitManager;
	tenancy: TenantContextResolver;
	settings: ISettingProvider;
	cache: UserPermissionCache;
}

export const DEFAULT_IDENTITY_CONFIG: IdentityManagerConfig = {
	multiTenancy: { isEnabled: true },
	permissionCache: { maxSize: 1000, ttlMs: 60000 },
	settings: {},
	mongo: {},
};

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

function pickBoolean(raw: Record<string, unknown>, key: string, fallback: boolean): boolean {
	const value = raw[key];
	return typeof value === "boolean" ? value : fallback;
}

function pickNumber(raw: Record<string, unknown>, key: string, fallback: number): number {
	const value = raw[key];
	return typeof value === "number" && Number.isFinite(value) ? value : fallback;
}

/**
 * IdentityManagerService - Núcleo de autorización multi-tenant
 *
 * **Persistencia:**
 * Usa los stores recibidos en las opciones o, si no hay, los de MongoDB
 * (`mongo.uri`, `MONGODB_URI` o la URI local por defecto).
 */
export default class IdentityManagerService extends BaseService<IdentityManagerConfig> {
	public readonly name = "IdentityManagerService";

	#managers: IdentityManagers | null = null;
	#mongo: MongoProvider | null = null;
	readonly #serviceOptions: IdentityManagerServiceOptions;

	constructor(options: IdentityManagerServiceOptions) {
		super(DEFAULT_IDENTITY_CONFIG, options);
		this.#serviceOptions = options;
	}

	protected getServiceDir(): string {
		return path.dirname(fileURLToPath(import.meta.url));
	}

	protected mergeConfig(base: IdentityManagerConfig, raw: unknown): IdentityManagerConfig {
		if (!isRecord(raw)) return base;

		const multiTenancy = isRecord(raw.multiTenancy) ? raw.multiTenancy : {};
		const permissionCache = isRecord(raw.permissionCache) ? raw.permissionCache : {};
		const mongo = isRecord(raw.mongo) ? raw.mongo : {};
		const uri = typeof mongo.uri === "string" ? mongo.uri : base.mongo.uri;

		return {
			multiTenancy: { isEnabled: pickBoolean(multiTenancy, "isEnabled", base.multiTenancy.isEnabled) },
			permissionCache: {
				maxSize: pickNumber(permissionCache, "maxSize", base.permissionCache.maxSize),
				ttlMs: pickNumber(permissionCache, "ttlMs", base.permissionCache.ttlMs),
			},
			settings: { ...base.settings, ...readSettings(raw.settings) },
			mongo: uri === undefined ? {} : { uri },
		};
	}

	async start(): Promise<void> {
		await super.start();

		try {
			const stores = this.#serviceOptions.stores ?? (await this.#connectMongo());
			const settings = this.#serviceOptions.settings ?? new SettingManager(this.config.settings);
			const tenancy = new TenantContextResolver(this.config.multiTenancy.isEnabled);
			const cache = new UserPermissionCache(this.config.permissionCache);
			const catalog = this.#serviceOptions.catalog;

			const roles = new RoleManager(stores.roles, catalog, this.logger.getLogger("RoleManager"), this.config.permissionCache);
			const users = new UserManager(
				{
					userStore: stores.users,
					membershipStore: stores.userOrganizationUnits,
					roleManager: roles,
					settings,
					tenancy,
					permissionCache: cache,
					passwordValidators: this.#serviceOptions.passwordValidators,
					passwordHasher: this.#serviceOptions.passwordHasher,
				},
				this.logger.getLogger("UserManager")
			);
			const permissions = new PermissionManager(
				users,
				roles,
				catalog,
				tenancy,
				this.#serviceOptions.featureChecker ?? new StaticFeatureChecker(),
				cache,
				this.logger.getLogger("PermissionManager")
			);
			const organizationUnits = new OrganizationUnitManager(
				stores.users,
				stores.organizationUnits,
				stores.userOrganizationUnits,
				settings,
				this.logger.getLogger("OrganizationUnitManager")
			);

			this.#managers = { users, roles, permissions, organizationUnits, tenancy, settings, cache };
			this.logger.logOk(`${this.name} iniciado (multi-tenancy ${this.config.multiTenancy.isEnabled ? "activo" : "inactivo"})`);
		} catch (error) {
			this.logger.logError(`Error iniciando ${this.name}: ${error}`);
			throw error;
		}
	}

	async stop(): Promise<void> {
		if (this.#managers) {
			this.#managers.cache.clear();
			this.#managers.roles.clearCache();
			this.#managers = null;
		}
		if (this.#mongo) {
			await this.#mongo.stop();
			this.#mongo = null;
		}
		await super.stop();
	}

	async #connectMongo(): Promise<IdentityStores> {
		const mongo = new MongoProvider({ uri: this.config.mongo.uri ?? process.env.MONGODB_URI ?? DEFAULT_MONGO_URI });
		await mongo.start();
		this.#mongo = mongo;
		return createMongoStores(mongo, this.logger.getLogger("MongoStores"));
	}

	#require(): IdentityManagers {
		if (!this.#managers) {
			throw new Error(`${this.name} no está iniciado`);
		}
		return this.#managers;
	}

	// ─────────────────────────────────────────────────────────────────────────────
	// Managers
	// ─────────────────────────────────────────────────────────────────────────────

	get users(): UserManager {
		return this.#require().users;
	}

	get roles(): RoleManager {
		return this.#require().roles;
	}

	get permissions(): PermissionManager {
		return this.#require().permissions;
	}

	get organizationUnits(): OrganizationUnitManager {
		return this.#require().organizationUnits;
	}

	get settings(): ISettingProvider {
		return this.#require().settings;
	}

	get tenancy(): TenantContextResolver {
		return this.#require().tenancy;
	}

	// ─────────────────────────────────────────────────────────────────────────────
	// Permisos
	// ─────────────────────────────────────────────────────────────────────────────

	isGranted(context: TenantContext, userId: string, permission: Permission | string): Promise<boolean> {
		return this.permissions.isGranted(context, userId, permission);
	}

	getGrantedPermissions(context: TenantContext, user: User): Promise<Permission[]> {
		return this.permissions.getGrantedPermissions(context, user);
	}

	grantPermission(context: TenantContext, user: User, permission: Permission | string): Promise<void> {
		return this.permissions.grantPermission(context, user, permission);
	}

	prohibitPermission(context: TenantContext, user: User, permission: Permission | string): Promise<void> {
		return this.permissions.prohibitPermission(context, user, permission);
	}

	resetAllPermissions(user: User): Promise<void> {
		return this.permissions.resetAllPermissions(user);
	}

	prohibitAllPermissions(context: TenantContext, user: User): Promise<void> {
		return this.permissions.prohibitAllPermissions(context, user);
	}

	setGrantedPermissions(context: TenantContext, user: User, permissions: ReadonlyArray<Permission | string>): Promise<void> {
		return this.permissions.setGrantedPermissions(context, user, permissions);
	}

	// ─────────────────────────────────────────────────────────────────────────────
	// Usuarios y roles
	// ─────────────────────────────────────────────────────────────────────────────

	createUser(context: TenantContext, input: CreateUserInput): Promise<User> {
		return this.users.create(context, input);
	}

	getUserById(userId: string): Promise<User> {
		return this.users.getUserById(userId);
	}

	updateUser(user: User): Promise<void> {
		return this.users.update(user);
	}

	deleteUser(user: User): Promise<void> {
		return this.users.delete(user);
	}

	async changePassword(user: User, newPassword: string): Promise<IdentityResult> {
		await this.users.initializeOptions(user.tenantId);
		return this.users.changePassword(user, newPassword);
	}

	createRole(context: TenantContext, input: Omit<CreateRoleInput, "tenantId">): Promise<Role> {
		return this.roles.createRole({ ...input, tenantId: this.tenancy.getCurrentTenantId(context) });
	}

	setRoles(user: User, roleNames: readonly string[]): Promise<IdentityResult> {
		return this.users.setRoles(user, roleNames);
	}

	addToRole(user: User, roleName: string): Promise<IdentityResult> {
		return this.users.addToRole(user, roleName);
	}

	removeFromRole(user: User, roleName: string): Promise<IdentityResult> {
		return this.users.removeFromRole(user, roleName);
	}

	// ─────────────────────────────────────────────────────────────────────────────
	// Unidades organizativas
	// ─────────────────────────────────────────────────────────────────────────────

	addToOrganizationUnit(user: UserRef, organizationUnit: OrganizationUnitRef): Promise<void> {
		return this.organizationUnits.addToOrganizationUnit(user, organizationUnit);
	}

	removeFromOrganizationUnit(user: UserRef, organizationUnit: OrganizationUnitRef): Promise<void> {
		return this.organizationUnits.removeFromOrganizationUnit(user, organizationUnit);
	}

	setOrganizationUnits(user: UserRef, organizationUnitIds: readonly string[] | null | undefined): Promise<void> {
		return this.organizationUnits.setOrganizationUnits(user, organizationUnitIds);
	}

	getOrganizationUnits(user: UserRef): Promise<OrganizationUnit[]> {
		return this.organizationUnits.getOrganizationUnits(user);
	}

	isInOrganizationUnit(user: UserRef, organizationUnit: OrganizationUnitRef): Promise<boolean> {
		return this.organizationUnits.isInOrganizationUnit(user, organizationUnit);
	}

	getUsersInOrganizationUnit(organizationUnit: OrganizationUnitRef, includeChildren = false): Promise<User[]> {
		return this.organizationUnits.getUsersInOrganizationUnit(organizationUnit, includeChildren);
	}
}
