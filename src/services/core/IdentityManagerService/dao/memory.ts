import type { ISpecification } from "../../../../common/specifications/index.js";
import { IdentityError } from "../../../../common/types/custom-errors/IdentityError.js";
import type { User, UserRole } from "../domain/user.js";
import type { Role } from "../domain/role.js";
import type { PermissionGrantInfo } from "../domain/permission.js";
import type { PermissionSetting } from "../domain/permission-setting.js";
import type { OrganizationUnit } from "../domain/organization-unit.js";
import type { UserOrganizationUnit } from "../domain/user-organization-unit.js";
import type { IdentityStores, IOrganizationUnitStore, IRoleStore, IUserOrganizationUnitStore, IUserPermissionStore, IUserStore } from "../types.js";

function matches<T>(items: Iterable<T>, specification?: ISpecification<T>): T[] {
	const all = [...items];
	return specification ? all.filter((item) => specification.isSatisfiedBy(item)) : all;
}

/**
 * Stores en memoria (`Map`). Guardan y devuelven copias, como haría una base de datos.
 */
export class InMemoryRoleStore implements IRoleStore {
	private roles = new Map<string, Role>();
	private permissions: PermissionSetting[] = [];

	async findById(roleId: string): Promise<Role | null> {
		const role = this.roles.get(roleId);
		return role ? structuredClone(role) : null;
	}

	async findByName(name: string, tenantId: number | null): Promise<Role | null> {
		const role = [...this.roles.values()].find((r) => r.name === name && r.tenantId === tenantId);
		return role ? structuredClone(role) : null;
	}

	async findAll(specification?: ISpecification<Role>): Promise<Role[]> {
		return matches(this.roles.values(), specification).map((r) => structuredClone(r));
	}

	async create(role: Role): Promise<void> {
		if (this.roles.has(role.id)) {
			throw new Error(`Rol ${role.id} ya existe`);
		}
		this.roles.set(role.id, structuredClone(role));
	}

	async getPermissions(roleId: string): Promise<PermissionGrantInfo[]> {
		return this.permissions.filter((p) => p.roleId === roleId).map((p) => ({ name: p.name, isGranted: p.isGranted }));
	}

	async addPermission(role: Role, permission: PermissionGrantInfo): Promise<void> {
		this.permissions.push({ tenantId: role.tenantId, userId: null, roleId: role.id, name: permission.name, isGranted: permission.isGranted, createdAt: new Date() });
	}

	async removePermission(role: Role, permission: PermissionGrantInfo): Promise<void> {
		this.permissions = this.permissions.filter((p) => !(p.roleId === role.id && p.name === permission.name && p.isGranted === permission.isGranted));
	}
}

export class InMemoryUserStore implements IUserStore, IUserPermissionStore {
	private users = new Map<string, User>();
	private permissions: PermissionSetting[] = [];

	constructor(private readonly roleStore: IRoleStore) {}

	async findById(userId: string): Promise<User | null> {
		const user = this.users.get(userId);
		return user ? structuredClone(user) : null;
	}

	async findByName(userName: string, tenantId: number | null): Promise<User | null> {
		return this.#findOne((u) => u.userName === userName && u.tenantId === tenantId);
	}

	async findByEmail(emailAddress: string, tenantId: number | null): Promise<User | null> {
		return this.#findOne((u) => u.emailAddress === emailAddress && u.tenantId === tenantId);
	}

	async findAll(specification?: ISpecification<User>): Promise<User[]> {
		return matches(this.users.values(), specification).map((u) => structuredClone(u));
	}

	async getUserNameFromDatabase(userId: string): Promise<string | null> {
		return this.users.get(userId)?.userName ?? null;
	}

	async getRoleNames(user: User): Promise<string[]> {
		const names: string[] = [];
		for (const userRole of user.roles) {
			const role = await this.roleStore.findById(userRole.roleId);
			if (role) names.push(role.name);
		}
		return names;
	}

	async create(user: User): Promise<void> {
		if (this.users.has(user.id)) {
			throw new Error(`Usuario ${user.id} ya existe`);
		}
		this.users.set(user.id, structuredClone(user));
	}

	async update(user: User): Promise<void> {
		const stored = this.users.get(user.id);
		if (!stored) return;
		// Roles y contraseña tienen operaciones propias
		this.users.set(user.id, { ...structuredClone(user), roles: stored.roles, passwordHash: stored.passwordHash });
	}

	async delete(userId: string): Promise<void> {
		this.users.delete(userId);
	}

	async addToRole(userId: string, role: UserRole): Promise<void> {
		const user = this.users.get(userId);
		if (user && !user.roles.some((r) => r.roleId === role.roleId)) user.roles.push({ ...role });
	}

	async removeFromRole(userId: string, roleId: string): Promise<void> {
		const user = this.users.get(userId);
		if (user) user.roles = user.roles.filter((r) => r.roleId !== roleId);
	}

	async setPasswordHash(userId: string, passwordHash: string): Promise<void> {
		const user = this.users.get(userId);
		if (user) {
			user.passwordHash = passwordHash;
			user.updatedAt = new Date();
		}
	}

	async getPermissions(userId: string): Promise<PermissionGrantInfo[]> {
		return this.permissions.filter((p) => p.userId === userId).map((p) => ({ name: p.name, isGranted: p.isGranted }));
	}

	async addPermission(user: User, permission: PermissionGrantInfo): Promise<void> {
		this.permissions.push({ tenantId: user.tenantId, userId: user.id, roleId: null, name: permission.name, isGranted: permission.isGranted, createdAt: new Date() });
	}

	async removePermission(user: User, permission: PermissionGrantInfo): Promise<void> {
		this.permissions = this.permissions.filter((p) => !(p.userId === user.id && p.name === permission.name && p.isGranted === permission.isGranted));
	}

	async removeAllPermissionSettings(user: User): Promise<void> {
		this.permissions = this.permissions.filter((p) => p.userId !== user.id);
	}

	#findOne(predicate: (user: User) => boolean): User | null {
		const user = [...this.users.values()].find(predicate);
		return user ? structuredClone(user) : null;
	}
}

export class InMemoryOrganizationUnitStore implements IOrganizationUnitStore {
	private units = new Map<string, OrganizationUnit>();

	async get(organizationUnitId: string): Promise<OrganizationUnit> {
		const organizationUnit = await this.findById(organizationUnitId);
		if (!organizationUnit) {
			throw new IdentityError(404, "ORGANIZATION_UNIT_NOT_FOUND", `Unidad organizativa ${organizationUnitId} no encontrada`, { organizationUnitId });
		}
		return organizationUnit;
	}

	async findById(organizationUnitId: string): Promise<OrganizationUnit | null> {
		const organizationUnit = this.units.get(organizationUnitId);
		return organizationUnit ? structuredClone(organizationUnit) : null;
	}

	async findAll(specification?: ISpecification<OrganizationUnit>): Promise<OrganizationUnit[]> {
		return matches(this.units.values(), specification).map((ou) => structuredClone(ou));
	}

	async create(organizationUnit: OrganizationUnit): Promise<void> {
		this.units.set(organizationUnit.id, structuredClone(organizationUnit));
	}
}

export class InMemoryUserOrganizationUnitStore implements IUserOrganizationUnitStore {
	private records = new Map<string, UserOrganizationUnit>();

	async findAll(specification: ISpecification<UserOrganizationUnit>): Promise<UserOrganizationUnit[]> {
		return matches(this.records.values(), specification).map((m) => structuredClone(m));
	}

	async count(specification: ISpecification<UserOrganizationUnit>): Promise<number> {
		return matches(this.records.values(), specification).length;
	}

	async insert(record: UserOrganizationUnit): Promise<void> {
		const duplicated = [...this.records.values()].some((m) => m.userId === record.userId && m.organizationUnitId === record.organizationUnitId);
		if (duplicated) {
			throw new IdentityError(409, "USER_ALREADY_IN_ORGANIZATION_UNIT", `Membresía duplicada: ${record.userId} en ${record.organizationUnitId}`, {
				userId: record.userId,
				organizationUnitId: record.organizationUnitId,
			});
		}
		this.records.set(record.id, structuredClone(record));
	}

	async delete(specification: ISpecification<UserOrganizationUnit>): Promise<number> {
		const removed = matches(this.records.values(), specification);
		for (const record of removed) this.records.delete(record.id);
		return removed.length;
	}
}

export function createInMemoryStores(): IdentityStores & { users: InMemoryUserStore; roles: InMemoryRoleStore } {
	const roles = new InMemoryRoleStore();
	return {
		users: new InMemoryUserStore(roles),
		roles,
		organizationUnits: new InMemoryOrganizationUnitStore(),
		userOrganizationUnits: new InMemoryUserOrganizationUnitStore(),
	};
}
