import type { Model } from "mongoose";
import type { ILogger } from "../../../../interfaces/utils/ILogger.js";
import type { ISpecification } from "../../../../common/specifications/index.js";
import type { User, UserRole } from "../domain/user.js";
import type { Role } from "../domain/role.js";
import type { PermissionGrantInfo } from "../domain/permission.js";
import type { PermissionSetting } from "../domain/permission-setting.js";
import type { IUserPermissionStore, IUserStore } from "../types.js";
import { applyPostFilter, planQuery } from "./query.js";

/**
 * Store de usuarios sobre MongoDB, con permisos explícitos por usuario
 */
export class MongoUserStore implements IUserStore, IUserPermissionStore {
	constructor(
		private readonly userModel: Model<User>,
		private readonly roleModel: Model<Role>,
		private readonly permissionModel: Model<PermissionSetting>,
		private readonly logger: ILogger
	) {}

	async findById(userId: string): Promise<User | null> {
		const doc = await this.userModel.findOne({ id: userId }).lean().exec();
		return doc ? this.#toUser(doc) : null;
	}

	async findByName(userName: string, tenantId: number | null): Promise<User | null> {
		const doc = await this.userModel.findOne({ userName, tenantId }).lean().exec();
		return doc ? this.#toUser(doc) : null;
	}

	async findByEmail(emailAddress: string, tenantId: number | null): Promise<User | null> {
		const doc = await this.userModel.findOne({ emailAddress, tenantId }).lean().exec();
		return doc ? this.#toUser(doc) : null;
	}

	async findAll(specification?: ISpecification<User>): Promise<User[]> {
		const plan = planQuery(specification);
		const docs = await this.userModel.find().where(plan.filter).lean().exec();
		return applyPostFilter(
			docs.map((doc) => this.#toUser(doc)),
			plan
		);
	}

	async getUserNameFromDatabase(userId: string): Promise<string | null> {
		const doc = await this.userModel.findOne({ id: userId }).lean().exec();
		return doc?.userName ?? null;
	}

	async getRoleNames(user: User): Promise<string[]> {
		if (user.roles.length === 0) return [];
		const roles = await this.roleModel
			.find({ id: { $in: user.roles.map((r) => r.roleId) } })
			.lean()
			.exec();
		return roles.map((role) => role.name);
	}

	async create(user: User): Promise<void> {
		try {
			await this.userModel.create(user);
		} catch (error) {
			this.logger.logError(`Error creando usuario ${user.userName}: ${error}`);
			throw error;
		}
	}

	async update(user: User): Promise<void> {
		await this.userModel
			.updateOne(
				{ id: user.id },
				{
					$set: {
						tenantId: user.tenantId,
						userName: user.userName,
						emailAddress: user.emailAddress,
						name: user.name,
						surname: user.surname,
						isActive: user.isActive,
						isLockoutEnabled: user.isLockoutEnabled,
						updatedAt: user.updatedAt,
					},
				}
			)
			.exec();
	}

	async delete(userId: string): Promise<void> {
		await this.userModel.deleteOne({ id: userId }).exec();
	}

	async addToRole(userId: string, role: UserRole): Promise<void> {
		await this.userModel.updateOne({ id: userId, "roles.roleId": { $ne: role.roleId } }, { $push: { roles: role } }).exec();
	}

	async removeFromRole(userId: string, roleId: string): Promise<void> {
		await this.userModel.updateOne({ id: userId }, { $pull: { roles: { roleId } } }).exec();
	}

	async setPasswordHash(userId: string, passwordHash: string): Promise<void> {
		await this.userModel.updateOne({ id: userId }, { $set: { passwordHash, updatedAt: new Date() } }).exec();
	}

	// ─────────────────────────────────────────────────────────────────────────────
	// Permisos explícitos
	// ─────────────────────────────────────────────────────────────────────────────

	async getPermissions(userId: string): Promise<PermissionGrantInfo[]> {
		const settings = await this.permissionModel.find({ userId }).lean().exec();
		return settings.map((s) => ({ name: s.name, isGranted: s.isGranted }));
	}

	async addPermission(user: User, permission: PermissionGrantInfo): Promise<void> {
		await this.permissionModel.create({
			tenantId: user.tenantId,
			userId: user.id,
			roleId: null,
			name: permission.name,
			isGranted: permission.isGranted,
			createdAt: new Date(),
		});
	}

	async removePermission(user: User, permission: PermissionGrantInfo): Promise<void> {
		await this.permissionModel.deleteMany({ userId: user.id, name: permission.name, isGranted: permission.isGranted }).exec();
	}

	async removeAllPermissionSettings(user: User): Promise<void> {
		await this.permissionModel.deleteMany({ userId: user.id }).exec();
	}

	#toUser(doc: User): User {
		return {
			id: doc.id,
			tenantId: doc.tenantId ?? null,
			userName: doc.userName,
			emailAddress: doc.emailAddress,
			name: doc.name,
			surname: doc.surname,
			passwordHash: doc.passwordHash ?? null,
			isActive: doc.isActive,
			isLockoutEnabled: doc.isLockoutEnabled,
			roles: (doc.roles ?? []).map((r) => ({ tenantId: r.tenantId ?? null, roleId: r.roleId })),
			createdAt: doc.createdAt,
			updatedAt: doc.updatedAt,
		};
	}
}
