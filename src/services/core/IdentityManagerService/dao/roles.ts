import type { Model } from "mongoose";
import type { ILogger } from "../../../../interfaces/utils/ILogger.js";
import type { ISpecification } from "../../../../common/specifications/index.js";
import type { Role } from "../domain/role.js";
import type { PermissionGrantInfo } from "../domain/permission.js";
import type { PermissionSetting } from "../domain/permission-setting.js";
import type { IRoleStore } from "../types.js";
import { applyPostFilter, planQuery } from "./query.js";

export class MongoRoleStore implements IRoleStore {
	constructor(
		private readonly roleModel: Model<Role>,
		private readonly permissionModel: Model<PermissionSetting>,
		private readonly logger: ILogger
	) {}

	async findById(roleId: string): Promise<Role | null> {
		const doc = await this.roleModel.findOne({ id: roleId }).lean().exec();
		return doc ? this.#toRole(doc) : null;
	}

	async findByName(name: string, tenantId: number | null): Promise<Role | null> {
		const doc = await this.roleModel.findOne({ name, tenantId }).lean().exec();
		return doc ? this.#toRole(doc) : null;
	}

	async findAll(specification?: ISpecification<Role>): Promise<Role[]> {
		const plan = planQuery(specification);
		const docs = await this.roleModel.find().where(plan.filter).lean().exec();
		return applyPostFilter(
			docs.map((doc) => this.#toRole(doc)),
			plan
		);
	}

	async create(role: Role): Promise<void> {
		try {
			await this.roleModel.create(role);
		} catch (error) {
			this.logger.logError(`Error creando rol ${role.name}: ${error}`);
			throw error;
		}
	}

	async getPermissions(roleId: string): Promise<PermissionGrantInfo[]> {
		const settings = await this.permissionModel.find({ roleId }).lean().exec();
		return settings.map((s) => ({ name: s.name, isGranted: s.isGranted }));
	}

	async addPermission(role: Role, permission: PermissionGrantInfo): Promise<void> {
		await this.permissionModel.create({
			tenantId: role.tenantId,
			userId: null,
			roleId: role.id,
			name: permission.name,
			isGranted: permission.isGranted,
			createdAt: new Date(),
		});
	}

	async removePermission(role: Role, permission: PermissionGrantInfo): Promise<void> {
		await this.permissionModel.deleteMany({ roleId: role.id, name: permission.name, isGranted: permission.isGranted }).exec();
	}

	#toRole(doc: Role): Role {
		return {
			id: doc.id,
			tenantId: doc.tenantId ?? null,
			name: doc.name,
			displayName: doc.displayName,
			isStatic: doc.isStatic,
			createdAt: doc.createdAt,
		};
	}
}
