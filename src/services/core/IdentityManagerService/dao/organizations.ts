import mongoose, { type Model } from "mongoose";
import type { ILogger } from "../../../../interfaces/utils/ILogger.js";
import type { ISpecification } from "../../../../common/specifications/index.js";
import { IdentityError } from "../../../../common/types/custom-errors/IdentityError.js";
import type { OrganizationUnit } from "../domain/organization-unit.js";
import type { UserOrganizationUnit } from "../domain/user-organization-unit.js";
import type { IOrganizationUnitStore, IUserOrganizationUnitStore } from "../types.js";
import { applyPostFilter, planQuery } from "./query.js";

const DUPLICATE_KEY_CODE = 11000;

export class MongoOrganizationUnitStore implements IOrganizationUnitStore {
	constructor(
		private readonly organizationUnitModel: Model<OrganizationUnit>,
		private readonly logger: ILogger
	) {}

	async get(organizationUnitId: string): Promise<OrganizationUnit> {
		const organizationUnit = await this.findById(organizationUnitId);
		if (!organizationUnit) {
			throw new IdentityError(404, "ORGANIZATION_UNIT_NOT_FOUND", `Unidad organizativa ${organizationUnitId} no encontrada`, { organizationUnitId });
		}
		return organizationUnit;
	}

	async findById(organizationUnitId: string): Promise<OrganizationUnit | null> {
		const doc = await this.organizationUnitModel.findOne({ id: organizationUnitId }).lean().exec();
		return doc ? this.#toOrganizationUnit(doc) : null;
	}

	async findAll(specification?: ISpecification<OrganizationUnit>): Promise<OrganizationUnit[]> {
		const plan = planQuery(specification);
		const docs = await this.organizationUnitModel.find().where(plan.filter).lean().exec();
		return applyPostFilter(
			docs.map((doc) => this.#toOrganizationUnit(doc)),
			plan
		);
	}

	async create(organizationUnit: OrganizationUnit): Promise<void> {
		await this.organizationUnitModel.create(organizationUnit);
		this.logger.logDebug(`Unidad organizativa creada: ${organizationUnit.code}`);
	}

	#toOrganizationUnit(doc: OrganizationUnit): OrganizationUnit {
		return {
			id: doc.id,
			tenantId: doc.tenantId ?? null,
			parentId: doc.parentId ?? null,
			code: doc.code,
			displayName: doc.displayName,
			createdAt: doc.createdAt,
		};
	}
}

export class MongoUserOrganizationUnitStore implements IUserOrganizationUnitStore {
	constructor(
		private readonly membershipModel: Model<UserOrganizationUnit>,
		private readonly logger: ILogger
	) {}

	async findAll(specification: ISpecification<UserOrganizationUnit>): Promise<UserOrganizationUnit[]> {
		const plan = planQuery(specification);
		const docs = await this.membershipModel.find().where(plan.filter).lean().exec();
		return applyPostFilter(
			docs.map((doc) => this.#toMembership(doc)),
			plan
		);
	}

	async count(specification: ISpecification<UserOrganizationUnit>): Promise<number> {
		const plan = planQuery(specification);
		if (plan.postFilter) {
			return (await this.findAll(specification)).length;
		}
		return this.membershipModel.countDocuments().where(plan.filter).exec();
	}

	async insert(record: UserOrganizationUnit): Promise<void> {
		try {
			await this.membershipModel.create(record);
		} catch (error) {
			if (error instanceof mongoose.mongo.MongoServerError && error.code === DUPLICATE_KEY_CODE) {
				throw new IdentityError(409, "USER_ALREADY_IN_ORGANIZATION_UNIT", `Membresía duplicada: ${record.userId} en ${record.organizationUnitId}`, {
					userId: record.userId,
					organizationUnitId: record.organizationUnitId,
				});
			}
			throw error;
		}
	}

	async delete(specification: ISpecification<UserOrganizationUnit>): Promise<number> {
		const plan = planQuery(specification);
		const filter = plan.postFilter ? { id: { $in: (await this.findAll(specification)).map((m) => m.id) } } : plan.filter;
		const result = await this.membershipModel.deleteMany().where(filter).exec();
		this.logger.logDebug(`Membresías eliminadas: ${result.deletedCount}`);
		return result.deletedCount;
	}

	#toMembership(doc: UserOrganizationUnit): UserOrganizationUnit {
		return {
			id: doc.id,
			tenantId: doc.tenantId ?? null,
			userId: doc.userId,
			organizationUnitId: doc.organizationUnitId,
			createdAt: doc.createdAt,
		};
	}
}
