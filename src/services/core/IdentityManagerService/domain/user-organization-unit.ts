import { Schema } from "mongoose";

/**
 * Membresía de un usuario en una unidad organizativa
 */
export interface UserOrganizationUnit {
	id: string;
	tenantId: number | null;
	userId: string;
	organizationUnitId: string;
	createdAt: Date;
}

export const userOrganizationUnitSchema = new Schema<UserOrganizationUnit>(
	{
		id: { type: String, required: true, unique: true },
		tenantId: { type: Number, default: null },
		userId: { type: String, required: true, index: true },
		organizationUnitId: { type: String, required: true, index: true },
		createdAt: { type: Date, default: Date.now },
	},
	{ id: false }
);

userOrganizationUnitSchema.index({ userId: 1, organizationUnitId: 1 }, { unique: true });
