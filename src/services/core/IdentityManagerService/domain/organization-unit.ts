import { Schema } from "mongoose";

/**
 * Unidad organizativa. `code` codifica la jerarquía: el código de un
 * descendiente empieza por el código de su ancestro (p.ej. "00001.00002").
 */
export interface OrganizationUnit {
	id: string;
	tenantId: number | null;
	parentId: string | null;
	code: string;
	displayName: string;
	createdAt: Date;
}

export const organizationUnitSchema = new Schema<OrganizationUnit>(
	{
		id: { type: String, required: true, unique: true },
		tenantId: { type: Number, default: null },
		parentId: { type: String, default: null },
		code: { type: String, required: true, index: true },
		displayName: { type: String, required: true },
		createdAt: { type: Date, default: Date.now },
	},
	{ id: false }
);
