import { Schema } from "mongoose";

/**
 * Definición de rol. Los nombres son únicos por tenant.
 */
export interface Role {
	id: string;
	tenantId: number | null;
	name: string;
	displayName: string;
	isStatic: boolean;
	createdAt: Date;
}

export const roleSchema = new Schema<Role>(
	{
		id: { type: String, required: true, unique: true },
		tenantId: { type: Number, default: null },
		name: { type: String, required: true },
		displayName: { type: String, required: true },
		isStatic: { type: Boolean, default: false },
		createdAt: { type: Date, default: Date.now },
	},
	{ id: false } // Disable Mongoose virtual id getter to avoid conflicts with custom id field
);

roleSchema.index({ tenantId: 1, name: 1 }, { unique: true });
