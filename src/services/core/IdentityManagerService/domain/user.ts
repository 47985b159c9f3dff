import { Schema } from "mongoose";

/**
 * Asignación de un rol a un usuario
 */
export interface UserRole {
	tenantId: number | null;
	roleId: string;
}

/**
 * Usuario del sistema. `tenantId` null indica un usuario del host.
 */
export interface User {
	id: string;
	tenantId: number | null;
	userName: string;
	emailAddress: string;
	name?: string;
	surname?: string;
	passwordHash: string | null;
	isActive: boolean;
	isLockoutEnabled: boolean;
	roles: UserRole[];
	createdAt: Date;
	updatedAt: Date;
}

export const userSchema = new Schema<User>(
	{
		id: { type: String, required: true, unique: true },
		tenantId: { type: Number, default: null },
		userName: { type: String, required: true },
		emailAddress: { type: String, required: true },
		name: String,
		surname: String,
		passwordHash: { type: String, default: null },
		isActive: { type: Boolean, default: true },
		isLockoutEnabled: { type: Boolean, default: false },
		roles: [
			{
				_id: false,
				tenantId: { type: Number, default: null },
				roleId: { type: String, required: true },
			},
		],
		createdAt: { type: Date, default: Date.now },
		updatedAt: { type: Date, default: Date.now },
	},
	{ id: false }
);

userSchema.index({ tenantId: 1, userName: 1 }, { unique: true });
userSchema.index({ tenantId: 1, emailAddress: 1 }, { unique: true });
