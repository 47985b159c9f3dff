import { Schema } from "mongoose";

/**
 * Registro persistido de un permiso explícito, de usuario o de rol.
 * Exactamente uno de `userId` y `roleId` está informado.
 */
export interface PermissionSetting {
	tenantId: number | null;
	userId: string | null;
	roleId: string | null;
	name: string;
	isGranted: boolean;
	createdAt: Date;
}

export const permissionSettingSchema = new Schema<PermissionSetting>({
	tenantId: { type: Number, default: null },
	userId: { type: String, default: null, index: true },
	roleId: { type: String, default: null, index: true },
	name: { type: String, required: true },
	isGranted: { type: Boolean, required: true },
	createdAt: { type: Date, default: Date.now },
});
