export enum StaticRoleName {
	ADMIN = "Admin",
	USER = "User",
}

/** Nombre del usuario administrador de cada tenant y del host */
export const ADMIN_USER_NAME = "admin";

export const STATIC_ROLES: Array<{ name: StaticRoleName; displayName: string }> = [
	{ name: StaticRoleName.ADMIN, displayName: "Administrador" },
	{ name: StaticRoleName.USER, displayName: "Usuario" },
];
