import type { IMongoProvider } from "../../../../providers/object/mongo/index.js";
import type { ILogger } from "../../../../interfaces/utils/ILogger.js";
import { userSchema } from "../domain/user.js";
import { roleSchema } from "../domain/role.js";
import { permissionSettingSchema } from "../domain/permission-setting.js";
import { organizationUnitSchema } from "../domain/organization-unit.js";
import { userOrganizationUnitSchema } from "../domain/user-organization-unit.js";
import type { IdentityStores } from "../types.js";
import { MongoUserStore } from "./users.js";
import { MongoRoleStore } from "./roles.js";
import { MongoOrganizationUnitStore, MongoUserOrganizationUnitStore } from "./organizations.js";

export { MongoUserStore } from "./users.js";
export { MongoRoleStore } from "./roles.js";
export { MongoOrganizationUnitStore, MongoUserOrganizationUnitStore } from "./organizations.js";
export { InMemoryUserStore, InMemoryRoleStore, InMemoryOrganizationUnitStore, InMemoryUserOrganizationUnitStore, createInMemoryStores } from "./memory.js";

/**
 * Registra los modelos en la conexión y construye los stores de MongoDB
 */
export function createMongoStores(mongo: IMongoProvider, logger: ILogger): IdentityStores {
	const UserModel = mongo.createModel("User", userSchema);
	const RoleModel = mongo.createModel("Role", roleSchema);
	const PermissionSettingModel = mongo.createModel("PermissionSetting", permissionSettingSchema);
	const OrganizationUnitModel = mongo.createModel("OrganizationUnit", organizationUnitSchema);
	const UserOrganizationUnitModel = mongo.createModel("UserOrganizationUnit", userOrganizationUnitSchema);

	return {
		users: new MongoUserStore(UserModel, RoleModel, PermissionSettingModel, logger),
		roles: new MongoRoleStore(RoleModel, PermissionSettingModel, logger),
		organizationUnits: new MongoOrganizationUnitStore(OrganizationUnitModel, logger),
		userOrganizationUnits: new MongoUserOrganizationUnitStore(UserOrganizationUnitModel, logger),
	};
}
