export * from "./user.js";
export * from "./role.js";
export * from "./permission.js";
export * from "./permission-setting.js";
export * from "./organization-unit.js";
export * from "./user-organization-unit.js";
export * from "./identity-result.js";
