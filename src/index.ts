// src/index.ts
export { default as IdentityManagerService, DEFAULT_IDENTITY_CONFIG, type IdentityManagerServiceOptions } from "./services/core/IdentityManagerService/index.js";
export * from "./services/core/IdentityManagerService/types.js";
export * from "./services/core/IdentityManagerService/domain/index.js";
export * from "./services/core/IdentityManagerService/settings.js";
export { ADMIN_USER_NAME, StaticRoleName, STATIC_ROLES } from "./services/core/IdentityManagerService/defaults/staticRoles.js";
export { PermissionManager } from "./services/core/IdentityManagerService/domain/permissions.js";
export { UserPermissionCache, userPermissionCacheKey, type UserPermissionCacheItem } from "./services/core/IdentityManagerService/domain/permission-cache.js";
export { RoleManager, type RolePermissionCacheItem, type CreateRoleInput } from "./services/core/IdentityManagerService/domain/roles.js";
export { UserManager, defaultIdentityOptions, type CreateUserInput, type UserManagerDependencies } from "./services/core/IdentityManagerService/domain/users.js";
export { OrganizationUnitManager, type UserRef, type OrganizationUnitRef } from "./services/core/IdentityManagerService/domain/organization-units.js";
export { TenantContextResolver, hostContext, tenantContext } from "./services/core/IdentityManagerService/domain/tenancy.js";
export { SettingManager, getSettingValue, readSettings } from "./services/core/IdentityManagerService/domain/settings.js";
export { SimpleFeatureDependency, StaticFeatureChecker } from "./services/core/IdentityManagerService/domain/features.js";
export { PermissionCatalog } from "./services/core/IdentityManagerService/domain/catalog.js";
export { PasswordComplexityValidator } from "./services/core/IdentityManagerService/domain/validators.js";
export * from "./services/core/IdentityManagerService/domain/specifications.js";
export * from "./services/core/IdentityManagerService/dao/index.js";
export { Pbkdf2PasswordHasher, generateId } from "./services/core/IdentityManagerService/utils/crypto.js";

export * from "./common/specifications/index.js";
export { default as CustomError, type CustomErrorJSON } from "./common/types/CustomError.js";
export { IdentityError, identityErrorKind, type IdentityErrorTypes, type IdentityErrorKind, type IdentityErrorJSON } from "./common/types/custom-errors/IdentityError.js";
export { ArgumentError } from "./common/types/custom-errors/ArgumentError.js";
export { MultiTenancySide, hasFlags, sideName, type ResolvedSide } from "./common/types/multiTenancy.js";
export { SingleFlightCache, type SingleFlightCacheOptions } from "./utils/cache/SingleFlightCache.js";
export { default as MongoProvider, DEFAULT_MONGO_URI, type IMongoConfig, type IMongoProvider } from "./providers/object/mongo/index.js";
export { BaseService, type BaseServiceOptions } from "./services/BaseService.js";
export { Logger, parseLogLevel } from "./utils/logger/Logger.js";
export { default as ConsoleLogger } from "./utils/logger/ConsoleLogger.js";
export type { ILogger, LogLevel } from "./interfaces/utils/ILogger.js";
export type { ILifecycle } from "./interfaces/behaviours/ILifecycle.js";
