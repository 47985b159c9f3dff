import CustomError, { type CustomErrorJSON } from "../CustomError.js";

type NotFoundErrorTypes = "USER_NOT_FOUND" | "ROLE_NOT_FOUND" | "PERMISSION_NOT_FOUND" | "ORGANIZATION_UNIT_NOT_FOUND";

type PolicyViolationErrorTypes = "MAX_ORGANIZATION_UNIT_MEMBERSHIP_EXCEEDED";

type DuplicateConflictErrorTypes = "DUPLICATE_USER_NAME" | "DUPLICATE_EMAIL" | "USER_ALREADY_IN_ORGANIZATION_UNIT";

type ProtectedAccountErrorTypes = "CANNOT_RENAME_ADMIN_USER" | "CANNOT_DELETE_ADMIN_USER";

type InvariantViolationErrorTypes = "STORE_NOT_PERMISSION_CAPABLE";

export type IdentityErrorTypes =
	| NotFoundErrorTypes
	| PolicyViolationErrorTypes
	| DuplicateConflictErrorTypes
	| ProtectedAccountErrorTypes
	| InvariantViolationErrorTypes;

export type IdentityErrorKind = "NotFound" | "PolicyViolation" | "DuplicateConflict" | "ProtectedAccount" | "InvariantViolation";

const ERROR_KINDS: Record<IdentityErrorTypes, IdentityErrorKind> = {
	USER_NOT_FOUND: "NotFound",
	ROLE_NOT_FOUND: "NotFound",
	PERMISSION_NOT_FOUND: "NotFound",
	ORGANIZATION_UNIT_NOT_FOUND: "NotFound",
	MAX_ORGANIZATION_UNIT_MEMBERSHIP_EXCEEDED: "PolicyViolation",
	DUPLICATE_USER_NAME: "DuplicateConflict",
	DUPLICATE_EMAIL: "DuplicateConflict",
	USER_ALREADY_IN_ORGANIZATION_UNIT: "DuplicateConflict",
	CANNOT_RENAME_ADMIN_USER: "ProtectedAccount",
	CANNOT_DELETE_ADMIN_USER: "ProtectedAccount",
	STORE_NOT_PERMISSION_CAPABLE: "InvariantViolation",
};

export function identityErrorKind(errorKey: IdentityErrorTypes): IdentityErrorKind {
	return ERROR_KINDS[errorKey];
}

export class IdentityError extends CustomError<Record<string, unknown>, IdentityErrorTypes> {
	public readonly name = "IdentityError";

	get kind(): IdentityErrorKind {
		return identityErrorKind(this.errorKey);
	}
}

/**
 * @public
 */
export type IdentityErrorJSON = CustomErrorJSON<Record<string, unknown>, IdentityErrorTypes>;
