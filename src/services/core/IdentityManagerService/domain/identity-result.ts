export type IdentityResultErrorCode =
	| "USER_ALREADY_IN_ROLE"
	| "USER_NOT_IN_ROLE"
	| "CANNOT_REMOVE_ADMIN_ROLE"
	| "PASSWORD_TOO_SHORT"
	| "PASSWORD_REQUIRES_DIGIT"
	| "PASSWORD_REQUIRES_LOWER"
	| "PASSWORD_REQUIRES_UPPER"
	| "PASSWORD_REQUIRES_NON_ALPHANUMERIC";

export interface IdentityResultError {
	code: IdentityResultErrorCode;
	description: string;
}

/**
 * Resultado de una operación de identidad que puede fallar de forma esperada
 * (sin lanzar excepción).
 */
export type IdentityResult = { succeeded: true; errors: readonly [] } | { succeeded: false; errors: readonly IdentityResultError[] };

const SUCCESS: IdentityResult = { succeeded: true, errors: [] };

export const IdentityResult = {
	success(): IdentityResult {
		return SUCCESS;
	},

	failed(...errors: IdentityResultError[]): IdentityResult {
		return errors.length === 0 ? SUCCESS : { succeeded: false, errors };
	},

	/**
	 * Combina varios resultados en uno con todos sus errores
	 */
	combine(results: readonly IdentityResult[]): IdentityResult {
		return IdentityResult.failed(...results.flatMap((r) => r.errors));
	},
};
