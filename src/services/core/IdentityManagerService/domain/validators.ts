import { IdentityResult, type IdentityResultError } from "./identity-result.js";
import type { User } from "./user.js";
import type { IdentityOptions, IPasswordValidator } from "../types.js";

/**
 * Valida la contraseña contra las reglas de complejidad de `options.password`.
 * Devuelve todos los incumplimientos a la vez.
 */
export class PasswordComplexityValidator implements IPasswordValidator {
	async validate(_user: User, password: string, options: IdentityOptions): Promise<IdentityResult> {
		const rules = options.password;
		const errors: IdentityResultError[] = [];

		if (password.length < rules.requiredLength) {
			errors.push({ code: "PASSWORD_TOO_SHORT", description: `La contraseña debe tener al menos ${rules.requiredLength} caracteres` });
		}
		if (rules.requireDigit && !/[0-9]/.test(password)) {
			errors.push({ code: "PASSWORD_REQUIRES_DIGIT", description: "La contraseña debe contener un dígito" });
		}
		if (rules.requireLowercase && !/[a-z]/.test(password)) {
			errors.push({ code: "PASSWORD_REQUIRES_LOWER", description: "La contraseña debe contener una minúscula" });
		}
		if (rules.requireUppercase && !/[A-Z]/.test(password)) {
			errors.push({ code: "PASSWORD_REQUIRES_UPPER", description: "La contraseña debe contener una mayúscula" });
		}
		if (rules.requireNonAlphanumeric && !/[^a-zA-Z0-9]/.test(password)) {
			errors.push({ code: "PASSWORD_REQUIRES_NON_ALPHANUMERIC", description: "La contraseña debe contener un carácter no alfanumérico" });
		}

		return IdentityResult.failed(...errors);
	}
}
