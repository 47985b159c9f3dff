import * as crypto from "node:crypto";
import type { User } from "../domain/user.js";
import type { IPasswordHasher } from "../types.js";

export function generateId(): string {
	return crypto.randomUUID();
}

export function hashPassword(password: string): string {
	const salt = crypto.randomBytes(16).toString("hex");
	const hash = crypto.pbkdf2Sync(password, salt, 100000, 64, "sha512").toString("hex");
	return `${salt}:${hash}`;
}

export function verifyPassword(password: string, passwordHash: string): boolean {
	const [salt, hash] = passwordHash.split(":");
	if (!salt || !hash) return false;
	const computed = crypto.pbkdf2Sync(password, salt, 100000, 64, "sha512");
	const expected = Buffer.from(hash, "hex");
	return expected.length === computed.length && crypto.timingSafeEqual(computed, expected);
}

/**
 * Hasher por defecto: PBKDF2-SHA512 con sal aleatoria ("sal:hash" en hex)
 */
export class Pbkdf2PasswordHasher implements IPasswordHasher {
	hashPassword(_user: User, password: string): string {
		return hashPassword(password);
	}

	verifyHashedPassword(_user: User, passwordHash: string, password: string): boolean {
		return verifyPassword(password, passwordHash);
	}
}
