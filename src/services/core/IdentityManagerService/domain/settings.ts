import { DEFAULT_SETTINGS, SETTING_NAMES, isSettingValue, type IdentitySettings, type SettingName } from "../settings.js";
import type { ISettingProvider } from "../types.js";

/**
 * Lee un ajuste para el tenant indicado, o para la aplicación si es null
 */
export function getSettingValue<K extends SettingName>(provider: ISettingProvider, name: K, tenantId: number | null): Promise<IdentitySettings[K]> {
	return tenantId === null ? provider.getSettingValueForApplicationAsync(name) : provider.getSettingValueForTenantAsync(name, tenantId);
}

/**
 * Filtra un objeto arbitrario (p.ej. config.json) a los ajustes conocidos con el tipo correcto
 */
export function readSettings(raw: unknown): Partial<IdentitySettings> {
	const result: Partial<IdentitySettings> = {};
	if (typeof raw !== "object" || raw === null) return result;

	for (const name of SETTING_NAMES) {
		copySetting(result, name, Reflect.get(raw, name));
	}
	return result;
}

function copySetting<K extends SettingName>(target: Partial<IdentitySettings>, name: K, value: unknown): void {
	if (isSettingValue(name, value)) target[name] = value;
}

/**
 * SettingManager - Ajustes tipados en memoria
 *
 * Precedencia: valor del tenant → valor de aplicación → valor por defecto
 */
export class SettingManager implements ISettingProvider {
	#defaults: IdentitySettings;
	#application: Partial<IdentitySettings> = {};
	#tenants = new Map<number, Partial<IdentitySettings>>();

	constructor(defaults: Partial<IdentitySettings> = {}) {
		this.#defaults = { ...DEFAULT_SETTINGS, ...defaults };
	}

	getSettingValueForApplication<K extends SettingName>(name: K): IdentitySettings[K] {
		return this.#application[name] ?? this.#defaults[name];
	}

	getSettingValueForTenant<K extends SettingName>(name: K, tenantId: number): IdentitySettings[K] {
		return this.#tenants.get(tenantId)?.[name] ?? this.getSettingValueForApplication(name);
	}

	async getSettingValueForApplicationAsync<K extends SettingName>(name: K): Promise<IdentitySettings[K]> {
		return this.getSettingValueForApplication(name);
	}

	async getSettingValueForTenantAsync<K extends SettingName>(name: K, tenantId: number): Promise<IdentitySettings[K]> {
		return this.getSettingValueForTenant(name, tenantId);
	}

	changeSettingForApplication<K extends SettingName>(name: K, value: IdentitySettings[K]): void {
		this.#application[name] = value;
	}

	changeSettingForTenant<K extends SettingName>(name: K, value: IdentitySettings[K], tenantId: number): void {
		const values = this.#tenants.get(tenantId) ?? {};
		values[name] = value;
		this.#tenants.set(tenantId, values);
	}
}
