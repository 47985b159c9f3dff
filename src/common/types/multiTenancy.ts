// ─────────────────────────────────────────────────────────────────────────────
// MultiTenancySide (bitfield)
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Lados de multi-tenancy como bitfield.
 * Un permiso puede declarar ambos: HOST | TENANT = 3
 */
export const MultiTenancySide = {
	NONE: 0,
	HOST: 1 << 0, // 1
	TENANT: 1 << 1, // 2
	ALL: (1 << 0) | (1 << 1), // 3
} as const;

export type MultiTenancySide = (typeof MultiTenancySide)[keyof typeof MultiTenancySide];

/** Lado efectivo de una llamada: siempre uno solo */
export type ResolvedSide = typeof MultiTenancySide.HOST | typeof MultiTenancySide.TENANT;

/**
 * Verifica si un bitfield contiene todos los flags requeridos
 */
export function hasFlags(value: number, required: number): boolean {
	return (value & required) === required;
}

/** Mapa inverso para logs */
export function sideName(side: number): string {
	if (side === MultiTenancySide.HOST) return "Host";
	if (side === MultiTenancySide.TENANT) return "Tenant";
	if (side === MultiTenancySide.ALL) return "Host|Tenant";
	return "None";
}
