import type { FeatureDependencyContext, IFeatureDependency } from "./permission.js";
import type { IFeatureChecker } from "../types.js";

/**
 * Dependencia de una o varias features.
 * Con `requiresAll` todas deben estar activas; si no, basta con una.
 */
export class SimpleFeatureDependency implements IFeatureDependency {
	readonly features: readonly string[];
	readonly requiresAll: boolean;

	constructor(features: string | readonly string[], requiresAll = false) {
		this.features = typeof features === "string" ? [features] : features;
		this.requiresAll = requiresAll;
	}

	async isSatisfied(context: FeatureDependencyContext): Promise<boolean> {
		if (this.features.length === 0) return true;

		for (const feature of this.features) {
			const enabled = await context.featureChecker.isEnabled(context.tenantId, feature);
			if (enabled && !this.requiresAll) return true;
			if (!enabled && this.requiresAll) return false;
		}
		return this.requiresAll;
	}
}

/**
 * Checker de features en memoria: features activas por defecto y por tenant
 */
export class StaticFeatureChecker implements IFeatureChecker {
	#defaults: Set<string>;
	#tenants = new Map<number, Map<string, boolean>>();

	constructor(enabledByDefault: readonly string[] = []) {
		this.#defaults = new Set(enabledByDefault);
	}

	async isEnabled(tenantId: number | null, featureName: string): Promise<boolean> {
		const override = tenantId === null ? undefined : this.#tenants.get(tenantId)?.get(featureName);
		return override ?? this.#defaults.has(featureName);
	}

	setForTenant(tenantId: number, featureName: string, enabled: boolean): void {
		const features = this.#tenants.get(tenantId) ?? new Map<string, boolean>();
		features.set(featureName, enabled);
		this.#tenants.set(tenantId, features);
	}
}
