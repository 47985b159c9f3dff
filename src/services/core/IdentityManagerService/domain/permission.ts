import type { MultiTenancySide } from "../../../../common/types/multiTenancy.js";
import type { IFeatureChecker } from "../types.js";

/**
 * Contexto que recibe una dependencia de feature al evaluarse
 */
export interface FeatureDependencyContext {
	tenantId: number | null;
	featureChecker: IFeatureChecker;
}

export interface IFeatureDependency {
	isSatisfied(context: FeatureDependencyContext): Promise<boolean>;
}

/**
 * Permiso definido en el catálogo.
 *
 * `multiTenancySides` es un bitfield de `MultiTenancySide`: un permiso solo
 * puede concederse en los lados que declara.
 */
export interface Permission {
	name: string;
	displayName?: string;
	description?: string;
	multiTenancySides: MultiTenancySide;
	featureDependency?: IFeatureDependency;
}

/**
 * Registro explícito de concesión (`isGranted: true`) o prohibición (`false`)
 */
export interface PermissionGrantInfo {
	name: string;
	isGranted: boolean;
}
