import { MultiTenancySide } from "../../../../common/types/multiTenancy.js";
import type { ResolvedTenancy, TenantContext } from "../types.js";

/**
 * Contexto de una llamada hecha desde el host (sin tenant)
 */
export function hostContext(): TenantContext {
	return { unitOfWork: null, session: { tenantId: null, multiTenancySide: MultiTenancySide.HOST } };
}

/**
 * Contexto de una llamada hecha dentro de un tenant
 */
export function tenantContext(tenantId: number): TenantContext {
	return { unitOfWork: null, session: { tenantId, multiTenancySide: MultiTenancySide.TENANT } };
}

/**
 * Resuelve tenant y lado actuales. Se invoca una sola vez por operación y el
 * resultado se reutiliza en todos sus pasos.
 */
export class TenantContextResolver {
	constructor(private readonly isMultiTenancyEnabled: boolean) {}

	resolve(context: TenantContext): ResolvedTenancy {
		const unitOfWork = context.unitOfWork;
		if (unitOfWork) {
			const tenantId = unitOfWork.tenantId;
			const side = this.isMultiTenancyEnabled && tenantId === null ? MultiTenancySide.HOST : MultiTenancySide.TENANT;
			return { tenantId, side };
		}

		return { tenantId: context.session.tenantId, side: context.session.multiTenancySide };
	}

	/**
	 * Tenant actual, sin lado
	 */
	getCurrentTenantId(context: TenantContext): number | null {
		return this.resolve(context).tenantId;
	}
}
