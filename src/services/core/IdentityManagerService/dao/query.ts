import type { ISpecification, QueryFilter } from "../../../../common/specifications/index.js";

export interface MongoQueryPlan<T> {
	filter: QueryFilter;
	/** Se aplica en memoria cuando la especificación no se traduce a filtro */
	postFilter: ((candidate: T) => boolean) | null;
}

/**
 * Traduce una especificación a filtro de mongoose. Si no tiene traducción se
 * consulta todo y se filtra con su expresión.
 */
export function planQuery<T>(specification?: ISpecification<T>): MongoQueryPlan<T> {
	if (!specification) return { filter: {}, postFilter: null };

	const filter = specification.toFilter();
	if (filter) return { filter, postFilter: null };

	return { filter: {}, postFilter: specification.toExpression() };
}

export function applyPostFilter<T>(items: T[], plan: MongoQueryPlan<T>): T[] {
	const postFilter = plan.postFilter;
	return postFilter ? items.filter((item) => postFilter(item)) : items;
}
