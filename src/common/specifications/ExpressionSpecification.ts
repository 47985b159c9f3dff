import { Specification, type Predicate, type QueryFilter } from "./Specification.js";

/**
 * Especificación hoja construida a partir de un predicado y, opcionalmente,
 * de su filtro equivalente para MongoDB.
 */
export class ExpressionSpecification<T> extends Specification<T> {
	readonly #expression: Predicate<T>;
	readonly #filter: QueryFilter | null;

	constructor(expression: Predicate<T>, filter: QueryFilter | null = null) {
		super();
		this.#expression = expression;
		this.#filter = filter;
	}

	toExpression(): Predicate<T> {
		return this.#expression;
	}

	toFilter(): QueryFilter | null {
		return this.#filter;
	}
}

/** Se cumple para cualquier candidato */
export class AnySpecification<T> extends ExpressionSpecification<T> {
	constructor() {
		super(() => true, {});
	}
}

/** No se cumple para ningún candidato */
export class NoneSpecification<T> extends ExpressionSpecification<T> {
	constructor() {
		super(() => false, { $expr: false });
	}
}
