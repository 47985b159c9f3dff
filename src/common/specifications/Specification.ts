import { ArgumentError } from "../types/custom-errors/ArgumentError.js";

/** Predicado traducible que consume la capa de consultas */
export type Predicate<T> = (candidate: T) => boolean;

/**
 * Filtro de consulta estilo MongoDB (`{ code: { $regex: "^00001" } }`).
 * Los DAOs de mongoose lo aplican con `Query.where()`.
 */
export type QueryFilter = Readonly<Record<string, unknown>>;

export interface ISpecification<T> {
	isSatisfiedBy(candidate: T): boolean;
	toExpression(): Predicate<T>;
	/** `null` cuando la especificación no tiene traducción a filtro */
	toFilter(): QueryFilter | null;
}

/**
 * Especificación componible sobre `T`.
 *
 * La composición es estructural (un árbol): nada se evalúa hasta que se
 * traduce a expresión o se aplica a un candidato.
 */
export abstract class Specification<T> implements ISpecification<T> {
	abstract toExpression(): Predicate<T>;

	toFilter(): QueryFilter | null {
		return null;
	}

	isSatisfiedBy(candidate: T): boolean {
		return this.toExpression()(candidate);
	}

	and(other: ISpecification<T>): Specification<T> {
		return new AndSpecification(this, other);
	}

	or(other: ISpecification<T>): Specification<T> {
		return new OrSpecification(this, other);
	}

	not(): Specification<T> {
		return new NotSpecification(this);
	}
}

function requireChild<T>(child: ISpecification<T> | null | undefined, name: string): ISpecification<T> {
	if (child == null) {
		throw new ArgumentError(name, `La especificación "${name}" es obligatoria`);
	}
	return child;
}

/**
 * Especificación compuesta por dos hijas (izquierda y derecha)
 */
export abstract class CompositeSpecification<T> extends Specification<T> {
	readonly left: ISpecification<T>;
	readonly right: ISpecification<T>;

	constructor(left: ISpecification<T> | null | undefined, right: ISpecification<T> | null | undefined) {
		super();
		this.left = requireChild(left, "left");
		this.right = requireChild(right, "right");
	}
}

/**
 * Ambas especificaciones deben cumplirse
 */
export class AndSpecification<T> extends CompositeSpecification<T> {
	toExpression(): Predicate<T> {
		const left = this.left.toExpression();
		const right = this.right.toExpression();
		return (candidate) => left(candidate) && right(candidate);
	}

	toFilter(): QueryFilter | null {
		const left = this.left.toFilter();
		const right = this.right.toFilter();
		if (!left || !right) return null;
		return { $and: [left, right] };
	}
}

/**
 * Basta con que se cumpla una de las dos especificaciones
 */
export class OrSpecification<T> extends CompositeSpecification<T> {
	toExpression(): Predicate<T> {
		const left = this.left.toExpression();
		const right = this.right.toExpression();
		return (candidate) => left(candidate) || right(candidate);
	}

	toFilter(): QueryFilter | null {
		const left = this.left.toFilter();
		const right = this.right.toFilter();
		if (!left || !right) return null;
		return { $or: [left, right] };
	}
}

/**
 * Invierte el resultado de la especificación hija
 */
export class NotSpecification<T> extends Specification<T> {
	readonly inner: ISpecification<T>;

	constructor(inner: ISpecification<T> | null | undefined) {
		super();
		this.inner = requireChild(inner, "inner");
	}

	toExpression(): Predicate<T> {
		const inner = this.inner.toExpression();
		return (candidate) => !inner(candidate);
	}

	toFilter(): QueryFilter | null {
		const inner = this.inner.toFilter();
		if (!inner) return null;
		return { $nor: [inner] };
	}
}
