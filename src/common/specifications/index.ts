export {
	Specification,
	CompositeSpecification,
	AndSpecification,
	OrSpecification,
	NotSpecification,
	type ISpecification,
	type Predicate,
	type QueryFilter,
} from "./Specification.js";
export { ExpressionSpecification, AnySpecification, NoneSpecification } from "./ExpressionSpecification.js";
