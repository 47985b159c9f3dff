/**
 * Unit Tests for specification combinators
 *
 * Run: npx tsx --test tests/unit/specifications.test.ts
 */

import { test } from "node:test";
import assert from "node:assert";
import {
	AndSpecification,
	AnySpecification,
	ExpressionSpecification,
	NoneSpecification,
	NotSpecification,
	OrSpecification,
	type ISpecification,
} from "../../src/common/specifications/index.js";
import { ArgumentError } from "../../src/common/types/custom-errors/ArgumentError.js";

interface Account {
	age: number;
	active: boolean;
}

const adult = new ExpressionSpecification<Account>((a) => a.age >= 18, { age: { $gte: 18 } });
const active = new ExpressionSpecification<Account>((a) => a.active, { active: true });
const untranslatable = new ExpressionSpecification<Account>((a) => a.age % 2 === 0);

const accounts: Account[] = [
	{ age: 12, active: false },
	{ age: 12, active: true },
	{ age: 30, active: false },
	{ age: 30, active: true },
];

test("Specifications - Boolean composition", async (t) => {
	await t.test("and requires both children", () => {
		const spec = adult.and(active);
		assert.deepStrictEqual(
			accounts.map((a) => spec.isSatisfiedBy(a)),
			[false, false, false, true]
		);
	});

	await t.test("or requires either child", () => {
		const spec = adult.or(active);
		assert.deepStrictEqual(
			accounts.map((a) => spec.isSatisfiedBy(a)),
			[false, true, true, true]
		);
	});

	await t.test("not negates its child", () => {
		const spec = adult.not();
		assert.deepStrictEqual(
			accounts.map((a) => spec.isSatisfiedBy(a)),
			[true, true, false, false]
		);
	});

	await t.test("nested trees compose structurally", () => {
		const spec = new OrSpecification(new AndSpecification(adult, active.not()), new NotSpecification(adult).and(active));
		assert.deepStrictEqual(
			accounts.map((a) => spec.isSatisfiedBy(a)),
			[false, true, true, false]
		);
	});

	await t.test("isSatisfiedBy agrees with toExpression for every candidate", () => {
		const specs: ISpecification<Account>[] = [adult.and(active), adult.or(active), adult.not(), adult.and(active.or(untranslatable)).not()];
		for (const spec of specs) {
			const expression = spec.toExpression();
			for (const account of accounts) {
				assert.strictEqual(spec.isSatisfiedBy(account), expression(account));
			}
		}
	});
});

test("Specifications - Short-circuit evaluation", async (t) => {
	await t.test("and does not evaluate the right child when the left one fails", () => {
		let calls = 0;
		const counted = new ExpressionSpecification<Account>(() => {
			calls++;
			return true;
		});
		adult.and(counted).isSatisfiedBy({ age: 5, active: true });
		assert.strictEqual(calls, 0);
	});

	await t.test("or does not evaluate the right child when the left one holds", () => {
		let calls = 0;
		const counted = new ExpressionSpecification<Account>(() => {
			calls++;
			return false;
		});
		adult.or(counted).isSatisfiedBy({ age: 40, active: false });
		assert.strictEqual(calls, 0);
	});

	await t.test("building a composite does not evaluate its children", () => {
		let calls = 0;
		const counted = new ExpressionSpecification<Account>(() => {
			calls++;
			return true;
		});
		const spec = counted.and(counted).or(counted.not());
		assert.strictEqual(calls, 0);
		spec.toExpression();
		assert.strictEqual(calls, 0);
	});
});

test("Specifications - Invalid construction", async (t) => {
	await t.test("and with a null left child throws ArgumentError", () => {
		assert.throws(
			() => new AndSpecification<Account>(null, adult),
			(error: unknown) => error instanceof ArgumentError && error.errorKey === "INVALID_ARGUMENT" && error.data?.argument === "left"
		);
	});

	await t.test("or with an undefined right child throws ArgumentError", () => {
		assert.throws(
			() => new OrSpecification<Account>(adult, undefined),
			(error: unknown) => error instanceof ArgumentError && error.data?.argument === "right"
		);
	});

	await t.test("not with a null child throws ArgumentError", () => {
		assert.throws(
			() => new NotSpecification<Account>(null),
			(error: unknown) => error instanceof ArgumentError && error.status === 400 && error.data?.argument === "inner"
		);
	});
});

test("Specifications - Query filters", async (t) => {
	await t.test("and translates to $and", () => {
		assert.deepStrictEqual(adult.and(active).toFilter(), { $and: [{ age: { $gte: 18 } }, { active: true }] });
	});

	await t.test("or translates to $or", () => {
		assert.deepStrictEqual(adult.or(active).toFilter(), { $or: [{ age: { $gte: 18 } }, { active: true }] });
	});

	await t.test("not translates to $nor", () => {
		assert.deepStrictEqual(adult.not().toFilter(), { $nor: [{ age: { $gte: 18 } }] });
	});

	await t.test("a child without translation makes the whole filter null", () => {
		assert.strictEqual(adult.and(untranslatable).toFilter(), null);
		assert.strictEqual(untranslatable.or(active).toFilter(), null);
		assert.strictEqual(untranslatable.not().toFilter(), null);
	});
});

test("Specifications - Constants", async (t) => {
	await t.test("any is satisfied by every candidate and filters nothing", () => {
		const spec = new AnySpecification<Account>();
		assert.ok(accounts.every((a) => spec.isSatisfiedBy(a)));
		assert.deepStrictEqual(spec.toFilter(), {});
	});

	await t.test("none is satisfied by no candidate", () => {
		const spec = new NoneSpecification<Account>();
		assert.ok(accounts.every((a) => !spec.isSatisfiedBy(a)));
		assert.deepStrictEqual(spec.toFilter(), { $expr: false });
	});

	await t.test("any and x behaves like x", () => {
		const spec = new AnySpecification<Account>().and(active);
		assert.deepStrictEqual(
			accounts.map((a) => spec.isSatisfiedBy(a)),
			accounts.map((a) => a.active)
		);
	});
});
