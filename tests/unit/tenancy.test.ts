/**
 * Unit Tests for tenant/side resolution
 *
 * Run: npx tsx --test tests/unit/tenancy.test.ts
 */

import { test } from "node:test";
import assert from "node:assert";
import { MultiTenancySide, hasFlags, sideName } from "../../src/common/types/multiTenancy.js";
import { TenantContextResolver, hostContext, tenantContext } from "../../src/services/core/IdentityManagerService/domain/tenancy.js";

test("TenantContextResolver - Unit of work", async (t) => {
	await t.test("null tenant resolves to host when multi-tenancy is enabled", () => {
		const resolver = new TenantContextResolver(true);
		const resolved = resolver.resolve({
			unitOfWork: { tenantId: null },
			session: { tenantId: 9, multiTenancySide: MultiTenancySide.TENANT },
		});
		assert.deepStrictEqual(resolved, { tenantId: null, side: MultiTenancySide.HOST });
	});

	await t.test("a tenant id resolves to tenant side", () => {
		const resolver = new TenantContextResolver(true);
		const resolved = resolver.resolve({
			unitOfWork: { tenantId: 5 },
			session: { tenantId: null, multiTenancySide: MultiTenancySide.HOST },
		});
		assert.deepStrictEqual(resolved, { tenantId: 5, side: MultiTenancySide.TENANT });
	});

	await t.test("null tenant resolves to tenant side when multi-tenancy is disabled", () => {
		const resolver = new TenantContextResolver(false);
		const resolved = resolver.resolve({
			unitOfWork: { tenantId: null },
			session: { tenantId: null, multiTenancySide: MultiTenancySide.HOST },
		});
		assert.deepStrictEqual(resolved, { tenantId: null, side: MultiTenancySide.TENANT });
	});
});

test("TenantContextResolver - Session", async (t) => {
	const resolver = new TenantContextResolver(true);

	await t.test("without a unit of work the session values are used", () => {
		const resolved = resolver.resolve({ session: { tenantId: 3, multiTenancySide: MultiTenancySide.HOST } });
		assert.deepStrictEqual(resolved, { tenantId: 3, side: MultiTenancySide.HOST });
	});

	await t.test("hostContext resolves to host with no tenant", () => {
		assert.deepStrictEqual(resolver.resolve(hostContext()), { tenantId: null, side: MultiTenancySide.HOST });
	});

	await t.test("tenantContext resolves to the given tenant", () => {
		assert.deepStrictEqual(resolver.resolve(tenantContext(7)), { tenantId: 7, side: MultiTenancySide.TENANT });
		assert.strictEqual(resolver.getCurrentTenantId(tenantContext(7)), 7);
	});
});

test("MultiTenancySide flags", async (t) => {
	await t.test("ALL contains both sides", () => {
		assert.strictEqual(hasFlags(MultiTenancySide.ALL, MultiTenancySide.HOST), true);
		assert.strictEqual(hasFlags(MultiTenancySide.ALL, MultiTenancySide.TENANT), true);
	});

	await t.test("a single side does not contain the other", () => {
		assert.strictEqual(hasFlags(MultiTenancySide.TENANT, MultiTenancySide.HOST), false);
		assert.strictEqual(hasFlags(MultiTenancySide.HOST, MultiTenancySide.TENANT), false);
	});

	await t.test("sideName labels each value", () => {
		assert.strictEqual(sideName(MultiTenancySide.HOST), "Host");
		assert.strictEqual(sideName(MultiTenancySide.TENANT), "Tenant");
		assert.strictEqual(sideName(MultiTenancySide.ALL), "Host|Tenant");
		assert.strictEqual(sideName(MultiTenancySide.NONE), "None");
	});
});
