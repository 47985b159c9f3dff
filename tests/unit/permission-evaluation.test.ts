/**
 * Unit Tests for permission evaluation (isGranted)
 *
 * Run: npx tsx --test tests/unit/permission-evaluation.test.ts
 */

import { test } from "node:test";
import assert from "node:assert";
import { IdentityError } from "../../src/common/types/custom-errors/IdentityError.js";
import { hostContext, tenantContext } from "../../src/services/core/IdentityManagerService/domain/tenancy.js";
import { SimpleFeatureDependency, StaticFeatureChecker } from "../../src/services/core/IdentityManagerService/domain/features.js";
import { createFixture, names, seedRole, seedUser } from "../helpers/fixtures.js";

const TENANT = 5;

async function setup() {
	const fixture = createFixture();
	await seedRole(fixture, "Manager", TENANT, ["Orders.Approve", "Reports.Export", "Audit.Read"]);
	const user = await seedUser(fixture, "ana", TENANT, ["Manager"]);
	return { fixture, user };
}

function hasErrorKey(errorKey: string) {
	return (error: unknown) => error instanceof IdentityError && error.errorKey === errorKey;
}

test("PermissionManager.isGranted - Sides", async (t) => {
	await t.test("role grant applies on the tenant side", async () => {
		const { fixture, user } = await setup();
		assert.strictEqual(await fixture.permissions.isGranted(tenantContext(TENANT), user.id, "Orders.Approve"), true);
	});

	await t.test("tenant-only permission is denied on the host side", async () => {
		const { fixture, user } = await setup();
		assert.strictEqual(await fixture.permissions.isGranted(hostContext(), user.id, "Orders.Approve"), false);
	});

	await t.test("host-only permission is denied on the tenant side even when granted", async () => {
		const { fixture, user } = await setup();
		await fixture.permissions.grantPermission(hostContext(), user, "Host.Tenants");

		assert.strictEqual(await fixture.permissions.isGranted(hostContext(), user.id, "Host.Tenants"), true);
		assert.strictEqual(await fixture.permissions.isGranted(tenantContext(TENANT), user.id, "Host.Tenants"), false);
	});

	await t.test("accepts a permission object from the catalog", async () => {
		const { fixture, user } = await setup();
		const permission = fixture.catalog.getPermission("Orders.Approve");
		assert.strictEqual(await fixture.permissions.isGranted(tenantContext(TENANT), user.id, permission), true);
	});
});

test("PermissionManager.isGranted - Explicit settings", async (t) => {
	await t.test("user prohibition overrides role grant", async () => {
		const { fixture, user } = await setup();
		await fixture.permissions.prohibitPermission(tenantContext(TENANT), user, "Orders.Approve");
		assert.strictEqual(await fixture.permissions.isGranted(tenantContext(TENANT), user.id, "Orders.Approve"), false);
	});

	await t.test("reset restores the role grant", async () => {
		const { fixture, user } = await setup();
		await fixture.permissions.prohibitPermission(tenantContext(TENANT), user, "Orders.Approve");
		await fixture.permissions.resetAllPermissions(user);
		assert.strictEqual(await fixture.permissions.isGranted(tenantContext(TENANT), user.id, "Orders.Approve"), true);
	});

	await t.test("user grant applies without any role", async () => {
		const { fixture } = await setup();
		const bob = await seedUser(fixture, "bob", TENANT);
		await fixture.permissions.grantPermission(tenantContext(TENANT), bob, "Orders.View");
		assert.strictEqual(await fixture.permissions.isGranted(tenantContext(TENANT), bob.id, "Orders.View"), true);
	});
});

test("PermissionManager.isGranted - Features", async (t) => {
	await t.test("feature dependency must be enabled for the tenant", async () => {
		const { fixture, user } = await setup();
		assert.strictEqual(await fixture.permissions.isGranted(tenantContext(TENANT), user.id, "Reports.Export"), false);

		fixture.featureChecker.setForTenant(TENANT, "Reports", true);
		assert.strictEqual(await fixture.permissions.isGranted(tenantContext(TENANT), user.id, "Reports.Export"), true);
	});

	await t.test("feature dependency is ignored on the host side", async () => {
		const { fixture, user } = await setup();
		assert.strictEqual(await fixture.permissions.isGranted(hostContext(), user.id, "Audit.Read"), true);
		assert.strictEqual(await fixture.permissions.isGranted(tenantContext(TENANT), user.id, "Audit.Read"), false);
	});

	await t.test("feature enabled for another tenant does not count", async () => {
		const { fixture, user } = await setup();
		fixture.featureChecker.setForTenant(6, "Reports", true);
		assert.strictEqual(await fixture.permissions.isGranted(tenantContext(TENANT), user.id, "Reports.Export"), false);
	});
});

test("SimpleFeatureDependency", async (t) => {
	const featureChecker = new StaticFeatureChecker(["A"]);

	await t.test("any feature is enough by default", async () => {
		const dependency = new SimpleFeatureDependency(["A", "B"]);
		assert.strictEqual(await dependency.isSatisfied({ tenantId: 1, featureChecker }), true);
	});

	await t.test("requiresAll needs every feature", async () => {
		const dependency = new SimpleFeatureDependency(["A", "B"], true);
		assert.strictEqual(await dependency.isSatisfied({ tenantId: 1, featureChecker }), false);
	});

	await t.test("tenant override disables a default feature", async () => {
		const checker = new StaticFeatureChecker(["A"]);
		checker.setForTenant(1, "A", false);
		const dependency = new SimpleFeatureDependency("A");
		assert.strictEqual(await dependency.isSatisfied({ tenantId: 1, featureChecker: checker }), false);
		assert.strictEqual(await dependency.isSatisfied({ tenantId: 2, featureChecker: checker }), true);
	});

	await t.test("an empty list is satisfied", async () => {
		const dependency = new SimpleFeatureDependency([]);
		assert.strictEqual(await dependency.isSatisfied({ tenantId: 1, featureChecker }), true);
	});
});

test("PermissionManager.isGranted - Edge cases", async (t) => {
	await t.test("unknown user is denied", async () => {
		const { fixture } = await setup();
		assert.strictEqual(await fixture.permissions.isGranted(tenantContext(TENANT), "missing-user", "Orders.View"), false);
		assert.strictEqual(await fixture.permissions.getUserPermissionCacheItem(tenantContext(TENANT), "missing-user"), null);
	});

	await t.test("unknown permission name is rejected", async () => {
		const { fixture, user } = await setup();
		await assert.rejects(fixture.permissions.isGranted(tenantContext(TENANT), user.id, "Nope.Nothing"), hasErrorKey("PERMISSION_NOT_FOUND"));
	});

	await t.test("role held from another tenant fails the lookup", async () => {
		const { fixture, user } = await setup();
		const global = await seedRole(fixture, "Global", null);
		await fixture.stores.users.addToRole(user.id, { tenantId: null, roleId: global.id });

		await assert.rejects(fixture.permissions.isGranted(tenantContext(TENANT), user.id, "Orders.View"), hasErrorKey("ROLE_NOT_FOUND"));
	});

	await t.test("getGrantedPermissions evaluates the whole catalog", async () => {
		const { fixture, user } = await setup();
		assert.deepStrictEqual(names(await fixture.permissions.getGrantedPermissions(tenantContext(TENANT), user)), ["Orders.Approve"]);
	});
});

test("PermissionManager - Cache", async (t) => {
	await t.test("concurrent checks load the user once", async () => {
		const { fixture, user } = await setup();
		const store = fixture.stores.users;
		const findById = store.findById.bind(store);
		let calls = 0;
		store.findById = async (userId) => {
			calls++;
			return findById(userId);
		};

		const results = await Promise.all(
			Array.from({ length: 5 }, () => fixture.permissions.isGranted(tenantContext(TENANT), user.id, "Orders.Approve"))
		);

		assert.deepStrictEqual(results, [true, true, true, true, true]);
		assert.strictEqual(calls, 1);
	});

	await t.test("cache item lists roles and explicit settings", async () => {
		const { fixture, user } = await setup();
		await fixture.permissions.grantPermission(tenantContext(TENANT), user, "Orders.View");
		await fixture.permissions.prohibitPermission(tenantContext(TENANT), user, "Orders.Approve");

		const item = await fixture.permissions.getUserPermissionCacheItem(tenantContext(TENANT), user.id);
		const manager = await fixture.roles.getRoleByName("Manager", TENANT);

		assert.deepStrictEqual([...(item?.roleIds ?? [])], [manager.id]);
		assert.deepStrictEqual([...(item?.grantedPermissions ?? [])], ["Orders.View"]);
		assert.deepStrictEqual([...(item?.prohibitedPermissions ?? [])], ["Orders.Approve"]);
	});
});
