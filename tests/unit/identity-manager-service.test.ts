/**
 * Unit Tests for IdentityManagerService wiring
 *
 * Run: npx tsx --test tests/unit/identity-manager-service.test.ts
 */

import { test } from "node:test";
import assert from "node:assert";
import IdentityManagerService from "../../src/services/core/IdentityManagerService/index.js";
import { createInMemoryStores } from "../../src/services/core/IdentityManagerService/dao/memory.js";
import { SettingNames } from "../../src/services/core/IdentityManagerService/settings.js";
import { MultiTenancySide } from "../../src/common/types/multiTenancy.js";
import { tenantContext } from "../../src/services/core/IdentityManagerService/domain/tenancy.js";
import { createCatalog } from "../helpers/fixtures.js";

const REQUIRED_LENGTH = SettingNames.PasswordComplexity.RequiredLength;

function createService(options: { configPath?: string; config?: unknown } = {}) {
	return new IdentityManagerService({ catalog: createCatalog(), stores: createInMemoryStores(), ...options });
}

test("IdentityManagerService - Lifecycle", async (t) => {
	await t.test("managers are unavailable before start", () => {
		const service = createService();
		assert.throws(() => service.users, /IdentityManagerService no está iniciado/);
		assert.throws(() => service.permissions, /IdentityManagerService no está iniciado/);
	});

	await t.test("managers are unavailable after stop", async () => {
		const service = createService();
		await service.start();
		assert.ok(service.roles);

		await service.stop();
		assert.throws(() => service.roles, /IdentityManagerService no está iniciado/);
	});
});

test("IdentityManagerService - Configuration", async (t) => {
	await t.test("reads config.json beside the service", async () => {
		const service = createService();
		await service.start();
		assert.strictEqual(service.settings.getSettingValueForApplication(REQUIRED_LENGTH), 6);
		await service.stop();
	});

	await t.test("falls back to defaults when the config file is missing", async () => {
		const service = createService({ configPath: "/nonexistent/identity/config.json" });
		await service.start();
		assert.strictEqual(service.settings.getSettingValueForApplication(REQUIRED_LENGTH), 3);
		await service.stop();
	});

	await t.test("options override the config file", async () => {
		const service = createService({ config: { multiTenancy: { isEnabled: false }, settings: { [REQUIRED_LENGTH]: 10 } } });
		await service.start();

		const resolved = service.tenancy.resolve({ unitOfWork: { tenantId: null }, session: { tenantId: null, multiTenancySide: MultiTenancySide.HOST } });
		assert.deepStrictEqual(resolved, { tenantId: null, side: MultiTenancySide.TENANT });
		assert.strictEqual(service.settings.getSettingValueForApplication(REQUIRED_LENGTH), 10);
		await service.stop();
	});

	await t.test("values of the wrong type are ignored", async () => {
		const service = createService({ config: { multiTenancy: { isEnabled: "no" }, settings: { [REQUIRED_LENGTH]: "10" } } });
		await service.start();

		const resolved = service.tenancy.resolve({ unitOfWork: { tenantId: null }, session: { tenantId: null, multiTenancySide: MultiTenancySide.HOST } });
		assert.strictEqual(resolved.side, MultiTenancySide.HOST);
		assert.strictEqual(service.settings.getSettingValueForApplication(REQUIRED_LENGTH), 6);
		await service.stop();
	});
});

test("IdentityManagerService - Facade", async (t) => {
	await t.test("role and user created in a tenant drive permission checks", async () => {
		const service = createService();
		await service.start();
		const ctx = tenantContext(5);

		const role = await service.createRole(ctx, { name: "Manager" });
		const user = await service.createUser(ctx, { userName: "ana", emailAddress: "ana@example.com" });
		assert.strictEqual(role.tenantId, 5);
		assert.strictEqual((await service.addToRole(user, "Manager")).succeeded, true);

		assert.strictEqual(await service.isGranted(ctx, user.id, "Orders.Approve"), false);
		await service.roles.grantPermission(role, "Orders.Approve");
		assert.strictEqual(await service.isGranted(ctx, user.id, "Orders.Approve"), true);
		await service.stop();
	});

	await t.test("changePassword applies the settings of the user's tenant", async () => {
		const service = createService();
		await service.start();
		const user = await service.createUser(tenantContext(5), { userName: "ana", emailAddress: "ana@example.com" });

		assert.strictEqual((await service.changePassword(user, "abc")).succeeded, false);
		assert.strictEqual((await service.changePassword(user, "abcdef")).succeeded, true);
		await service.stop();
	});
});
