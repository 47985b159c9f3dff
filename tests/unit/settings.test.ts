/**
 * Unit Tests for typed settings
 *
 * Run: npx tsx --test tests/unit/settings.test.ts
 */

import { test } from "node:test";
import assert from "node:assert";
import { SettingNames } from "../../src/services/core/IdentityManagerService/settings.js";
import { SettingManager, getSettingValue, readSettings } from "../../src/services/core/IdentityManagerService/domain/settings.js";

const MAX_MEMBERSHIP = SettingNames.OrganizationUnits.MaxUserMembershipCount;
const REQUIRED_LENGTH = SettingNames.PasswordComplexity.RequiredLength;

test("SettingManager - Precedence", async (t) => {
	await t.test("defaults apply when nothing is set", () => {
		const settings = new SettingManager();
		assert.strictEqual(settings.getSettingValueForApplication(MAX_MEMBERSHIP), 2147483647);
		assert.strictEqual(settings.getSettingValueForApplication(REQUIRED_LENGTH), 3);
		assert.strictEqual(settings.getSettingValueForTenant(SettingNames.UserLockOut.IsEnabled, 5), true);
	});

	await t.test("constructor defaults override the built-in ones", () => {
		const settings = new SettingManager({ [REQUIRED_LENGTH]: 6 });
		assert.strictEqual(settings.getSettingValueForApplication(REQUIRED_LENGTH), 6);
	});

	await t.test("tenant value wins over application value", () => {
		const settings = new SettingManager();
		settings.changeSettingForApplication(MAX_MEMBERSHIP, 4);
		settings.changeSettingForTenant(MAX_MEMBERSHIP, 2, 5);

		assert.strictEqual(settings.getSettingValueForTenant(MAX_MEMBERSHIP, 5), 2);
		assert.strictEqual(settings.getSettingValueForTenant(MAX_MEMBERSHIP, 6), 4);
		assert.strictEqual(settings.getSettingValueForApplication(MAX_MEMBERSHIP), 4);
	});

	await t.test("async getters return the same values", async () => {
		const settings = new SettingManager();
		settings.changeSettingForTenant(SettingNames.PasswordComplexity.RequireDigit, true, 5);

		assert.strictEqual(await settings.getSettingValueForTenantAsync(SettingNames.PasswordComplexity.RequireDigit, 5), true);
		assert.strictEqual(await settings.getSettingValueForApplicationAsync(SettingNames.PasswordComplexity.RequireDigit), false);
	});
});

test("getSettingValue", async (t) => {
	const settings = new SettingManager();
	settings.changeSettingForApplication(MAX_MEMBERSHIP, 10);
	settings.changeSettingForTenant(MAX_MEMBERSHIP, 1, 5);

	await t.test("null tenant reads the application value", async () => {
		assert.strictEqual(await getSettingValue(settings, MAX_MEMBERSHIP, null), 10);
	});

	await t.test("a tenant id reads the tenant value", async () => {
		assert.strictEqual(await getSettingValue(settings, MAX_MEMBERSHIP, 5), 1);
	});
});

test("readSettings", async (t) => {
	await t.test("keeps only known names with the right type", () => {
		const result = readSettings({
			[REQUIRED_LENGTH]: "8",
			[SettingNames.UserLockOut.IsEnabled]: false,
			Unknown: 1,
		});
		assert.deepStrictEqual(result, { "Identity.UserLockOut.IsEnabled": false });
	});

	await t.test("non-object input yields no settings", () => {
		assert.deepStrictEqual(readSettings(null), {});
		assert.deepStrictEqual(readSettings("x"), {});
	});
});
