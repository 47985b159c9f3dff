import { IdentityError } from "../../../../common/types/custom-errors/IdentityError.js";
import type { ILogger } from "../../../../interfaces/utils/ILogger.js";
import { SettingNames } from "../settings.js";
import type { User } from "./user.js";
import type { OrganizationUnit } from "./organization-unit.js";
import { getSettingValue } from "./settings.js";
import {
	membershipInUnit,
	membershipInUnits,
	membershipOfUser,
	organizationUnitCodeStartsWith,
	organizationUnitIdIn,
	organizationUnitInTenant,
	userIdIn,
} from "./specifications.js";
import { generateId } from "../utils/crypto.js";
import type { IOrganizationUnitStore, ISettingProvider, IUserOrganizationUnitStore, IUserStore } from "../types.js";

export type UserRef = User | string;
export type OrganizationUnitRef = OrganizationUnit | string;

/**
 * OrganizationUnitManager - Membresías de usuarios en unidades organizativas
 *
 * El límite de membresías por usuario se comprueba antes de insertar y sin
 * transacción: altas concurrentes pueden superarlo momentáneamente.
 */
export class OrganizationUnitManager {
	constructor(
		private readonly userStore: IUserStore,
		private readonly organizationUnitStore: IOrganizationUnitStore,
		private readonly membershipStore: IUserOrganizationUnitStore,
		private readonly settings: ISettingProvider,
		private readonly logger: ILogger
	) {}

	async isInOrganizationUnit(userRef: UserRef, organizationUnitRef: OrganizationUnitRef): Promise<boolean> {
		const user = await this.#resolveUser(userRef);
		const organizationUnit = await this.#resolveOrganizationUnit(organizationUnitRef);
		return (await this.membershipStore.count(membershipOfUser(user.id).and(membershipInUnit(organizationUnit.id)))) > 0;
	}

	/**
	 * Añade el usuario a la unidad. No hace nada si ya es miembro.
	 */
	async addToOrganizationUnit(userRef: UserRef, organizationUnitRef: OrganizationUnitRef): Promise<void> {
		const user = await this.#resolveUser(userRef);
		const organizationUnit = await this.#resolveOrganizationUnit(organizationUnitRef);

		const currentIds = await this.#getMembershipUnitIds(user.id);
		if (currentIds.includes(organizationUnit.id)) return;

		await this.#checkMaxUserMembershipCount(user.tenantId, currentIds.length + 1);

		try {
			await this.membershipStore.insert({
				id: generateId(),
				tenantId: user.tenantId,
				userId: user.id,
				organizationUnitId: organizationUnit.id,
				createdAt: new Date(),
			});
		} catch (error) {
			// Un alta concurrente del mismo par ya lo dejó como miembro
			if (error instanceof IdentityError && error.errorKey === "USER_ALREADY_IN_ORGANIZATION_UNIT") return;
			throw error;
		}
		this.logger.logDebug(`Usuario ${user.userName} añadido a la unidad ${organizationUnit.code}`);
	}

	async removeFromOrganizationUnit(userRef: UserRef, organizationUnitRef: OrganizationUnitRef): Promise<void> {
		const user = await this.#resolveUser(userRef);
		const organizationUnit = await this.#resolveOrganizationUnit(organizationUnitRef);

		const removed = await this.membershipStore.delete(membershipOfUser(user.id).and(membershipInUnit(organizationUnit.id)));
		if (removed > 0) {
			this.logger.logDebug(`Usuario ${user.userName} retirado de la unidad ${organizationUnit.code}`);
		}
	}

	/**
	 * Deja al usuario exactamente en las unidades indicadas (null = ninguna).
	 * El límite se comprueba con el número final de unidades antes de tocar nada.
	 */
	async setOrganizationUnits(userRef: UserRef, organizationUnitIds: readonly string[] | null | undefined): Promise<void> {
		const targetIds = [...new Set(organizationUnitIds ?? [])];
		const user = await this.#resolveUser(userRef);

		await this.#checkMaxUserMembershipCount(user.tenantId, targetIds.length);

		const currentIds = await this.#getMembershipUnitIds(user.id);

		for (const currentId of currentIds) {
			if (!targetIds.includes(currentId)) {
				await this.removeFromOrganizationUnit(user, currentId);
			}
		}

		for (const targetId of targetIds) {
			if (!currentIds.includes(targetId)) {
				await this.addToOrganizationUnit(user, targetId);
			}
		}
	}

	async getOrganizationUnits(userRef: UserRef): Promise<OrganizationUnit[]> {
		const user = await this.#resolveUser(userRef);
		const ids = await this.#getMembershipUnitIds(user.id);
		if (ids.length === 0) return [];
		return this.organizationUnitStore.findAll(organizationUnitIdIn(ids));
	}

	/**
	 * Miembros de la unidad. Con `includeChildren` también los de sus
	 * descendientes (unidades del mismo tenant cuyo código empieza por el suyo).
	 * Cada usuario aparece una sola vez.
	 */
	async getUsersInOrganizationUnit(organizationUnitRef: OrganizationUnitRef, includeChildren = false): Promise<User[]> {
		const organizationUnit = await this.#resolveOrganizationUnit(organizationUnitRef);

		let unitIds = [organizationUnit.id];
		if (includeChildren) {
			const units = await this.organizationUnitStore.findAll(
				organizationUnitCodeStartsWith(organizationUnit.code).and(organizationUnitInTenant(organizationUnit.tenantId))
			);
			unitIds = units.map((ou) => ou.id);
		}

		const memberships = await this.membershipStore.findAll(includeChildren ? membershipInUnits(unitIds) : membershipInUnit(organizationUnit.id));
		const userIds = [...new Set(memberships.map((m) => m.userId))];
		if (userIds.length === 0) return [];
		return this.userStore.findAll(userIdIn(userIds));
	}

	async #getMembershipUnitIds(userId: string): Promise<string[]> {
		const memberships = await this.membershipStore.findAll(membershipOfUser(userId));
		return memberships.map((m) => m.organizationUnitId);
	}

	async #checkMaxUserMembershipCount(tenantId: number | null, requestedCount: number): Promise<void> {
		const maxCount = await getSettingValue(this.settings, SettingNames.OrganizationUnits.MaxUserMembershipCount, tenantId);
		if (requestedCount > maxCount) {
			throw new IdentityError(
				422,
				"MAX_ORGANIZATION_UNIT_MEMBERSHIP_EXCEEDED",
				`Un usuario no puede pertenecer a más de ${maxCount} unidades organizativas`,
				{ maxCount }
			);
		}
	}

	async #resolveUser(userRef: UserRef): Promise<User> {
		if (typeof userRef !== "string") return userRef;
		const user = await this.userStore.findById(userRef);
		if (!user) {
			throw new IdentityError(404, "USER_NOT_FOUND", `Usuario ${userRef} no encontrado`, { userId: userRef });
		}
		return user;
	}

	#resolveOrganizationUnit(organizationUnitRef: OrganizationUnitRef): Promise<OrganizationUnit> {
		return typeof organizationUnitRef === "string" ? this.organizationUnitStore.get(organizationUnitRef) : Promise.resolve(organizationUnitRef);
	}
}
