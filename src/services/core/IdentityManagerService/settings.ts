/**
 * Nombres de los ajustes que consume el núcleo de identidad
 */
export const SettingNames = {
	OrganizationUnits: {
		MaxUserMembershipCount: "Identity.OrganizationUnits.MaxUserMembershipCount",
	},
	UserLockOut: {
		IsEnabled: "Identity.UserLockOut.IsEnabled",
		DefaultAccountLockoutSeconds: "Identity.UserLockOut.DefaultAccountLockoutSeconds",
		MaxFailedAccessAttemptsBeforeLockout: "Identity.UserLockOut.MaxFailedAccessAttemptsBeforeLockout",
	},
	PasswordComplexity: {
		RequireDigit: "Identity.PasswordComplexity.RequireDigit",
		RequireLowercase: "Identity.PasswordComplexity.RequireLowercase",
		RequireNonAlphanumeric: "Identity.PasswordComplexity.RequireNonAlphanumeric",
		RequireUppercase: "Identity.PasswordComplexity.RequireUppercase",
		RequiredLength: "Identity.PasswordComplexity.RequiredLength",
	},
} as const;

export interface IdentitySettings {
	"Identity.OrganizationUnits.MaxUserMembershipCount": number;
	"Identity.UserLockOut.IsEnabled": boolean;
	"Identity.UserLockOut.DefaultAccountLockoutSeconds": number;
	"Identity.UserLockOut.MaxFailedAccessAttemptsBeforeLockout": number;
	"Identity.PasswordComplexity.RequireDigit": boolean;
	"Identity.PasswordComplexity.RequireLowercase": boolean;
	"Identity.PasswordComplexity.RequireNonAlphanumeric": boolean;
	"Identity.PasswordComplexity.RequireUppercase": boolean;
	"Identity.PasswordComplexity.RequiredLength": number;
}

export type SettingName = keyof IdentitySettings;

export const DEFAULT_SETTINGS: IdentitySettings = {
	"Identity.OrganizationUnits.MaxUserMembershipCount": 2147483647,
	"Identity.UserLockOut.IsEnabled": true,
	"Identity.UserLockOut.DefaultAccountLockoutSeconds": 300,
	"Identity.UserLockOut.MaxFailedAccessAttemptsBeforeLockout": 5,
	"Identity.PasswordComplexity.RequireDigit": false,
	"Identity.PasswordComplexity.RequireLowercase": false,
	"Identity.PasswordComplexity.RequireNonAlphanumeric": false,
	"Identity.PasswordComplexity.RequireUppercase": false,
	"Identity.PasswordComplexity.RequiredLength": 3,
};

export const SETTING_NAMES: readonly SettingName[] = [
	SettingNames.OrganizationUnits.MaxUserMembershipCount,
	SettingNames.UserLockOut.IsEnabled,
	SettingNames.UserLockOut.DefaultAccountLockoutSeconds,
	SettingNames.UserLockOut.MaxFailedAccessAttemptsBeforeLockout,
	SettingNames.PasswordComplexity.RequireDigit,
	SettingNames.PasswordComplexity.RequireLowercase,
	SettingNames.PasswordComplexity.RequireNonAlphanumeric,
	SettingNames.PasswordComplexity.RequireUppercase,
	SettingNames.PasswordComplexity.RequiredLength,
];

export function isSettingValue<K extends SettingName>(name: K, value: unknown): value is IdentitySettings[K] {
	return typeof value === typeof DEFAULT_SETTINGS[name];
}
