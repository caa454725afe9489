/**
 * Role configuration store.
 *
 * Holds named string collections and notifies listeners when one changes.
 * Values are validated when loaded from an untyped record (e.g. parsed JSON).
 *
 * @module
 */

/** Roles that mark a member as part of an outer ring. Default `["outer"]`. */
export const OUTER_EXACT_ROLES = "outer-exact-roles"
/** Role prefixes that mark a member as outer. Default empty. */
export const OUTER_ROLE_PREFIXES = "outer-role-prefixes"
/** Roles that mark a member as part of an inner ring. Default `["inner"]`. */
export const INNER_EXACT_ROLES = "inner-exact-roles"
/** Role prefixes that mark a member as inner. Default empty. */
export const INNER_ROLE_PREFIXES = "inner-role-prefixes"

export const ROLE_SETTING_KEYS = [
	OUTER_EXACT_ROLES,
	OUTER_ROLE_PREFIXES,
	INNER_EXACT_ROLES,
	INNER_ROLE_PREFIXES,
] as const

export type RoleSettingKey = (typeof ROLE_SETTING_KEYS)[number]

export type RoleLiterals = readonly (string | null | undefined)[]

export interface RoleSettingsSource {
	getCollection(key: RoleSettingKey): RoleLiterals | undefined
}

export interface SettingChangedDetail {
	key: string
}

export function isRoleSettingKey(key: string): key is RoleSettingKey {
	return ROLE_SETTING_KEYS.some((roleKey) => roleKey === key)
}

export class RoleSettings extends EventTarget implements RoleSettingsSource {
	private values = new Map<string, RoleLiterals>()

	/**
	 * Load settings from a plain object. Every value must be a list of strings
	 * (null entries are allowed and dropped later).
	 */
	static fromRecord(record: Record<string, unknown>): RoleSettings {
		const settings = new RoleSettings()
		for (const [key, value] of Object.entries(record)) {
			if (
				!Array.isArray(value) ||
				!value.every(
					(entry): entry is string | null =>
						entry === null || typeof entry === "string",
				)
			) {
				throw Error(`Setting "${key}" must be a list of strings`)
			}
			settings.values.set(key, [...value])
		}
		return settings
	}

	getCollection(key: string): RoleLiterals | undefined {
		return this.values.get(key)
	}

	set(key: string, values: RoleLiterals) {
		this.values.set(key, [...values])
		this.changed(key)
	}

	delete(key: string) {
		if (this.values.delete(key)) this.changed(key)
	}

	/**
	 * Subscribe to changes. Returns a function that removes the listener.
	 */
	onChange(listener: (key: string) => void): () => void {
		const handler = (event: Event) => {
			if (event instanceof CustomEvent) {
				listener((event as CustomEvent<SettingChangedDetail>).detail.key)
			}
		}
		this.addEventListener("change", handler)
		return () => this.removeEventListener("change", handler)
	}

	private changed(key: string) {
		this.dispatchEvent(
			new CustomEvent<SettingChangedDetail>("change", { detail: { key } }),
		)
	}
}
