import {
	INNER_EXACT_ROLES,
	INNER_ROLE_PREFIXES,
	isRoleSettingKey,
	OUTER_EXACT_ROLES,
	OUTER_ROLE_PREFIXES,
	type RoleLiterals,
	type RoleSettings,
	type RoleSettingsSource,
} from "./settings"

/**
 * Which member roles count as outer or inner. Values are frozen; build a new one
 * to change the rules.
 */
export interface RoleMatcherConfig {
	readonly outerExactRoles: readonly string[]
	readonly outerRolePrefixes: readonly string[]
	readonly innerExactRoles: readonly string[]
	readonly innerRolePrefixes: readonly string[]
}

export const DEFAULT_ROLE_MATCHER_CONFIG: RoleMatcherConfig = freezeConfig({
	outerExactRoles: ["outer"],
	outerRolePrefixes: [],
	innerExactRoles: ["inner"],
	innerRolePrefixes: [],
})

/**
 * Drop null entries, trim, and remove duplicates keeping first-seen order.
 */
export function normalizeRoles(literals: RoleLiterals): string[] {
	const roles: string[] = []
	for (const literal of literals) {
		if (literal == null) continue
		const role = literal.trim()
		if (!roles.includes(role)) roles.push(role)
	}
	return roles
}

/**
 * Build a config. Missing or empty lists keep their default; a non-empty list
 * replaces the default entirely.
 */
export function createRoleMatcherConfig(
	lists: Partial<Record<keyof RoleMatcherConfig, RoleLiterals>> = {},
): RoleMatcherConfig {
	const pick = (key: keyof RoleMatcherConfig) => {
		const literals = lists[key]
		return literals && literals.length > 0
			? normalizeRoles(literals)
			: [...DEFAULT_ROLE_MATCHER_CONFIG[key]]
	}
	return freezeConfig({
		outerExactRoles: pick("outerExactRoles"),
		outerRolePrefixes: pick("outerRolePrefixes"),
		innerExactRoles: pick("innerExactRoles"),
		innerRolePrefixes: pick("innerRolePrefixes"),
	})
}

/**
 * Read a config snapshot from a settings source.
 */
export function roleMatcherConfigFromSettings(
	source: RoleSettingsSource,
): RoleMatcherConfig {
	return createRoleMatcherConfig({
		outerExactRoles: source.getCollection(OUTER_EXACT_ROLES),
		outerRolePrefixes: source.getCollection(OUTER_ROLE_PREFIXES),
		innerExactRoles: source.getCollection(INNER_EXACT_ROLES),
		innerRolePrefixes: source.getCollection(INNER_ROLE_PREFIXES),
	})
}

/**
 * Decides whether a member role denotes an outer or an inner ring.
 *
 * The config is swapped as a whole on `reload`, and each query reads it once,
 * so a query never mixes old and new rules.
 */
export class RoleMatcher {
	private config: RoleMatcherConfig

	constructor(config: RoleMatcherConfig = DEFAULT_ROLE_MATCHER_CONFIG) {
		this.config = config
	}

	get snapshot(): RoleMatcherConfig {
		return this.config
	}

	reload(config: RoleMatcherConfig) {
		this.config = config
	}

	isOuterRole(role: string | null | undefined): boolean {
		const config = this.config
		return matchRole(role, config.outerExactRoles, config.outerRolePrefixes)
	}

	isInnerRole(role: string | null | undefined): boolean {
		const config = this.config
		return matchRole(role, config.innerExactRoles, config.innerRolePrefixes)
	}
}

/**
 * Load the matcher from `settings` now and again whenever a role setting changes.
 * Returns a function that stops watching.
 */
export function watchRoleSettings(
	settings: RoleSettings,
	matcher: RoleMatcher,
): () => void {
	matcher.reload(roleMatcherConfigFromSettings(settings))
	return settings.onChange((key) => {
		if (isRoleSettingKey(key)) {
			matcher.reload(roleMatcherConfigFromSettings(settings))
		}
	})
}

function matchRole(
	role: string | null | undefined,
	exactRoles: readonly string[],
	prefixes: readonly string[],
) {
	if (role == null) return false
	if (exactRoles.includes(role)) return true
	return prefixes.some((prefix) => role.startsWith(prefix))
}

function freezeConfig(config: RoleMatcherConfig): RoleMatcherConfig {
	return Object.freeze({
		outerExactRoles: Object.freeze([...config.outerExactRoles]),
		outerRolePrefixes: Object.freeze([...config.outerRolePrefixes]),
		innerExactRoles: Object.freeze([...config.innerExactRoles]),
		innerRolePrefixes: Object.freeze([...config.innerRolePrefixes]),
	})
}
