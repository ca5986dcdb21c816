import { defaultLoggerVisibility } from './definitions'

type LoggerRegistryEntry = {
	tag: string
	enabled: boolean
}

// Explicit per-tag settings. A tag without one inherits from its nearest
// ancestor (`cli:convert` → `cli`), then from the definition defaults.
const overrides = new Map<string, boolean>()
const knownTags = new Set<string>(defaultLoggerVisibility.keys())

const normalizeTag = (tag: string): string => {
	const normalized = tag.trim()
	if (!normalized) {
		throw new Error('Logger tag cannot be empty.')
	}
	return normalized
}

const ancestry = (tag: string): string[] => {
	const segments = tag.split(':')
	return segments.map((_, index) =>
		segments.slice(0, segments.length - index).join(':')
	)
}

const resolveEnabled = (tag: string): boolean | undefined => {
	for (const candidate of ancestry(tag)) {
		const value =
			overrides.get(candidate) ?? defaultLoggerVisibility.get(candidate)
		if (value !== undefined) return value
	}
	return undefined
}

const registerLoggerTag = (tag: string): string => {
	const normalized = normalizeTag(tag)
	if (resolveEnabled(normalized) === undefined) {
		throw new Error(
			`Unknown logger tag "${normalized}". Add a definition for it in packages/logger/src/utils/loggerDefinitions.ts.`
		)
	}
	knownTags.add(normalized)
	return normalized
}

const isLoggerEnabled = (tag: string): boolean =>
	resolveEnabled(normalizeTag(tag)) ?? false

/**
 * Enable or disable a tag. Children without their own setting follow it;
 * `includeChildren` also drops the settings children already have.
 */
const setLoggerEnabled = (
	tag: string,
	enabled: boolean,
	options?: { includeChildren?: boolean }
): void => {
	const normalized = registerLoggerTag(tag)
	overrides.set(normalized, enabled)

	if (!options?.includeChildren) return

	const prefix = `${normalized}:`
	for (const child of overrides.keys()) {
		if (child.startsWith(prefix)) overrides.delete(child)
	}
}

const configureLoggers = (config: Record<string, boolean>): void => {
	for (const [tag, enabled] of Object.entries(config)) {
		setLoggerEnabled(tag, enabled)
	}
}

const resetLoggerToggles = (): void => {
	overrides.clear()
}

const getRegisteredLoggers = (): LoggerRegistryEntry[] =>
	Array.from(knownTags)
		.map(tag => ({ tag, enabled: isLoggerEnabled(tag) }))
		.sort((a, b) => a.tag.localeCompare(b.tag))

export {
	configureLoggers,
	getRegisteredLoggers,
	isLoggerEnabled,
	registerLoggerTag,
	resetLoggerToggles,
	setLoggerEnabled,
}
export type { LoggerRegistryEntry }
