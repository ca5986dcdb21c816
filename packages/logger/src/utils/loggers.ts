import { consola, type ConsolaInstance } from './consola'
import { definitionEntries, type LoggerName } from './definitions'
import { buildTag, type LoggerScope } from './tags'
import { registerLoggerTag } from './toggles'

type Logger = ConsolaInstance

const instances = new Map<string, Logger>()

/**
 * Logger for a scope path. Instances are shared per tag.
 */
const createLogger = (...scopes: LoggerScope[]): Logger => {
	const tag = registerLoggerTag(buildTag(scopes))

	const existing = instances.get(tag)
	if (existing) return existing

	const instance = consola.withTag(tag)
	instances.set(tag, instance)
	return instance
}

const loggers: Readonly<Record<LoggerName, Logger>> = Object.freeze(
	Object.fromEntries(
		definitionEntries.map(([name, definition]) => [
			name,
			createLogger(...definition.scopes),
		])
	) as Record<LoggerName, Logger>
)

export { createLogger, loggers }
export type { Logger, LoggerName }
