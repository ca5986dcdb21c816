import {
	LOGGER_DEFINITIONS,
	definitionEntries,
	type LoggerDefinition,
	type LoggerName,
} from './loggerDefinitions'
import { buildTag } from './tags'

const defaultLoggerVisibility = new Map<string, boolean>()

for (const [name, definition] of definitionEntries) {
	const tag = buildTag(definition.scopes)
	if (defaultLoggerVisibility.has(tag)) {
		throw new Error(
			`Logger "${name}" reuses the scope "${tag}". Give every definition its own scope.`
		)
	}
	defaultLoggerVisibility.set(tag, definition.enabled ?? true)
}

export { LOGGER_DEFINITIONS, definitionEntries, defaultLoggerVisibility }
export type { LoggerDefinition, LoggerName }
