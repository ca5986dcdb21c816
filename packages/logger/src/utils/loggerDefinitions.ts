import type { LoggerScope } from './tags'

type LoggerDefinition = {
	scopes: readonly LoggerScope[]
	enabled?: boolean
}

const LOGGER_DEFINITIONS = {
	app: {
		scopes: [],
	},
	cli: {
		scopes: ['cli'],
	},
	lexer: {
		scopes: ['lexer'],
	},
	theme: {
		scopes: ['theme'],
	},
	render: {
		scopes: ['render'],
	},
} as const satisfies Record<string, LoggerDefinition>

type LoggerName = keyof typeof LOGGER_DEFINITIONS

const definitionEntries = Object.entries(LOGGER_DEFINITIONS) as [
	LoggerName,
	LoggerDefinition,
][]

export { LOGGER_DEFINITIONS, definitionEntries }
export type { LoggerDefinition, LoggerName }
