export { createLogger, loggers } from './utils/loggers'
export type { Logger, LoggerName } from './utils/loggers'

export {
	configureLoggers,
	getRegisteredLoggers,
	isLoggerEnabled,
	resetLoggerToggles,
	setLoggerEnabled,
} from './utils/toggles'
export type { LoggerRegistryEntry } from './utils/toggles'

export { setLogForwarder } from './utils/forwarding'
export type { LogForwarder, LogForwarderEntry } from './utils/forwarding'

export type { LoggerScope } from './utils/tags'
