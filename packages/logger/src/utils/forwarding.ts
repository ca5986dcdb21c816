import type { ConsolaReporter, LogObject } from 'consola'
import { DEFAULT_SCOPE } from './tags'
import { isLoggerEnabled } from './toggles'

type LogForwarderEntry = {
	tag: string
	level: LogObject['type']
	args: unknown[]
}

type LogForwarder = (entry: LogForwarderEntry) => void

let logForwarder: LogForwarder | undefined

/**
 * Wrap the output reporters so disabled tags are dropped and every
 * emitted entry is offered to the forwarder first.
 *
 * A forwarder that throws surfaces at the log call.
 */
const createGatedReporter = (
	reporters: readonly ConsolaReporter[]
): ConsolaReporter => ({
	log(logObj, ctx) {
		const tag = logObj.tag || DEFAULT_SCOPE
		if (!isLoggerEnabled(tag)) return

		logForwarder?.({ tag, level: logObj.type, args: logObj.args })

		for (const reporter of reporters) {
			reporter.log(logObj, ctx)
		}
	},
})

const setLogForwarder = (forwarder?: LogForwarder) => {
	logForwarder = forwarder
}

export { createGatedReporter, setLogForwarder }
export type { LogForwarder, LogForwarderEntry }
