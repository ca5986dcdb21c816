import {
	createConsola,
	type ConsolaInstance,
	type ConsolaOptions,
} from 'consola'
import { loggerEnv } from '../env'
import { createGatedReporter } from './forwarding'

const DEFAULT_LEVEL = loggerEnv.loggerLevel ?? (loggerEnv.isDev ? 4 : 3)

const consola = createConsola({
	level: DEFAULT_LEVEL,
	// `fancy` is read by the node build but missing from the shared option types.
	fancy: true,
} as Partial<ConsolaOptions> & { fancy: boolean })

// Tagged children copy the reporter list when created, so this has to
// happen before any `withTag` call.
consola.setReporters([createGatedReporter(consola.options.reporters)])

export { consola }
export type { ConsolaInstance }
