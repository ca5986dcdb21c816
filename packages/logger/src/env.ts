import { z } from 'zod'

type EnvRecord = Record<string, string | undefined>

const parseLevel = (value: unknown): number | undefined => {
	if (typeof value === 'number') return value
	if (typeof value === 'string' && value.trim().length > 0) {
		const parsed = Number.parseInt(value, 10)
		return Number.isNaN(parsed) ? undefined : parsed
	}
	return undefined
}

const envSchema = z.object({
	LOGGER_LEVEL: z
		.preprocess(parseLevel, z.number().int().min(0).max(5))
		.optional(),
	NODE_ENV: z.enum(['development', 'production', 'test']).optional(),
})

export const readLoggerEnv = (source: EnvRecord) => {
	const result = envSchema.safeParse(source)
	if (!result.success) {
		throw new Error(z.prettifyError(result.error))
	}

	const nodeEnv = result.data.NODE_ENV ?? 'development'

	return {
		nodeEnv,
		isDev: nodeEnv === 'development',
		loggerLevel: result.data.LOGGER_LEVEL,
	}
}

export const loggerEnv = readLoggerEnv(process.env)

export type LoggerEnv = typeof loggerEnv
