import { parseArgs } from 'node:util'
import { CliUsageError } from './errors'

export const USAGE = `Usage: codeprint <file> [options]

Render a C or C++ project as a paginated, highlighted document.

Options:
  -o, --output <file>   Output file (default: <basename>_submission.html)
  -n, --name <name>     Student name shown in the header
  -t, --title <title>   Document title
  -c, --course <course> Course shown in the header
      --theme <name>    Color theme
      --chunk-size <n>  Lines per code block
      --no-project      Convert only the given file
      --list-themes     Print the available themes and exit
  -h, --help            Show this help`

export type CliArgs = {
	file?: string
	output?: string
	name?: string
	title?: string
	course?: string
	theme?: string
	chunkSize?: number
	project: boolean
	listThemes: boolean
	help: boolean
}

const parseChunkSize = (value: string | undefined): number | undefined => {
	if (value === undefined) return undefined
	if (!/^\d+$/.test(value.trim()) || Number(value) < 1) {
		throw new CliUsageError(`--chunk-size must be a positive integer, got "${value}".`)
	}
	return Number(value)
}

const readArgv = (argv: readonly string[]) => {
	try {
		return parseArgs({
			args: [...argv],
			allowPositionals: true,
			strict: true,
			options: {
				output: { type: 'string', short: 'o' },
				name: { type: 'string', short: 'n' },
				title: { type: 'string', short: 't' },
				course: { type: 'string', short: 'c' },
				theme: { type: 'string' },
				'chunk-size': { type: 'string' },
				'no-project': { type: 'boolean', default: false },
				'list-themes': { type: 'boolean', default: false },
				help: { type: 'boolean', short: 'h', default: false },
			},
		})
	} catch (error) {
		throw new CliUsageError(error instanceof Error ? error.message : String(error))
	}
}

export const parseCliArgs = (argv: readonly string[]): CliArgs => {
	const { values, positionals } = readArgv(argv)
	if (positionals.length > 1) {
		throw new CliUsageError(`Expected one input file, got ${positionals.length}.`)
	}

	const args: CliArgs = {
		file: positionals[0],
		output: values.output,
		name: values.name,
		title: values.title,
		course: values.course,
		theme: values.theme,
		chunkSize: parseChunkSize(values['chunk-size']),
		project: !values['no-project'],
		listThemes: values['list-themes'] === true,
		help: values.help === true,
	}

	if (!args.file && !args.listThemes && !args.help) {
		throw new CliUsageError('Missing input file.')
	}

	return args
}
