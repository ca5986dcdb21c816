export class UnknownThemeError extends Error {
	readonly themeName: string
	readonly availableThemes: readonly string[]

	constructor(themeName: string, availableThemes: readonly string[]) {
		super(
			[
				`Unknown theme: ${themeName}.`,
				`Available themes: ${availableThemes.join(', ')}`,
			].join(' ')
		)
		this.name = 'UnknownThemeError'
		this.themeName = themeName
		this.availableThemes = availableThemes
	}
}

export const isUnknownThemeError = (error: unknown): error is UnknownThemeError =>
	error instanceof UnknownThemeError
