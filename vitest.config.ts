import { defineConfig } from 'vitest/config'

const workspaces = [
	'packages/lexer',
	'packages/logger',
	'packages/theme',
	'packages/render',
	'apps/cli',
]

export default defineConfig({
	test: {
		projects: workspaces.map((root) => ({
			extends: true,
			test: {
				name: root.split('/')[1],
				include: [`${root}/src/**/*.test.ts`],
				exclude: ['**/node_modules/**'],
				environment: 'node',
			},
		})),
	},
})
