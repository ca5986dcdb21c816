import { describe, expect, it } from 'vitest'
import { consola } from './consola'

describe('consola', () => {
	it('starts at the environment level with only the gated reporter', () => {
		expect(consola.level).toBe(3)
		expect(consola.options.reporters).toHaveLength(1)
	})
})
