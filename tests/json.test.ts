import { describe, expect, it } from 'vitest'
import { classify } from '../src/core/comment.ts'
import { classificationFromJson, classificationToJson } from '../src/core/json.ts'
import type { Classification } from '../src/types.ts'

describe('json', () => {
	describe('classificationToJson', () => {
		it('should serialize a classification', () => {
			const classification: Classification = {
				description: 'some fix.',
				change: { type: 'fix', breaking: false },
			}

			expect(classificationToJson(classification)).toEqual({
				ok: true,
				value: '{"comment":"some fix.","semantic_type":{"Fix":{"is_breaking":false}}}',
			})
		})

		it('should name each change type', () => {
			const names = [
				['feat! x', 'Feature'],
				['fix: x', 'Fix'],
				['refact: x', 'Refactoring'],
			]

			for (const [comment, name] of names) {
				const classified = classify(comment)
				if (!classified.ok) throw new Error(`unexpected failure for ${comment}`)
				const json = classificationToJson(classified.value)

				expect(json.ok && Object.keys(JSON.parse(json.value).semantic_type)).toEqual([name])
			}
		})

		it('should indent with tabs when pretty', () => {
			const classification: Classification = {
				description: 'breaking change feature.',
				change: { type: 'feature', breaking: true },
			}

			expect(classificationToJson(classification, { pretty: true })).toEqual({
				ok: true,
				value:
					'{\n\t"comment": "breaking change feature.",\n\t"semantic_type": {\n\t\t"Feature": {\n\t\t\t"is_breaking": true\n\t\t}\n\t}\n}',
			})
		})
	})

	describe('classificationFromJson', () => {
		it('should parse a serialized classification', () => {
			expect(
				classificationFromJson('{"comment":"tidy up","semantic_type":{"Refactoring":{"is_breaking":true}}}')
			).toEqual({
				ok: true,
				value: { description: 'tidy up', change: { type: 'refactoring', breaking: true } },
			})
		})

		it('should leave a classification unchanged after a round trip', () => {
			const classification: Classification = {
				description: 'handle "quoted": values!',
				change: { type: 'feature', breaking: false },
			}
			const json = classificationToJson(classification)
			if (!json.ok) throw new Error('serialization failed')

			expect(classificationFromJson(json.value)).toEqual({ ok: true, value: classification })
		})

		it('should fail on invalid JSON', () => {
			const result = classificationFromJson('not json')

			expect(result.ok).toBe(false)
			expect(!result.ok && result.error.code).toBe('SERIALIZATION_ERROR')
		})

		it('should fail on a wrong shape', () => {
			expect(classificationFromJson('[]')).toEqual({
				ok: false,
				error: { code: 'SERIALIZATION_ERROR', reason: 'expected "comment" and "semantic_type"' },
			})
			expect(classificationFromJson('{"comment":"x","semantic_type":{}}')).toEqual({
				ok: false,
				error: { code: 'SERIALIZATION_ERROR', reason: 'expected exactly one semantic type' },
			})
			expect(
				classificationFromJson(
					'{"comment":"x","semantic_type":{"Fix":{"is_breaking":true},"Feature":{"is_breaking":true}}}'
				)
			).toEqual({
				ok: false,
				error: { code: 'SERIALIZATION_ERROR', reason: 'expected exactly one semantic type' },
			})
		})

		it('should fail on an unknown semantic type', () => {
			expect(
				classificationFromJson('{"comment":"x","semantic_type":{"Chore":{"is_breaking":false}}}')
			).toEqual({
				ok: false,
				error: { code: 'SERIALIZATION_ERROR', reason: 'unknown semantic type "Chore"' },
			})
		})

		it('should fail without breaking flag', () => {
			expect(classificationFromJson('{"comment":"x","semantic_type":{"Fix":{}}}')).toEqual({
				ok: false,
				error: { code: 'SERIALIZATION_ERROR', reason: '"Fix" is missing "is_breaking"' },
			})
		})
	})
})
