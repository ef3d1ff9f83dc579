import assert from 'node:assert'
import { describe, it } from 'node:test'
import {
	DIAGNOSTICS,
	DiagnosticSeverity,
	getDiagnostic,
	interpolateMessage,
	isValidDiagnosticCode,
} from '../src/index.ts'

describe('interpolateMessage', () => {
	it('should replace known placeholders', () => {
		const result = interpolateMessage('cannot redeclare {kind} `{name}`', {
			kind: 'field',
			name: 'balance',
		})
		assert.strictEqual(result, 'cannot redeclare field `balance`')
	})

	it('should leave unknown placeholders in place', () => {
		assert.strictEqual(interpolateMessage('missing {what}', { other: 'x' }), 'missing {what}')
	})

	it('should return the message unchanged without args', () => {
		assert.strictEqual(interpolateMessage('syntax error: {detail}'), 'syntax error: {detail}')
	})

	it('should render numbers and lists', () => {
		assert.strictEqual(interpolateMessage('{n} fields', { n: 3 }), '3 fields')
		assert.strictEqual(
			interpolateMessage('destroy {fields}', { fields: ['a', 'b', 'c'] }),
			'destroy a, b, c'
		)
	})

	it('should ignore braces that do not wrap a word', () => {
		assert.strictEqual(interpolateMessage('Add a body `{ … }`.', { name: 'x' }), 'Add a body `{ … }`.')
	})
})

describe('diagnostic catalog', () => {
	it('should key every definition by its own code', () => {
		for (const [key, def] of Object.entries(DIAGNOSTICS)) {
			assert.strictEqual(def.code, key)
		}
	})

	it('should look up definitions by code', () => {
		const def = getDiagnostic('LDCHECK004')
		assert.strictEqual(def.severity, DiagnosticSeverity.Error)
		assert.strictEqual(def.message, '{implementedKind} in {containerKind} cannot have an implementation')
	})

	it('should validate codes', () => {
		assert.strictEqual(isValidDiagnosticCode('LDCHECK001'), true)
		assert.strictEqual(isValidDiagnosticCode('LDCLI003'), true)
		assert.strictEqual(isValidDiagnosticCode('LDCHECK999'), false)
		assert.strictEqual(isValidDiagnosticCode('LDLINT001'), false)
	})
})
