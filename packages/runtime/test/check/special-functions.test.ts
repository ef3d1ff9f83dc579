import assert from 'node:assert'
import { describe, it } from 'node:test'
import { analyzeSource, codes, onlyDiagnostic, summaries, summarize } from '../helpers.ts'

describe('check/special-functions', () => {
	describe('initializers', () => {
		it('should report every initializer after the first', () => {
			const source = 'pub struct S {\n    init() {}\n    init() {}\n    init() {}\n}'
			assert.deepStrictEqual(summaries(analyzeSource(source)), [
				{ code: 'LDCHECK011', column: 5, line: 3, message: 'struct `S` cannot have more than one initializer' },
				{ code: 'LDCHECK011', column: 5, line: 4, message: 'struct `S` cannot have more than one initializer' },
			])
		})

		it('should report fields the initializer leaves unset', () => {
			const source = [
				'pub struct Point {',
				'    pub let x: Int',
				'    pub let y: Int',
				'    pub let label: String?',
				'    init(x: Int) {',
				'        self.x = x',
				'    }',
				'}',
			].join('\n')
			assert.deepStrictEqual(summaries(analyzeSource(source)), [
				{ code: 'LDCHECK009', column: 5, line: 5, message: 'field `y` is not initialized in initializer' },
			])
		})

		it('should require an initializer when there are fields', () => {
			assert.deepStrictEqual(summaries(analyzeSource('pub struct Point {\n    pub let x: Int\n}')), [
				{ code: 'LDCHECK010', column: 12, line: 1, message: 'missing initializer for struct `Point`' },
			])
		})

		it('should not require an initializer without fields', () => {
			assert.deepStrictEqual(codes(analyzeSource('pub struct Empty {}')), [])
		})

		it('should require an initializer body in a composite', () => {
			assert.deepStrictEqual(summaries(analyzeSource('pub struct S {\n    init()\n}')), [
				{ code: 'LDCHECK022', column: 5, line: 2, message: 'missing implementation of initializer `init`' },
			])
		})

		it('should not check field initialization in an interface', () => {
			const source = 'pub struct interface S {\n    pub let x: Int\n    init()\n}'
			assert.deepStrictEqual(codes(analyzeSource(source)), [])
		})

		it('should accept initializer conditions in an interface', () => {
			const source = 'pub struct interface S {\n    init(x: Int) {\n        pre { x > 0 }\n    }\n}'
			assert.deepStrictEqual(codes(analyzeSource(source)), [])
		})
	})

	describe('destructors', () => {
		const wallet = (destructor: readonly string[]): string =>
			[
				'pub resource Wallet {',
				'    pub let vault: @Vault',
				'    pub let spare: @Vault?',
				'    init(vault: @Vault) {',
				'        self.vault <- vault',
				'    }',
				...destructor,
				'}',
				'pub resource Vault {}',
			].join('\n')

		it('should require a destructor for resource fields', () => {
			const diagnostic = onlyDiagnostic(analyzeSource(wallet([])))
			assert.deepStrictEqual(summarize(diagnostic), {
				code: 'LDCHECK014',
				column: 14,
				line: 1,
				message: 'missing destructor for resource `Wallet`',
			})
			assert.deepStrictEqual(diagnostic.args, {
				fields: ['self.vault', 'self.spare'],
				name: 'Wallet',
			})
		})

		it('should report resource fields the destructor leaves', () => {
			const source = wallet(['    destroy() {', '        destroy self.vault', '    }'])
			assert.deepStrictEqual(summaries(analyzeSource(source)), [
				{
					code: 'LDCHECK015',
					column: 5,
					line: 7,
					message: 'resource field `spare` is not destroyed in destructor',
				},
			])
		})

		it('should accept a destructor that destroys every resource field', () => {
			const source = wallet([
				'    destroy() {',
				'        destroy self.vault',
				'        destroy self.spare',
				'    }',
			])
			assert.deepStrictEqual(codes(analyzeSource(source)), [])
		})

		it('should reject a destructor outside resources', () => {
			assert.deepStrictEqual(summaries(analyzeSource('pub struct S {\n    destroy() {}\n}')), [
				{ code: 'LDCHECK012', column: 5, line: 2, message: 'struct `S` cannot have a destructor' },
			])
		})

		it('should reject a destructor in a struct interface', () => {
			const context = analyzeSource('pub struct interface S {\n    destroy()\n}')
			assert.deepStrictEqual(summaries(context), [
				{ code: 'LDCHECK012', column: 5, line: 2, message: 'struct interface `S` cannot have a destructor' },
			])
		})

		it('should report destructor parameters at the first one', () => {
			const source = 'pub resource R {\n    destroy(force: Bool, again: Bool) {}\n}'
			assert.deepStrictEqual(summaries(analyzeSource(source)), [
				{ code: 'LDCHECK013', column: 13, line: 2, message: 'destructor of `R` cannot have parameters' },
			])
		})

		it('should report more than one destructor', () => {
			const source = 'pub resource R {\n    destroy() {}\n    destroy() {}\n}'
			assert.deepStrictEqual(summaries(analyzeSource(source)), [
				{ code: 'LDCHECK011', column: 5, line: 3, message: 'resource `R` cannot have more than one destructor' },
			])
		})

		it('should report a destructor body in a resource interface', () => {
			const source = 'pub resource interface R {\n    destroy() {}\n}'
			assert.deepStrictEqual(summaries(analyzeSource(source)), [
				{
					code: 'LDCHECK004',
					column: 15,
					line: 2,
					message: 'destructor in resource interface cannot have an implementation',
				},
			])
		})
	})

	describe('unknown special functions', () => {
		it('should report a special function that is neither init nor destroy', () => {
			assert.deepStrictEqual(summaries(analyzeSource('pub struct S {\n    setup() {}\n}')), [
				{ code: 'LDCHECK016', column: 5, line: 2, message: 'unknown special function `setup`' },
			])
		})
	})
})
