import assert from 'node:assert'
import { describe, it } from 'node:test'
import { qualifiedIdentifier } from '../../src/check/types.ts'
import { analyzeSource, codes, summaries } from '../helpers.ts'

const token = [
	'pub contract Token {',
	'    pub resource interface Provider {',
	'        pub fun withdraw(amount: UFix64): @Vault',
	'    }',
	'    pub resource Vault: Provider {',
	'        pub var balance: UFix64',
	'        init(balance: UFix64) {',
	'            self.balance = balance',
	'        }',
	'        pub fun withdraw(amount: UFix64): @Vault {',
	'            self.balance = self.balance - amount',
	'            return <- create Vault(balance: amount)',
	'        }',
	'    }',
	'}',
].join('\n')

describe('check/nested', () => {
	it('should check a contract with nested interfaces and composites', () => {
		assert.deepStrictEqual(codes(analyzeSource(token)), [])
	})

	it('should qualify nested types by their containers', () => {
		const context = analyzeSource(token)
		const [declaration] = context.program?.declarations ?? []
		assert.ok(declaration)
		const type = context.elaboration?.typeOf(declaration)
		assert.ok(type)

		const provider = type.nestedTypes.get('Provider')
		assert.ok(provider)
		assert.strictEqual(qualifiedIdentifier(provider), 'Token.Provider')

		const vault = type.nestedTypes.get('Vault')
		assert.ok(vault && vault.kind === 'composite')
		assert.deepStrictEqual(
			vault.conformances.map((c) => qualifiedIdentifier(c)),
			['Token.Provider']
		)
	})

	it('should record nested declarations by name', () => {
		const context = analyzeSource(token)
		const [declaration] = context.program?.declarations ?? []
		assert.ok(declaration)
		const byName = context.elaboration?.nestedDeclarations.get(declaration)
		assert.ok(byName)
		assert.deepStrictEqual([...byName.keys()], ['Provider', 'Vault'])
		assert.strictEqual(byName.get('Vault')?.identifier.position.line, 5)
	})

	it('should let other declarations use nested types through their container', () => {
		const source = [
			token,
			'pub resource Holder {',
			'    pub let vault: @Token.Vault',
			'    init(vault: @Token.Vault) {',
			'        self.vault <- vault',
			'    }',
			'    destroy() {',
			'        destroy self.vault',
			'    }',
			'}',
		].join('\n')
		assert.deepStrictEqual(codes(analyzeSource(source)), [])
	})

	it('should not bring nested types into scope outside their container', () => {
		const source = [token, 'pub struct interface Holder {', '    pub let vault: @Vault', '}'].join('\n')
		assert.deepStrictEqual(summaries(analyzeSource(source)), [
			{ code: 'LDCHECK019', column: 21, line: 17, message: 'cannot find type `Vault` in this scope' },
		])
	})

	it('should report nested types sharing a name once', () => {
		const source = [
			'pub contract C {',
			'    pub resource interface Item {}',
			'    pub struct Item {}',
			'}',
		].join('\n')
		assert.deepStrictEqual(summaries(analyzeSource(source)), [
			{ code: 'LDCHECK001', column: 16, line: 3, message: 'cannot redeclare struct `Item`' },
		])
	})

	it('should report a member sharing a name with a nested type', () => {
		const source = [
			'pub contract C {',
			'    pub struct Item {}',
			'    pub fun Item() {}',
			'}',
		].join('\n')
		assert.deepStrictEqual(summaries(analyzeSource(source)), [
			{ code: 'LDCHECK001', column: 13, line: 3, message: 'cannot redeclare function `Item`' },
		])
	})

	it('should not let nested types leak into later top-level declarations', () => {
		const source = [
			'pub contract A {',
			'    pub struct Inner {}',
			'}',
			'pub contract B {',
			'    pub struct Inner {}',
			'}',
		].join('\n')
		assert.deepStrictEqual(codes(analyzeSource(source)), [])
	})
})
