import assert from 'node:assert'
import { describe, it } from 'node:test'
import { CheckingContext } from '../../src/core/index.ts'
import {
	Access,
	type CompositeDeclaration,
	type Expression,
	type FunctionDeclaration,
	type InterfaceDeclaration,
	match,
	nominalTypeName,
	parse,
	type Program,
	SpecialFunctionKind,
	type TypeDeclaration,
	type TypeNode,
	VariableKind,
} from '../../src/parse/index.ts'
import { onlyDiagnostic } from '../helpers.ts'

function parseProgram(source: string): Program {
	const context = new CheckingContext(source)
	const result = parse(context)
	assert.strictEqual(result.succeeded, true, context.formatAllDiagnostics())
	assert.ok(context.program)
	return context.program
}

function firstDeclaration(source: string): TypeDeclaration {
	const [declaration] = parseProgram(source).declarations
	assert.ok(declaration)
	return declaration
}

function firstInterface(source: string): InterfaceDeclaration {
	const declaration = firstDeclaration(source)
	assert.ok(declaration.kind === 'interface')
	return declaration
}

function firstComposite(source: string): CompositeDeclaration {
	const declaration = firstDeclaration(source)
	assert.ok(declaration.kind === 'composite')
	return declaration
}

function firstFunction(declaration: TypeDeclaration): FunctionDeclaration {
	const [fn] = declaration.members.functions
	assert.ok(fn)
	return fn
}

function fieldType(source: string): TypeNode {
	const [field] = firstInterface(source).members.fields
	assert.ok(field)
	return field.typeAnnotation.type
}

describe('parse/parser', () => {
	describe('declarations', () => {
		const source = [
			'pub resource interface Vault {',
			'    pub var balance: UFix64',
			'    pub fun withdraw(amount: UFix64): @Vault {',
			'        pre { amount <= self.balance: "insufficient" }',
			'    }',
			'}',
		].join('\n')

		it('should parse an interface declaration', () => {
			const declaration = firstInterface(source)
			assert.strictEqual(declaration.compositeKind, 'resource')
			assert.strictEqual(declaration.access, Access.Public)
			assert.deepStrictEqual(declaration.identifier, {
				name: 'Vault',
				position: { column: 24, line: 1, offset: 23 },
			})
			assert.deepStrictEqual(declaration.position, { column: 1, line: 1, offset: 0 })
		})

		it('should group members by sort', () => {
			const { members } = firstInterface(source)
			assert.strictEqual(members.all.length, 2)
			assert.deepStrictEqual(
				members.fields.map((f) => f.identifier.name),
				['balance']
			)
			assert.deepStrictEqual(
				members.functions.map((f) => f.identifier.name),
				['withdraw']
			)
		})

		it('should parse a field', () => {
			const [field] = firstInterface(source).members.fields
			assert.ok(field)
			assert.strictEqual(field.variableKind, VariableKind.Variable)
			assert.strictEqual(field.typeAnnotation.isResource, false)
			assert.deepStrictEqual(field.position, { column: 5, line: 2, offset: 35 })
		})

		it('should parse a function signature and its conditions', () => {
			const fn = firstFunction(firstInterface(source))
			assert.deepStrictEqual(
				fn.parameters.map((p) => [p.label, p.identifier.name]),
				[[null, 'amount']]
			)
			assert.ok(fn.returnTypeAnnotation)
			assert.strictEqual(fn.returnTypeAnnotation.isResource, true)

			assert.ok(fn.functionBlock)
			assert.strictEqual(fn.functionBlock.statements.length, 0)
			assert.strictEqual(fn.functionBlock.postConditions.length, 0)
			const [condition] = fn.functionBlock.preConditions
			assert.ok(condition)
			assert.ok(condition.test.kind === 'binary')
			assert.deepStrictEqual(condition.message, {
				kind: 'literal',
				literal: 'string',
				position: { column: 39, line: 4, offset: 144 },
				text: 'insufficient',
			})
		})

		it('should parse conformances', () => {
			const composite = firstComposite('pub resource Vault: Provider, Token.Receiver {}')
			assert.deepStrictEqual(composite.conformances.map(nominalTypeName), [
				'Provider',
				'Token.Receiver',
			])
		})

		it('should parse nested declarations as members', () => {
			const declaration = firstInterface(
				'pub contract interface Token {\n    pub resource interface Provider {}\n    pub resource Vault {}\n}'
			)
			assert.deepStrictEqual(
				declaration.members.interfaces.map((d) => d.identifier.name),
				['Provider']
			)
			assert.deepStrictEqual(
				declaration.members.composites.map((d) => d.identifier.name),
				['Vault']
			)
		})

		it('should parse enum cases', () => {
			const composite = firstComposite('pub enum Color: UInt8 {\n    pub case red\n    case green\n}')
			assert.deepStrictEqual(
				composite.members.enumCases.map((c) => [c.access, c.identifier.name]),
				[
					[Access.Public, 'red'],
					[Access.NotSpecified, 'green'],
				]
			)
		})

		it('should treat comments as whitespace', () => {
			const program = parseProgram('// leading\npub struct S { /* empty */ }\n')
			assert.strictEqual(program.declarations.length, 1)
		})
	})

	describe('access modifiers', () => {
		it('should read every modifier form', () => {
			const declaration = firstInterface(
				[
					'pub struct interface S {',
					'    pub(set) var a: Int',
					'    priv let b: Int',
					'    access(contract) let c: Int',
					'    access(account) let d: Int',
					'    access(all) let e: Int',
					'    access(self) let f: Int',
					'    let g: Int',
					'}',
				].join('\n')
			)
			assert.deepStrictEqual(
				declaration.members.fields.map((f) => f.access),
				[
					Access.PublicSettable,
					Access.Private,
					Access.Contract,
					Access.Account,
					Access.Public,
					Access.Private,
					Access.NotSpecified,
				]
			)
		})
	})

	describe('special functions', () => {
		it('should classify init, destroy and anything else', () => {
			const composite = firstComposite(
				[
					'pub resource R {',
					'    init(balance: UFix64) { self.balance = balance }',
					'    destroy() {}',
					'    setup() {}',
					'}',
				].join('\n')
			)
			assert.deepStrictEqual(
				composite.members.specialFunctions.map((fn) => fn.specialKind),
				[SpecialFunctionKind.Initializer, SpecialFunctionKind.Destructor, SpecialFunctionKind.Unknown]
			)
		})

		it('should allow a missing body', () => {
			const declaration = firstInterface('pub struct interface S {\n    init(x: Int)\n}')
			const [init] = declaration.members.specialFunctions
			assert.ok(init)
			assert.strictEqual(init.functionBlock, null)
		})
	})

	describe('type annotations', () => {
		it('should parse optionals of nested nominal types', () => {
			const type = fieldType('pub struct interface S {\n    let x: Outer.Inner?\n}')
			assert.ok(type.kind === 'optional')
			assert.ok(type.type.kind === 'nominal')
			assert.strictEqual(nominalTypeName(type.type), 'Outer.Inner')
		})

		it('should keep resource markers on element types', () => {
			const type = fieldType('pub resource interface S {\n    let x: @{String: @Vault}\n}')
			assert.ok(type.kind === 'dictionary')
			assert.strictEqual(type.keyType.isResource, false)
			assert.strictEqual(type.valueType.isResource, true)
		})

		it('should parse sized arrays and references', () => {
			const sized = fieldType('pub struct interface S {\n    let x: [Int; 3]\n}')
			assert.ok(sized.kind === 'constant-sized')
			assert.strictEqual(sized.size, 3)

			const reference = fieldType('pub struct interface S {\n    let x: auth &Vault\n}')
			assert.ok(reference.kind === 'reference')
			assert.strictEqual(reference.authorized, true)
		})
	})

	describe('statements and expressions', () => {
		function statementsOf(body: string) {
			const composite = firstComposite(`pub resource R {\n    pub fun f() {\n${body}\n    }\n}`)
			const block = firstFunction(composite).functionBlock
			assert.ok(block)
			return block.statements
		}

		it('should parse declarations with move transfers', () => {
			const [statement] = statementsOf('        let vault <- create Vault(balance: 1.0)')
			assert.ok(statement)
			assert.ok(statement.kind === 'variable-declaration')
			assert.strictEqual(statement.transfer, '<-')
			assert.ok(statement.value.kind === 'create')
		})

		it('should tell assignments from expression statements', () => {
			const statements = statementsOf('        self.vault <- vault\n        destroy self.vault')
			assert.deepStrictEqual(
				statements.map((s) => s.kind),
				['assignment', 'expression']
			)
		})

		it('should keep labels of arguments', () => {
			const [statement] = statementsOf('        log(value: 1, 2)')
			assert.ok(statement)
			assert.ok(statement.kind === 'expression')
			const expression: Expression = statement.expression
			assert.ok(expression.kind === 'invocation')
			assert.deepStrictEqual(
				expression.arguments.map((a) => a.label),
				['value', null]
			)
		})

		it('should parse path literals', () => {
			const [statement] = statementsOf('        let path = /storage/vault')
			assert.ok(statement)
			assert.ok(statement.kind === 'variable-declaration')
			assert.deepStrictEqual(statement.value, {
				kind: 'literal',
				literal: 'path',
				position: { column: 20, line: 3, offset: 54 },
				text: '/storage/vault',
			})
		})
	})

	describe('syntax errors', () => {
		it('should report LDPARSE001 and leave the program unset', () => {
			const context = new CheckingContext('pub struct S {\n    let x Int\n}')
			const result = parse(context)

			assert.strictEqual(result.succeeded, false)
			assert.strictEqual(context.program, null)
			const diagnostic = onlyDiagnostic(context)
			assert.strictEqual(diagnostic.def.code, 'LDPARSE001')
			assert.strictEqual(diagnostic.line, 2)
			assert.ok(diagnostic.message.startsWith('syntax error: expected'))
		})

		it('should not accept keywords as names', () => {
			assert.strictEqual(match('pub struct resource {}').succeeded(), false)
		})
	})
})
