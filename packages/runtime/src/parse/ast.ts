/**
 * Plain AST for the declaration language.
 * Every node carries the position of its first character.
 */

import { unreachable } from '../core/errors.ts'

export interface Position {
	readonly offset: number
	/** 1-indexed */
	readonly line: number
	/** 1-indexed */
	readonly column: number
}

export interface Identifier {
	readonly name: string
	readonly position: Position
}

// =============================================================================
// KINDS
// =============================================================================

export const Access = {
	Account: 'access(account)',
	Contract: 'access(contract)',
	NotSpecified: 'not-specified',
	Private: 'priv',
	Public: 'pub',
	PublicSettable: 'pub(set)',
} as const

export type Access = (typeof Access)[keyof typeof Access]

export const CompositeKind = {
	Contract: 'contract',
	Enum: 'enum',
	Event: 'event',
	Resource: 'resource',
	Struct: 'struct',
} as const

export type CompositeKind = (typeof CompositeKind)[keyof typeof CompositeKind]

export const VariableKind = {
	Constant: 'let',
	Variable: 'var',
} as const

export type VariableKind = (typeof VariableKind)[keyof typeof VariableKind]

export const SpecialFunctionKind = {
	Destructor: 'destructor',
	Initializer: 'initializer',
	Unknown: 'unknown',
} as const

export type SpecialFunctionKind = (typeof SpecialFunctionKind)[keyof typeof SpecialFunctionKind]

export function parseCompositeKind(text: string): CompositeKind {
	switch (text) {
		case 'struct':
			return CompositeKind.Struct
		case 'resource':
			return CompositeKind.Resource
		case 'contract':
			return CompositeKind.Contract
		case 'event':
			return CompositeKind.Event
		case 'enum':
			return CompositeKind.Enum
		default:
			return unreachable(`unknown composite kind '${text}'`)
	}
}

export function parseVariableKind(text: string): VariableKind {
	if (text === 'let') return VariableKind.Constant
	if (text === 'var') return VariableKind.Variable
	return unreachable(`unknown variable kind '${text}'`)
}

export function parseSpecialFunctionKind(name: string): SpecialFunctionKind {
	if (name === 'init') return SpecialFunctionKind.Initializer
	if (name === 'destroy') return SpecialFunctionKind.Destructor
	return SpecialFunctionKind.Unknown
}

// =============================================================================
// TYPE ANNOTATIONS
// =============================================================================

/**
 * A type as written, with its optional `@` resource marker.
 */
export interface TypeAnnotationNode {
	readonly isResource: boolean
	readonly type: TypeNode
	readonly position: Position
}

export interface NominalTypeNode {
	readonly kind: 'nominal'
	readonly identifier: Identifier
	/** `Outer.Inner`: the parts after the first */
	readonly nestedIdentifiers: readonly Identifier[]
	readonly position: Position
}

export interface OptionalTypeNode {
	readonly kind: 'optional'
	readonly type: TypeNode
	readonly position: Position
}

export interface VariableSizedTypeNode {
	readonly kind: 'variable-sized'
	readonly element: TypeAnnotationNode
	readonly position: Position
}

export interface ConstantSizedTypeNode {
	readonly kind: 'constant-sized'
	readonly element: TypeAnnotationNode
	readonly size: number
	readonly position: Position
}

export interface DictionaryTypeNode {
	readonly kind: 'dictionary'
	readonly keyType: TypeAnnotationNode
	readonly valueType: TypeAnnotationNode
	readonly position: Position
}

export interface ReferenceTypeNode {
	readonly kind: 'reference'
	readonly authorized: boolean
	readonly type: TypeNode
	readonly position: Position
}

export type TypeNode =
	| NominalTypeNode
	| OptionalTypeNode
	| VariableSizedTypeNode
	| ConstantSizedTypeNode
	| DictionaryTypeNode
	| ReferenceTypeNode

export function nominalTypeName(node: NominalTypeNode): string {
	return [node.identifier, ...node.nestedIdentifiers].map((id) => id.name).join('.')
}

// =============================================================================
// EXPRESSIONS
// =============================================================================

export const LiteralKind = {
	Bool: 'bool',
	Fixed: 'fixed',
	Integer: 'integer',
	Nil: 'nil',
	Path: 'path',
	String: 'string',
} as const

export type LiteralKind = (typeof LiteralKind)[keyof typeof LiteralKind]

export interface LiteralExpression {
	readonly kind: 'literal'
	readonly literal: LiteralKind
	readonly text: string
	readonly position: Position
}

export interface IdentifierExpression {
	readonly kind: 'identifier'
	readonly identifier: Identifier
	readonly position: Position
}

export interface MemberExpression {
	readonly kind: 'member'
	readonly target: Expression
	readonly member: Identifier
	readonly optional: boolean
	readonly position: Position
}

export interface IndexExpression {
	readonly kind: 'index'
	readonly target: Expression
	readonly index: Expression
	readonly position: Position
}

export interface Argument {
	readonly label: string | null
	readonly value: Expression
	readonly position: Position
}

export interface InvocationExpression {
	readonly kind: 'invocation'
	readonly callee: Expression
	readonly arguments: readonly Argument[]
	readonly position: Position
}

export interface ForceExpression {
	readonly kind: 'force'
	readonly target: Expression
	readonly position: Position
}

export interface CreateExpression {
	readonly kind: 'create'
	readonly target: Expression
	readonly position: Position
}

export interface DestroyExpression {
	readonly kind: 'destroy'
	readonly target: Expression
	readonly position: Position
}

export interface MoveExpression {
	readonly kind: 'move'
	readonly target: Expression
	readonly position: Position
}

export interface UnaryExpression {
	readonly kind: 'unary'
	readonly operator: '!' | '-'
	readonly operand: Expression
	readonly position: Position
}

export interface BinaryExpression {
	readonly kind: 'binary'
	readonly operator: string
	readonly left: Expression
	readonly right: Expression
	readonly position: Position
}

export interface ArrayExpression {
	readonly kind: 'array'
	readonly elements: readonly Expression[]
	readonly position: Position
}

export type Expression =
	| LiteralExpression
	| IdentifierExpression
	| MemberExpression
	| IndexExpression
	| InvocationExpression
	| ForceExpression
	| CreateExpression
	| DestroyExpression
	| MoveExpression
	| UnaryExpression
	| BinaryExpression
	| ArrayExpression

// =============================================================================
// STATEMENTS
// =============================================================================

export type Transfer = '=' | '<-'

export interface VariableDeclarationStatement {
	readonly kind: 'variable-declaration'
	readonly variableKind: VariableKind
	readonly identifier: Identifier
	readonly typeAnnotation: TypeAnnotationNode | null
	readonly transfer: Transfer
	readonly value: Expression
	readonly position: Position
}

export interface AssignmentStatement {
	readonly kind: 'assignment'
	readonly target: Expression
	readonly transfer: Transfer
	readonly value: Expression
	readonly position: Position
}

export interface ReturnStatement {
	readonly kind: 'return'
	readonly value: Expression | null
	readonly position: Position
}

export interface ExpressionStatement {
	readonly kind: 'expression'
	readonly expression: Expression
	readonly position: Position
}

export type Statement =
	| VariableDeclarationStatement
	| AssignmentStatement
	| ReturnStatement
	| ExpressionStatement

export interface Condition {
	readonly test: Expression
	readonly message: Expression | null
	readonly position: Position
}

export interface FunctionBlock {
	readonly preConditions: readonly Condition[]
	readonly postConditions: readonly Condition[]
	readonly statements: readonly Statement[]
	/** Position of the opening `{` */
	readonly position: Position
}

// =============================================================================
// DECLARATIONS
// =============================================================================

export interface Parameter {
	readonly label: string | null
	readonly identifier: Identifier
	readonly typeAnnotation: TypeAnnotationNode
	readonly position: Position
}

export interface FieldDeclaration {
	readonly kind: 'field'
	readonly access: Access
	readonly variableKind: VariableKind
	readonly identifier: Identifier
	readonly typeAnnotation: TypeAnnotationNode
	readonly position: Position
}

export interface FunctionDeclaration {
	readonly kind: 'function'
	readonly access: Access
	readonly identifier: Identifier
	readonly parameters: readonly Parameter[]
	readonly returnTypeAnnotation: TypeAnnotationNode | null
	readonly functionBlock: FunctionBlock | null
	readonly position: Position
}

export interface SpecialFunctionDeclaration {
	readonly kind: 'special-function'
	readonly specialKind: SpecialFunctionKind
	readonly identifier: Identifier
	readonly parameters: readonly Parameter[]
	readonly functionBlock: FunctionBlock | null
	readonly position: Position
}

export interface EnumCaseDeclaration {
	readonly kind: 'enum-case'
	readonly access: Access
	readonly identifier: Identifier
	readonly position: Position
}

/**
 * Members grouped by sort; `all` keeps source order.
 */
export interface Members {
	readonly all: readonly MemberDeclaration[]
	readonly fields: readonly FieldDeclaration[]
	readonly functions: readonly FunctionDeclaration[]
	readonly specialFunctions: readonly SpecialFunctionDeclaration[]
	readonly enumCases: readonly EnumCaseDeclaration[]
	readonly interfaces: readonly InterfaceDeclaration[]
	readonly composites: readonly CompositeDeclaration[]
}

interface TypeDeclarationBase {
	readonly access: Access
	readonly compositeKind: CompositeKind
	readonly identifier: Identifier
	readonly members: Members
	readonly position: Position
}

export interface InterfaceDeclaration extends TypeDeclarationBase {
	readonly kind: 'interface'
}

export interface CompositeDeclaration extends TypeDeclarationBase {
	readonly kind: 'composite'
	readonly conformances: readonly NominalTypeNode[]
}

export type TypeDeclaration = InterfaceDeclaration | CompositeDeclaration

export type MemberDeclaration =
	| FieldDeclaration
	| FunctionDeclaration
	| SpecialFunctionDeclaration
	| EnumCaseDeclaration
	| TypeDeclaration

export interface Program {
	readonly declarations: readonly TypeDeclaration[]
}

export function groupMembers(all: readonly MemberDeclaration[]): Members {
	const fields: FieldDeclaration[] = []
	const functions: FunctionDeclaration[] = []
	const specialFunctions: SpecialFunctionDeclaration[] = []
	const enumCases: EnumCaseDeclaration[] = []
	const interfaces: InterfaceDeclaration[] = []
	const composites: CompositeDeclaration[] = []

	for (const member of all) {
		switch (member.kind) {
			case 'field':
				fields.push(member)
				break
			case 'function':
				functions.push(member)
				break
			case 'special-function':
				specialFunctions.push(member)
				break
			case 'enum-case':
				enumCases.push(member)
				break
			case 'interface':
				interfaces.push(member)
				break
			case 'composite':
				composites.push(member)
				break
		}
	}

	return { all, composites, enumCases, fields, functions, interfaces, specialFunctions }
}
