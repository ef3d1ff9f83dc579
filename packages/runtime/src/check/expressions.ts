/**
 * Name checking inside function bodies.
 *
 * No expression typing is done; only that every name a body uses is
 * declared somewhere visible.
 */

import type { CheckingContext } from '../core/context.ts'
import { assertNever } from '../core/errors.ts'
import { type Expression, type Identifier, type Statement, VariableKind } from '../parse/ast.ts'
import { lookupPrimitive } from './builtins.ts'
import { reportRedeclaration } from './declarations.ts'
import type { CheckerState } from './state.ts'
import { resolveAnnotation, resolveTypePath } from './type-resolution.ts'
import { DeclarationKind, primitive, PrimitiveName, type Type } from './types.ts'

function checkIdentifier(state: CheckerState, context: CheckingContext, identifier: Identifier): void {
	const { name } = identifier
	if (state.valueActivations.find(name) !== undefined) return
	// Type names are values too: constructors and enum namespaces
	if (state.typeActivations.find(name) !== undefined) return
	if (lookupPrimitive(name) !== undefined) return
	context.emit('LDCHECK020', identifier.position, { name })
}

/**
 * `A.B.C` as a list of identifiers, or null if the expression is anything
 * other than a chain of plain member accesses.
 */
function typePath(expression: Expression): Identifier[] | null {
	if (expression.kind === 'identifier') return [expression.identifier]
	if (expression.kind === 'member' && !expression.optional) {
		const head = typePath(expression.target)
		return head === null ? null : [...head, expression.member]
	}
	return null
}

function checkCreate(state: CheckerState, context: CheckingContext, target: Expression): void {
	const callee = target.kind === 'invocation' ? target.callee : target
	const path = typePath(callee)
	if (path === null) {
		checkExpression(state, context, target)
		return
	}

	const [head, ...rest] = path
	if (head !== undefined) resolveTypePath(state, context, head, rest)
	if (target.kind === 'invocation') {
		for (const argument of target.arguments) checkExpression(state, context, argument.value)
	}
}

export function checkExpression(
	state: CheckerState,
	context: CheckingContext,
	expression: Expression
): void {
	switch (expression.kind) {
		case 'literal':
			return
		case 'identifier':
			checkIdentifier(state, context, expression.identifier)
			return
		case 'member':
		case 'force':
		case 'destroy':
		case 'move':
			checkExpression(state, context, expression.target)
			return
		case 'index':
			checkExpression(state, context, expression.target)
			checkExpression(state, context, expression.index)
			return
		case 'invocation':
			checkExpression(state, context, expression.callee)
			for (const argument of expression.arguments) checkExpression(state, context, argument.value)
			return
		case 'create':
			checkCreate(state, context, expression.target)
			return
		case 'unary':
			checkExpression(state, context, expression.operand)
			return
		case 'binary':
			checkExpression(state, context, expression.left)
			checkExpression(state, context, expression.right)
			return
		case 'array':
			for (const element of expression.elements) checkExpression(state, context, element)
			return
		default:
			assertNever(expression, 'expression')
	}
}

export function checkStatement(
	state: CheckerState,
	context: CheckingContext,
	statement: Statement
): void {
	switch (statement.kind) {
		case 'variable-declaration': {
			// The initial value cannot see the name being declared
			checkExpression(state, context, statement.value)

			const type: Type =
				statement.typeAnnotation === null
					? primitive(PrimitiveName.AnyStruct)
					: resolveAnnotation(state, context, statement.typeAnnotation).type

			const isConstant = statement.variableKind === VariableKind.Constant
			const declarationKind = isConstant ? DeclarationKind.Constant : DeclarationKind.Variable
			const existing = state.valueActivations.declare({
				declarationKind,
				identifier: statement.identifier.name,
				isConstant,
				position: statement.identifier.position,
				type,
			})
			if (existing !== undefined) {
				reportRedeclaration(context, declarationKind, statement.identifier, existing.position)
			}
			return
		}
		case 'assignment':
			checkExpression(state, context, statement.target)
			checkExpression(state, context, statement.value)
			return
		case 'return':
			if (statement.value !== null) checkExpression(state, context, statement.value)
			return
		case 'expression':
			checkExpression(state, context, statement.expression)
			return
		default:
			assertNever(statement, 'statement')
	}
}
