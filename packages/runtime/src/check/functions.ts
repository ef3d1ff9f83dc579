/**
 * Function body checking.
 *
 * Scopes, from outermost:
 *   function  `self` and the parameters; pre-conditions are checked here
 *   block     locals declared by statements
 *   post      `result` (unless the function returns Void) and `before`
 */

import type { CheckingContext } from '../core/context.ts'
import type { Condition, FunctionBlock, Parameter, Position } from '../parse/ast.ts'
import { within } from './activations.ts'
import { reportRedeclaration } from './declarations.ts'
import { checkExpression, checkStatement } from './expressions.ts'
import type { CheckerState } from './state.ts'
import { lookupAnnotationType } from './type-resolution.ts'
import {
	DeclarationKind,
	type FunctionType,
	type NominalType,
	PrimitiveName,
	primitive,
	type Type,
} from './types.ts'

const BEFORE_TYPE: FunctionType = {
	kind: 'function',
	parameterTypeAnnotations: [{ isResource: false, type: primitive(PrimitiveName.AnyStruct) }],
	returnTypeAnnotation: { isResource: false, type: primitive(PrimitiveName.AnyStruct) },
}

export interface FunctionBody {
	readonly parameters: readonly Parameter[]
	/** null when the function declares no return type */
	readonly returnType: Type | null
	readonly functionBlock: FunctionBlock | null
}

function declareConstant(
	state: CheckerState,
	identifier: string,
	type: Type,
	declarationKind: DeclarationKind,
	position: Position | null
): void {
	state.valueActivations.declare({ declarationKind, identifier, isConstant: true, position, type })
}

function declareParameters(
	state: CheckerState,
	context: CheckingContext,
	parameters: readonly Parameter[]
): void {
	for (const parameter of parameters) {
		const existing = state.valueActivations.declare({
			declarationKind: DeclarationKind.Parameter,
			identifier: parameter.identifier.name,
			isConstant: true,
			position: parameter.identifier.position,
			type: lookupAnnotationType(state, parameter.typeAnnotation),
		})
		if (existing !== undefined) {
			reportRedeclaration(context, DeclarationKind.Parameter, parameter.identifier, existing.position)
		}
	}
}

function checkConditions(
	state: CheckerState,
	context: CheckingContext,
	conditions: readonly Condition[]
): void {
	for (const condition of conditions) {
		checkExpression(state, context, condition.test)
		if (condition.message !== null) checkExpression(state, context, condition.message)
	}
}

/**
 * Check a function's parameters and body in a fresh value scope with `self`
 * bound to the enclosing type. Parameter annotations must already be resolved.
 */
export function checkFunctionBody(
	state: CheckerState,
	context: CheckingContext,
	selfType: NominalType,
	body: FunctionBody
): void {
	within(state.valueActivations.enter(), () => {
		declareConstant(state, 'self', selfType, DeclarationKind.Self, null)
		declareParameters(state, context, body.parameters)

		const block = body.functionBlock
		if (block === null) return

		checkConditions(state, context, block.preConditions)

		within(state.valueActivations.enter(), () => {
			for (const statement of block.statements) checkStatement(state, context, statement)
		})

		within(state.valueActivations.enter(), () => {
			if (body.returnType !== null && !isVoid(body.returnType)) {
				declareConstant(state, 'result', body.returnType, DeclarationKind.Result, null)
			}
			declareConstant(state, 'before', BEFORE_TYPE, DeclarationKind.Before, null)
			checkConditions(state, context, block.postConditions)
		})
	})
}

function isVoid(type: Type): boolean {
	return type.kind === 'primitive' && type.name === PrimitiveName.Void
}

/**
 * Interface members may declare conditions but no implementation.
 * A block with statements, or a bare `{}`, is an implementation.
 */
export function checkInterfaceFunctionBlock(
	context: CheckingContext,
	block: FunctionBlock | null,
	implementedKind: string,
	containerKind: string
): void {
	if (block === null) return

	const [firstStatement] = block.statements
	if (firstStatement !== undefined) {
		context.emit('LDCHECK004', firstStatement.position, { containerKind, implementedKind })
		return
	}
	if (block.preConditions.length === 0 && block.postConditions.length === 0) {
		context.emit('LDCHECK004', block.position, { containerKind, implementedKind })
	}
}
