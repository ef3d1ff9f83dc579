import type { FailedMatchResult, Node } from 'ohm-js'
import type { CheckingContext } from '../core/context.ts'
import { unreachable } from '../core/errors.ts'
import {
	Access,
	type Argument,
	type CompositeDeclaration,
	type Condition,
	type Expression,
	type FunctionBlock,
	groupMembers,
	type Identifier,
	type InterfaceDeclaration,
	LiteralKind,
	type MemberDeclaration,
	type NominalTypeNode,
	type Parameter,
	type Position,
	parseCompositeKind,
	parseSpecialFunctionKind,
	parseVariableKind,
	type Statement,
	type Transfer,
	type TypeAnnotationNode,
	type TypeDeclaration,
	type TypeNode,
} from './ast.ts'
import { LodeGrammar } from './grammar.ts'

export interface ParseResult {
	succeeded: boolean
}

function parseTransfer(text: string): Transfer {
	if (text === '=' || text === '<-') return text
	return unreachable(`unknown transfer operator '${text}'`)
}

function parseScopedAccess(scope: string): Access {
	switch (scope) {
		case 'self':
			return Access.Private
		case 'contract':
			return Access.Contract
		case 'account':
			return Access.Account
		case 'all':
			return Access.Public
		default:
			return unreachable(`unknown access scope '${scope}'`)
	}
}

/**
 * Build semantics that turn a match into AST nodes, resolving every
 * node's start offset to a position through the context.
 */
function createAstSemantics(context: CheckingContext) {
	const semantics = LodeGrammar.createSemantics()

	function at(node: Node): Position {
		return context.positionAt(node.source.startIdx)
	}

	function toIdentifier(node: Node): Identifier {
		return { name: node.sourceString, position: at(node) }
	}

	function optionalAccess(node: Node): Access {
		const modifier = node.children[0]
		return modifier === undefined ? Access.NotSpecified : modifier['access']()
	}

	function optionalBlock(node: Node): FunctionBlock | null {
		const block = node.children[0]
		return block === undefined ? null : block['block']()
	}

	function optionalAnnotation(node: Node): TypeAnnotationNode | null {
		const annotation = node.children[0]
		return annotation === undefined ? null : annotation['annotation']()
	}

	function optionalExpression(node: Node): Expression | null {
		const expression = node.children[0]
		return expression === undefined ? null : expression['expression']()
	}

	function binary(node: Node, left: Node, operator: Node, right: Node): Expression {
		return {
			kind: 'binary',
			left: left['expression'](),
			operator: operator.sourceString,
			position: at(node),
			right: right['expression'](),
		}
	}

	semantics.addOperation<TypeDeclaration[]>('declarations', {
		Program(declarations: Node) {
			return declarations.children.map((d: Node) => d['declaration']())
		},
	})

	semantics.addOperation<TypeDeclaration>('declaration', {
		CompositeDeclaration(
			access: Node,
			kind: Node,
			identifier: Node,
			conformances: Node,
			_open: Node,
			members: Node,
			_close: Node
		): CompositeDeclaration {
			const conformanceList = conformances.children[0]
			return {
				access: optionalAccess(access),
				compositeKind: parseCompositeKind(kind.sourceString),
				conformances: conformanceList === undefined ? [] : conformanceList['conformances'](),
				identifier: toIdentifier(identifier),
				kind: 'composite',
				members: groupMembers(members.children.map((m: Node) => m['member']())),
				position: at(this),
			}
		},
		Declaration(declaration: Node) {
			return declaration['declaration']()
		},
		InterfaceDeclaration(
			access: Node,
			kind: Node,
			_interface: Node,
			identifier: Node,
			_open: Node,
			members: Node,
			_close: Node
		): InterfaceDeclaration {
			return {
				access: optionalAccess(access),
				compositeKind: parseCompositeKind(kind.sourceString),
				identifier: toIdentifier(identifier),
				kind: 'interface',
				members: groupMembers(members.children.map((m: Node) => m['member']())),
				position: at(this),
			}
		},
	})

	semantics.addOperation<NominalTypeNode[]>('conformances', {
		Conformances(_colon: Node, list: Node) {
			return list.asIteration().children.map((n: Node) => n['nominal']())
		},
	})

	semantics.addOperation<MemberDeclaration>('member', {
		Declaration(declaration: Node) {
			return declaration['declaration']()
		},
		EnumCaseDeclaration(access: Node, _case: Node, identifier: Node) {
			return {
				access: optionalAccess(access),
				identifier: toIdentifier(identifier),
				kind: 'enum-case',
				position: at(this),
			}
		},
		FieldDeclaration(access: Node, variableKind: Node, identifier: Node, _colon: Node, annotation: Node) {
			return {
				access: optionalAccess(access),
				identifier: toIdentifier(identifier),
				kind: 'field',
				position: at(this),
				typeAnnotation: annotation['annotation'](),
				variableKind: parseVariableKind(variableKind.sourceString),
			}
		},
		FunctionDeclaration(
			access: Node,
			_fun: Node,
			identifier: Node,
			parameters: Node,
			returnType: Node,
			block: Node
		) {
			return {
				access: optionalAccess(access),
				functionBlock: optionalBlock(block),
				identifier: toIdentifier(identifier),
				kind: 'function',
				parameters: parameters['parameters'](),
				position: at(this),
				returnTypeAnnotation: optionalAnnotation(returnType),
			}
		},
		Member(member: Node) {
			return member['member']()
		},
		SpecialFunctionDeclaration(name: Node, parameters: Node, block: Node) {
			return {
				functionBlock: optionalBlock(block),
				identifier: toIdentifier(name),
				kind: 'special-function',
				parameters: parameters['parameters'](),
				position: at(this),
				specialKind: parseSpecialFunctionKind(name.sourceString),
			}
		},
	})

	semantics.addOperation<Access>('access', {
		AccessModifier(modifier: Node) {
			return modifier['access']()
		},
		AccessModifier_priv(_priv: Node) {
			return Access.Private
		},
		AccessModifier_pub(_pub: Node) {
			return Access.Public
		},
		AccessModifier_pubSet(_pub: Node, _open: Node, _set: Node, _close: Node) {
			return Access.PublicSettable
		},
		AccessModifier_scoped(_access: Node, _open: Node, scope: Node, _close: Node) {
			return parseScopedAccess(scope.sourceString)
		},
	})

	semantics.addOperation<Parameter[]>('parameters', {
		ParameterList(_open: Node, list: Node, _close: Node) {
			return list.asIteration().children.map((p: Node) => p['parameter']())
		},
	})

	semantics.addOperation<Parameter>('parameter', {
		Parameter(parameter: Node) {
			return parameter['parameter']()
		},
		Parameter_labeled(label: Node, identifier: Node, _colon: Node, annotation: Node) {
			return {
				identifier: toIdentifier(identifier),
				label: label.sourceString,
				position: at(this),
				typeAnnotation: annotation['annotation'](),
			}
		},
		Parameter_unlabeled(identifier: Node, _colon: Node, annotation: Node) {
			return {
				identifier: toIdentifier(identifier),
				label: null,
				position: at(this),
				typeAnnotation: annotation['annotation'](),
			}
		},
	})

	semantics.addOperation<FunctionBlock>('block', {
		FunctionBlock(_open: Node, pre: Node, post: Node, statements: Node, _close: Node) {
			const preConditions = pre.children[0]
			const postConditions = post.children[0]
			return {
				position: at(this),
				postConditions: postConditions === undefined ? [] : postConditions['conditions'](),
				preConditions: preConditions === undefined ? [] : preConditions['conditions'](),
				statements: statements.children.map((s: Node) => s['statement']()),
			}
		},
	})

	semantics.addOperation<Condition[]>('conditions', {
		PostConditions(_post: Node, _open: Node, conditions: Node, _close: Node) {
			return conditions.children.map((c: Node) => c['condition']())
		},
		PreConditions(_pre: Node, _open: Node, conditions: Node, _close: Node) {
			return conditions.children.map((c: Node) => c['condition']())
		},
	})

	semantics.addOperation<Condition>('condition', {
		Condition(test: Node, message: Node, _semicolon: Node) {
			return {
				message: optionalExpression(message),
				position: at(this),
				test: test['expression'](),
			}
		},
	})

	semantics.addOperation<Statement>('statement', {
		Assignment(target: Node, transfer: Node, value: Node) {
			return {
				kind: 'assignment',
				position: at(this),
				target: target['expression'](),
				transfer: parseTransfer(transfer.sourceString),
				value: value['expression'](),
			}
		},
		ExpressionStatement(expression: Node) {
			return { expression: expression['expression'](), kind: 'expression', position: at(this) }
		},
		ReturnStatement(_return: Node, value: Node) {
			return { kind: 'return', position: at(this), value: optionalExpression(value) }
		},
		Statement(body: Node, _semicolon: Node) {
			return body['statement']()
		},
		StatementBody(statement: Node) {
			return statement['statement']()
		},
		VariableDeclaration(
			variableKind: Node,
			identifier: Node,
			typeSuffix: Node,
			transfer: Node,
			value: Node
		) {
			return {
				identifier: toIdentifier(identifier),
				kind: 'variable-declaration',
				position: at(this),
				transfer: parseTransfer(transfer.sourceString),
				typeAnnotation: optionalAnnotation(typeSuffix),
				value: value['expression'](),
				variableKind: parseVariableKind(variableKind.sourceString),
			}
		},
	})

	semantics.addOperation<Expression>('expression', {
		AdditiveExpression(expression: Node) {
			return expression['expression']()
		},
		AdditiveExpression_binary(left: Node, operator: Node, right: Node) {
			return binary(this, left, operator, right)
		},
		AndExpression(expression: Node) {
			return expression['expression']()
		},
		AndExpression_binary(left: Node, operator: Node, right: Node) {
			return binary(this, left, operator, right)
		},
		ConditionMessage(_colon: Node, expression: Node) {
			return expression['expression']()
		},
		EqualityExpression(expression: Node) {
			return expression['expression']()
		},
		EqualityExpression_binary(left: Node, operator: Node, right: Node) {
			return binary(this, left, operator, right)
		},
		Expression(expression: Node) {
			return expression['expression']()
		},
		MultiplicativeExpression(expression: Node) {
			return expression['expression']()
		},
		MultiplicativeExpression_binary(left: Node, operator: Node, right: Node) {
			return binary(this, left, operator, right)
		},
		OrExpression(expression: Node) {
			return expression['expression']()
		},
		OrExpression_binary(left: Node, operator: Node, right: Node) {
			return binary(this, left, operator, right)
		},
		PostfixExpression(expression: Node) {
			return expression['expression']()
		},
		PostfixExpression_force(target: Node, _bang: Node) {
			return { kind: 'force', position: at(this), target: target['expression']() }
		},
		PostfixExpression_index(target: Node, _open: Node, index: Node, _close: Node) {
			return {
				index: index['expression'](),
				kind: 'index',
				position: at(this),
				target: target['expression'](),
			}
		},
		PostfixExpression_invocation(callee: Node, _open: Node, args: Node, _close: Node) {
			return {
				arguments: args.asIteration().children.map((a: Node) => a['argument']()),
				callee: callee['expression'](),
				kind: 'invocation',
				position: at(this),
			}
		},
		PostfixExpression_member(target: Node, _dot: Node, member: Node) {
			return {
				kind: 'member',
				member: toIdentifier(member),
				optional: false,
				position: at(this),
				target: target['expression'](),
			}
		},
		PostfixExpression_optionalMember(target: Node, _dot: Node, member: Node) {
			return {
				kind: 'member',
				member: toIdentifier(member),
				optional: true,
				position: at(this),
				target: target['expression'](),
			}
		},
		PrimaryExpression(expression: Node) {
			return expression['expression']()
		},
		PrimaryExpression_array(_open: Node, elements: Node, _close: Node) {
			return {
				elements: elements.asIteration().children.map((e: Node) => e['expression']()),
				kind: 'array',
				position: at(this),
			}
		},
		PrimaryExpression_parenthesized(_open: Node, expression: Node, _close: Node) {
			return expression['expression']()
		},
		RelationalExpression(expression: Node) {
			return expression['expression']()
		},
		RelationalExpression_binary(left: Node, operator: Node, right: Node) {
			return binary(this, left, operator, right)
		},
		UnaryExpression(expression: Node) {
			return expression['expression']()
		},
		UnaryExpression_create(_create: Node, target: Node) {
			return { kind: 'create', position: at(this), target: target['expression']() }
		},
		UnaryExpression_destroy(_destroy: Node, target: Node) {
			return { kind: 'destroy', position: at(this), target: target['expression']() }
		},
		UnaryExpression_move(_arrow: Node, target: Node) {
			return { kind: 'move', position: at(this), target: target['expression']() }
		},
		UnaryExpression_negate(_minus: Node, operand: Node) {
			return { kind: 'unary', operand: operand['expression'](), operator: '-', position: at(this) }
		},
		UnaryExpression_not(_bang: Node, operand: Node) {
			return { kind: 'unary', operand: operand['expression'](), operator: '!', position: at(this) }
		},
		boolLiteral(_value: Node) {
			return { kind: 'literal', literal: LiteralKind.Bool, position: at(this), text: this.sourceString }
		},
		fixedLiteral(_integer: Node, _dot: Node, _fraction: Node) {
			return { kind: 'literal', literal: LiteralKind.Fixed, position: at(this), text: this.sourceString }
		},
		identifier(_start: Node, _rest: Node) {
			return { identifier: toIdentifier(this), kind: 'identifier', position: at(this) }
		},
		integerLiteral(_literal: Node) {
			return {
				kind: 'literal',
				literal: LiteralKind.Integer,
				position: at(this),
				text: this.sourceString,
			}
		},
		literal(literal: Node) {
			return literal['expression']()
		},
		nilLiteral(_nil: Node) {
			return { kind: 'literal', literal: LiteralKind.Nil, position: at(this), text: this.sourceString }
		},
		pathLiteral(_slash: Node, _domain: Node, _separator: Node, _identifier: Node) {
			return { kind: 'literal', literal: LiteralKind.Path, position: at(this), text: this.sourceString }
		},
		stringLiteral(_open: Node, characters: Node, _close: Node) {
			return {
				kind: 'literal',
				literal: LiteralKind.String,
				position: at(this),
				text: characters.sourceString,
			}
		},
	})

	semantics.addOperation<Argument>('argument', {
		Argument(argument: Node) {
			return argument['argument']()
		},
		Argument_labeled(label: Node, _colon: Node, value: Node) {
			return { label: label.sourceString, position: at(this), value: value['expression']() }
		},
		Argument_unlabeled(value: Node) {
			return { label: null, position: at(this), value: value['expression']() }
		},
	})

	semantics.addOperation<TypeAnnotationNode>('annotation', {
		ReturnType(_colon: Node, annotation: Node) {
			return annotation['annotation']()
		},
		TypeAnnotation(marker: Node, type: Node) {
			return { isResource: marker.children.length > 0, position: at(this), type: type['type']() }
		},
		TypeSuffix(_colon: Node, annotation: Node) {
			return annotation['annotation']()
		},
	})

	semantics.addOperation<TypeNode>('type', {
		BaseType(type: Node) {
			return type['type']()
		},
		BaseType_authorizedReference(_auth: Node, _ampersand: Node, type: Node) {
			return { authorized: true, kind: 'reference', position: at(this), type: type['type']() }
		},
		BaseType_constantSized(_open: Node, element: Node, _semicolon: Node, size: Node, _close: Node) {
			return {
				element: element['annotation'](),
				kind: 'constant-sized',
				position: at(this),
				size: Number(size.sourceString),
			}
		},
		BaseType_dictionary(_open: Node, keyType: Node, _colon: Node, valueType: Node, _close: Node) {
			return {
				keyType: keyType['annotation'](),
				kind: 'dictionary',
				position: at(this),
				valueType: valueType['annotation'](),
			}
		},
		BaseType_reference(_ampersand: Node, type: Node) {
			return { authorized: false, kind: 'reference', position: at(this), type: type['type']() }
		},
		BaseType_variableSized(_open: Node, element: Node, _close: Node) {
			return { element: element['annotation'](), kind: 'variable-sized', position: at(this) }
		},
		NominalType(_list: Node) {
			return this['nominal']()
		},
		Type(type: Node) {
			return type['type']()
		},
		Type_optional(type: Node, _question: Node) {
			return { kind: 'optional', position: at(this), type: type['type']() }
		},
	})

	semantics.addOperation<NominalTypeNode>('nominal', {
		NominalType(list: Node) {
			const [first, ...rest] = list.asIteration().children.map(toIdentifier)
			if (first === undefined) return unreachable('nominal type without identifier')
			return { identifier: first, kind: 'nominal', nestedIdentifiers: rest, position: at(this) }
		},
	})

	return semantics
}

const FAILURE_LOCATION = /^Line (\d+), col (\d+): /

function reportSyntaxError(context: CheckingContext, matchResult: FailedMatchResult): void {
	const summary = matchResult.shortMessage ?? 'unexpected input'
	const location = FAILURE_LOCATION.exec(summary)
	const position =
		location === null
			? context.positionAt(0)
			: context.positionAtLine(Number(location[1]), Number(location[2]))
	context.emit('LDPARSE001', position, { detail: summary.replace(FAILURE_LOCATION, '') })
}

/**
 * Parse the context's source into `context.program`.
 * A syntax error reports LDPARSE001 and leaves the program unset.
 */
export function parse(context: CheckingContext): ParseResult {
	const matchResult = LodeGrammar.match(context.source)

	if (matchResult.failed()) {
		reportSyntaxError(context, matchResult)
		return { succeeded: false }
	}

	const semantics = createAstSemantics(context)
	const declarations: TypeDeclaration[] = semantics(matchResult)['declarations']()
	context.program = { declarations }
	return { succeeded: true }
}
