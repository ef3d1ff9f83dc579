import type {
	CompositeDeclaration,
	InterfaceDeclaration,
	Position,
	TypeAnnotationNode,
	TypeDeclaration,
} from '../parse/ast.ts'
import type { CompositeType, InterfaceType, NominalType, Type } from './types.ts'

/**
 * Results of checking, keyed by AST node.
 * Later phases read declaration types and resolved annotations from here.
 */
export class Elaboration {
	readonly interfaceTypes = new Map<InterfaceDeclaration, InterfaceType>()

	readonly compositeTypes = new Map<CompositeDeclaration, CompositeType>()

	/** Per declaration: nested type name → the declaration that owns it */
	readonly nestedDeclarations = new Map<TypeDeclaration, Map<string, TypeDeclaration>>()

	/** Per type: member name → position of the declaring identifier */
	readonly memberOrigins = new Map<NominalType, Map<string, Position>>()

	/** Resolved type of every annotation the checker has seen */
	readonly annotationTypes = new Map<TypeAnnotationNode, Type>()

	typeOf(declaration: TypeDeclaration): NominalType | undefined {
		return declaration.kind === 'interface'
			? this.interfaceTypes.get(declaration)
			: this.compositeTypes.get(declaration)
	}
}
