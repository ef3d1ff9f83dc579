/**
 * Runtime values and traversals over them.
 */

export { copyValue } from './copy.ts'
export { ByteWriter, EncodeError, encodeValue, NUMBER_TAGS, ValueTag } from './encode.ts'
export { Interpreter, type InterpreterOptions } from './interpreter.ts'
export { collectStorageReferences, invalidateResources, setOwner } from './resources.ts'
export * from './values.ts'
export {
	type ContainerKind,
	type ContainerSlots,
	type ContainerValue,
	EMPTY_VISITOR,
	type LeafKind,
	type LeafSlots,
	type LeafValue,
	type Visitor,
	VisitDecision,
	walkValue,
} from './visitor.ts'
