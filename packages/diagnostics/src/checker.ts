/**
 * Parser and checker diagnostic definitions.
 *
 * Error code format: LD<PHASE><NUMBER>
 * - LDPARSE: Parser errors (001-099)
 * - LDCHECK: Checker errors (001-049), warnings (050-099)
 */

import { type DiagnosticDef, DiagnosticSeverity } from './types.ts'

// =============================================================================
// PARSER ERRORS (LDPARSE001-099)
// =============================================================================

export const LDPARSE001: DiagnosticDef = {
	code: 'LDPARSE001',
	description: "Lode couldn't understand this part of your declarations.",
	message: 'syntax error: {detail}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Check for a missing brace, colon or keyword near this position.',
}

// =============================================================================
// CHECKER ERRORS (LDCHECK001-049)
// =============================================================================

export const LDCHECK001: DiagnosticDef = {
	code: 'LDCHECK001',
	description:
		'Every name in a scope must be unique. Fields, functions, enum cases and nested types of one declaration share a single namespace.',
	message: 'cannot redeclare {kind} `{name}`',
	severity: DiagnosticSeverity.Error,
	suggestion: '`{name}` was first declared at {previous}. Rename one of the two.',
}

export const LDCHECK002: DiagnosticDef = {
	code: 'LDCHECK002',
	description:
		'`pub(set)` only applies to variable fields, and top-level type declarations cannot be private.',
	message: 'invalid access modifier `{access}` for {kind}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Use `pub`, `access(contract)` or `access(account)` instead.',
}

export const LDCHECK003: DiagnosticDef = {
	code: 'LDCHECK003',
	description: 'In strict access mode every declaration has to state its access level; in not-specified-restricted mode every field and function does.',
	message: 'missing access modifier for {kind} `{name}`',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Add `pub`, `priv`, `access(contract)` or `access(account)`.',
}

export const LDCHECK004: DiagnosticDef = {
	code: 'LDCHECK004',
	description:
		'An interface only describes a contract. Its functions may state pre- and post-conditions but may not contain statements, and a body that is present must hold at least one condition.',
	message: '{implementedKind} in {containerKind} cannot have an implementation',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Keep only `pre` and `post` blocks, or remove the body.',
}

export const LDCHECK005: DiagnosticDef = {
	code: 'LDCHECK005',
	description: 'Only resources and contracts can own resources.',
	message: 'field `{field}` of {kind} `{container}` cannot have resource type `{type}`',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Declare `{container}` as a resource, or store a reference instead.',
}

export const LDCHECK006: DiagnosticDef = {
	code: 'LDCHECK006',
	description:
		'A container that holds resources is itself a resource and has to be marked with `@`.',
	message: 'resource type `{type}` is nested in a non-resource container in field `{field}`',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Prefix the container type with `@`.',
}

export const LDCHECK007: DiagnosticDef = {
	code: 'LDCHECK007',
	description: 'The `@` marker is reserved for resource types.',
	message: 'invalid resource annotation: `{type}` is not a resource type',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Remove the `@`.',
}

export const LDCHECK008: DiagnosticDef = {
	code: 'LDCHECK008',
	description: 'Resource types must be marked with `@` wherever they are written.',
	message: 'missing resource annotation: `{type}` is a resource type',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Write `@{type}`.',
}

export const LDCHECK009: DiagnosticDef = {
	code: 'LDCHECK009',
	description: 'An initializer must assign every non-optional field of its type.',
	message: 'field `{field}` is not initialized in initializer',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Add `self.{field} = …` to the initializer.',
}

export const LDCHECK010: DiagnosticDef = {
	code: 'LDCHECK010',
	description: 'A composite with fields needs an initializer that sets them.',
	message: 'missing initializer for {kind} `{name}`',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Add an `init(…)` that assigns the fields.',
}

export const LDCHECK011: DiagnosticDef = {
	code: 'LDCHECK011',
	description: 'Initializers and destructors cannot be overloaded.',
	message: '{kind} `{name}` cannot have more than one {member}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Merge the declarations into one {member}.',
}

export const LDCHECK012: DiagnosticDef = {
	code: 'LDCHECK012',
	description: 'Only resources are destroyed, so only resources can declare a destructor.',
	message: '{kind} `{name}` cannot have a destructor',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Remove the destructor.',
}

export const LDCHECK013: DiagnosticDef = {
	code: 'LDCHECK013',
	description: 'A destructor is invoked by `destroy` and receives no arguments.',
	message: 'destructor of `{name}` cannot have parameters',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Remove the parameters.',
}

export const LDCHECK014: DiagnosticDef = {
	code: 'LDCHECK014',
	description: 'A resource that owns resources must destroy them when it is destroyed.',
	message: 'missing destructor for resource `{name}`',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Add a `destroy()` that destroys {fields}.',
}

export const LDCHECK015: DiagnosticDef = {
	code: 'LDCHECK015',
	description: 'Every resource field has to be destroyed in the destructor.',
	message: 'resource field `{field}` is not destroyed in destructor',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Add `destroy self.{field}`.',
}

export const LDCHECK016: DiagnosticDef = {
	code: 'LDCHECK016',
	description: 'Only `init` and `destroy` are special functions.',
	message: 'unknown special function `{name}`',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Declare a regular function with `fun {name}(…)`.',
}

export const LDCHECK017: DiagnosticDef = {
	code: 'LDCHECK017',
	description: 'Interfaces can be declared for structs, resources and contracts only.',
	message: '{kind} interfaces are not supported',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Declare a struct, resource or contract interface instead.',
}

export const LDCHECK018: DiagnosticDef = {
	code: 'LDCHECK018',
	description: 'Type declarations can only be nested inside contracts and contract interfaces.',
	message: '{nestedKind} declarations cannot be nested inside {containerKind}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Move the declaration to the top level or into a contract.',
}

export const LDCHECK019: DiagnosticDef = {
	code: 'LDCHECK019',
	description: 'This type is not declared here or in any enclosing scope.',
	message: 'cannot find type `{name}` in this scope',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Check the spelling, or qualify nested types as `Outer.{name}`.',
}

export const LDCHECK020: DiagnosticDef = {
	code: 'LDCHECK020',
	description: 'This name is not a parameter, local variable or builtin visible here.',
	message: 'cannot find variable `{name}` in this scope',
	severity: DiagnosticSeverity.Error,
	suggestion: '`result` and `before` are only available in post-conditions.',
}

export const LDCHECK021: DiagnosticDef = {
	code: 'LDCHECK021',
	description:
		'A type cannot contain itself by value, directly or through the declarations that enclose it.',
	message: 'field `{field}` recursively nests `{type}`',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Make the field optional or store a reference.',
}

export const LDCHECK022: DiagnosticDef = {
	code: 'LDCHECK022',
	description: 'Functions, initializers and destructors of concrete types need a body.',
	message: 'missing implementation of {kind} `{name}`',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Add a body `{ … }`.',
}

export const LDCHECK023: DiagnosticDef = {
	code: 'LDCHECK023',
	description: 'An enum is backed by an integer type given after the colon.',
	message: 'invalid raw type `{type}` for enum `{name}`',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Use an integer type such as `UInt8`.',
}

export const LDCHECK024: DiagnosticDef = {
	code: 'LDCHECK024',
	description: 'Enum cases can only be declared inside an enum.',
	message: 'enum case `{name}` is only allowed inside an enum',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Declare `{container}` as an enum, or remove the case.',
}

// =============================================================================
// CATALOG
// =============================================================================

/**
 * Central catalog of parser and checker diagnostics.
 */
export const CHECKER_DIAGNOSTICS = {
	LDCHECK001,
	LDCHECK002,
	LDCHECK003,
	LDCHECK004,
	LDCHECK005,
	LDCHECK006,
	LDCHECK007,
	LDCHECK008,
	LDCHECK009,
	LDCHECK010,
	LDCHECK011,
	LDCHECK012,
	LDCHECK013,
	LDCHECK014,
	LDCHECK015,
	LDCHECK016,
	LDCHECK017,
	LDCHECK018,
	LDCHECK019,
	LDCHECK020,
	LDCHECK021,
	LDCHECK022,
	LDCHECK023,
	LDCHECK024,
	LDPARSE001,
} as const

/**
 * All valid parser and checker diagnostic codes.
 */
export type CheckerDiagnosticCode = keyof typeof CHECKER_DIAGNOSTICS
