/**
 * Main entry point for @errgroup/core.
 *
 * Grouped errors that are caught by the kinds of the errors they hold:
 * interned specialization shapes, covariant structural matching, validated
 * construction, and Effect-based catch helpers.
 */

// ============================================================================
// Error Groups
// ============================================================================

export {
	ErrorGroup,
	copyErrorGroup,
	makeErrorGroup,
	renderMembers,
	unsafeMakeErrorGroup,
} from "./group/error-group.js";

export type { ErrorGroupArgs } from "./group/error-group.js";

export { catchGroup, isGroupOf, split } from "./group/group-tools.js";

export type { SplitResult } from "./group/group-tools.js";

// ============================================================================
// Shapes, Registry and Matching
// ============================================================================

export {
	DefaultFamily,
	GroupFamily,
	GroupShape,
	createGroupFamily,
	getOrCreateShape,
	unsafeGetOrCreateShape,
} from "./registry/group-shape.js";

export type { GroupFamilyConfig } from "./registry/group-shape.js";

export { Open, specialize, unsafeSpecialize } from "./registry/specialize.js";

export type { SpecializationItem } from "./registry/specialize.js";

export { matches } from "./registry/matcher.js";

// ============================================================================
// Error Kinds
// ============================================================================

export {
	isErrorKind,
	isErrorValue,
	isSubKind,
	kindOf,
} from "./kinds/error-kind.js";

export type { ErrorKind } from "./kinds/error-kind.js";

// ============================================================================
// Error Types (Effect TaggedError)
// ============================================================================

export {
	EmptySpecializationError,
	InvalidMemberError,
	InvalidSpecializationError,
	SourceCountMismatchError,
} from "./errors/group-errors.js";

export type { ErrorGroupError } from "./errors/group-errors.js";
