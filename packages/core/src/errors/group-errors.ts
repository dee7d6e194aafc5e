import { Data } from "effect";

// ============================================================================
// Specialization Errors
// ============================================================================

/**
 * Raised by the specialization entry point.
 *
 * - `invalid_kind`: an item is neither an Error subclass nor `Open`
 * - `already_specialized`: the target shape already has members
 * - `empty`: no items were given
 * - `members_mismatch`: a group built through a shape does not satisfy it
 */
export class InvalidSpecializationError extends Data.TaggedError(
	"InvalidSpecializationError",
)<{
	readonly shape: string;
	readonly reason:
		| "invalid_kind"
		| "already_specialized"
		| "empty"
		| "members_mismatch";
	readonly index?: number;
	readonly message: string;
}> {}

// ============================================================================
// Construction Errors
// ============================================================================

export class EmptySpecializationError extends Data.TaggedError(
	"EmptySpecializationError",
)<{
	readonly shape: string;
	readonly message: string;
}> {}

export class InvalidMemberError extends Data.TaggedError("InvalidMemberError")<{
	readonly index: number;
	readonly value: unknown;
	readonly message: string;
}> {}

export class SourceCountMismatchError extends Data.TaggedError(
	"SourceCountMismatchError",
)<{
	readonly sources: number;
	readonly exceptions: number;
	readonly message: string;
}> {}

// ============================================================================
// Error Group Error Union
// ============================================================================

export type ErrorGroupError =
	| InvalidSpecializationError
	| EmptySpecializationError
	| InvalidMemberError
	| SourceCountMismatchError;
