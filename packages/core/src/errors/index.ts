// ============================================================================
// Group Errors (re-exported from group-errors.ts)
// ============================================================================

export type { ErrorGroupError } from "./group-errors.js";
export {
	EmptySpecializationError,
	InvalidMemberError,
	InvalidSpecializationError,
	SourceCountMismatchError,
} from "./group-errors.js";
