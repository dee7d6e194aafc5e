/**
 * Catch-side helpers: the predicate a handler dispatcher calls per
 * candidate filter, an Effect combinator built on it, and `split`.
 */

import { Effect } from "effect";
import {
	type ErrorKind,
	isSubKindOfAny,
	kindOf,
} from "../kinds/error-kind.js";
import type { GroupShape } from "../registry/group-shape.js";
import { matches } from "../registry/matcher.js";
import { ErrorGroup, selectMembers } from "./error-group.js";

// ============================================================================
// Matching Thrown Values
// ============================================================================

/**
 * Predicate for one candidate handler: true when `error` is a group that
 * `filter` accepts.
 *
 * @example
 * const isLookupGroup = isGroupOf(unsafeSpecialize(DefaultFamily.root, LookupError))
 * try { ... } catch (e) { if (isLookupGroup(e)) { ... } else { throw e } }
 */
export const isGroupOf =
	(filter: GroupShape) =>
	(error: unknown): error is ErrorGroup =>
		error instanceof ErrorGroup && matches(filter, error.kind);

/**
 * Recovers from a failure that is a group accepted by `filter`.
 * Every other failure passes through unchanged.
 *
 * @example
 * program.pipe(catchGroup(lookupOnly, (group) => Effect.succeed(group.sources)))
 */
export const catchGroup =
	<A2, E2, R2>(
		filter: GroupShape,
		handler: (group: ErrorGroup) => Effect.Effect<A2, E2, R2>,
	) =>
	<A, E, R>(self: Effect.Effect<A, E, R>): Effect.Effect<A | A2, E | E2, R | R2> => {
		const accepts = isGroupOf(filter);
		return Effect.catchAll(
			self,
			(error): Effect.Effect<A2, E | E2, R2> =>
				accepts(error) ? handler(error) : Effect.fail(error),
		);
	};

// ============================================================================
// Split
// ============================================================================

export interface SplitResult {
	/** Members whose kind is a subtype of one of the requested kinds. */
	readonly matched: ErrorGroup | undefined;
	/** All other members. */
	readonly rest: ErrorGroup | undefined;
}

/**
 * Partitions a group's members by kind. Sources stay aligned with their
 * exceptions, each half keeps the message and chaining metadata, and an
 * empty half is `undefined`. When every member falls on one side, that side
 * is the group itself.
 */
export const split = (
	group: ErrorGroup,
	...kinds: ReadonlyArray<ErrorKind>
): SplitResult => {
	const matched: Array<number> = [];
	const rest: Array<number> = [];
	for (const [index, exception] of group.exceptions.entries()) {
		if (isSubKindOfAny(kindOf(exception), kinds)) {
			matched.push(index);
		} else {
			rest.push(index);
		}
	}

	if (rest.length === 0) {
		return { matched: group, rest: undefined };
	}
	if (matched.length === 0) {
		return { matched: undefined, rest: group };
	}
	return {
		matched: selectMembers(group, matched),
		rest: selectMembers(group, rest),
	};
};
