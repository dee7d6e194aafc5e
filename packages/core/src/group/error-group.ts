/**
 * The grouped error value.
 *
 * An ErrorGroup carries errors raised in parallel, one origin string per
 * error, and the exact shape derived from its members' kinds. The shape is
 * what filters are matched against, so a group is catchable by kind the
 * moment it is built.
 *
 * @module
 */

import { Effect } from "effect";
import {
	EmptySpecializationError,
	type ErrorGroupError,
	InvalidMemberError,
	InvalidSpecializationError,
	SourceCountMismatchError,
} from "../errors/group-errors.js";
import { isErrorValue, kindOf } from "../kinds/error-kind.js";
import {
	DefaultFamily,
	type GroupShape,
	getOrCreateShape,
	resolveShape,
} from "../registry/group-shape.js";
import { matches } from "../registry/matcher.js";
import { describeValue, runSyncOrThrow } from "../utils/run-sync.js";

// ============================================================================
// Types
// ============================================================================

/** Validated parts of a group. */
interface ErrorGroupParts {
	readonly message: string;
	readonly exceptions: ReadonlyArray<Error>;
	readonly sources: ReadonlyArray<string>;
	readonly kind: GroupShape;
	readonly args: ErrorGroupArgs;
}

/** The unmodified arguments a group was requested with. */
export type ErrorGroupArgs = readonly [
	message: string,
	exceptions: ReadonlyArray<Error>,
	sources: ReadonlyArray<string>,
];

// ============================================================================
// ErrorGroup
// ============================================================================

/** Held only by the builders in this module. */
const trusted: unique symbol = Symbol("ErrorGroup.trusted");

export class ErrorGroup extends Error {
	readonly _tag = "ErrorGroup" as const;
	readonly exceptions: ReadonlyArray<Error>;
	readonly sources: ReadonlyArray<string>;
	readonly kind: GroupShape;
	readonly args: ErrorGroupArgs;

	/** The error being handled when this group was raised. */
	context: unknown = undefined;
	/** Whether `context` is hidden in favour of `cause` when reporting. */
	suppressContext = false;

	/**
	 * Not callable from outside this module. Build groups with
	 * `makeErrorGroup`, `copyErrorGroup` or `split`.
	 */
	constructor(token: typeof trusted, parts: ErrorGroupParts) {
		super(parts.message);
		if (token !== trusted) {
			throw new TypeError(
				"ErrorGroup cannot be constructed directly; use makeErrorGroup",
			);
		}
		this.name = "ErrorGroup";
		this.exceptions = parts.exceptions;
		this.sources = parts.sources;
		this.kind = parts.kind;
		this.args = parts.args;
	}

	/**
	 * Builds a group in the default family.
	 */
	static make(
		message: string,
		exceptions: ReadonlyArray<Error>,
		sources: ReadonlyArray<string>,
	): Effect.Effect<ErrorGroup, ErrorGroupError> {
		return makeErrorGroup(message, exceptions, sources);
	}

	static unsafeMake(
		message: string,
		exceptions: ReadonlyArray<Error>,
		sources: ReadonlyArray<string>,
	): ErrorGroup {
		return unsafeMakeErrorGroup(message, exceptions, sources);
	}

	/**
	 * Links the error this group was raised from. Like an explicit
	 * "raise from", linking a cause suppresses the implicit context.
	 */
	withCause(cause: unknown): this {
		this.cause = cause;
		this.suppressContext = true;
		return this;
	}

	withContext(context: unknown): this {
		this.context = context;
		return this;
	}

	copy(): ErrorGroup {
		return copyErrorGroup(this);
	}

	toString(): string {
		return `ErrorGroup: ${renderMembers(this)}`;
	}
}

// ============================================================================
// Construction
// ============================================================================

/**
 * Validates and builds a group.
 *
 * `through` is the shape the caller builds through: the family root by
 * default, or a specialized shape the members must then satisfy. Checks run
 * in order and the first failure aborts construction:
 * 1. empty exceptions (a specialized shape always needs members; the root
 *    only accepts an empty group when its family allows it)
 * 2. every exception is an Error
 * 3. one source per exception
 * 4. the derived kind satisfies `through`
 */
export const makeErrorGroup = (
	message: string,
	exceptions: ReadonlyArray<Error>,
	sources: ReadonlyArray<string>,
	through: GroupShape = DefaultFamily.root,
): Effect.Effect<ErrorGroup, ErrorGroupError> =>
	Effect.gen(function* () {
		const family = through.family;

		if (
			exceptions.length === 0 &&
			(through.isSpecialized || !family.allowEmpty)
		) {
			return yield* Effect.fail(
				new EmptySpecializationError({
					shape: through.name,
					message: through.isSpecialized
						? `Specialization '${through.name}' does not match empty exceptions`
						: `'${through.name}' does not allow empty groups`,
				}),
			);
		}

		for (const [index, exception] of exceptions.entries()) {
			if (!isErrorValue(exception)) {
				return yield* Effect.fail(
					new InvalidMemberError({
						index,
						value: exception,
						message: `Expected an Error at index ${index}, not ${describeValue(exception)}`,
					}),
				);
			}
		}

		if (sources.length !== exceptions.length) {
			return yield* Effect.fail(
				new SourceCountMismatchError({
					sources: sources.length,
					exceptions: exceptions.length,
					message: `Different number of sources (${sources.length}) and exceptions (${exceptions.length})`,
				}),
			);
		}

		const kind = yield* getOrCreateShape(
			family.root,
			exceptions.map(kindOf),
			false,
		);

		if (through.isSpecialized && !matches(through, kind)) {
			return yield* Effect.fail(
				new InvalidSpecializationError({
					shape: through.name,
					reason: "members_mismatch",
					message: `Members of kind '${kind.name}' do not satisfy '${through.name}'`,
				}),
			);
		}

		return new ErrorGroup(trusted, {
			message,
			exceptions: Object.freeze([...exceptions]),
			sources: Object.freeze([...sources]),
			kind,
			args: [message, exceptions, sources],
		});
	});

/**
 * Synchronous `makeErrorGroup`. Throws the construction error itself.
 */
export const unsafeMakeErrorGroup = (
	message: string,
	exceptions: ReadonlyArray<Error>,
	sources: ReadonlyArray<string>,
	through?: GroupShape,
): ErrorGroup =>
	runSyncOrThrow(makeErrorGroup(message, exceptions, sources, through));

// ============================================================================
// Copy
// ============================================================================

/**
 * Copies a group with its chaining metadata. `suppressContext` is applied
 * last: linking the cause sets it as a side effect.
 */
export const copyErrorGroup = (group: ErrorGroup): ErrorGroup => {
	const copy = new ErrorGroup(trusted, {
		message: group.message,
		exceptions: group.exceptions,
		sources: group.sources,
		kind: group.kind,
		args: group.args,
	});
	return copyChaining(group, copy);
};

/**
 * Builds the group holding `group`'s members at `indices`, in that order,
 * with their sources and `group`'s message and chaining metadata. The
 * members are already validated, so only the kind is derived again.
 */
export const selectMembers = (
	group: ErrorGroup,
	indices: ReadonlyArray<number>,
): ErrorGroup => {
	const exceptions = indices.map((index) => group.exceptions[index]);
	const sources = indices.map((index) => group.sources[index]);
	const half = new ErrorGroup(trusted, {
		message: group.message,
		exceptions: Object.freeze(exceptions),
		sources: Object.freeze(sources),
		kind: resolveShape(group.kind.base, exceptions.map(kindOf), false).value,
		args: [group.message, exceptions, sources],
	});
	return copyChaining(group, half);
};

/**
 * Copies stack, context, cause and context suppression from `source` onto
 * `target`, in that order.
 *
 * Context is linked before cause, and `suppressContext` is written last
 * because `withCause` sets it. The result is the same as linking cause first
 * and context second; only the final assignment is order-sensitive.
 */
export const copyChaining = (
	source: ErrorGroup,
	target: ErrorGroup,
): ErrorGroup => {
	target.stack = source.stack;
	target.withContext(source.context);
	target.withCause(source.cause);
	target.suppressContext = source.suppressContext;
	return target;
};

// ============================================================================
// Rendering
// ============================================================================

const renderMember = (error: Error): string =>
	error.message === "" ? error.name : `${error.name}: ${error.message}`;

/**
 * Members rendered in order, comma-separated.
 */
export const renderMembers = (group: ErrorGroup): string =>
	group.exceptions.map(renderMember).join(", ");
