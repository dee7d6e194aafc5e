/**
 * Error kinds: the nominal categories a group's members are matched by.
 *
 * A kind is any `Error` subclass constructor. The subtype relation is the
 * prototype chain, so user hierarchies (`class KeyError extends LookupError`)
 * and Effect tagged errors take part without registration.
 */

// ============================================================================
// Types
// ============================================================================

/**
 * Constructor of an error value. Abstract so that abstract base classes can
 * be used as filter members.
 */
export type ErrorKind<E extends Error = Error> = abstract new (
	...args: never[]
) => E;

// ============================================================================
// Guards
// ============================================================================

/**
 * True for `Error` itself and every constructor whose prototype chain
 * reaches `Error.prototype`.
 */
export const isErrorKind = (value: unknown): value is ErrorKind =>
	typeof value === "function" &&
	(value === Error || value.prototype instanceof Error);

export const isErrorValue = (value: unknown): value is Error =>
	value instanceof Error;

// ============================================================================
// Kind Relations
// ============================================================================

/**
 * Runtime kind of an error value: the constructor its prototype names.
 * Falls back to `Error` for objects whose `constructor` was tampered with.
 */
export const kindOf = (error: Error): ErrorKind => {
	const prototype: unknown = Object.getPrototypeOf(error);
	if (prototype === null || typeof prototype !== "object") {
		return Error;
	}
	const ctor: unknown = Reflect.get(prototype, "constructor");
	return isErrorKind(ctor) ? ctor : Error;
};

/**
 * Nominal subtype-or-equal test: `sub <: sup`.
 */
export const isSubKind = (sub: ErrorKind, sup: ErrorKind): boolean =>
	sub === sup || sub.prototype instanceof sup;

/**
 * True when `sub` is a subtype-or-equal of at least one of `sups`.
 */
export const isSubKindOfAny = (
	sub: ErrorKind,
	sups: Iterable<ErrorKind>,
): boolean => {
	for (const sup of sups) {
		if (isSubKind(sub, sup)) {
			return true;
		}
	}
	return false;
};

export const kindName = (kind: ErrorKind): string =>
	kind.name === "" ? "(anonymous)" : kind.name;
