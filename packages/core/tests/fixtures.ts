/**
 * Error hierarchy shared by the tests:
 *
 *   Error
 *   ├── LookupError
 *   │   ├── KeyError
 *   │   └── IndexError
 *   ├── RangeError
 *   └── TypeError
 */

export class LookupError extends Error {
	name = "LookupError";
}

export class KeyError extends LookupError {
	name = "KeyError";
}

export class IndexError extends LookupError {
	name = "IndexError";
}

/** Builds aligned sources ("s0", "s1", ...) for a list of members. */
export const sourcesFor = (exceptions: ReadonlyArray<Error>): Array<string> =>
	exceptions.map((_, index) => `s${index}`);
