import { Effect, Either } from "effect";

/**
 * Runs a synchronous Effect and returns its value, throwing the typed
 * failure itself (not a FiberFailure wrapper) when it fails.
 */
export const runSyncOrThrow = <A, E>(effect: Effect.Effect<A, E>): A =>
	Either.getOrThrowWith(Effect.runSync(Effect.either(effect)), (error) => error);

/**
 * Short human-readable rendering of an arbitrary value for error messages.
 */
export const describeValue = (value: unknown): string => {
	if (typeof value === "string") {
		return JSON.stringify(value);
	}
	if (typeof value === "function") {
		return value.name === "" ? "[anonymous function]" : `[function ${value.name}]`;
	}
	if (value instanceof Error) {
		return `${value.name}: ${value.message}`;
	}
	return String(value);
};
