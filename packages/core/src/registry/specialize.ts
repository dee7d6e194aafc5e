/**
 * Specialization entry point: `specialize(ErrorGroupRoot, KeyError, Open)`.
 *
 * Requires at least one item, then resolves the interned shape through the
 * family registry, which validates the items. `Open` marks the shape
 * inclusive.
 */

import { Effect } from "effect";
import { InvalidSpecializationError } from "../errors/group-errors.js";
import { runSyncOrThrow } from "../utils/run-sync.js";
import {
	type GroupShape,
	getOrCreateShape,
	logRejection,
	Open,
	type SpecializationItem,
} from "./group-shape.js";

export { Open, type SpecializationItem };

/**
 * Refines an unspecialized shape with member kinds.
 *
 * Fails with InvalidSpecializationError when `shape` is already specialized,
 * when no items are given, or when an item is neither an Error subclass nor
 * `Open`. Specializing with `Open` alone yields the root itself.
 */
export const specialize = (
	shape: GroupShape,
	...items: ReadonlyArray<SpecializationItem>
): Effect.Effect<GroupShape, InvalidSpecializationError> =>
	items.length === 0 && !shape.isSpecialized
		? Effect.fail(
				new InvalidSpecializationError({
					shape: shape.name,
					reason: "empty",
					message: `Specialization of '${shape.name}' needs at least one kind`,
				}),
			).pipe(Effect.tapError(logRejection(shape)))
		: getOrCreateShape(shape, items, false);

/**
 * Synchronous `specialize`. Throws the InvalidSpecializationError itself.
 */
export const unsafeSpecialize = (
	shape: GroupShape,
	...items: ReadonlyArray<SpecializationItem>
): GroupShape => runSyncOrThrow(specialize(shape, ...items));
