/**
 * Group families and their specialization shapes.
 *
 * A family is one root grouped-error kind. Every shape of a family refines
 * its root with a set of member kinds and an inclusive flag. Shapes are
 * interned per family: equal requests return the same object, so identity
 * comparison is a valid fast path in the matcher.
 */

import { Effect } from "effect";
import { InvalidSpecializationError } from "../errors/group-errors.js";
import { type ErrorKind, isErrorKind, kindName } from "../kinds/error-kind.js";
import { describeValue, runSyncOrThrow } from "../utils/run-sync.js";
import { ShapeCache } from "./shape-cache.js";

// ============================================================================
// Configuration
// ============================================================================

export interface GroupFamilyConfig {
	/** Rendered as the shape name prefix. Defaults to "ErrorGroup". */
	readonly name?: string;
	/**
	 * Accept groups with no members when built through the root.
	 * A specialized shape always requires members. Defaults to false.
	 */
	readonly allowEmpty?: boolean;
}

// ============================================================================
// Kind Identifiers
// ============================================================================

const kindIds = new WeakMap<ErrorKind, number>();
let nextKindId = 0;

const kindId = (kind: ErrorKind): number => {
	const existing = kindIds.get(kind);
	if (existing !== undefined) {
		return existing;
	}
	const id = nextKindId++;
	kindIds.set(kind, id);
	return id;
};

// ============================================================================
// Shapes
// ============================================================================

export class GroupShape {
	readonly family: GroupFamily;
	readonly members: ReadonlySet<ErrorKind>;
	readonly inclusive: boolean;
	readonly name: string;

	constructor(
		family: GroupFamily,
		members: ReadonlySet<ErrorKind>,
		inclusive: boolean,
	) {
		this.family = family;
		this.members = members;
		this.inclusive = inclusive;
		this.name = shapeName(family.name, members, inclusive);
		Object.freeze(this);
	}

	/** The unspecialized root this shape refines. */
	get base(): GroupShape {
		return this.family.root;
	}

	get isSpecialized(): boolean {
		return this.members.size > 0;
	}

	toString(): string {
		return this.name;
	}
}

const sortedMembers = (
	members: ReadonlySet<ErrorKind>,
): ReadonlyArray<ErrorKind> =>
	[...members].sort((a, b) => {
		const byName = kindName(a).localeCompare(kindName(b));
		return byName !== 0 ? byName : kindId(a) - kindId(b);
	});

const shapeName = (
	familyName: string,
	members: ReadonlySet<ErrorKind>,
	inclusive: boolean,
): string => {
	if (members.size === 0) {
		return familyName;
	}
	const names = sortedMembers(members).map(kindName);
	if (inclusive) {
		names.push("...");
	}
	return `${familyName}[${names.join(", ")}]`;
};

// ============================================================================
// Families
// ============================================================================

export class GroupFamily {
	readonly name: string;
	readonly allowEmpty: boolean;
	readonly root: GroupShape;
	readonly cache = new ShapeCache<GroupShape>();

	constructor(config: GroupFamilyConfig = {}) {
		this.name = config.name ?? "ErrorGroup";
		this.allowEmpty = config.allowEmpty ?? false;
		this.root = new GroupShape(this, new Set(), true);
	}
}

export const createGroupFamily = (config?: GroupFamilyConfig): GroupFamily =>
	new GroupFamily(config);

/** The family `ErrorGroup.make` builds into. */
export const DefaultFamily: GroupFamily = createGroupFamily();

// ============================================================================
// Registry
// ============================================================================

const cacheKey = (
	members: ReadonlySet<ErrorKind>,
	inclusive: boolean,
): string => {
	const ids = [...members].map(kindId).sort((a, b) => a - b);
	return inclusive ? `${ids.join(",")},...` : ids.join(",");
};

/**
 * Interned lookup that also reports whether the shape was newly realized.
 * An empty member set always resolves to the family root.
 */
export const resolveShape = (
	base: GroupShape,
	members: Iterable<ErrorKind>,
	inclusive: boolean,
): { readonly value: GroupShape; readonly created: boolean } => {
	const family = base.family;
	const unique: ReadonlySet<ErrorKind> = new Set(members);
	if (unique.size === 0) {
		return { value: family.root, created: false };
	}
	return family.cache.getOrCreate(
		cacheKey(unique, inclusive),
		() => new GroupShape(family, unique, inclusive),
	);
};

// ============================================================================
// Open Marker
// ============================================================================

/**
 * Marks a specialization inclusive: the listed kinds must be present,
 * other member kinds are tolerated.
 */
export const Open: unique symbol = Symbol.for("@errgroup/core/Open");

export type SpecializationItem = ErrorKind | typeof Open;

/**
 * Returns the shape of `base`'s family for the given members and flag,
 * creating it on first request. Repeated calls with an equal member set
 * return the identical object. `Open` among the members sets `inclusive`.
 *
 * Fails with InvalidSpecializationError when `base` is already specialized
 * or a member is neither an Error subclass nor `Open`. Newly realized shapes
 * and rejections are logged at debug level.
 */
export const getOrCreateShape = (
	base: GroupShape,
	members: Iterable<SpecializationItem>,
	inclusive: boolean,
): Effect.Effect<GroupShape, InvalidSpecializationError> =>
	Effect.gen(function* () {
		if (base.isSpecialized) {
			return yield* Effect.fail(
				new InvalidSpecializationError({
					shape: base.name,
					reason: "already_specialized",
					message: `Cannot specialize already specialized '${base.name}'`,
				}),
			);
		}

		const kinds: Array<ErrorKind> = [];
		let open = inclusive;
		for (const [index, item] of [...members].entries()) {
			if (item === Open) {
				open = true;
				continue;
			}
			if (!isErrorKind(item)) {
				return yield* Effect.fail(
					new InvalidSpecializationError({
						shape: base.name,
						reason: "invalid_kind",
						index,
						message: `Expected an Error subclass at index ${index}, not ${describeValue(item)}`,
					}),
				);
			}
			kinds.push(item);
		}

		const { value, created } = resolveShape(base, kinds, open);
		if (created) {
			yield* Effect.logDebug("Realized group shape").pipe(
				Effect.annotateLogs({ family: base.family.name, shape: value.name }),
			);
		}
		return value;
	}).pipe(Effect.tapError(logRejection(base)));

/**
 * Synchronous `getOrCreateShape`. Throws the InvalidSpecializationError itself.
 */
export const unsafeGetOrCreateShape = (
	base: GroupShape,
	members: Iterable<SpecializationItem>,
	inclusive: boolean,
): GroupShape => runSyncOrThrow(getOrCreateShape(base, members, inclusive));

/** Debug log for a refused specialization request. */
export const logRejection =
	(base: GroupShape) =>
	(error: InvalidSpecializationError): Effect.Effect<void> =>
		Effect.logDebug(error.message).pipe(
			Effect.annotateLogs({ family: base.family.name, reason: error.reason }),
		);
