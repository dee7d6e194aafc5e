/**
 * Structural matching between a filter shape and a value shape.
 *
 * Covariant: a value member of a more specific kind satisfies a filter member
 * of a more general kind. Requirements and value members are checked in two
 * independent passes instead of comparing counts, because one value member
 * may satisfy several requirements and one requirement may be met by several
 * value members (`ErrorGroup[KeyError, LookupError]` against
 * `ErrorGroup[KeyError, RangeError]`).
 */

import { isSubKind, isSubKindOfAny } from "../kinds/error-kind.js";
import type { GroupShape } from "./group-shape.js";

/**
 * Does `filter` accept a group whose kind is `value`?
 *
 * Total for any pair of shapes; shapes of different families never match.
 */
export const matches = (filter: GroupShape, value: GroupShape): boolean => {
	if (filter === value) {
		return true;
	}
	if (filter.base !== value.base) {
		return false;
	}
	// the root accepts every specialization of its family
	if (filter.members.size === 0) {
		return true;
	}

	for (const required of filter.members) {
		let satisfied = false;
		for (const member of value.members) {
			if (isSubKind(member, required)) {
				satisfied = true;
				break;
			}
		}
		if (!satisfied) {
			return false;
		}
	}

	if (filter.inclusive) {
		return true;
	}

	for (const member of value.members) {
		if (!isSubKindOfAny(member, filter.members)) {
			return false;
		}
	}
	return true;
};
