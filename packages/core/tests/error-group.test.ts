import { Effect } from "effect";
import { describe, expect, it } from "vitest";
import {
	EmptySpecializationError,
	InvalidMemberError,
	InvalidSpecializationError,
	SourceCountMismatchError,
} from "../src/errors/index.js";
import {
	copyErrorGroup,
	ErrorGroup,
	makeErrorGroup,
	renderMembers,
	unsafeMakeErrorGroup,
} from "../src/group/error-group.js";
import { createGroupFamily, DefaultFamily } from "../src/registry/group-shape.js";
import { Open, unsafeSpecialize } from "../src/registry/specialize.js";
import { KeyError, LookupError } from "./fixtures.js";

const root = DefaultFamily.root;

/** A group raised from the error it was handling, like `raise ... from e`. */
const raiseFrom = (): ErrorGroup => {
	const handled = new RangeError("division by zero");
	return ErrorGroup.unsafeMake("ManyError", [handled], [handled.message])
		.withContext(handled)
		.withCause(handled);
};

// ============================================================================
// Construction
// ============================================================================

describe("ErrorGroup construction", () => {
	it("stores message, exceptions and sources", () => {
		const memberA = new RangeError("A");
		const memberB = new TypeError("B");
		const exceptions = [memberA, memberB];
		const sources = [String(memberA), String(memberB)];

		const group = unsafeMakeErrorGroup("many error.", exceptions, sources);

		expect(group.message).toBe("many error.");
		expect(group.exceptions).toEqual([memberA, memberB]);
		expect(group.exceptions[0]).toBe(memberA);
		expect(group.exceptions[1]).toBe(memberB);
		expect(group.sources).toEqual(["RangeError: A", "TypeError: B"]);
	});

	it("keeps the unmodified arguments", () => {
		const exceptions = [new RangeError("A")];
		const sources = ["A"];
		const group = unsafeMakeErrorGroup("many error.", exceptions, sources);

		expect(group.args[0]).toBe("many error.");
		expect(group.args[1]).toBe(exceptions);
		expect(group.args[2]).toBe(sources);
	});

	it("freezes its own copies of the sequences", () => {
		const exceptions = [new RangeError("A")];
		const group = unsafeMakeErrorGroup("m", exceptions, ["A"]);

		expect(group.exceptions).not.toBe(exceptions);
		expect(Object.isFrozen(group.exceptions)).toBe(true);
		expect(Object.isFrozen(group.sources)).toBe(true);
		exceptions.push(new TypeError("late"));
		expect(group.exceptions).toHaveLength(1);
	});

	it("is an Error with a discriminating tag", () => {
		const group = unsafeMakeErrorGroup("m", [new KeyError()], ["s"]);
		expect(group).toBeInstanceOf(Error);
		expect(group).toBeInstanceOf(ErrorGroup);
		expect(group._tag).toBe("ErrorGroup");
		expect(group.name).toBe("ErrorGroup");
	});

	it("derives the exact kind from its members", () => {
		const group = unsafeMakeErrorGroup(
			"m",
			[new RangeError("A"), new TypeError("B")],
			["a", "b"],
		);
		expect(group.kind).toBe(unsafeSpecialize(root, TypeError, RangeError));
		expect(group.kind.inclusive).toBe(false);
		expect(group.kind.name).toBe("ErrorGroup[RangeError, TypeError]");
	});

	it("collapses repeated member kinds", () => {
		const group = unsafeMakeErrorGroup(
			"m",
			[new KeyError(), new KeyError()],
			["a", "b"],
		);
		expect(group.kind.members.size).toBe(1);
		expect(group.kind).toBe(unsafeSpecialize(root, KeyError));
	});

	it("ErrorGroup.make builds into the default family", () => {
		const group = Effect.runSync(ErrorGroup.make("m", [new KeyError()], ["s"]));
		expect(group.kind.base).toBe(DefaultFamily.root);
	});
});

// ============================================================================
// Validation
// ============================================================================

describe("ErrorGroup validation", () => {
	it("rejects members that are not errors", () => {
		const error = Effect.runSync(
			Effect.flip(
				makeErrorGroup(
					"error",
					[new RangeError("RangeError"), "error2" as unknown as Error],
					["RangeError", "error2"],
				),
			),
		);
		expect(error).toBeInstanceOf(InvalidMemberError);
		expect(error._tag).toBe("InvalidMemberError");
		if (error._tag === "InvalidMemberError") {
			expect(error.index).toBe(1);
			expect(error.value).toBe("error2");
		}
		expect(error.message).toBe('Expected an Error at index 1, not "error2"');
	});

	it("rejects mismatched source counts", () => {
		const error = Effect.runSync(
			Effect.flip(
				makeErrorGroup(
					"many error.",
					[new RangeError("A"), new TypeError("B")],
					["A"],
				),
			),
		);
		expect(error).toBeInstanceOf(SourceCountMismatchError);
		if (error._tag === "SourceCountMismatchError") {
			expect(error.sources).toBe(1);
			expect(error.exceptions).toBe(2);
		}
		expect(error.message).toBe(
			"Different number of sources (1) and exceptions (2)",
		);
	});

	it("rejects more sources than exceptions", () => {
		const error = Effect.runSync(
			Effect.flip(makeErrorGroup("m", [new RangeError("A")], ["a", "b"])),
		);
		expect(error.message).toBe(
			"Different number of sources (2) and exceptions (1)",
		);
	});

	it("reports an invalid member before a source mismatch", () => {
		const error = Effect.runSync(
			Effect.flip(makeErrorGroup("m", [42 as unknown as Error], [])),
		);
		expect(error._tag).toBe("InvalidMemberError");
		expect(error.message).toBe("Expected an Error at index 0, not 42");
	});

	it("refuses construction that skips validation", () => {
		const lookupOnly = unsafeSpecialize(root, LookupError);
		const build = () =>
			Reflect.construct(ErrorGroup, [
				Symbol("ErrorGroup.trusted"),
				{
					message: "m",
					exceptions: [new TypeError("t")],
					sources: [],
					kind: lookupOnly,
					args: ["m", [new TypeError("t")], []],
				},
			]);
		expect(build).toThrow(
			new TypeError(
				"ErrorGroup cannot be constructed directly; use makeErrorGroup",
			),
		);
	});

	it("unsafeMake throws the construction error itself", () => {
		expect(() =>
			ErrorGroup.unsafeMake("m", [null as unknown as Error], ["a"]),
		).toThrow(InvalidMemberError);
		expect(() => unsafeMakeErrorGroup("m", [new KeyError()], [])).toThrow(
			SourceCountMismatchError,
		);
	});
});

// ============================================================================
// Empty Groups and Specialized Construction
// ============================================================================

describe("ErrorGroup empty groups", () => {
	it("rejects an empty group in the default family", () => {
		const error = Effect.runSync(Effect.flip(makeErrorGroup("m", [], [])));
		expect(error).toBeInstanceOf(EmptySpecializationError);
		expect(error.message).toBe("'ErrorGroup' does not allow empty groups");
	});

	it("accepts an empty group through the root of a lenient family", () => {
		const family = createGroupFamily({ name: "Lenient", allowEmpty: true });
		const group = unsafeMakeErrorGroup("m", [], [], family.root);
		expect(group.exceptions).toEqual([]);
		expect(group.kind).toBe(family.root);
	});

	it("rejects an empty group through a specialized shape in any family", () => {
		const family = createGroupFamily({ name: "Lenient", allowEmpty: true });
		const shape = unsafeSpecialize(family.root, KeyError);
		const error = Effect.runSync(
			Effect.flip(makeErrorGroup("m", [], [], shape)),
		);
		expect(error._tag).toBe("EmptySpecializationError");
		expect(error.message).toBe(
			"Specialization 'Lenient[KeyError]' does not match empty exceptions",
		);
	});
});

describe("ErrorGroup through a specialized shape", () => {
	it("keeps the exact derived kind when the members satisfy the shape", () => {
		const through = unsafeSpecialize(root, LookupError, Open);
		const group = unsafeMakeErrorGroup(
			"m",
			[new KeyError(), new TypeError()],
			["a", "b"],
			through,
		);
		expect(group.kind).toBe(unsafeSpecialize(root, KeyError, TypeError));
	});

	it("rejects members that do not satisfy the shape", () => {
		const through = unsafeSpecialize(root, LookupError);
		const error = Effect.runSync(
			Effect.flip(makeErrorGroup("m", [new TypeError()], ["a"], through)),
		);
		expect(error).toBeInstanceOf(InvalidSpecializationError);
		if (error._tag === "InvalidSpecializationError") {
			expect(error.reason).toBe("members_mismatch");
		}
		expect(error.message).toBe(
			"Members of kind 'ErrorGroup[TypeError]' do not satisfy 'ErrorGroup[LookupError]'",
		);
	});
});

// ============================================================================
// Chaining and Copy
// ============================================================================

describe("ErrorGroup chaining", () => {
	it("starts without cause or context", () => {
		const group = unsafeMakeErrorGroup("m", [new KeyError()], ["s"]);
		expect(group.cause).toBeUndefined();
		expect(group.context).toBeUndefined();
		expect(group.suppressContext).toBe(false);
	});

	it("suppresses the context when a cause is linked", () => {
		const group = unsafeMakeErrorGroup("m", [new KeyError()], ["s"]);
		const cause = new RangeError("boom");
		expect(group.withCause(cause)).toBe(group);
		expect(group.cause).toBe(cause);
		expect(group.suppressContext).toBe(true);
	});

	it("links a context without touching suppression", () => {
		const group = unsafeMakeErrorGroup("m", [new KeyError()], ["s"]);
		const context = new RangeError("while handling");
		group.withContext(context);
		expect(group.context).toBe(context);
		expect(group.suppressContext).toBe(false);
	});
});

describe("copyErrorGroup", () => {
	it("copies fields and chaining metadata", () => {
		const group = raiseFrom();
		const copy = copyErrorGroup(group);

		expect(copy).not.toBe(group);
		expect(copy.message).toBe(group.message);
		expect(copy.exceptions).toEqual(group.exceptions);
		expect(copy.exceptions[0]).toBe(group.exceptions[0]);
		expect(copy.sources).toEqual(group.sources);
		expect(copy.kind).toBe(group.kind);
		expect(copy.stack).toBe(group.stack);
		expect(copy.cause).toBe(group.cause);
		expect(copy.context).toBe(group.context);
		expect(copy.cause).toBeInstanceOf(RangeError);
		expect(copy.context).toBeInstanceOf(RangeError);
		expect(copy.suppressContext).toBe(true);
	});

	it("reproduces a cleared suppression flag despite the linked cause", () => {
		const group = raiseFrom();
		group.suppressContext = false;

		const copy = group.copy();

		expect(copy.cause).toBe(group.cause);
		expect(copy.context).toBe(group.context);
		expect(copy.suppressContext).toBe(false);
	});

	it("copies a group that was never chained", () => {
		const group = unsafeMakeErrorGroup("m", [new KeyError()], ["s"]);
		const copy = copyErrorGroup(group);
		expect(copy.cause).toBeUndefined();
		expect(copy.context).toBeUndefined();
		expect(copy.suppressContext).toBe(false);
	});
});

// ============================================================================
// Rendering
// ============================================================================

describe("ErrorGroup rendering", () => {
	const memberA = new RangeError("memberA");
	const memberB = new RangeError("memberB");
	const group = unsafeMakeErrorGroup(
		"many error.",
		[memberA, memberB],
		[String(memberA), String(memberB)],
	);

	it("joins member renderings in order", () => {
		expect(renderMembers(group)).toBe(
			"RangeError: memberA, RangeError: memberB",
		);
	});

	it("prefixes the detailed form", () => {
		expect(group.toString()).toBe(
			"ErrorGroup: RangeError: memberA, RangeError: memberB",
		);
		expect(String(group)).toBe(
			"ErrorGroup: RangeError: memberA, RangeError: memberB",
		);
	});

	it("renders members without a message by name", () => {
		const bare = unsafeMakeErrorGroup(
			"m",
			[new KeyError(), new TypeError("t")],
			["a", "b"],
		);
		expect(renderMembers(bare)).toBe("KeyError, TypeError: t");
	});
});
