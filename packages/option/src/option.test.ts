/**
 * Option Tests
 */
import { describe, it, expect } from "vitest";
import { Some, Nil, nil, fromNullable, isOption } from "./option.js";
import type { Option } from "./option.js";
import { ExpectNilError, UnwrapNilError } from "./errors.js";
import { GT, LT } from "./ordering.js";

const none: Option<number> = nil;

// ============================================================================
// Constructors
// ============================================================================

describe("Option", () => {
  describe("constructors", () => {
    it("Some wraps a value", () => {
      const opt = Some(42);
      expect(opt._tag).toBe("Some");
      expect(opt.value).toBe(42);
    });

    it("nil is a single shared instance", () => {
      expect(Nil).toBe(nil);
      expect(nil._tag).toBe("Nil");
    });

    it("Some keeps falsy values present", () => {
      expect(Some(undefined).isSome()).toBe(true);
      expect(Some(null).isSome()).toBe(true);
      expect(Some(0).isSome()).toBe(true);
      expect(Some(false).isSome()).toBe(true);
    });

    it("fromNullable maps null and undefined to nil", () => {
      expect(fromNullable(null)).toBe(nil);
      expect(fromNullable(undefined)).toBe(nil);
      expect(fromNullable(0).unwrap()).toBe(0);
      expect(fromNullable("").unwrap()).toBe("");
    });

    it("isOption recognizes both variants only", () => {
      expect(isOption(Some(1))).toBe(true);
      expect(isOption(nil)).toBe(true);
      expect(isOption({ _tag: "Some", value: 1 })).toBe(false);
      expect(isOption(null)).toBe(false);
    });
  });

  // ==========================================================================
  // Type guards
  // ==========================================================================

  describe("type guards", () => {
    it("isSome and isNil are exclusive", () => {
      expect(Some(1).isSome()).toBe(true);
      expect(Some(1).isNil()).toBe(false);
      expect(none.isSome()).toBe(false);
      expect(none.isNil()).toBe(true);
    });

    it("isSome narrows to the value", () => {
      const opt: Option<string> = Some("a");
      if (opt.isSome()) {
        expect(opt.value).toBe("a");
      } else {
        expect.unreachable();
      }
    });

    it("isSomeAnd requires a value and a passing predicate", () => {
      expect(Some(4).isSomeAnd((x) => x > 3)).toBe(true);
      expect(Some(2).isSomeAnd((x) => x > 3)).toBe(false);
      expect(none.isSomeAnd((x) => x > 3)).toBe(false);
    });

    it("isNilOr holds vacuously for nil", () => {
      expect(none.isNilOr((x) => x > 3)).toBe(true);
      expect(Some(4).isNilOr((x) => x > 3)).toBe(true);
      expect(Some(2).isNilOr((x) => x > 3)).toBe(false);
    });
  });

  // ==========================================================================
  // Extraction
  // ==========================================================================

  describe("extraction", () => {
    it("unwrap returns the value or throws UnwrapNilError", () => {
      expect(Some(3).unwrap()).toBe(3);
      expect(() => none.unwrap()).toThrow(UnwrapNilError);
      expect(() => none.unwrap()).toThrow("Attempted to unwrap nil");
    });

    it("expect throws ExpectNilError with the caller's message", () => {
      expect(Some(3).expect("missing")).toBe(3);
      expect(() => none.expect("config value missing")).toThrow(ExpectNilError);
      expect(() => none.expect("config value missing")).toThrow("config value missing");
    });

    it("errors carry their class name", () => {
      expect(new UnwrapNilError().name).toBe("UnwrapNilError");
      expect(new ExpectNilError().name).toBe("ExpectNilError");
    });

    it("unwrapOr and unwrapOrElse fall back on nil", () => {
      expect(Some(3).unwrapOr(0)).toBe(3);
      expect(none.unwrapOr(0)).toBe(0);
      let calls = 0;
      expect(
        Some(3).unwrapOrElse(() => {
          calls++;
          return 0;
        })
      ).toBe(3);
      expect(calls).toBe(0);
      expect(none.unwrapOrElse(() => 7)).toBe(7);
    });

    it("match dispatches on the variant", () => {
      const render = (opt: Option<number>) =>
        opt.match({ Some: (x) => `got ${x}`, Nil: () => "nothing" });
      expect(render(Some(5))).toBe("got 5");
      expect(render(none)).toBe("nothing");
    });
  });

  // ==========================================================================
  // Transformation
  // ==========================================================================

  describe("transformation", () => {
    it("map applies only to Some", () => {
      expect(Some(2).map((x) => x * 10).unwrap()).toBe(20);
      expect(none.map((x) => x * 10)).toBe(nil);
    });

    it("mapOr and mapOrElse", () => {
      expect(Some(2).mapOr(0, (x) => x + 1)).toBe(3);
      expect(none.mapOr(0, (x) => x + 1)).toBe(0);
      expect(none.mapOrElse(() => -1, (x) => x + 1)).toBe(-1);
    });

    it("andThen chains fallible steps", () => {
      const half = (x: number): Option<number> => (x % 2 === 0 ? Some(x / 2) : nil);
      expect(Some(8).andThen(half).andThen(half).unwrap()).toBe(2);
      expect(Some(6).andThen(half).andThen(half).isNil()).toBe(true);
    });

    it("filter keeps values passing the predicate", () => {
      const four = Some(4);
      expect(four.filter((x) => x > 3)).toBe(four);
      expect(Some(2).filter((x) => x > 3)).toBe(nil);
    });

    it("flatten removes one level of nesting", () => {
      const inner = Some(1);
      expect(Some(inner).flatten()).toBe(inner);
      const nested: Option<Option<number>> = Some(none);
      expect(nested.flatten()).toBe(nil);
    });

    it("zip pairs two Somes", () => {
      expect(Some(1).zip(Some("a")).unwrap()).toEqual([1, "a"]);
      expect(Some(1).zip(nil).isNil()).toBe(true);
      expect(none.zip(Some("a")).isNil()).toBe(true);
    });

    it("unzip splits a pair", () => {
      const pair: Option<readonly [number, string]> = Some([1, "a"] as const);
      const [left, right] = pair.unzip();
      expect(left.unwrap()).toBe(1);
      expect(right.unwrap()).toBe("a");

      const empty: Option<readonly [number, string]> = nil;
      const [l, r] = empty.unzip();
      expect(l.isNil() && r.isNil()).toBe(true);
    });
  });

  // ==========================================================================
  // Boolean combinators
  // ==========================================================================

  describe("boolean combinators", () => {
    it("and returns the other option when this is Some", () => {
      expect(Some(1).and(Some("b")).unwrap()).toBe("b");
      expect(none.and(Some("b"))).toBe(nil);
    });

    it("or and orElse prefer this", () => {
      expect(Some(1).or(Some(2)).unwrap()).toBe(1);
      expect(none.or(Some(2)).unwrap()).toBe(2);
      expect(none.orElse(() => Some(3)).unwrap()).toBe(3);
    });

    it("xor is Some only when exactly one side is", () => {
      expect(Some(1).xor(none).unwrap()).toBe(1);
      expect(none.xor(Some(2)).unwrap()).toBe(2);
      expect(Some(1).xor(Some(2))).toBe(nil);
      expect(none.xor(none)).toBe(nil);
    });
  });

  // ==========================================================================
  // Swapping accessors
  // ==========================================================================

  describe("swapping accessors", () => {
    it("insert always replaces", () => {
      const { inserted, returned } = none.insert(5);
      expect(inserted.value).toBe(5);
      expect(returned).toBe(5);
    });

    it("getOrInsert keeps an existing value", () => {
      const existing = Some(1);
      const kept = existing.getOrInsert(9);
      expect(kept.inserted).toBe(existing);
      expect(kept.returned).toBe(1);

      const filled = none.getOrInsert(9);
      expect(filled.inserted.value).toBe(9);
      expect(filled.returned).toBe(9);
    });

    it("getOrInsertWith calls the thunk only for nil", () => {
      let calls = 0;
      const make = () => {
        calls++;
        return 4;
      };
      expect(Some(1).getOrInsertWith(make).returned).toBe(1);
      expect(none.getOrInsertWith(make).returned).toBe(4);
      expect(calls).toBe(1);
    });

    it("replace hands back the previous option", () => {
      const swapped = Some(1).replace(2);
      expect(swapped.inserted.value).toBe(2);
      expect(swapped.returned.unwrap()).toBe(1);
      expect(none.replace(2).returned).toBe(nil);
    });

    it("take leaves nil behind", () => {
      const taken = Some(1).take();
      expect(taken.inserted).toBe(nil);
      expect(taken.returned.unwrap()).toBe(1);
    });
  });

  // ==========================================================================
  // Comparison
  // ==========================================================================

  describe("comparison", () => {
    it("eq compares variants and values", () => {
      expect(Some(1).eq(Some(1))).toBe(true);
      expect(Some(1).eq(Some(2))).toBe(false);
      expect(Some(1).eq(none)).toBe(false);
      expect(none.eq(nil)).toBe(true);
    });

    it("eq accepts a custom equality", () => {
      const sameLength = (a: string, b: string) => a.length === b.length;
      expect(Some("ab").eq(Some("cd"), sameLength)).toBe(true);
    });

    it("cmp orders nil before Some", () => {
      expect(none.cmp(Some(0))).toBe(LT);
      expect(Some(0).cmp(none)).toBe(GT);
      expect(none.cmp(none)).toBe(0);
      expect(Some(1).cmp(Some(2))).toBe(LT);
      expect(Some("b").cmp(Some("a"))).toBe(GT);
    });

    it("cmp throws for incomparable values", () => {
      expect(() => Some(NaN).cmp(Some(1))).toThrow(TypeError);
    });
  });

  // ==========================================================================
  // Conversion
  // ==========================================================================

  describe("conversion", () => {
    it("iterates zero or one values", () => {
      expect([...Some(3)]).toEqual([3]);
      expect([...none]).toEqual([]);
    });

    it("toString shows the variant", () => {
      expect(Some(3).toString()).toBe("Some(3)");
      expect(Some("x").toString()).toBe('Some("x")');
      expect(nil.toString()).toBe("nil");
    });
  });
});
