import { describe, it, expect, expectTypeOf } from "vitest";
import { nil } from "@iterum/option";
import { Diterum, PeekableDiterum, SizedDiterum } from "../diterum.js";
import { iterum, range, rangeFrom } from "../entry.js";
import { Iterum, PeekableIterum } from "../iterum.js";
import type { DoubleEndedSequence } from "../protocol.js";

// ===========================================================================
// Capabilities carried through the chain
// ===========================================================================

describe("wrapper capabilities", () => {
  it("arrays and ranges are sized", () => {
    expectTypeOf(iterum([1, 2])).toEqualTypeOf<SizedDiterum<number>>();
    expectTypeOf(range(3)).toEqualTypeOf<SizedDiterum<number>>();
    expect(range(3)).toBeInstanceOf(SizedDiterum);
  });

  it("filter keeps the back but loses the length", () => {
    const filtered = range(3).filter((x) => x > 0);
    expectTypeOf(filtered).toEqualTypeOf<Diterum<number>>();
    expect(filtered).toBeInstanceOf(Diterum);
    expect(filtered).not.toBeInstanceOf(SizedDiterum);
  });

  it("take is forward-only", () => {
    const taken = range(3).take(2);
    expectTypeOf(taken).toEqualTypeOf<Iterum<number>>();
    expect(taken).not.toBeInstanceOf(Diterum);
  });

  it("zip stays sized only against a sized side", () => {
    expectTypeOf(range(3).zip(["a"])).toEqualTypeOf<SizedDiterum<[number, string]>>();
    expectTypeOf(range(3).zip(new Set(["a"]))).toEqualTypeOf<Iterum<[number, string]>>();
    expect(range(3).zip(new Set(["a"]))).not.toBeInstanceOf(Diterum);
  });

  it("chain follows the weaker side", () => {
    expectTypeOf(range(2).chain(range(2))).toEqualTypeOf<SizedDiterum<number>>();
    expectTypeOf(range(2).chain(range(2).filter(Boolean))).toEqualTypeOf<Diterum<number>>();
    expectTypeOf(range(2).chain(rangeFrom())).toEqualTypeOf<Iterum<number>>();
    expect(range(2).chain(range(2).filter(Boolean))).not.toBeInstanceOf(SizedDiterum);
  });

  it("peekable keeps the back when there is one", () => {
    expectTypeOf(range(2).peekable()).toEqualTypeOf<PeekableDiterum<number>>();
    expectTypeOf(rangeFrom().peekable()).toEqualTypeOf<PeekableIterum<number>>();
    expect(range(2).peekable()).toBeInstanceOf(PeekableDiterum);
  });

  it("forward-only sources stay forward-only", () => {
    const items = iterum(new Set([1]));
    expectTypeOf(items).toEqualTypeOf<Iterum<number>>();
    expect(items).not.toBeInstanceOf(Diterum);
  });
});

// ===========================================================================
// Cursors
// ===========================================================================

describe("front and back cursors", () => {
  it.each([0, 1, 2, 3, 4, 5, 6])("never cross over range(%i)", (n) => {
    const items = range(n);
    const seen: number[] = [];
    for (let i = 0; ; i++) {
      const item = i % 2 === 0 ? items.next() : items.nextBack();
      if (item.isNil()) break;
      seen.push(item.value);
    }
    expect([...seen].sort((a, b) => a - b)).toEqual(range(n).collect());
    expect(items.next()).toBe(nil);
    expect(items.nextBack()).toBe(nil);
  });

  const drain = (items: DoubleEndedSequence<unknown>): unknown[] => {
    const out: unknown[] = [];
    for (let item = items.next(); item.isSome(); item = items.next()) out.push(item.value);
    return out;
  };

  const peeked = () => {
    const items = range(5).peekable();
    items.peek();
    return items;
  };

  it.each<[string, () => DoubleEndedSequence<unknown>]>([
    ["map", () => range(5).map((x) => x * 2)],
    ["filter", () => range(10).filter((x) => x % 3 !== 0)],
    ["zip", () => range(5).zip(["a", "b", "c", "d", "e", "f", "g"])],
    ["enumerate", () => iterum(["a", "b", "c", "d", "e"]).enumerate()],
    ["peekable after a peek", peeked],
    ["fuse", () => range(5).fuse()],
    ["chain", () => range(3).chain([7, 8, 9])],
    ["rev", () => range(6).rev()],
  ])("never cross over %s", (_, make) => {
    const items = make();
    const front: unknown[] = [];
    const back: unknown[] = [];
    for (let i = 0; ; i++) {
      const item = i % 2 === 0 ? items.next() : items.nextBack();
      if (item.isNil()) break;
      (i % 2 === 0 ? front : back).push(item.value);
    }
    expect([...front, ...back.reverse()]).toEqual(drain(make()));
    expect(items.next()).toBe(nil);
    expect(items.nextBack()).toBe(nil);
  });

  it("len tracks pulls from both ends", () => {
    const items = iterum(["a", "b", "c", "d"]);
    items.next();
    expect(items.len()).toBe(3);
    items.nextBack();
    expect(items.len()).toBe(2);
    expect(items.collect()).toEqual(["b", "c"]);
    expect(items.isEmpty()).toBe(true);
  });
});
