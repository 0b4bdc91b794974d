import { EnumSet } from "@enumset/core";
import { Foo, FooOrdinal, WIDE, WideOrdinal } from "./fixtures/foo";

const { A, B, C } = Foo;
const empty = () => new EnumSet(FooOrdinal);

test("new set is empty", () => {
  const e = empty();
  expect(e.isEmpty()).toBe(true);
  expect(e.size).toBe(0);
  expect(e.bits).toBe(0);
});

test("debug rendering", () => {
  const e = empty();
  expect(e.toString()).toBe("{}");
  e.insert(A);
  expect(e.toString()).toBe("{A}");
  e.insert(C);
  expect(e.toString()).toBe("{A, C}");
  expect(`${e}`).toBe("{A, C}");
});

test("rendering falls back to String() without nameOf", () => {
  const s = EnumSet.of(WideOrdinal, "V03", "V01");
  expect(s.toString()).toBe("{V01, V03}");
});

test("size", () => {
  const e = empty();
  e.insert(A);
  e.insert(B);
  e.insert(C);
  expect(e.size).toBe(3);
  e.remove(A);
  expect(e.size).toBe(2);
  e.clear();
  expect(e.size).toBe(0);
  expect(e.isEmpty()).toBe(true);
});

test("insert and remove report membership changes", () => {
  const e = empty();
  expect(e.insert(B)).toBe(true);
  expect(e.size).toBe(1);
  expect(e.insert(B)).toBe(false);
  expect(e.size).toBe(1);
  expect(e.remove(A)).toBe(false);
  expect(e.remove(B)).toBe(true);
  expect(e.remove(B)).toBe(false);
  expect(e.isEmpty()).toBe(true);
});

test("disjoint", () => {
  expect(empty().isDisjoint(empty())).toBe(true);
  expect(empty().isDisjoint(EnumSet.of(FooOrdinal, A, B, C))).toBe(true);
  expect(EnumSet.of(FooOrdinal, A).isDisjoint(EnumSet.of(FooOrdinal, B))).toBe(true);
  expect(EnumSet.of(FooOrdinal, A).isDisjoint(EnumSet.of(FooOrdinal, A, B))).toBe(false);
});

test("subset and superset", () => {
  const e1 = EnumSet.of(FooOrdinal, A);
  const e2 = EnumSet.of(FooOrdinal, A, B);
  const e3 = EnumSet.of(FooOrdinal, C);
  expect(e1.isSubset(e2)).toBe(true);
  expect(e2.isSuperset(e1)).toBe(true);
  expect(e3.isSuperset(e2)).toBe(false);
  expect(e2.isSuperset(e3)).toBe(false);
  expect(empty().isSubset(e3)).toBe(true);
  expect(e2.isSubset(e2)).toBe(true);
});

test("has", () => {
  const e = EnumSet.of(FooOrdinal, A);
  expect(e.has(A)).toBe(true);
  expect(e.has(B)).toBe(false);
  expect(e.has(C)).toBe(false);
  e.insert(A);
  e.insert(B);
  expect(e.has(A)).toBe(true);
  expect(e.has(B)).toBe(true);
  expect(e.has(C)).toBe(false);
});

test("set algebra", () => {
  const e1 = EnumSet.of(FooOrdinal, A, C);
  const e2 = EnumSet.of(FooOrdinal, B, C);

  expect([...e1.union(e2)]).toEqual([A, B, C]);
  expect([...e1.intersection(e2)]).toEqual([C]);
  expect([...e1.difference(e1.difference(e2))]).toEqual([C]);
  expect([...e1.difference(e2)]).toEqual([A]);
  expect([...e1.symmetricDifference(e2)]).toEqual([A, B]);
  expect([...e1.difference(e2).union(e2.difference(e1))]).toEqual([A, B]);
  expect([...e1.union(e2).difference(e1.intersection(e2))]).toEqual([A, B]);

  // операнды не меняются
  expect(e1.toString()).toBe("{A, C}");
  expect(e2.toString()).toBe("{B, C}");
});

test("from and extend deduplicate and ignore order", () => {
  const s = EnumSet.from(FooOrdinal, [C, A, C, A]);
  expect(s.toString()).toBe("{A, C}");
  s.extend([B, B]);
  expect([...s]).toEqual([A, B, C]);
  expect(s.equals(EnumSet.from(FooOrdinal, [B, C, A]))).toBe(true);
});

test("equality, ordering and hashing follow the mask", () => {
  const ac = EnumSet.of(FooOrdinal, A, C);
  const b = EnumSet.of(FooOrdinal, B);
  expect(ac.bits).toBe(0b101);
  expect(ac.hashCode()).toBe(0b101);
  expect(ac.equals(EnumSet.of(FooOrdinal, C, A))).toBe(true);
  expect(ac.equals(b)).toBe(false);
  expect(b.compare(ac)).toBe(-1);
  expect(ac.compare(b)).toBe(1);
  expect(ac.compare(ac.clone())).toBe(0);
});

test("clone is independent", () => {
  const s = EnumSet.of(FooOrdinal, A);
  const c = s.clone();
  c.insert(B);
  expect(s.toString()).toBe("{A}");
  expect(c.toString()).toBe("{A, B}");
});

test("32 members: highest ordinal fits", () => {
  const s = new EnumSet(WideOrdinal);
  expect(s.insert("V31")).toBe(true);
  expect(s.has("V31")).toBe(true);
  expect(s.bits).toBe(0x80000000);
  expect(s.size).toBe(1);
  expect([...s]).toEqual(["V31"]);
  s.insert("V00");
  expect(s.compare(EnumSet.of(WideOrdinal, "V00"))).toBe(1);
});

test("ordinal 32 is rejected", () => {
  const s = new EnumSet(WideOrdinal);
  expect(() => s.insert(WIDE[32] ?? "")).toThrow(
    "EnumSet only supports up to 32 variants (got ordinal 32)"
  );
  expect(s.isEmpty()).toBe(true);
  expect(() => s.has("V39")).toThrow("got ordinal 39");
  expect(() => s.remove("nope")).toThrow("got ordinal -1");
});

test("scenario A, B, C", () => {
  const s = empty();
  expect(s.toString()).toBe("{}");
  s.insert(A);
  s.insert(C);
  expect(s.toString()).toBe("{A, C}");
  expect(s.size).toBe(2);
  const bc = EnumSet.of(FooOrdinal, B, C);
  expect([...s.union(bc)]).toEqual([A, B, C]);
  expect([...s.symmetricDifference(bc)]).toEqual([A, B]);
});
