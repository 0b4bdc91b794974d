import { inspect } from "util";
import { popcount32 } from "@enumset/utils";
import { bit } from "./bit.js";
import { EnumSetIter } from "./iter.js";
import type { OrdinalMapping } from "./ordinal.js";

// Множество членов C-подобного enum в одной 32-битной маске.
// Биты ставит только bit(), поэтому каждый бит соответствует члену E.
export class EnumSet<E> implements Iterable<E> {
  private mask = 0;
  readonly mapping: OrdinalMapping<E>;

  constructor(mapping: OrdinalMapping<E>) {
    this.mapping = mapping;
  }

  static from<E>(mapping: OrdinalMapping<E>, values: Iterable<E>): EnumSet<E> {
    const s = new EnumSet(mapping);
    s.extend(values);
    return s;
  }

  static of<E>(mapping: OrdinalMapping<E>, ...values: E[]): EnumSet<E> {
    return EnumSet.from(mapping, values);
  }

  private withBits(bits: number): EnumSet<E> {
    const s = new EnumSet(this.mapping);
    s.mask = bits >>> 0;
    return s;
  }

  get bits(): number {
    return this.mask;
  }

  get size(): number {
    return popcount32(this.mask);
  }

  isEmpty(): boolean {
    return this.mask === 0;
  }

  clear() {
    this.mask = 0;
  }

  has(value: E): boolean {
    return (this.mask & bit(this.mapping, value)) !== 0;
  }

  // true, если значения ещё не было
  insert(value: E): boolean {
    const b = bit(this.mapping, value);
    const added = (this.mask & b) === 0;
    this.mask = (this.mask | b) >>> 0;
    return added;
  }

  remove(value: E): boolean {
    const b = bit(this.mapping, value);
    const present = (this.mask & b) !== 0;
    this.mask = (this.mask & ~b) >>> 0;
    return present;
  }

  extend(values: Iterable<E>) {
    for (const v of values) this.insert(v);
  }

  isDisjoint(other: EnumSet<E>): boolean {
    return (this.mask & other.mask) === 0;
  }

  // this ⊇ other
  isSuperset(other: EnumSet<E>): boolean {
    return ((this.mask & other.mask) >>> 0) === other.mask;
  }

  isSubset(other: EnumSet<E>): boolean {
    return other.isSuperset(this);
  }

  union(other: EnumSet<E>): EnumSet<E> {
    return this.withBits(this.mask | other.mask);
  }

  intersection(other: EnumSet<E>): EnumSet<E> {
    return this.withBits(this.mask & other.mask);
  }

  difference(other: EnumSet<E>): EnumSet<E> {
    return this.withBits(this.mask & ~other.mask);
  }

  symmetricDifference(other: EnumSet<E>): EnumSet<E> {
    return this.withBits(this.mask ^ other.mask);
  }

  iter(): EnumSetIter<E> {
    return new EnumSetIter(this.mapping, this.mask);
  }

  [Symbol.iterator](): EnumSetIter<E> {
    return this.iter();
  }

  clone(): EnumSet<E> {
    return this.withBits(this.mask);
  }

  equals(other: EnumSet<E>): boolean {
    return this.mask === other.mask;
  }

  // порядок по значению маски (беззнаково)
  compare(other: EnumSet<E>): -1 | 0 | 1 {
    if (this.mask < other.mask) return -1;
    if (this.mask > other.mask) return 1;
    return 0;
  }

  hashCode(): number {
    return this.mask;
  }

  toString(): string {
    const names: string[] = [];
    for (const v of this) names.push(this.mapping.nameOf?.(v) ?? String(v));
    return `{${names.join(", ")}}`;
  }

  [inspect.custom](): string {
    return `EnumSet ${this.toString()}`;
  }
}
