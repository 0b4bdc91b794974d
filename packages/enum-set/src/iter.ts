import { popcount32 } from "@enumset/utils";
import type { OrdinalMapping } from "./ordinal.js";

// Курсор по снимку маски; изменения множества после iter() не видны
export class EnumSetIter<E> implements IterableIterator<E> {
  private index: number;
  private bits: number;
  private readonly mapping: OrdinalMapping<E>;

  constructor(mapping: OrdinalMapping<E>, bits: number, index = 0) {
    this.mapping = mapping;
    this.bits = bits >>> 0;
    this.index = index;
  }

  next(): IteratorResult<E> {
    if (this.bits === 0) return { done: true, value: undefined };
    while ((this.bits & 1) === 0) {
      this.index++;
      this.bits >>>= 1;
    }
    // каждый оставшийся бит выставлен через bit(), значит ординал валиден
    const value = this.mapping.fromOrdinal(this.index);
    this.index++;
    this.bits >>>= 1;
    return { done: false, value };
  }

  // точное число оставшихся элементов
  remaining(): number {
    return popcount32(this.bits);
  }

  clone(): EnumSetIter<E> {
    return new EnumSetIter(this.mapping, this.bits, this.index);
  }

  [Symbol.iterator](): EnumSetIter<E> {
    return this;
  }
}
