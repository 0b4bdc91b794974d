import { assert } from "@enumset/utils";

// Ширина маски: не более 32 значений на тип
export const MAX_ORDINALS = 32;

// fromOrdinal обязан принимать только ординалы, которые вернул toOrdinal
export interface OrdinalMapping<E> {
  toOrdinal(value: E): number;
  fromOrdinal(ordinal: number): E;
  // имя для toString
  nameOf?(value: E): string;
}

export function checkOrdinalMapping<E>(
  mapping: OrdinalMapping<E>,
  members: Iterable<E>
): void {
  const seen = new Map<number, string>();
  for (const m of members) {
    const label = mapping.nameOf?.(m) ?? String(m);
    const ord = mapping.toOrdinal(m);
    assert(
      Number.isInteger(ord) && ord >= 0 && ord < MAX_ORDINALS,
      `ordinal of ${label} out of range: ${ord}`
    );
    const prev = seen.get(ord);
    assert(prev === undefined, `ordinal ${ord} shared by ${prev} and ${label}`);
    seen.set(ord, label);
    assert(
      Object.is(mapping.fromOrdinal(ord), m),
      `fromOrdinal(${ord}) does not return ${label}`
    );
  }
}
