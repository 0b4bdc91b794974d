import { assert } from "@enumset/utils";
import { MAX_ORDINALS, type OrdinalMapping } from "./ordinal.js";

export function bit<E>(mapping: OrdinalMapping<E>, value: E): number {
  const ord = mapping.toOrdinal(value);
  assert(
    Number.isInteger(ord) && ord >= 0 && ord < MAX_ORDINALS,
    `EnumSet only supports up to ${MAX_ORDINALS} variants (got ordinal ${ord})`
  );
  return (1 << ord) >>> 0;
}
