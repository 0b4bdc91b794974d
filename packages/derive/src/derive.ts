import type { OrdinalMapping } from "@enumset/core";
import { unreachable } from "@enumset/utils";
import { unionDecl } from "./decl.js";
import { checkEligibility } from "./eligibility.js";

// Маппинг для строкового перечисления по кортежу членов (порядок = ординал)
export function deriveOrdinal<const M extends readonly string[]>(
  name: string,
  members: M
): OrdinalMapping<M[number]> {
  // копия: изменения исходного массива не должны ломать биекцию
  const list: ReadonlyArray<M[number]> = Object.freeze([...members]);
  checkEligibility(unionDecl(name, list));

  const index = new Map<string, number>();
  list.forEach((m, i) => index.set(m, i));

  return {
    toOrdinal(value) {
      return index.get(value) ?? unreachable(`${value} is not a member of ${name}`);
    },
    fromOrdinal(ordinal) {
      return list[ordinal] ?? unreachable(`invalid ordinal ${ordinal} for ${name}`);
    },
    nameOf(value) {
      return value;
    },
  };
}
