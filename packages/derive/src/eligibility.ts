import { MAX_ORDINALS } from "@enumset/core";
import type { EnumDecl } from "./decl.js";

export type EligibilityRule =
  | "not-enum"
  | "too-many-members"
  | "data-member"
  | "explicit-discriminant"
  | "duplicate-member"
  | "not-exported";

export class EligibilityError extends Error {
  readonly rule: EligibilityRule;
  readonly typeName: string;
  readonly member: string | undefined;

  constructor(
    rule: EligibilityRule,
    typeName: string,
    message: string,
    member?: string
  ) {
    super(message);
    this.name = "EligibilityError";
    this.rule = rule;
    this.typeName = typeName;
    this.member = member;
  }
}

export interface EligibilityOptions {
  // генерируемый модуль импортирует тип, поэтому нужен export
  requireExport?: boolean;
}

// первое нарушение по порядку правил и членов
export function checkEligibility(
  decl: EnumDecl,
  opt?: EligibilityOptions
): void {
  const t = decl.name;
  if (decl.kind !== "enum" && decl.kind !== "union") {
    throw new EligibilityError(
      "not-enum",
      t,
      `ordinal mapping is only defined for enums and literal unions (${t} is ${article(decl.kind)} ${decl.kind})`
    );
  }

  const names = new Set<string>();
  decl.members.forEach((m, count) => {
    if (count === MAX_ORDINALS) {
      throw new EligibilityError(
        "too-many-members",
        t,
        `ordinal mapping supports at most ${MAX_ORDINALS} members (${t} has ${decl.members.length})`,
        m.name
      );
    }
    if (m.hasData) {
      throw new EligibilityError(
        "data-member",
        t,
        `ordinal mapping requires a C-like enum: ${t}.${m.name} carries data`,
        m.name
      );
    }
    if (m.hasDiscriminant) {
      throw new EligibilityError(
        "explicit-discriminant",
        t,
        `ordinal mapping doesn't support explicit discriminants (${t}.${m.name})`,
        m.name
      );
    }
    if (names.has(m.name)) {
      throw new EligibilityError(
        "duplicate-member",
        t,
        `duplicate member ${t}.${m.name}`,
        m.name
      );
    }
    names.add(m.name);
  });

  if (opt?.requireExport && !decl.exported) {
    throw new EligibilityError(
      "not-exported",
      t,
      `${t} must be exported for the generated mapping to import it`
    );
  }
}

function article(kind: string): string {
  return /^[aeiou]/.test(kind) ? "an" : "a";
}
