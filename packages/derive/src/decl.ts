// enum / union — кандидаты; остальное отвергается правилом not-enum
export type DeclKind = "enum" | "union" | "interface" | "class" | "alias";

export interface MemberDecl {
  name: string;
  hasData: boolean;
  hasDiscriminant: boolean;
  // для union: строковый литерал члена
  literal?: string;
}

export interface EnumDecl {
  name: string;
  kind: DeclKind;
  exported: boolean;
  members: MemberDecl[];
}

export function unionDecl(name: string, members: readonly string[]): EnumDecl {
  return {
    name,
    kind: "union",
    exported: true,
    members: members.map((m) => ({
      name: m,
      hasData: false,
      hasDiscriminant: false,
      literal: m,
    })),
  };
}
