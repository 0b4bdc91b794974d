import ts from "typescript";
import type { DeclKind, EnumDecl, MemberDecl } from "./decl.js";

export interface ScanOptions {
  // JSDoc-тег, которым помечены типы для генерации
  tag?: string;
}

export function scanSource(
  fileName: string,
  text: string,
  opt?: ScanOptions
): EnumDecl[] {
  const tag = opt?.tag ?? "ordinal";
  const sf = ts.createSourceFile(fileName, text, ts.ScriptTarget.Latest, true);
  const out: EnumDecl[] = [];
  for (const st of sf.statements) {
    if (!hasTag(st, tag)) continue;
    const decl = toDecl(st, sf);
    if (decl) out.push(decl);
  }
  return out;
}

function hasTag(node: ts.Node, tag: string): boolean {
  return ts.getJSDocTags(node).some((t) => t.tagName.text === tag);
}

function isExported(node: ts.Node): boolean {
  if (!ts.canHaveModifiers(node)) return false;
  const mods = ts.getModifiers(node) ?? [];
  return mods.some((m) => m.kind === ts.SyntaxKind.ExportKeyword);
}

function toDecl(st: ts.Statement, sf: ts.SourceFile): EnumDecl | null {
  const exported = isExported(st);
  if (ts.isEnumDeclaration(st)) {
    return {
      name: st.name.text,
      kind: "enum",
      exported,
      members: st.members.map((m) => ({
        name: propertyName(m.name, sf),
        hasData: false,
        hasDiscriminant: m.initializer !== undefined,
      })),
    };
  }
  if (ts.isTypeAliasDeclaration(st)) {
    const t = st.type;
    // обобщённый алиас не перечисление, даже если тело это союз литералов
    const isUnion = !st.typeParameters && (ts.isUnionTypeNode(t) || ts.isLiteralTypeNode(t));
    const kind: DeclKind = isUnion ? "union" : "alias";
    const parts = ts.isUnionTypeNode(t) ? t.types : [t];
    return {
      name: st.name.text,
      kind,
      exported,
      members: isUnion ? parts.map((p) => unionMember(p, sf)) : [],
    };
  }
  if (ts.isInterfaceDeclaration(st)) {
    return { name: st.name.text, kind: "interface", exported, members: [] };
  }
  if (ts.isClassDeclaration(st) && st.name) {
    return { name: st.name.text, kind: "class", exported, members: [] };
  }
  return null;
}

function unionMember(node: ts.TypeNode, sf: ts.SourceFile): MemberDecl {
  if (ts.isLiteralTypeNode(node)) {
    const lit = node.literal;
    if (ts.isStringLiteral(lit) || ts.isNoSubstitutionTemplateLiteral(lit)) {
      return {
        name: lit.text,
        hasData: false,
        hasDiscriminant: false,
        literal: lit.text,
      };
    }
    // числовой литерал — это значение, заданное пользователем
    if (ts.isNumericLiteral(lit) || ts.isPrefixUnaryExpression(lit)) {
      return {
        name: lit.getText(sf),
        hasData: false,
        hasDiscriminant: true,
      };
    }
  }
  return {
    name: node.getText(sf).replace(/\s+/g, " "),
    hasData: true,
    hasDiscriminant: false,
  };
}

function propertyName(name: ts.PropertyName, sf: ts.SourceFile): string {
  if (
    ts.isIdentifier(name) ||
    ts.isStringLiteral(name) ||
    ts.isNumericLiteral(name)
  ) {
    return name.text;
  }
  return name.getText(sf);
}
