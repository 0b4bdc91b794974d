import type { EnumDecl, MemberDecl } from "./decl.js";
import { checkEligibility } from "./eligibility.js";

export interface EmitOptions {
  // имя исходного файла для заголовка
  source: string;
  // путь импорта исходного модуля из сгенерированного, например "./colors"
  importPath: string;
  coreModule: string;
  utilsModule: string;
}

// сначала проверяем все декларации: одна негодная отменяет весь файл
export function emitOrdinalModule(
  decls: readonly EnumDecl[],
  opt: EmitOptions
): string {
  for (const d of decls) checkEligibility(d, { requireExport: true });

  const values = decls.filter((d) => d.kind === "enum").map((d) => d.name);
  const types = decls.filter((d) => d.kind !== "enum").map((d) => d.name);

  const lines: string[] = [
    `// Generated by enumset-gen from ${opt.source}. Do not edit.`,
    `import type { OrdinalMapping } from ${q(opt.coreModule)};`,
    `import { unreachable } from ${q(opt.utilsModule)};`,
  ];
  if (values.length === 0) {
    lines.push(`import type { ${types.join(", ")} } from ${q(opt.importPath)};`);
  } else {
    const names = [...values, ...types.map((t) => `type ${t}`)];
    lines.push(`import { ${names.join(", ")} } from ${q(opt.importPath)};`);
  }

  for (const d of decls) {
    lines.push("", ...emitMapping(d));
  }
  return lines.join("\n") + "\n";
}

function emitMapping(d: EnumDecl): string[] {
  const t = d.name;
  const out = [`export const ${t}Ordinal: OrdinalMapping<${t}> = {`];

  if (d.members.length === 0) {
    // значений пустого типа не существует, но контракт должен быть полным
    out.push(
      `  toOrdinal(_value: ${t}): number {`,
      `    return unreachable(${q(`${t} has no members`)});`,
      `  },`,
      `  fromOrdinal(ordinal: number): ${t} {`,
      `    return unreachable(\`invalid ordinal \${ordinal} for ${t}\`);`,
      `  },`,
      `  nameOf(_value: ${t}): string {`,
      `    return unreachable(${q(`${t} has no members`)});`,
      `  },`,
      `};`
    );
    return out;
  }

  out.push(`  toOrdinal(value: ${t}): number {`, `    switch (value) {`);
  d.members.forEach((m, i) => {
    out.push(`      case ${memberRef(d, m)}:`, `        return ${i};`);
  });
  out.push(
    `      default:`,
    `        return unreachable(\`\${String(value)} is not a member of ${t}\`);`,
    `    }`,
    `  },`
  );

  out.push(`  fromOrdinal(ordinal: number): ${t} {`, `    switch (ordinal) {`);
  d.members.forEach((m, i) => {
    out.push(`      case ${i}:`, `        return ${memberRef(d, m)};`);
  });
  out.push(
    `      default:`,
    `        return unreachable(\`invalid ordinal \${ordinal} for ${t}\`);`,
    `    }`,
    `  },`
  );

  out.push(`  nameOf(value: ${t}): string {`, `    switch (value) {`);
  d.members.forEach((m) => {
    out.push(`      case ${memberRef(d, m)}:`, `        return ${q(m.name)};`);
  });
  out.push(
    `      default:`,
    `        return unreachable(\`\${String(value)} is not a member of ${t}\`);`,
    `    }`,
    `  },`,
    `};`
  );
  return out;
}

function memberRef(d: EnumDecl, m: MemberDecl): string {
  if (d.kind === "union") return q(m.literal ?? m.name);
  return /^[A-Za-z_$][\w$]*$/.test(m.name)
    ? `${d.name}.${m.name}`
    : `${d.name}[${q(m.name)}]`;
}

function q(s: string): string {
  return JSON.stringify(s);
}
