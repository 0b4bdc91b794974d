import { EligibilityError, emitOrdinalModule, unionDecl, type EnumDecl } from "@enumset/derive";

const OPTS = {
  source: "colors.ts",
  importPath: "./colors",
  coreModule: "@enumset/core",
  utilsModule: "@enumset/utils",
};

test("literal union module", () => {
  const code = emitOrdinalModule([unionDecl("Color", ["Red", "Green"])], OPTS);
  expect(code).toBe(
    [
      "// Generated by enumset-gen from colors.ts. Do not edit.",
      'import type { OrdinalMapping } from "@enumset/core";',
      'import { unreachable } from "@enumset/utils";',
      'import type { Color } from "./colors";',
      "",
      "export const ColorOrdinal: OrdinalMapping<Color> = {",
      "  toOrdinal(value: Color): number {",
      "    switch (value) {",
      '      case "Red":',
      "        return 0;",
      '      case "Green":',
      "        return 1;",
      "      default:",
      "        return unreachable(`${String(value)} is not a member of Color`);",
      "    }",
      "  },",
      "  fromOrdinal(ordinal: number): Color {",
      "    switch (ordinal) {",
      "      case 0:",
      '        return "Red";',
      "      case 1:",
      '        return "Green";',
      "      default:",
      "        return unreachable(`invalid ordinal ${ordinal} for Color`);",
      "    }",
      "  },",
      "  nameOf(value: Color): string {",
      "    switch (value) {",
      '      case "Red":',
      '        return "Red";',
      '      case "Green":',
      '        return "Green";',
      "      default:",
      "        return unreachable(`${String(value)} is not a member of Color`);",
      "    }",
      "  },",
      "};",
      "",
    ].join("\n")
  );
});

const level: EnumDecl = {
  name: "Level",
  kind: "enum",
  exported: true,
  members: [
    { name: "Low", hasData: false, hasDiscriminant: false },
    { name: "very-high", hasData: false, hasDiscriminant: false },
  ],
};

test("enum members are referenced through the enum", () => {
  const lines = emitOrdinalModule([level, unionDecl("Color", ["Red"])], OPTS).split("\n");
  expect(lines[3]).toBe('import { Level, type Color } from "./colors";');
  expect(lines).toContain("      case Level.Low:");
  expect(lines).toContain('        return Level["very-high"];');
  expect(lines).toContain('        return "very-high";');
  expect(lines).toContain("export const ColorOrdinal: OrdinalMapping<Color> = {");
});

test("empty enum still gets a complete mapping", () => {
  const empty: EnumDecl = { name: "Never", kind: "enum", exported: true, members: [] };
  const lines = emitOrdinalModule([empty], OPTS).split("\n");
  expect(lines.slice(5)).toEqual([
    "export const NeverOrdinal: OrdinalMapping<Never> = {",
    "  toOrdinal(_value: Never): number {",
    '    return unreachable("Never has no members");',
    "  },",
    "  fromOrdinal(ordinal: number): Never {",
    "    return unreachable(`invalid ordinal ${ordinal} for Never`);",
    "  },",
    "  nameOf(_value: Never): string {",
    '    return unreachable("Never has no members");',
    "  },",
    "};",
    "",
  ]);
});

test("one ineligible declaration rejects the whole module", () => {
  const bad: EnumDecl = {
    name: "Http",
    kind: "enum",
    exported: true,
    members: [{ name: "Ok", hasData: false, hasDiscriminant: true }],
  };
  expect(() => emitOrdinalModule([level, bad], OPTS)).toThrow(EligibilityError);
  expect(() => emitOrdinalModule([{ ...level, exported: false }], OPTS)).toThrow(
    "Level must be exported for the generated mapping to import it"
  );
});
