import { describe, expect, test } from "vitest";
import {
  classifyReference,
  resolveReference,
  toRootedReference,
  type ResolveOptions,
} from "../src/core/links/resolver";

const existing = new Set(["docs/b.md", "docs/guides/c.md", "README.md"]);
const options: ResolveOptions = {
  docsDir: "docs",
  exists: (path) => existing.has(path),
};

describe("classifyReference", () => {
  test("classifies every reference form", () => {
    expect(classifyReference("https://example.com/a.md")).toBe("external");
    expect(classifyReference("ftp://example.com/file")).toBe("external");
    expect(classifyReference("mailto:team@example.com")).toBe("external");
    expect(classifyReference("#usage")).toBe("anchor-only");
    expect(classifyReference("/docs/x.md")).toBe("rooted");
    expect(classifyReference("./x.md")).toBe("dot-relative");
    expect(classifyReference("../x.md")).toBe("relative");
    expect(classifyReference("x.md")).toBe("relative");
  });
});

describe("resolveReference", () => {
  test("resolves a dot-relative sibling", () => {
    expect(resolveReference("./b.md", "docs/a.md", options)).toEqual({
      kind: "dot-relative",
      resolved: "docs/b.md",
      exists: true,
    });
    expect(resolveReference("./missing.md", "docs/a.md", options)).toEqual({
      kind: "dot-relative",
      resolved: "docs/missing.md",
      exists: false,
    });
  });

  test("maps rooted references onto the corpus directory", () => {
    expect(resolveReference("/docs/guides/c.md", "docs/a.md", options)).toEqual({
      kind: "rooted",
      resolved: "docs/guides/c.md",
      exists: true,
    });
    expect(resolveReference("/guides/c.md", "docs/b.md", options)).toEqual({
      kind: "rooted",
      resolved: "docs/guides/c.md",
      exists: true,
    });
  });

  test("maps the literal /docs/ prefix onto a differently named corpus directory", () => {
    const renamed: ResolveOptions = {
      docsDir: "documentation",
      exists: (path) => path === "documentation/guides/c.md",
    };
    expect(resolveReference("/docs/guides/c.md", "documentation/a.md", renamed)).toEqual({
      kind: "rooted",
      resolved: "documentation/guides/c.md",
      exists: true,
    });
    expect(
      resolveReference("/documentation/guides/c.md", "documentation/a.md", renamed)
        .resolved,
    ).toBe("documentation/guides/c.md");
    expect(resolveReference("/guides/c.md", "documentation/a.md", renamed).resolved).toBe(
      "documentation/guides/c.md",
    );
  });

  test("walks up with parent segments", () => {
    expect(resolveReference("../README.md", "docs/a.md", options)).toEqual({
      kind: "relative",
      resolved: "README.md",
      exists: true,
    });
  });

  test("marks references above the project root as invalid", () => {
    expect(resolveReference("../../x.md", "docs/a.md", options)).toEqual({
      kind: "relative",
      resolved: "invalid:../../x.md",
      exists: false,
    });
  });

  test("strips fragments and decodes escapes before resolving", () => {
    expect(
      resolveReference("guides/c.md#install", "docs/a.md", options).resolved,
    ).toBe("docs/guides/c.md");
    expect(resolveReference("my%20file.md", "docs/a.md", options).resolved).toBe(
      "docs/my file.md",
    );
  });

  test("treats an unprefixed corpus path as relative to the referring directory", () => {
    expect(resolveReference("docs/b.md", "docs/a.md", options)).toEqual({
      kind: "relative",
      resolved: "docs/docs/b.md",
      exists: false,
    });
  });

  test("never resolves external or anchor-only references", () => {
    let calls = 0;
    const counting: ResolveOptions = {
      docsDir: "docs",
      exists: () => {
        calls += 1;
        return true;
      },
    };
    expect(resolveReference("https://example.com", "docs/a.md", counting)).toEqual({
      kind: "external",
      resolved: null,
      exists: false,
    });
    expect(resolveReference("#top", "docs/a.md", counting).resolved).toBeNull();
    expect(calls).toBe(0);
  });

  test("checks existence on every call", () => {
    let calls = 0;
    const counting: ResolveOptions = {
      docsDir: "docs",
      exists: () => {
        calls += 1;
        return false;
      },
    };
    resolveReference("./b.md", "docs/a.md", counting);
    resolveReference("./b.md", "docs/a.md", counting);
    expect(calls).toBe(2);
  });
});

describe("toRootedReference", () => {
  test("prefixes the corpus directory", () => {
    expect(toRootedReference("docs/guides/c.md", "docs")).toBe("/docs/guides/c.md");
  });
});
