import { mkdir, mkdtemp, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { beforeAll, describe, expect, test } from "vitest";
import { DocsInputError } from "../src/core/errors";
import { FilesystemDocumentSource } from "../src/core/fs/docs";

let root = "";
let source: FilesystemDocumentSource;

async function put(relativePath: string, content: string) {
  const file = join(root, relativePath);
  await mkdir(join(file, ".."), { recursive: true });
  await writeFile(file, content, "utf8");
}

beforeAll(async () => {
  root = await mkdtemp(join(tmpdir(), "docs-source-"));
  await put("docs/README.md", "# Docs");
  await put("docs/a.md", "# A");
  await put("docs/notes.txt", "not markdown");
  await put("docs/.draft.md", "# Draft");
  await put("docs/.hidden/x.md", "# Hidden");
  await put("docs/node_modules/pkg/y.md", "# Vendored");
  await put("docs/guides/b.md", "# B");
  source = new FilesystemDocumentSource(root, "docs");
});

describe("FilesystemDocumentSource", () => {
  test("lists the corpus recursively and skips hidden and vendored entries", async () => {
    expect(await source.list({ kind: "corpus", recursive: true })).toEqual([
      "docs/README.md",
      "docs/a.md",
      "docs/guides/b.md",
    ]);
  });

  test("lists only the top level when not recursive", async () => {
    expect(await source.list({ kind: "corpus", recursive: false })).toEqual([
      "docs/README.md",
      "docs/a.md",
    ]);
  });

  test("scopes to a directory or a single file", async () => {
    expect(
      await source.list({
        kind: "directory",
        path: join(root, "docs", "guides"),
        recursive: true,
      }),
    ).toEqual(["docs/guides/b.md"]);
    expect(
      await source.list({ kind: "file", path: join(root, "docs", "a.md") }),
    ).toEqual(["docs/a.md"]);
  });

  test("rejects missing or unsupported inputs", async () => {
    await expect(
      source.list({ kind: "file", path: join(root, "docs", "missing.md") }),
    ).rejects.toBeInstanceOf(DocsInputError);
    await expect(
      source.list({ kind: "file", path: join(root, "docs", "notes.txt") }),
    ).rejects.toBeInstanceOf(DocsInputError);
    await expect(
      source.list({ kind: "directory", path: join(root, "nope"), recursive: true }),
    ).rejects.toBeInstanceOf(DocsInputError);
    await expect(
      source.list({ kind: "file", path: join(root, "..", "outside.md") }),
    ).rejects.toBeInstanceOf(DocsInputError);
  });

  test("reads content and checks existence of any file", async () => {
    expect(await source.read("docs/a.md")).toBe("# A");
    expect(source.exists("docs/notes.txt")).toBe(true);
    expect(source.exists("docs/missing.md")).toBe(false);
  });
});
