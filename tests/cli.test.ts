import { existsSync } from "node:fs";
import { mkdir, mkdtemp, readFile, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { beforeEach, describe, expect, test } from "vitest";
import {
  checkLinksCommand,
  fixFrontmatterCommand,
  fixLinksCommand,
  reportCommand,
  scopeFromOptions,
  type CommandContext,
} from "../src/cli/commands";
import { defaultConfig } from "../src/core/config";
import { DocsInputError } from "../src/core/errors";
import { CSV_HEADER } from "../src/core/report/render";

let root = "";
let output: string[] = [];

async function put(relativePath: string, content: string) {
  const file = join(root, relativePath);
  await mkdir(join(file, ".."), { recursive: true });
  await writeFile(file, content, "utf8");
}

function context(env: NodeJS.ProcessEnv = {}): CommandContext {
  const config = defaultConfig();
  config.paths.root = root;
  config.analysis.concurrency = 2;
  return {
    config,
    env,
    write: (text) => output.push(text),
    now: () => new Date("2024-06-01T12:00:00Z"),
  };
}

beforeEach(async () => {
  root = await mkdtemp(join(tmpdir(), "docs-cli-"));
  output = [];
  await put("docs/README.md", "# Docs\n[Guide](guide.md)\n[Old](old/setup.md)");
  await put("docs/guide.md", "# Guide");
  await put("docs/how-to/setup.md", "# Setup\n[Back](../README.md)");
});

describe("scopeFromOptions", () => {
  test("rejects --file together with --dir", () => {
    expect(() =>
      scopeFromOptions({ file: "a.md", dir: "docs" }, defaultConfig()),
    ).toThrow(DocsInputError);
  });

  test("defaults to the whole corpus with the configured recursion", () => {
    expect(scopeFromOptions({}, defaultConfig())).toEqual({
      kind: "corpus",
      recursive: true,
    });
  });
});

describe("check-links", () => {
  test("exits 1 and lists broken references", async () => {
    expect(await checkLinksCommand({}, context())).toBe(1);
    expect(output).toHaveLength(1);
    expect(output[0]).toMatch(
      /^docs\/README\.md: .*old\/setup\.md.* -> docs\/old\/setup\.md \(missing\)\n$/,
    );
  });
});

describe("fix-links", () => {
  test("only prints proposals in dry-run mode", async () => {
    expect(await fixLinksCommand({ dryRun: true }, context())).toBe(0);
    expect(await readFile(join(root, "docs/README.md"), "utf8")).toBe(
      "# Docs\n[Guide](guide.md)\n[Old](old/setup.md)",
    );
    expect(output).toHaveLength(1);
  });

  test("rewrites the broken reference so check-links passes", async () => {
    expect(await fixLinksCommand({}, context())).toBe(0);
    expect(await readFile(join(root, "docs/README.md"), "utf8")).toBe(
      "# Docs\n[Guide](guide.md)\n[Old](/docs/how-to/setup.md)",
    );
    output = [];
    expect(await checkLinksCommand({}, context())).toBe(0);
    expect(output).toEqual([]);
  });
});

describe("fix-frontmatter", () => {
  test("lists the fields it would add without writing in dry-run mode", async () => {
    expect(await fixFrontmatterCommand({ dryRun: true }, context())).toBe(0);
    expect(output).toHaveLength(3);
    expect(output[0]).toMatch(
      /^docs\/README\.md: .*\+ title, description, last_updated.*\n$/,
    );
    expect(await readFile(join(root, "docs/guide.md"), "utf8")).toBe("# Guide");
  });

  test("writes the derived fields", async () => {
    expect(await fixFrontmatterCommand({}, context())).toBe(0);
    expect(await readFile(join(root, "docs/guide.md"), "utf8")).toBe(
      [
        "---",
        "title: Guide",
        "description: Description of guide",
        "last_updated: 2024-06-01",
        "---",
        "# Guide",
      ].join("\n"),
    );
  });
});

describe("report", () => {
  test("writes the requested format to the output file", async () => {
    const target = join(root, "out", "report.csv");
    const code = await reportCommand(
      { format: "csv", output: target, history: false },
      context(),
    );
    expect(code).toBe(0);
    const csv = await readFile(target, "utf8");
    expect(csv.split("\r\n")[0]).toBe(CSV_HEADER);
    expect(existsSync(join(root, "target/reports/docs_validation"))).toBe(false);
  });

  test("writes markdown into the reports directory by default and records history", async () => {
    await reportCommand({ format: "markdown", history: true }, context());
    const reports = join(root, "target/reports/docs_validation");
    expect(existsSync(join(reports, "documentation_report.md"))).toBe(true);
    expect(existsSync(join(reports, "documentation_metrics_history.csv"))).toBe(true);
  });

  test("prints text to stdout", async () => {
    await reportCommand({ format: "text", history: false }, context());
    expect(output).toHaveLength(1);
    expect(output[0]?.startsWith("Documents: 3 (whole corpus)\n")).toBe(true);
  });

  test("fails under CI when the score is below the threshold", async () => {
    const ci = context({ CI: "true" });
    ci.config.report.ci_threshold = 101;
    expect(await reportCommand({ format: "text", history: false }, ci)).toBe(1);
  });

  test("rejects a missing file before writing anything", async () => {
    await expect(
      reportCommand(
        { format: "markdown", history: true, file: join(root, "docs/none.md") },
        context(),
      ),
    ).rejects.toBeInstanceOf(DocsInputError);
    expect(existsSync(join(root, "target"))).toBe(false);
  });
});
