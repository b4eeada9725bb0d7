import { existsSync } from "node:fs";
import { readFile, readdir, stat } from "node:fs/promises";
import { isAbsolute, join, posix, relative, sep } from "node:path";
import { DocsInputError } from "../errors";
import type { ScanScope } from "../types";

const IGNORE_DIRECTORIES = new Set(["node_modules"]);

/**
 * Read-only access to the markdown corpus. Paths are posix and relative to the project root.
 */
export interface DocumentSource {
  list(scope: ScanScope): Promise<string[]>;
  read(projectPath: string): Promise<string>;
  exists(projectPath: string): boolean;
}

function isMarkdown(name: string): boolean {
  return name.toLowerCase().endsWith(".md");
}

function isHidden(name: string): boolean {
  return name.startsWith(".");
}

export class FilesystemDocumentSource implements DocumentSource {
  constructor(
    private readonly rootDirectory: string,
    private readonly docsDirectory: string,
  ) {}

  /**
   * Converts a user-supplied path (absolute, or relative to the root) into a project path.
   */
  toProjectPath(input: string): string {
    const absolute = isAbsolute(input) ? input : join(this.rootDirectory, input);
    const projectPath = relative(this.rootDirectory, absolute).split(sep).join("/");
    if (projectPath === ".." || projectPath.startsWith("../") || isAbsolute(projectPath)) {
      throw new DocsInputError(`Path is outside the project root: ${input}`, input);
    }
    return projectPath === "" ? "." : projectPath;
  }

  async list(scope: ScanScope): Promise<string[]> {
    if (scope.kind === "file") {
      const projectPath = this.toProjectPath(scope.path);
      if (!isMarkdown(projectPath)) {
        throw new DocsInputError(`Not a markdown file: ${scope.path}`, scope.path);
      }
      const fileStats = await this.statOrNull(projectPath);
      if (!fileStats?.isFile()) {
        throw new DocsInputError(`File not found: ${scope.path}`, scope.path);
      }
      return [projectPath];
    }

    const directory =
      scope.kind === "corpus" ? this.docsDirectory : this.toProjectPath(scope.path);
    const directoryStats = await this.statOrNull(directory);
    if (!directoryStats?.isDirectory()) {
      const label = scope.kind === "corpus" ? this.docsDirectory : scope.path;
      throw new DocsInputError(`Directory not found: ${label}`, label);
    }

    const paths: string[] = [];
    for await (const path of this.walk(directory, scope.recursive)) {
      paths.push(path);
    }
    return paths.sort();
  }

  async read(projectPath: string): Promise<string> {
    const buffer = await readFile(this.absolute(projectPath));
    return buffer.toString("utf8");
  }

  exists(projectPath: string): boolean {
    return existsSync(this.absolute(projectPath));
  }

  private absolute(projectPath: string): string {
    return join(this.rootDirectory, ...projectPath.split("/"));
  }

  private async statOrNull(projectPath: string) {
    try {
      return await stat(this.absolute(projectPath));
    } catch (error) {
      if (isNotFound(error)) return null;
      throw error;
    }
  }

  private async *walk(
    directory: string,
    recursive: boolean,
  ): AsyncGenerator<string> {
    const entries = await readdir(this.absolute(directory), {
      withFileTypes: true,
    });
    for (const entry of entries) {
      if (isHidden(entry.name)) continue;
      const projectPath =
        directory === "." ? entry.name : posix.join(directory, entry.name);
      if (entry.isDirectory()) {
        if (!recursive || IGNORE_DIRECTORIES.has(entry.name)) continue;
        yield* this.walk(projectPath, recursive);
      } else if (entry.isFile() && isMarkdown(entry.name)) {
        yield projectPath;
      }
    }
  }
}

function isNotFound(error: unknown): boolean {
  return (
    error instanceof Error &&
    "code" in error &&
    (error.code === "ENOENT" || error.code === "ENOTDIR")
  );
}
