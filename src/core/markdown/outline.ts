export interface FencedBlock {
  /** Info string word after the opening fence, `null` when none is declared. */
  language: string | null;
  /** Zero-based index of the opening fence line in the body. */
  line: number;
}

export interface Heading {
  level: number;
  text: string;
  line: number;
}

export interface MarkdownOutline {
  /** Body lines with every fenced code line (fences included) replaced by an empty string. */
  proseLines: string[];
  codeBlocks: FencedBlock[];
  headings: Heading[];
}

const FENCE_OPEN = /^ {0,3}(`{3,}|~{3,})\s*([^`\s]*)/;
const HEADING = /^(#{1,6})\s+(.*?)(?:\s+#+)?\s*$/;

/**
 * Splits a markdown body into prose and fenced code. An unclosed fence runs to the end of the
 * body. Line indexes are preserved so callers can map prose back to sections.
 */
export function outlineMarkdown(body: string): MarkdownOutline {
  const lines = body.split(/\r?\n/);
  const proseLines: string[] = [];
  const codeBlocks: FencedBlock[] = [];
  const headings: Heading[] = [];
  let openFence: string | null = null;

  lines.forEach((line, index) => {
    if (openFence) {
      const trimmed = line.trim();
      if (
        trimmed.startsWith(openFence) &&
        trimmed.replace(/[`~]/g, "").length === 0
      ) {
        openFence = null;
      }
      proseLines.push("");
      return;
    }
    const fence = line.match(FENCE_OPEN);
    if (fence) {
      const marker = fence[1] ?? "```";
      openFence = marker;
      const info = fence[2] ?? "";
      codeBlocks.push({
        language: /^[A-Za-z]/.test(info) ? info : null,
        line: index,
      });
      proseLines.push("");
      return;
    }
    proseLines.push(line);
    const heading = line.match(HEADING);
    if (heading) {
      headings.push({
        level: (heading[1] ?? "#").length,
        text: heading[2] ?? "",
        line: index,
      });
    }
  });

  return { proseLines, codeBlocks, headings };
}

/**
 * Returns the prose lines belonging to the first heading whose text matches `title`, up to the
 * next heading of the same or a higher level.
 */
export function sectionLines(
  outline: MarkdownOutline,
  level: number,
  title: string,
): string[] | null {
  const start = outline.headings.findIndex(
    (heading) =>
      heading.level === level &&
      heading.text.toLowerCase() === title.toLowerCase(),
  );
  if (start === -1) return null;
  const heading = outline.headings[start];
  if (!heading) return null;
  const next = outline.headings
    .slice(start + 1)
    .find((candidate) => candidate.level <= level);
  const end = next ? next.line : outline.proseLines.length;
  return outline.proseLines.slice(heading.line + 1, end);
}
