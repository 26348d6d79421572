/**
 * Parser for the multi-file text protocol the generation prompt asks for.
 *
 * Format version 1:
 *
 *   >>> filename: <name>
 *   <raw file content>
 *   ---END FILE---
 *
 * Models do not always comply, so parsing falls through three tiers:
 * delimited blocks, then the legacy `---README.md---` split, then the whole
 * text as a single page with a synthesized README. The result is never empty.
 */

export const OUTPUT_FORMAT_VERSION = 1;
export const FILE_START_MARKER = ">>> filename:";
export const FILE_END_MARKER = "---END FILE---";
export const LEGACY_README_SEPARATOR = "---README.md---";

export type GeneratedFiles = Record<string, string>;

export type ParseFormat = "delimited" | "legacy" | "plain";

export interface ParseResult {
  files: GeneratedFiles;
  format: ParseFormat;
}

const START_LINE = />>> filename:[ \t]*([^\n]*)\n/g;
const FENCED = /^```[^\n]*\n([\s\S]*?)\n?```$/;
const INNER_FENCE = /^```/m;

/**
 * Remove one level of surrounding ``` fencing, if the whole text is one
 * fenced block. Text that opens and closes with separate blocks is kept.
 */
export function stripCodeFence(text: string): string {
  const trimmed = text.trim();
  const inner = FENCED.exec(trimmed)?.[1];
  if (inner === undefined || INNER_FENCE.test(inner)) return trimmed;
  return inner.trim();
}

/**
 * Extract every `>>> filename:` block. A block ends at the end marker, at
 * the next start marker, or at the end of the text, whichever comes first.
 */
export function parseDelimitedFiles(text: string): GeneratedFiles {
  const files: GeneratedFiles = {};
  const starts = [...text.matchAll(START_LINE)];

  starts.forEach((match, i) => {
    const name = (match[1] ?? "").trim();
    if (!name) return;

    const bodyStart = (match.index ?? 0) + match[0].length;
    const nextStart = starts[i + 1]?.index ?? text.length;
    const segment = text.slice(bodyStart, nextStart);

    let body: string;
    if (segment.startsWith(FILE_END_MARKER)) {
      body = "";
    } else {
      const end = segment.indexOf(`\n${FILE_END_MARKER}`);
      body = end === -1 ? segment : segment.slice(0, end);
    }

    files[name] = stripCodeFence(body);
  });

  return files;
}

/**
 * Parse model output into a file set. `synthesizeReadme` is called only
 * when the output carries no README of its own (the plain tier).
 */
export function parseGeneratedFiles(
  text: string,
  synthesizeReadme: () => string
): ParseResult {
  const delimited = parseDelimitedFiles(text);
  if (Object.keys(delimited).length > 0) {
    return { files: delimited, format: "delimited" };
  }

  const separator = text.indexOf(LEGACY_README_SEPARATOR);
  if (separator !== -1) {
    return {
      files: {
        "index.html": stripCodeFence(text.slice(0, separator)),
        "README.md": stripCodeFence(
          text.slice(separator + LEGACY_README_SEPARATOR.length)
        ),
      },
      format: "legacy",
    };
  }

  return {
    files: {
      "index.html": stripCodeFence(text),
      "README.md": synthesizeReadme(),
    },
    format: "plain",
  };
}
