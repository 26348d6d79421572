import { escapeHtml } from "../utils/text.js";
import {
  FILE_END_MARKER,
  FILE_START_MARKER,
  OUTPUT_FORMAT_VERSION,
} from "./response-parser.js";

export const SYSTEM_PROMPT =
  "You are a helpful coding assistant that generates structured multi-file projects.";

export const DEFAULT_EXPECTED_FILES: readonly string[] = ["index.html", "README.md"];

const FILE_MENTION = /[\w-]+\.(?:txt|json|md|svg|html|csv)/g;

/** File names the brief mentions, in order; the default pair when none. */
export function extractExpectedFiles(brief: string): string[] {
  const found = brief.match(FILE_MENTION);
  return found && found.length > 0 ? [...found] : [...DEFAULT_EXPECTED_FILES];
}

export interface PromptInput {
  brief: string;
  round: number;
  previousReadme?: string | null;
  attachmentSummary: string;
  checks: readonly string[];
  expectedFiles: readonly string[];
}

function bulletList(items: readonly string[], empty: string): string {
  return items.length > 0 ? items.map((item) => `- ${item}`).join("\n") : empty;
}

export function buildUserPrompt(input: PromptInput): string {
  const sections = [
    "You are a professional full-stack web developer assistant.",
    `### Round\n${input.round}`,
    `### Task\n${input.brief}`,
  ];

  if (input.round >= 2 && input.previousReadme) {
    sections.push(
      `### Previous README.md\n${input.previousReadme}\n\n` +
        "Revise and enhance this project according to the new brief above."
    );
  }

  sections.push(
    `### Attachments (if any)\n${input.attachmentSummary || "(none)"}`,
    `### Evaluation checks\n${bulletList(input.checks, "(none)")}`,
    "### Expected files\nThe brief mentions or implies these files:\n" +
      bulletList(input.expectedFiles, ""),
    [
      `### Output format rules (v${OUTPUT_FORMAT_VERSION})`,
      "1. You must output **each file separately** using the following format:",
      `   ${FILE_START_MARKER} <name.ext>`,
      "   (file content here)",
      `   ${FILE_END_MARKER}`,
      "2. Include *all files required by the brief*, including every expected file listed above.",
      "3. Every file must contain complete, valid content (valid JSON, SVG, HTML, etc.).",
      "4. Do NOT include commentary outside this format.",
      "5. The final output must contain all files in one response.",
    ].join("\n")
  );

  return sections.join("\n\n");
}

/** Canned model output used when the completion call fails. */
export function buildFallbackResponse(brief: string): string {
  return [
    `${FILE_START_MARKER} index.html`,
    `<html><body><h1>Fallback App</h1><p>${escapeHtml(brief)}</p></body></html>`,
    FILE_END_MARKER,
    `${FILE_START_MARKER} README.md`,
    "# Auto-generated README",
    "This fallback was generated due to API error.",
    FILE_END_MARKER,
    "",
  ].join("\n");
}

export interface FallbackReadmeInput {
  brief: string;
  checks: readonly string[];
  attachmentSummary: string;
  round: number;
}

/** README for model output that came back without one. */
export function buildFallbackReadme(input: FallbackReadmeInput): string {
  return `# Auto-generated README (Round ${input.round})

**Project brief:** ${input.brief}

**Attachments:**
${input.attachmentSummary}

**Checks to meet:**
${input.checks.join("\n")}

## Setup
1. Open \`index.html\` in a browser.
2. No build steps required.

## Notes
This README was generated as a fallback (the model did not return an explicit README).
`;
}
