/** Collapse tabs and line breaks so a value fits on one line. */
export function toSingleLine(text: string): string {
  return text.replace(/[\r\n\t]+/g, " ");
}

/** Escape newlines as a literal backslash-n for inline previews. */
export function escapeNewlines(text: string): string {
  return text.replace(/\r?\n/g, "\\n");
}

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;");
}
