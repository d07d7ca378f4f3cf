/**
 * A human-owned text file as an ordered list of lines.
 */

export interface ConfigDocument {
  lines: string[];
  trailingNewline: boolean;
}

export function parseDocument(text: string): ConfigDocument {
  if (text === "") {
    return { lines: [], trailingNewline: false };
  }
  const lines = text.split("\n");
  const trailingNewline = lines[lines.length - 1] === "";
  if (trailingNewline) {
    lines.pop();
  }
  return { lines, trailingNewline };
}

export function renderDocument(doc: ConfigDocument): string {
  if (doc.lines.length === 0) {
    return "";
  }
  return doc.lines.join("\n") + (doc.trailingNewline ? "\n" : "");
}

/** Indices of lines matching `pattern`, in document order. */
export function findLines(doc: ConfigDocument, pattern: RegExp): number[] {
  const indices: number[] = [];
  doc.lines.forEach((line, i) => {
    if (pattern.test(line)) indices.push(i);
  });
  return indices;
}
