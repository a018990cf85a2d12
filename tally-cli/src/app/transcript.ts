import type { Reply } from "tally-main";
import type { DisplayLine, TranscriptEntry, TranscriptKind } from "./types.js";

let nextId = 1;

export function createEntry(kind: TranscriptKind, content: string): TranscriptEntry {
  return { id: String(nextId++), kind, content };
}

/** Transcript entries for one submitted line and the reply it produced. */
export function entriesForReply(input: string, reply: Reply): TranscriptEntry[] {
  const echoed = createEntry("input", input);
  switch (reply.kind) {
    case "result":
      return [echoed, createEntry("result", reply.text)];
    case "error":
      return [echoed, createEntry("error", reply.text)];
    case "info":
    case "exit":
      return [echoed, createEntry("info", reply.text)];
    case "clear":
      return [createEntry("info", reply.text)];
    case "none":
      return [];
  }
}

export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

function chunk(word: string, width: number): string[] {
  const pieces: string[] = [];
  for (let index = 0; index < word.length; index += width) {
    pieces.push(word.slice(index, index + width));
  }
  return pieces;
}

/** Greedy word wrap of a single line; words longer than `width` are split. */
export function wrapSegment(segment: string, width: number): string[] {
  // Lines that fit keep their spacing (help text is column-aligned)
  if (segment.length <= width) return [segment];

  const lines: string[] = [];
  let current = "";

  for (const word of segment.split(/\s+/)) {
    if (word.length === 0) continue;

    const candidate = current.length === 0 ? word : `${current} ${word}`;
    if (candidate.length <= width) {
      current = candidate;
      continue;
    }

    if (current.length > 0) lines.push(current);
    if (word.length <= width) {
      current = word;
    } else {
      const pieces = chunk(word, width);
      current = pieces.pop() ?? "";
      lines.push(...pieces);
    }
  }

  if (current.length > 0) lines.push(current);
  return lines.length > 0 ? lines : [""];
}

export function wrapContent(content: string, width: number): string[] {
  const safeWidth = Math.max(1, width);
  return content.split(/\r?\n/).flatMap((line) => wrapSegment(line, safeWidth));
}

export function toDisplayLines(entries: TranscriptEntry[], width: number): DisplayLine[] {
  const contentWidth = Math.max(1, width - 2);
  const lines: DisplayLine[] = [];

  for (const entry of entries) {
    if (entry.kind === "input") {
      lines.push({ text: `> ${entry.content}`, color: "green" });
      continue;
    }

    const wrapped = wrapContent(entry.content, contentWidth);
    for (const line of wrapped) {
      if (entry.kind === "result") {
        lines.push({ text: `  ${line}`, color: "cyan", bold: true });
      } else if (entry.kind === "error") {
        lines.push({ text: `  ${line}`, color: "red" });
      } else {
        lines.push({ text: `  ${line}` });
      }
    }
  }

  return lines;
}
