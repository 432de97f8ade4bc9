/**
 * Line model for the roster patcher. Each line keeps its own terminator so that
 * joining untouched lines reproduces the input byte for byte.
 */

import { normalizeName } from "../normalize.js";

export interface Line {
  text: string;
  /** "\n", "\r\n", "\r", or "" for a final unterminated line */
  eol: string;
}

/** Line range of one record: [start, end). */
export interface Block {
  start: number;
  end: number;
  /** Indentation before the record's "-" marker */
  indent: string;
  name: string;
  normalizedName: string;
}

const RECORD_START = /^([ \t]*)-[ \t]+name[ \t]*:[ \t]*(\S.*?)[ \t]*$/;

export function splitLines(doc: string): Line[] {
  const lines: Line[] = [];
  let start = 0;
  let i = 0;
  while (i < doc.length) {
    const ch = doc[i];
    if (ch === "\n" || ch === "\r") {
      const eol = ch === "\r" && doc[i + 1] === "\n" ? "\r\n" : ch;
      lines.push({ text: doc.slice(start, i), eol });
      i += eol.length;
      start = i;
    } else {
      i++;
    }
  }
  if (start < doc.length) lines.push({ text: doc.slice(start), eol: "" });
  return lines;
}

export function joinLines(lines: Line[]): string {
  return lines.map((l) => l.text + l.eol).join("");
}

/** First terminator in the document, "\n" when there is none. */
export function detectEol(lines: Line[]): string {
  return lines.find((l) => l.eol !== "")?.eol ?? "\n";
}

const DOUBLE_QUOTED = /^"((?:[^"\\]|\\.)*)"/;
const SINGLE_QUOTED = /^'((?:[^']|'')*)'/;

/** Scalar value of a `name:` field: quotes removed, trailing comment dropped. */
export function scalarName(raw: string): string {
  const dq = DOUBLE_QUOTED.exec(raw);
  if (dq) return dq[1].replace(/\\(.)/g, "$1");
  const sq = SINGLE_QUOTED.exec(raw);
  if (sq) return sq[1].replace(/''/g, "'");
  return raw.replace(/[ \t]+#.*$/, "").trim();
}

function indentOf(text: string): string {
  return /^[ \t]*/.exec(text)?.[0] ?? "";
}

/** First line at or left of the record's marker that is not blank or a comment. */
function blockEnd(lines: Line[], from: number, limit: number, indent: string): number {
  for (let i = from; i < limit; i++) {
    const t = lines[i].text.trim();
    if (t === "" || t.startsWith("#")) continue;
    if (indentOf(lines[i].text).length <= indent.length) return i;
  }
  return limit;
}

/** Scan `- name: <value>` markers and cut the document into blocks. */
export function findBlocks(lines: Line[]): Block[] {
  const starts: { index: number; indent: string; name: string }[] = [];
  lines.forEach((line, index) => {
    const m = RECORD_START.exec(line.text);
    if (m) starts.push({ index, indent: m[1], name: scalarName(m[2]) });
  });

  return starts.map((s, i) => ({
    start: s.index,
    end: blockEnd(lines, s.index + 1, i + 1 < starts.length ? starts[i + 1].index : lines.length, s.indent),
    indent: s.indent,
    name: s.name,
    normalizedName: normalizeName(s.name),
  }));
}
