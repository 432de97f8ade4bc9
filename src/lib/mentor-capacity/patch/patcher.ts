/**
 * Format-preserving roster patcher.
 *
 * Locates mentor blocks by line patterns and edits only the `availability`
 * and `sort` lines of each requested block. Everything else (comments,
 * quoting, spacing, line endings) is left as written. A field whose shape is
 * not recognized is treated as absent rather than as an error.
 */

import { normalizeName } from "../normalize.js";
import { CLOSED_SORT_VALUE, type PatchResult } from "../types.js";
import { detectEol, findBlocks, joinLines, splitLines, type Block, type Line } from "./lines.js";

const AVAILABILITY_LINE = /^([ \t]*)availability[ \t]*:(.*)$/i;
const ITEM_LINE = /^-[ \t]+(\d+)[ \t]*(?:#.*)?$/;
const SORT_LINE = /^([ \t]*)(sort[ \t]*:)(.*)$/i;
const SORT_VALUE = /^[ \t]*([+-]?\d+)[ \t]*(?:#.*)?$/;

interface AvailabilityEdit {
  changed: boolean;
  /** Header line index after the edit; null when the block has no header */
  headerIndex: number | null;
  headerIndent: string;
}

function findLine(lines: Line[], block: Block, pattern: RegExp): number {
  for (let i = block.start; i < block.end; i++) {
    if (pattern.test(lines[i].text)) return i;
  }
  return -1;
}

function collectItems(lines: Line[], from: number, end: number, itemIndent: string): { index: number; value: number }[] {
  const items: { index: number; value: number }[] = [];
  for (let i = from; i < end; i++) {
    const text = lines[i].text;
    if (!text.startsWith(itemIndent)) break;
    const m = ITEM_LINE.exec(text.slice(itemIndent.length));
    if (!m) break;
    items.push({ index: i, value: parseInt(m[1], 10) });
  }
  return items;
}

function editFlowList(line: Line, month: number): boolean {
  const open = line.text.indexOf("[");
  const close = open === -1 ? -1 : line.text.indexOf("]", open);
  if (close === -1) return false;

  const values = (line.text.slice(open + 1, close).match(/-?\d+/g) ?? []).map((v) => parseInt(v, 10));
  if (!values.includes(month)) return false;

  const remaining = values.filter((v) => v !== month);
  line.text = `${line.text.slice(0, open)}[${remaining.join(", ")}]${line.text.slice(close + 1)}`;
  return true;
}

function editAvailability(lines: Line[], block: Block, month: number): AvailabilityEdit {
  const headerIndex = findLine(lines, block, AVAILABILITY_LINE);
  if (headerIndex === -1) {
    return { changed: false, headerIndex: null, headerIndent: "" };
  }
  const header = lines[headerIndex];
  const m = AVAILABILITY_LINE.exec(header.text);
  const headerIndent = m?.[1] ?? "";
  const rest = m?.[2] ?? "";

  if (rest.includes("[") && rest.includes("]")) {
    return { changed: editFlowList(header, month), headerIndex, headerIndent };
  }

  const restTrimmed = rest.trim();
  if (restTrimmed !== "" && !restTrimmed.startsWith("#")) {
    // scalar or otherwise unrecognized value
    return { changed: false, headerIndex, headerIndent };
  }

  const items = collectItems(lines, headerIndex + 1, block.end, `${headerIndent}  `);
  const remaining = items.filter((it) => it.value !== month);
  if (remaining.length === items.length) {
    return { changed: false, headerIndex, headerIndent };
  }

  const lastItem = lines[items[items.length - 1].index];
  const itemEol = items.map((it) => lines[it.index].eol).find((e) => e !== "") ?? header.eol;

  if (remaining.length === 0) {
    const prefix = header.text.slice(0, header.text.length - rest.length);
    const comment = restTrimmed.startsWith("#") ? ` ${restTrimmed}` : "";
    header.text = `${prefix} []${comment}`;
    header.eol = lastItem.eol;
    lines.splice(headerIndex + 1, items.length);
    return { changed: true, headerIndex, headerIndent };
  }

  const kept: Line[] = remaining.map((it, i) => ({
    text: lines[it.index].text,
    eol: i === remaining.length - 1 ? lastItem.eol : itemEol,
  }));
  lines.splice(headerIndex + 1, items.length, ...kept);
  return { changed: true, headerIndex, headerIndent };
}

function lastContentLine(lines: Line[], block: Block): number {
  for (let i = block.end - 1; i > block.start; i--) {
    const t = lines[i].text.trim();
    if (t !== "" && !t.startsWith("#")) return i;
  }
  return block.start;
}

/** First line after the header that is not part of its value (list items, nested lines). */
function afterHeaderValue(lines: Line[], headerIndex: number, end: number, headerIndent: string): number {
  let i = headerIndex + 1;
  while (i < end) {
    const text = lines[i].text;
    const indent = /^[ \t]*/.exec(text)?.[0] ?? "";
    const nested = indent.length > headerIndent.length && text.trim() !== "";
    const indentless = indent === headerIndent && text.slice(indent.length).startsWith("-");
    if (!nested && !indentless) break;
    i++;
  }
  return i;
}

function insertLine(lines: Line[], at: number, text: string, docEol: string): void {
  const prev = lines[at - 1];
  const eol = prev.eol;
  if (prev.eol === "") prev.eol = docEol;
  lines.splice(at, 0, { text, eol });
}

function editSort(lines: Line[], block: Block, availability: AvailabilityEdit, docEol: string): boolean {
  const sortIndex = findLine(lines, block, SORT_LINE);
  if (sortIndex !== -1) {
    const line = lines[sortIndex];
    const m = SORT_LINE.exec(line.text);
    if (!m) return false;
    const value = SORT_VALUE.exec(m[3]);
    if (value && parseInt(value[1], 10) === CLOSED_SORT_VALUE) return false;
    line.text = `${m[1]}${m[2]} ${CLOSED_SORT_VALUE}`;
    return true;
  }

  if (availability.headerIndex !== null) {
    const at = afterHeaderValue(lines, availability.headerIndex, block.end, availability.headerIndent);
    insertLine(lines, at, `${availability.headerIndent}sort: ${CLOSED_SORT_VALUE}`, docEol);
  } else {
    insertLine(lines, lastContentLine(lines, block) + 1, `${block.indent}  sort: ${CLOSED_SORT_VALUE}`, docEol);
  }
  return true;
}

/** Block for a normalized name; the last one wins when several share it. */
function lookupBlock(blocks: Block[], normalized: string): { block: Block | undefined; shared: boolean } {
  const matches = blocks.filter((b) => b.normalizedName === normalized);
  return { block: matches[matches.length - 1], shared: matches.length > 1 };
}

/**
 * Close `month` for every mentor in `worklist`: remove it from `availability`
 * and set `sort: 100`. Returns the original text unchanged when no block changed.
 */
export function patchDocument(documentText: string, worklist: string[], month: number): PatchResult {
  const lines = splitLines(documentText);
  const docEol = detectEol(lines);
  const changed: string[] = [];
  const notFound: string[] = [];
  const collisions: string[] = [];
  const seen = new Set<string>();
  let blocks = findBlocks(lines);

  for (const name of worklist) {
    const normalized = normalizeName(name);
    if (seen.has(normalized)) continue;
    seen.add(normalized);

    const { block, shared } = lookupBlock(blocks, normalized);
    if (!block) {
      notFound.push(name);
      continue;
    }
    if (shared) collisions.push(normalized);

    const lineCount = lines.length;
    const availability = editAvailability(lines, block, month);
    // a collapsed or shortened list moves the block's end
    const current = { ...block, end: block.end + lines.length - lineCount };
    const sortChanged = editSort(lines, current, availability, docEol);
    if (lines.length !== lineCount) blocks = findBlocks(lines);

    if (availability.changed || sortChanged) changed.push(name);
  }

  if (changed.length === 0) {
    return { text: documentText, changed, notFound, collisions };
  }
  return { text: joinLines(lines), changed, notFound, collisions };
}
