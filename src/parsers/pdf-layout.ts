/**
 * Layout analysis for PDF text.
 *
 * pdf.js hands back positioned text runs. Runs that share a baseline form a
 * line, runs on a line separated by a wide gap are separate segments, and
 * a run of consecutive multi-segment lines is treated as one raw table
 * region whose columns are anchored on the region's first line.
 */

export interface PositionedText {
  text: string;
  x: number;
  y: number;
  width: number;
  fontSize: number;
}

export interface Segment {
  text: string;
  x: number;
  end: number;
}

export interface TextLine {
  y: number;
  segments: Segment[];
}

const Y_TOLERANCE = 3;
/** Gap, in multiples of the font size, that separates two segments */
const SEGMENT_GAP = 1.5;

export function groupLines(items: readonly PositionedText[]): TextLine[] {
  const visible = items.filter((item) => item.text.trim() !== "");
  const sorted = [...visible].sort((a, b) => b.y - a.y || a.x - b.x);
  const lines: { y: number; items: PositionedText[] }[] = [];

  for (const item of sorted) {
    const line = lines.find((l) => Math.abs(l.y - item.y) <= Y_TOLERANCE);
    if (line) line.items.push(item);
    else lines.push({ y: item.y, items: [item] });
  }

  return lines
    .sort((a, b) => b.y - a.y)
    .map((line) => ({ y: line.y, segments: toSegments(line.items) }));
}

function toSegments(items: PositionedText[]): Segment[] {
  const ordered = [...items].sort((a, b) => a.x - b.x);
  const segments: Segment[] = [];
  let lastFontSize = 0;

  for (const item of ordered) {
    const text = item.text.trim();
    const prev = segments[segments.length - 1];
    const gapLimit = Math.max(item.fontSize, lastFontSize, 1) * SEGMENT_GAP;

    if (prev && item.x - prev.end < gapLimit) {
      prev.text = `${prev.text} ${text}`;
      prev.end = Math.max(prev.end, item.x + item.width);
    } else {
      segments.push({ text, x: item.x, end: item.x + item.width });
    }
    lastFontSize = item.fontSize;
  }

  return segments;
}

export function lineText(line: TextLine): string {
  return line.segments.map((s) => s.text).join(" ");
}

/** Page text, one output line per layout line */
export function pageText(lines: readonly TextLine[]): string {
  return lines.map(lineText).join("\n").trim();
}

/**
 * Cut maximal runs of lines with two or more segments into raw tables.
 * Each segment lands in the column whose header anchor is nearest.
 */
export function findTableRegions(lines: readonly TextLine[]): string[][][] {
  const regions: TextLine[][] = [];
  let current: TextLine[] = [];

  for (const line of lines) {
    if (line.segments.length >= 2) {
      current.push(line);
    } else {
      if (current.length > 0) regions.push(current);
      current = [];
    }
  }
  if (current.length > 0) regions.push(current);

  return regions.map((region) => {
    const anchors = region[0].segments.map((s) => s.x);

    return region.map((line) => {
      const cells: string[] = anchors.map(() => "");
      for (const segment of line.segments) {
        let best = 0;
        anchors.forEach((anchor, i) => {
          if (Math.abs(segment.x - anchor) < Math.abs(segment.x - anchors[best])) best = i;
        });
        cells[best] = cells[best] ? `${cells[best]} ${segment.text}` : segment.text;
      }
      return cells;
    });
  });
}

/**
 * Apply the raw-table rules: trim cells, drop rows without a non-empty
 * cell and require at least two rows. Returns null for regions that fail.
 */
export function cleanRawTable(raw: readonly (readonly (string | null)[])[]): string[][] | null {
  if (raw.length < 2) return null;

  const trimmed = raw.map((row) => row.map((cell) => (cell ?? "").trim()));
  const [header, ...rest] = trimmed;
  const rows = rest.filter((row) => row.some((cell) => cell !== ""));

  if (rows.length === 0) return null;
  return [header, ...rows];
}
