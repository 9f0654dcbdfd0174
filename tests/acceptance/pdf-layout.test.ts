import { describe, it, expect } from "vitest";
import { cleanRawTable, findTableRegions, groupLines, pageText } from "../../src/parsers/pdf-layout.js";
import type { PositionedText } from "../../src/parsers/pdf-layout.js";

function run(text: string, x: number, y: number): PositionedText {
  return { text, x, y, width: text.length * 5, fontSize: 10 };
}

describe("PDF layout", () => {
  it("groups runs on one baseline into a line, top of page first", () => {
    const lines = groupLines([
      run("second", 72, 700),
      run("first", 72, 720),
      run("line", 110, 721),
    ]);

    expect(lines.map((l) => l.segments.map((s) => s.text))).toEqual([["first line"], ["second"]]);
  });

  it("splits a line at wide gaps", () => {
    const [line] = groupLines([run("Name", 72, 700), run("Qty", 200, 700)]);
    expect(line.segments.map((s) => s.text)).toEqual(["Name", "Qty"]);
  });

  it("drops blank runs", () => {
    expect(groupLines([run("   ", 72, 700)])).toEqual([]);
  });

  it("finds consecutive multi-segment lines as one table", () => {
    const lines = groupLines([
      run("Title", 72, 760),
      run("Item", 72, 740),
      run("Cost", 200, 740),
      run("Pen", 72, 720),
      run("2", 200, 720),
      run("Ink", 72, 700),
      run("5", 205, 700),
      run("Footer", 72, 680),
    ]);

    expect(findTableRegions(lines)).toEqual([
      [
        ["Item", "Cost"],
        ["Pen", "2"],
        ["Ink", "5"],
      ],
    ]);
    expect(pageText(lines)).toBe("Title\nItem Cost\nPen 2\nInk 5\nFooter");
  });

  it("leaves a cell empty when a row has no text under a column", () => {
    const lines = groupLines([
      run("A", 72, 740),
      run("B", 200, 740),
      run("C", 320, 740),
      run("1", 72, 720),
      run("3", 320, 720),
    ]);

    expect(findTableRegions(lines)).toEqual([
      [
        ["A", "B", "C"],
        ["1", "", "3"],
      ],
    ]);
  });

  it("requires a header and one non-empty data row", () => {
    expect(cleanRawTable([["only"]])).toBeNull();
    expect(cleanRawTable([["h1", "h2"], ["", " "]])).toBeNull();
    expect(
      cleanRawTable([
        [" h1 ", "h2"],
        ["", null],
        ["a", " b "],
      ])
    ).toEqual([
      ["h1", "h2"],
      ["a", "b"],
    ]);
  });
});
