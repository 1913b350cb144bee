import { describe, it, expect } from "vitest";
import { stripVTControlCharacters } from "node:util";
import { renderFields, renderTable } from "../src/output.js";

const plain = (lines: string[]): string[] => lines.map((l) => stripVTControlCharacters(l));

describe("renderTable", () => {
  it("pads columns to the widest cell and right-aligns numbers", () => {
    const lines = renderTable(
      [{ header: "ID", align: "right" }, { header: "Name" }, { header: "Amount", align: "right" }],
      [
        ["1", "Cash", "5.00"],
        ["12", "Acme Ltd", "1250.00"],
      ],
    );

    expect(plain(lines)).toEqual([
      "ID  Name       Amount",
      "--  --------  -------",
      " 1  Cash         5.00",
      "12  Acme Ltd  1250.00",
    ]);
  });

  it("trims the padding of a short last column", () => {
    const lines = renderTable([{ header: "Name" }, { header: "Note" }], [["A", "x"]]);
    expect(plain(lines)).toEqual(["Name  Note", "----  ----", "A     x"]);
  });

  it("renders only the header for no rows", () => {
    expect(plain(renderTable([{ header: "ID" }], []))).toEqual(["ID", "--"]);
  });
});

describe("renderFields", () => {
  it("aligns values after the longest label", () => {
    expect(
      plain(
        renderFields([
          ["ID", "3"],
          ["Description", "Rent"],
          ["Reference", ""],
        ]),
      ),
    ).toEqual(["ID:          3", "Description: Rent", "Reference:"]);
  });
});
