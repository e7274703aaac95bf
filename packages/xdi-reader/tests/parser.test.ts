import { fileURLToPath } from "node:url";
import { describe, expect, it } from "vitest";
import { XdiParseError } from "../src/errors.js";
import {
  parseColumnDefinition,
  parseXdi,
  readXdiFile,
} from "../src/parser.js";

const SAMPLE = fileURLToPath(new URL("./fixtures/sample.xdi", import.meta.url));

function xdi(...lines: string[]): string {
  return lines.join("\n");
}

function parseError(text: string): XdiParseError {
  try {
    parseXdi(text);
  } catch (error) {
    if (error instanceof XdiParseError) return error;
    throw error;
  }
  throw new Error("Expected an XdiParseError");
}

describe("parseColumnDefinition", () => {
  it("splits label, units and address", () => {
    expect(parseColumnDefinition("energy eV || bl.mono.energy", 2)).toEqual({
      label: "energy",
      units: "eV",
      address: "bl.mono.energy",
      line: 2,
    });
  });

  it("leaves missing units and address null", () => {
    expect(parseColumnDefinition("i0", 3)).toEqual({
      label: "i0",
      units: null,
      address: null,
      line: 3,
    });
  });

  it("rejects an empty definition", () => {
    expect(() => parseColumnDefinition("  || addr", 4)).toThrow(
      "Column definition has no label (line 4)",
    );
  });
});

describe("readXdiFile", () => {
  it("parses a complete file", async () => {
    const file = await readXdiFile(SAMPLE);

    expect(file.version).toBe("1.0");
    expect(file.extraVersion).toBe("TestLab/0.1");
    expect(file.npts).toBe(4);
    expect(file.columns.map((c) => [c.label, c.units, c.address])).toEqual([
      ["energy", "eV", null],
      ["i0", null, null],
      ["itrans", null, "bl.det.itrans"],
    ]);
    expect(file.columns[0].values).toEqual([8900, 8910, 8920, 8930]);
    expect(file.columns[2].values).toEqual([500, 498.2, 490, 470.5]);
    expect([...file.metadata.keys()]).toEqual(["element", "mono", "sample"]);
    expect(Object.fromEntries(file.metadata.get("mono") ?? [])).toEqual({
      d_spacing: "3.13553",
      name: "Si 111",
    });
    expect(file.comments).toEqual(["Placeholder spectrum", "written for tests"]);
  });
});

describe("parseXdi", () => {
  it("lower-cases families and keywords", () => {
    const file = parseXdi(
      xdi("# XDI/1.0", "# Scan.Start_Time: 2024-01-01T00:00:00", "#---", "1"),
    );
    expect(file.metadata.get("scan")?.get("start_time")).toBe(
      "2024-01-01T00:00:00",
    );
  });

  it("names unlabeled columns from the label line, then by position", () => {
    const file = parseXdi(
      xdi("# XDI/1.0", "#---", "# energy", "1 2 3", "4 5 6"),
    );
    expect(file.extraVersion).toBeNull();
    expect(file.columns.map((c) => c.label)).toEqual(["energy", "col2", "col3"]);
    expect(file.columns[1].values).toEqual([2, 5]);
  });

  it("prefers Column.N definitions over the label line", () => {
    const file = parseXdi(
      xdi("# XDI/1.0", "# Column.1: angle deg", "#---", "# energy", "1"),
    );
    expect(file.columns[0].label).toBe("angle");
    expect(file.columns[0].units).toBe("deg");
  });

  it("accepts CRLF line endings and exponents", () => {
    const file = parseXdi("# XDI/1.1\r\n#----\r\n1.5e3 -2E-1\r\n");
    expect(file.columns.map((c) => c.values)).toEqual([[1500], [-0.2]]);
  });

  it("requires the version line", () => {
    const error = parseError(xdi("# Element.symbol: Cu", "#---", "1"));
    expect(error.line).toBe(1);
    expect(error.message).toBe("Missing '# XDI/<version>' line (line 1)");
  });

  it("rejects malformed header fields", () => {
    const error = parseError(xdi("# XDI/1.0", "# not a field", "#---", "1"));
    expect(error.message).toBe("Invalid header field 'not a field' (line 2)");
  });

  it("rejects data before the separator", () => {
    const error = parseError(xdi("# XDI/1.0", "# Element.symbol: Cu", "1 2"));
    expect(error.message).toBe("Data before the '#---' separator (line 3)");
  });

  it("rejects non-numeric values", () => {
    const error = parseError(xdi("# XDI/1.0", "#---", "1 2", "3 x"));
    expect(error.message).toBe("Invalid number 'x' (line 4)");
  });

  it("rejects ragged rows", () => {
    const error = parseError(xdi("# XDI/1.0", "#---", "1 2", "3"));
    expect(error.message).toBe("Expected 2 values, found 1 (line 4)");
  });

  it("rejects files without data", () => {
    const error = parseError(xdi("# XDI/1.0", "# Element.symbol: Cu", "#---"));
    expect(error.message).toBe("No data rows (line 3)");
  });

  it("rejects column definitions without data", () => {
    const error = parseError(
      xdi("# XDI/1.0", "# Column.3: mu", "#---", "1 2"),
    );
    expect(error.message).toBe(
      "Column.3 defined but rows have 2 values (line 2)",
    );
  });

  it("rejects header lines after data", () => {
    const error = parseError(xdi("# XDI/1.0", "#---", "1", "# late"));
    expect(error.message).toBe("Header line after data (line 4)");
  });
});
