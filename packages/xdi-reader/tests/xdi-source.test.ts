import { fileURLToPath } from "node:url";
import { describeSource, silentLogger } from "array-ld";
import { describe, expect, it } from "vitest";
import { parseXdi } from "../src/parser.js";
import { XdiNodeSource, xdiNodes } from "../src/xdi-source.js";

const SAMPLE = fileURLToPath(new URL("./fixtures/sample.xdi", import.meta.url));

describe("xdiNodes", () => {
  it("exposes columns, header families and comments", () => {
    const nodes = xdiNodes(
      parseXdi(
        [
          "# XDI/1.0",
          "# Column.1: energy eV || bl.energy",
          "# Element.symbol: Cu",
          "# ///",
          "# a note",
          "#---",
          "1 10",
          "2 20",
        ].join("\n"),
      ),
    );

    expect(nodes).toEqual([
      {
        path: "data/energy",
        shape: [2],
        dtype: "float64",
        attributes: [
          ["column", 1],
          ["units", "eV"],
          ["address", "bl.energy"],
        ],
      },
      {
        path: "data/col2",
        shape: [2],
        dtype: "float64",
        attributes: [["column", 2]],
      },
      {
        path: "metadata/element",
        shape: [],
        dtype: "string",
        attributes: new Map([["symbol", "Cu"]]),
      },
      {
        path: "comments",
        shape: [],
        dtype: "string",
        attributes: [["text", "a note"]],
      },
    ]);
  });

  it("omits the comments node when there are none", () => {
    const nodes = xdiNodes(parseXdi("# XDI/1.0\n#---\n1"));
    expect(nodes.map((n) => n.path)).toEqual(["data/col1"]);
  });
});

describe("XdiNodeSource", () => {
  it("describes a file as a linked data document", async () => {
    const source = await XdiNodeSource.fromFile(SAMPLE);
    const { document, diagnostics } = await describeSource(source, {
      name: "Cu foil",
      logger: silentLogger,
    });

    expect(diagnostics).toEqual([]);
    expect(document.name).toBe("Cu foil");
    expect(
      document.variableMeasured.map((v) => [v.path, v.role, v.encodingFormat]),
    ).toEqual([
      ["/data/energy", "Dimension", "text/x-xdi"],
      ["/data/i0", "Dimension", "text/x-xdi"],
      ["/data/itrans", "Dimension", "text/x-xdi"],
      ["/metadata/element", "Attribute", "text/x-xdi"],
      ["/metadata/mono", "Attribute", "text/x-xdi"],
      ["/metadata/sample", "Attribute", "text/x-xdi"],
      ["/comments", "Attribute", "text/x-xdi"],
    ]);
    expect(document.variableMeasured[4].additionalProperty).toEqual([
      { "@type": "PropertyValue", name: "d_spacing", value: "3.13553" },
      { "@type": "PropertyValue", name: "name", value: "Si 111" },
    ]);
    expect(document.variableMeasured[6].additionalProperty).toEqual([
      {
        "@type": "PropertyValue",
        name: "text",
        value: "Placeholder spectrum\nwritten for tests",
      },
    ]);
  });
});
