/**
 * Property-based tests for the classification invariants, using fast-check
 * over randomly generated array trees.
 */

import * as fc from "fast-check";
import { describe, expect, it } from "vitest";
import { displayName } from "./classify.js";
import { isNumericElementType } from "./element-type.js";
import { serializeLinkedDataDocument } from "./jsonld.js";
import { silentLogger } from "./logger.js";
import { runPipeline } from "./pipeline.js";
import type { RawArrayNode } from "./types.js";

const DTYPES = [
  "<f8",
  "<i4",
  "|u1",
  "|b1",
  "<U5",
  "|S3",
  "<M8[ns]",
  "float32",
  "H5T_OPAQUE",
];

const nodeArbitrary: fc.Arbitrary<RawArrayNode> = fc
  .record({
    path: fc.stringMatching(/^[a-z]{1,6}(\/[a-z]{1,6}){0,2}$/),
    shape: fc.array(fc.integer({ min: 0, max: 6 }), { maxLength: 3 }),
    dtype: fc.constantFrom(...DTYPES),
    labeled: fc.boolean(),
  })
  .map(({ path, shape, dtype, labeled }) => ({
    path,
    shape,
    dtype,
    axisLabels:
      labeled && shape.length > 0
        ? shape.map((_, i) => (i === shape.length - 1 ? "axis" : null))
        : undefined,
  }));

const treeArbitrary = fc.uniqueArray(nodeArbitrary, {
  selector: (node) => node.path,
  minLength: 1,
  maxLength: 12,
});

function run(nodes: RawArrayNode[]) {
  return runPipeline(nodes, { logger: silentLogger });
}

describe("classification properties", () => {
  it("assigns every path to exactly one group", () => {
    fc.assert(
      fc.property(treeArbitrary, (nodes) => {
        const { classification } = run(nodes);
        const assigned = [
          ...classification.measures,
          ...classification.dimensions,
          ...classification.attributes,
        ].map((d) => d.path);

        expect(assigned).toHaveLength(nodes.length);
        expect(new Set(assigned)).toEqual(new Set(nodes.map((n) => n.path)));
      }),
    );
  });

  it("always makes labeled nodes candidates", () => {
    fc.assert(
      fc.property(treeArbitrary, (nodes) => {
        const { candidates } = run(nodes);
        for (const node of nodes) {
          if (node.axisLabels !== undefined) {
            expect(candidates.has(node.path)).toBe(true);
          }
        }
      }),
    );
  });

  it("never makes a non-numeric candidate without 'time' in its name a dimension", () => {
    fc.assert(
      fc.property(treeArbitrary, (nodes) => {
        const { candidates, classification } = run(nodes);
        const attributePaths = new Set(
          classification.attributes.map((d) => d.path),
        );
        for (const descriptor of classification.dimensions) {
          expect(candidates.has(descriptor.path)).toBe(true);
        }
        for (const descriptor of [
          ...classification.measures,
          ...classification.dimensions,
          ...classification.attributes,
        ]) {
          if (
            candidates.has(descriptor.path) &&
            !isNumericElementType(descriptor.elementType) &&
            !displayName(descriptor.path).toLowerCase().includes("time")
          ) {
            expect(attributePaths.has(descriptor.path)).toBe(true);
          }
        }
      }),
    );
  });

  it("makes non-candidates aligned with a candidate's first axis measures", () => {
    fc.assert(
      fc.property(treeArbitrary, (nodes) => {
        const { candidates, descriptors, classification } = run(nodes);
        const firstAxes = new Set<number>();
        for (const path of candidates) {
          const shape = descriptors.get(path)?.shape;
          if (shape && shape.length > 0) firstAxes.add(shape[0]);
        }
        const measurePaths = new Set(
          classification.measures.map((d) => d.path),
        );
        for (const descriptor of descriptors.values()) {
          const { shape } = descriptor;
          if (
            !candidates.has(descriptor.path) &&
            shape &&
            shape.length > 0 &&
            firstAxes.has(shape[0])
          ) {
            expect(measurePaths.has(descriptor.path)).toBe(true);
          }
        }
      }),
    );
  });

  it("produces byte-identical documents for the same input", () => {
    fc.assert(
      fc.property(treeArbitrary, (nodes) => {
        const first = serializeLinkedDataDocument(run(nodes).document);
        const second = serializeLinkedDataDocument(run(nodes).document);
        expect(first).toBe(second);
      }),
    );
  });
});
