import { describe, it, expect } from "vitest";
import {
  EmptyGeometry,
  RectGeometry,
  buildFeature,
  buildSchema,
} from "@geofeature/testkit";
import { renderDump } from "../src/commands/dump.js";
import { formatEnvelopeLines, summarizeEnvelopes } from "../src/commands/envelope.js";
import { describeSchema, formatSchemaLines } from "../src/commands/schema.js";

function grownFixture() {
  const schema = buildSchema("b", "a");
  const first = buildFeature(schema, 1, { a: 1, b: "x" });
  schema.registerSlot("c");
  const second = buildFeature(schema, 2, { c: true });
  return { schema, features: [first, second] };
}

describe("renderDump", () => {
  it("should concatenate feature text", () => {
    const { features } = grownFixture();

    expect(renderDump(features)).toBe(
      "Feature ( id=1\n  a:1\n  b:x\n)\n" + "Feature ( id=2\n  a:null\n  b:null\n  c:true\n)\n"
    );
  });

  it("should stop after the limit", () => {
    const { features } = grownFixture();

    expect(renderDump(features, 1)).toBe("Feature ( id=1\n  a:1\n  b:x\n)\n");
    expect(renderDump(features, 0)).toBe("");
  });
});

describe("describeSchema", () => {
  it("should report coverage for slots added after a feature was built", () => {
    const { schema, features } = grownFixture();
    const slots = describeSchema(schema, features);

    expect(slots).toEqual([
      { name: "a", index: 1, coverage: 2 },
      { name: "b", index: 0, coverage: 2 },
      { name: "c", index: 2, coverage: 1 },
    ]);
    expect(formatSchemaLines(slots, features.length)).toEqual([
      "1\ta\t2/2",
      "0\tb\t2/2",
      "2\tc\t1/2",
    ]);
  });
});

describe("envelopes", () => {
  it("should union feature boxes and skip features without extent", () => {
    const schema = buildSchema();
    const first = buildFeature(schema, 1);
    first.addGeometry(new EmptyGeometry());
    first.addGeometry(new RectGeometry(1, 2, 3, 4));
    const second = buildFeature(schema, 2);
    const third = buildFeature(schema, 3);
    third.addGeometry(new RectGeometry(-5, 0, 0, 1));

    expect(formatEnvelopeLines([first, second, third])).toEqual([
      "1\tbox2d(1,2,3,4)",
      "2\tbox2d(empty)",
      "3\tbox2d(-5,0,0,1)",
      "total\tbox2d(-5,0,3,4)",
    ]);
    expect(summarizeEnvelopes([first, second, third])).toEqual({
      features: [
        { id: 1, bbox: [1, 2, 3, 4] },
        { id: 2, bbox: null },
        { id: 3, bbox: [-5, 0, 0, 1] },
      ],
      bbox: [-5, 0, 3, 4],
    });
  });

  it("should recompute boxes on every call", () => {
    const schema = buildSchema();
    const feature = buildFeature(schema, 1);
    const geometry = new RectGeometry(0, 0, 1, 1);
    feature.addGeometry(geometry);

    summarizeEnvelopes([feature]);
    formatEnvelopeLines([feature]);

    expect(geometry.envelopeCalls).toBe(2);
  });

  it("should report an empty total for no features", () => {
    expect(summarizeEnvelopes([])).toEqual({ features: [], bbox: null });
    expect(formatEnvelopeLines([])).toEqual(["total\tbox2d(empty)"]);
  });
});
