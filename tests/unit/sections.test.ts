import { describe, it, expect } from "vitest";
import { createSection, orderSections, serializeSection } from "../../src/context/index.js";
import { ValidationError } from "../../src/utils/errors.js";

describe("context sections", () => {
  it("tags string values as scalar and arrays as lists", () => {
    expect(createSection("Summary", "text", 1).value).toEqual({ kind: "scalar", text: "text" });
    expect(createSection("Articles", ["a", "b"], 2).value).toEqual({ kind: "list", items: ["a", "b"] });
  });

  it("joins list items with newlines", () => {
    expect(serializeSection(createSection("Articles", ["first", "second"], 1))).toBe("first\nsecond");
    expect(serializeSection(createSection("Empty", [], 1))).toBe("");
    expect(serializeSection(createSection("Summary", "as is\n", 1))).toBe("as is\n");
  });

  it("copies list items at construction", () => {
    const items = ["a"];
    const section = createSection("List", items, 1);
    items.push("b");

    expect(serializeSection(section)).toBe("a");
  });

  it("orders by ascending priority, keeping input order for ties", () => {
    const ordered = orderSections([
      createSection("c", "", 5),
      createSection("a", "", 1),
      createSection("d", "", 5),
      createSection("b", "", -3),
    ]);

    expect(ordered.map((s) => s.label)).toEqual(["b", "a", "c", "d"]);
  });

  it("rejects duplicate labels", () => {
    expect(() => orderSections([createSection("Summary", "a", 1), createSection("Summary", "b", 2)])).toThrow(
      'duplicate section label "Summary"',
    );
  });

  it("rejects non-integer priorities", () => {
    expect(() => createSection("Summary", "a", 1.5)).toThrow(ValidationError);
    expect(() => createSection("Summary", "a", Number.NaN)).toThrow('priority of section "Summary" must be an integer');
  });
});
