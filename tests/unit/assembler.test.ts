import { describe, it, expect, afterEach } from "vitest";
import { assembleContext, countTokens, createSection, gptTokenizer } from "../../src/context/index.js";
import type { Tokenizer } from "../../src/context/index.js";
import { TokenizationError, ValidationError } from "../../src/utils/errors.js";
import { setTestSink, type TelemetryShape } from "../../src/utils/telemetry.js";
import { charTokenizer, CountingTokenizer } from "../helpers/fakes.js";

// "é" spans tokens 2 and 3; token 2 alone decodes to a replacement character
const pairing: Tokenizer = {
  encode: (text) => Array.from(text, (ch) => (ch === "é" ? [2, 3] : [ch.codePointAt(0) ?? 0])).flat(),
  decode: (tokens) =>
    tokens
      .map((token, index) => {
        if (token === 2) return tokens[index + 1] === 3 ? "é" : "\uFFFD";
        if (token === 3) return "";
        return String.fromCodePoint(token);
      })
      .join(""),
};

describe("assembleContext", () => {
  afterEach(() => {
    setTestSink(null);
  });

  it("returns every section unchanged when the total fits", () => {
    const bundle = assembleContext(
      [createSection("Articles", ["one", "two"], 2), createSection("Summary", "hello", 1)],
      100,
      charTokenizer,
    );

    expect(bundle).toEqual({
      maxTokens: 100,
      totalTokens: 12,
      truncated: null,
      dropped: [],
      sections: [
        { label: "Summary", content: "hello", tokens: 5 },
        { label: "Articles", content: "one\ntwo", tokens: 7 },
      ],
    });
  });

  it("fits exactly at the budget without truncating", () => {
    const bundle = assembleContext([createSection("Summary", "abcde", 1)], 5, charTokenizer);

    expect(bundle.truncated).toBeNull();
    expect(bundle.totalTokens).toBe(5);
  });

  it("cuts the first section that does not fit and drops the rest", () => {
    const bundle = assembleContext(
      [
        createSection("Summary", "s".repeat(500), 1),
        createSection("Articles", "a".repeat(800), 2),
        createSection("Extra", "e".repeat(300), 3),
      ],
      1000,
      charTokenizer,
    );

    expect(bundle.sections.map((s) => [s.label, s.tokens])).toEqual([
      ["Summary", 500],
      ["Articles", 500],
    ]);
    expect(bundle.sections[1]?.content).toBe("a".repeat(500));
    expect(bundle.truncated).toBe("Articles");
    expect(bundle.dropped).toEqual(["Extra"]);
    expect(bundle.totalTokens).toBe(1000);
  });

  it("stops at the cut section even when later ones would fit", () => {
    const bundle = assembleContext(
      [createSection("Big", "b".repeat(20), 1), createSection("Tiny", "t", 2)],
      10,
      charTokenizer,
    );

    expect(bundle.sections).toEqual([{ label: "Big", content: "b".repeat(10), tokens: 10 }]);
    expect(bundle.dropped).toEqual(["Tiny"]);
  });

  it("keeps fitting sections byte-identical", () => {
    const summary = "  spaced\ttext \n";
    const bundle = assembleContext(
      [createSection("Summary", summary, 1), createSection("Rest", "r".repeat(50), 2)],
      20,
      charTokenizer,
    );

    expect(bundle.sections[0]).toEqual({ label: "Summary", content: summary, tokens: 15 });
    expect(bundle.sections[1]).toEqual({ label: "Rest", content: "rrrrr", tokens: 5 });
  });

  it("truncates list sections after serialization", () => {
    const bundle = assembleContext([createSection("Lines", ["ab", "cd"], 1)], 4, charTokenizer);

    expect(bundle.sections).toEqual([{ label: "Lines", content: "ab\nc", tokens: 4 }]);
    expect(bundle.truncated).toBe("Lines");
  });

  it("drops instead of emitting an empty section when the budget is used up", () => {
    const bundle = assembleContext(
      [createSection("First", "f".repeat(10), 1), createSection("Second", "s".repeat(5), 2), createSection("Third", "t", 3)],
      10,
      charTokenizer,
    );

    expect(bundle.sections.map((s) => s.label)).toEqual(["First"]);
    expect(bundle.truncated).toBeNull();
    expect(bundle.dropped).toEqual(["Second", "Third"]);
    expect(bundle.totalTokens).toBe(10);
  });

  it("honours priority order rather than input order", () => {
    const bundle = assembleContext(
      [createSection("Low", "l".repeat(10), 9), createSection("High", "h".repeat(10), 0)],
      12,
      charTokenizer,
    );

    expect(bundle.sections.map((s) => [s.label, s.tokens])).toEqual([
      ["High", 10],
      ["Low", 2],
    ]);
  });

  it.each([0, -5, 1.5, Number.POSITIVE_INFINITY])("rejects max_tokens=%s before tokenizing", (maxTokens) => {
    const tokenizer = new CountingTokenizer();

    expect(() => assembleContext([createSection("A", "a", 1)], maxTokens, tokenizer)).toThrow(ValidationError);
    expect(tokenizer.encodes).toBe(0);
  });

  it("rejects duplicate labels before tokenizing", () => {
    const tokenizer = new CountingTokenizer();

    expect(() =>
      assembleContext([createSection("A", "a", 1), createSection("A", "b", 2)], 10, tokenizer),
    ).toThrow('duplicate section label "A"');
    expect(tokenizer.encodes).toBe(0);
  });

  it("decodes only when a section is cut", () => {
    const tokenizer = new CountingTokenizer();

    assembleContext([createSection("A", "abc", 1), createSection("B", "de", 2)], 10, tokenizer);
    expect(tokenizer.decodes).toBe(0);

    assembleContext([createSection("A", "abc", 1), createSection("B", "de", 2)], 4, tokenizer);
    expect(tokenizer.decodes).toBe(1);
  });

  it("surfaces encode failures as TokenizationError", () => {
    const broken: Tokenizer = {
      encode: () => {
        throw new Error("vocabulary missing");
      },
      decode: () => "",
    };

    expect(() => assembleContext([createSection("A", "a", 1)], 10, broken)).toThrow(TokenizationError);
  });

  it("surfaces decode failures as TokenizationError", () => {
    const broken: Tokenizer = {
      encode: charTokenizer.encode,
      decode: () => {
        throw new Error("bad token id");
      },
    };

    try {
      assembleContext([createSection("A", "abcdef", 1)], 3, broken);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(TokenizationError);
      if (error instanceof TokenizationError) {
        expect(error.operation).toBe("decode");
        expect(error.cause).toBeInstanceOf(Error);
      }
    }
  });

  it("measures with the default tokenizer", () => {
    const text = "Warfarin interacts with aspirin.";
    const bundle = assembleContext([createSection("Summary", text, 1)], 1000, gptTokenizer);

    expect(bundle.totalTokens).toBe(countTokens(gptTokenizer, text));
    expect(bundle.totalTokens).toBeGreaterThan(0);
    expect(bundle.sections[0]?.content).toBe(text);
  });

  it("keeps the default tokenizer within budget when cutting", () => {
    const text = "Warfarin interacts with aspirin, heparin and ibuprofen. ".repeat(20);
    const bundle = assembleContext([createSection("Summary", text, 1)], 7, gptTokenizer);

    const content = bundle.sections[0]?.content ?? "";
    expect(bundle.truncated).toBe("Summary");
    expect(content.length).toBeGreaterThan(0);
    expect(text.startsWith(content)).toBe(true);
    expect(bundle.totalTokens).toBe(countTokens(gptTokenizer, content));
    expect(bundle.totalTokens).toBeLessThanOrEqual(7);
  });

  it.each([
    ["Chinese", "药物相互作用是指两种或多种药物同时使用时产生的影响。"],
    ["emoji", "💊🩺💉 interactions between 💊 and 🩺"],
    ["Greek", "Ωμέγα φάρμακο αλληλεπίδραση"],
  ])("cuts %s text to a clean prefix within every budget", (_script, text) => {
    const full = countTokens(gptTokenizer, text);

    for (let budget = 1; budget < full; budget++) {
      const bundle = assembleContext([createSection("S", text, 1)], budget, gptTokenizer);
      const content = bundle.sections[0]?.content ?? "";

      expect(content.includes("\uFFFD")).toBe(false);
      expect(text.startsWith(content)).toBe(true);
      expect(countTokens(gptTokenizer, content)).toBeLessThanOrEqual(budget);
      expect(bundle.totalTokens).toBe(countTokens(gptTokenizer, content));
    }
  });

  it("backs off a cut whose head is not a prefix of the section", () => {
    const bundle = assembleContext([createSection("S", "abé", 1)], 3, pairing);

    expect(bundle.sections).toEqual([{ label: "S", content: "ab", tokens: 2 }]);
    expect(bundle.truncated).toBe("S");
    expect(bundle.totalTokens).toBe(2);
  });

  it("drops a section that cannot be backed off to a non-empty prefix", () => {
    const bundle = assembleContext([createSection("S", "éa", 1)], 1, pairing);

    expect(bundle.sections).toEqual([]);
    expect(bundle.truncated).toBeNull();
    expect(bundle.dropped).toEqual(["S"]);
    expect(bundle.totalTokens).toBe(0);
  });

  it("emits truncation telemetry", () => {
    const events: Array<{ name: string; data: TelemetryShape }> = [];
    setTestSink((name, data) => events.push({ name, data }));

    assembleContext([createSection("A", "aaaa", 1), createSection("B", "bbbb", 2)], 6, charTokenizer);

    expect(events.find((e) => e.name === "context.truncated")?.data).toEqual({
      measured_tokens: 8,
      max_tokens: 6,
      truncated_section: "B",
      dropped_sections: [],
    });
    expect(events.find((e) => e.name === "context.assembled")?.data).toEqual({
      section_count: 2,
      total_tokens: 6,
      max_tokens: 6,
      truncated: true,
    });
  });
});
