import { describe, it, expect } from "vitest";
import {
  entityNameFromIdentifier,
  normalizeName,
  parseSubject,
  parseSubjectList,
  subjectsEqual,
  toResourceName,
} from "../../src/interactions/index.js";
import { ValidationError } from "../../src/utils/errors.js";

describe("subjects", () => {
  describe("normalizeName", () => {
    it("trims and collapses whitespace", () => {
      expect(normalizeName("  acetylsalicylic \t  acid\n")).toBe("acetylsalicylic acid");
    });
  });

  describe("parseSubject", () => {
    it("returns the normalized subject", () => {
      expect(parseSubject("  Warfarin ")).toBe("Warfarin");
    });

    it("rejects empty and whitespace-only subjects", () => {
      expect(() => parseSubject("")).toThrow(ValidationError);
      expect(() => parseSubject("   ")).toThrow("subject must not be empty");
    });

    it("rejects non-strings", () => {
      expect(() => parseSubject(42)).toThrow("subject must be a string");
    });

    it("rejects control characters but accepts tabs and newlines", () => {
      expect(() => parseSubject("war\u0000farin")).toThrow("subject contains control characters");
      expect(parseSubject("warfarin\tsodium")).toBe("warfarin sodium");
    });

    it("rejects subjects longer than 200 characters", () => {
      expect(parseSubject("a".repeat(200))).toHaveLength(200);
      expect(() => parseSubject("a".repeat(201))).toThrow("subject must be at most 200 characters");
    });

    it("reports the field name", () => {
      try {
        parseSubject("", "subject_b");
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(ValidationError);
        if (error instanceof ValidationError) {
          expect(error.field).toBe("subject_b");
          expect(error.message).toBe("subject_b must not be empty");
        }
      }
    });
  });

  describe("subjectsEqual", () => {
    it("compares normalized forms, case-sensitively", () => {
      expect(subjectsEqual(" Aspirin", "Aspirin  ")).toBe(true);
      expect(subjectsEqual("Aspirin", "aspirin")).toBe(false);
    });
  });

  describe("parseSubjectList", () => {
    it("splits, normalizes, drops empties and keeps first occurrences", () => {
      expect(parseSubjectList("warfarin, aspirin,, warfarin ,ibuprofen")).toEqual([
        "warfarin",
        "aspirin",
        "ibuprofen",
      ]);
    });

    it("accepts arrays whose entries may themselves be comma-separated", () => {
      expect(parseSubjectList(["warfarin", "aspirin, warfarin"])).toEqual(["warfarin", "aspirin"]);
    });

    it("rejects a list with no subjects", () => {
      expect(() => parseSubjectList(" , ,")).toThrow("subjects must name at least one subject");
    });
  });

  describe("identifier normalization", () => {
    it("builds underscore resource names", () => {
      expect(toResourceName(" acetylsalicylic  acid ")).toBe("Acetylsalicylic_acid");
    });

    it("uppercases the first character like page titles", () => {
      expect(toResourceName("warfarin")).toBe("Warfarin");
      expect(toResourceName("Warfarin")).toBe("Warfarin");
      expect(toResourceName("étoposide")).toBe("Étoposide");
    });

    it("takes the decoded last URI segment with underscores as spaces", () => {
      expect(entityNameFromIdentifier("http://dbpedia.org/resource/Acetylsalicylic_acid")).toBe(
        "Acetylsalicylic acid",
      );
      expect(entityNameFromIdentifier("http://dbpedia.org/resource/Caf%C3%A9ine")).toBe("Caféine");
      expect(entityNameFromIdentifier("http://example.org/ns#Thing")).toBe("ns");
    });

    it("keeps malformed percent-escapes as-is", () => {
      expect(entityNameFromIdentifier("http://dbpedia.org/resource/100%_Pure")).toBe("100% Pure");
    });
  });
});
