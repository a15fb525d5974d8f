import { describe, it, expect, beforeEach } from "vitest";
import { extractRecords, findCandidate, normalizeParsed } from "../../server/services/responseExtractor";
import { MemoryLogger } from "../mocks/MemoryLogger";

describe("responseExtractor", () => {
  let logger: MemoryLogger;

  beforeEach(() => {
    logger = new MemoryLogger();
  });

  describe("extractRecords", () => {
    it("returns the array inside a json fenced block, ignoring surrounding prose", () => {
      const text = [
        "Here is the analysis you asked for:",
        "```json",
        '[{"System_Name": "Payroll", "Environment_DTAP": "OK", "Reason": "DEV, TEST, PROD environments are present"}]',
        "```",
        "Let me know if you need anything else.",
      ].join("\n");

      expect(extractRecords(text, logger)).toEqual([
        { System_Name: "Payroll", Environment_DTAP: "OK", Reason: "DEV, TEST, PROD environments are present" },
      ]);
    });

    it("prefers the fenced block over an earlier array in the prose", () => {
      const text = 'Draft: [{"System_Name": "Old"}]\n```json\n[{"System_Name": "New"}]\n```';

      expect(extractRecords(text, logger)).toEqual([{ System_Name: "New" }]);
    });

    it("returns a bare array unchanged", () => {
      const text = '[{"System_Name": "A", "Reason": "r"}, {"System_Name": "B", "Reason": "s"}]';

      expect(extractRecords(text, logger)).toEqual([
        { System_Name: "A", Reason: "r" },
        { System_Name: "B", Reason: "s" },
      ]);
    });

    it("reads an array from an untagged code fence", () => {
      expect(extractRecords('```\n[{"a": 1}]\n```', logger)).toEqual([{ a: 1 }]);
    });

    it("wraps a single object in a list", () => {
      const text = 'Result: {"System_Name": "A", "Environment_DTAP": "Deviation", "Reason": "No TEST environment available"}';

      expect(extractRecords(text, logger)).toEqual([
        { System_Name: "A", Environment_DTAP: "Deviation", Reason: "No TEST environment available" },
      ]);
    });

    it("unwraps a results key", () => {
      const text = '```json\n{"results": [{"System_Name": "A"}, {"System_Name": "B"}]}\n```';

      expect(extractRecords(text, logger)).toEqual([{ System_Name: "A" }, { System_Name: "B" }]);
    });

    it("returns an empty list for text with no JSON shape", () => {
      expect(extractRecords("I could not classify these systems.", logger)).toEqual([]);
      expect(logger.messages("error")).toEqual(["Could not find JSON content in the response"]);
    });

    it("returns an empty list for malformed JSON", () => {
      expect(extractRecords('[{"System_Name": }]', logger)).toEqual([]);
      expect(logger.messages("error")[0]).toMatch(/^Error parsing JSON: /);
    });

    it("returns an empty list for empty text", () => {
      expect(extractRecords("", logger)).toEqual([]);
    });

    it("parses the whole text when it is JSON without objects", () => {
      expect(extractRecords("[1, 2]", logger)).toEqual([1, 2]);
    });
  });

  describe("findCandidate", () => {
    it("reports which strategy matched", () => {
      expect(findCandidate('```json\n[]\n```')).toEqual({ source: "fenced", content: "[]" });
      expect(findCandidate('x [{"a": 1}] y')).toEqual({ source: "array", content: '[{"a": 1}]' });
      expect(findCandidate('x {"a": 1} y')).toEqual({ source: "object", content: '{"a": 1}' });
      expect(findCandidate("[1, 2]")).toEqual({ source: "whole", content: "[1, 2]" });
      expect(findCandidate("nothing here")).toEqual({ source: "none", content: null });
    });
  });

  describe("normalizeParsed", () => {
    it("keeps arrays", () => {
      expect(normalizeParsed([{ a: 1 }])).toEqual([{ a: 1 }]);
    });

    it("returns results when it is a list", () => {
      expect(normalizeParsed({ results: [1, 2] })).toEqual([1, 2]);
    });

    it("returns an empty list when results is not a list", () => {
      expect(normalizeParsed({ results: "none" })).toEqual([]);
    });

    it("wraps other objects", () => {
      expect(normalizeParsed({ a: 1 })).toEqual([{ a: 1 }]);
    });

    it("returns an empty list for scalars and null", () => {
      expect(normalizeParsed(42)).toEqual([]);
      expect(normalizeParsed(null)).toEqual([]);
    });
  });
});
