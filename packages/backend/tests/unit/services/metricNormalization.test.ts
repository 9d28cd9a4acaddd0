import { describe, expect, it } from "vitest";
import {
  checkBounds,
  normalizeMetricValue,
  sameNormalizedValue
} from "../../../src/services/metricNormalization.js";

describe("normalizeMetricValue", () => {
  describe("currency", () => {
    it("applies scale words and symbols", () => {
      expect(normalizeMetricValue("currency", "$4.2 billion", null)).toEqual({
        ok: true,
        value: { type: "number", value: 4_200_000_000, unit: "USD" }
      });
      expect(normalizeMetricValue("currency", "€3.5m", null)).toEqual({
        ok: true,
        value: { type: "number", value: 3_500_000, unit: "EUR" }
      });
    });

    it("reads accounting parentheses as negative", () => {
      expect(normalizeMetricValue("currency", "(1,234)", "USD")).toEqual({
        ok: true,
        value: { type: "number", value: -1234, unit: "USD" }
      });
    });

    it("rejects a different currency than expected", () => {
      expect(normalizeMetricValue("currency", "£10 million", null, "USD")).toEqual({
        ok: false,
        reason: "expected USD but found GBP"
      });
    });
  });

  describe("percentage", () => {
    it("converts basis points and keeps signs", () => {
      expect(normalizeMetricValue("percentage", "250 bps", null)).toEqual({
        ok: true,
        value: { type: "number", value: 2.5, unit: "%" }
      });
      expect(normalizeMetricValue("percentage", "-3.2%", null)).toEqual({
        ok: true,
        value: { type: "number", value: -3.2, unit: "%" }
      });
    });

    it("rejects values without a percent sign", () => {
      expect(normalizeMetricValue("percentage", "$14.5", null)).toEqual({
        ok: false,
        reason: '"$14.5" is not a percentage'
      });
    });
  });

  describe("count", () => {
    it("requires whole numbers", () => {
      expect(normalizeMetricValue("count", "12,400", null)).toEqual({
        ok: true,
        value: { type: "number", value: 12_400, unit: "" }
      });
      expect(normalizeMetricValue("count", "2.5", null)).toEqual({ ok: false, reason: "2.5 is not a whole number" });
      expect(normalizeMetricValue("count", "45%", null)).toEqual({
        ok: false,
        reason: "count is expressed as a percentage"
      });
    });
  });

  describe("date", () => {
    it.each([
      ["March 31, 2023", "2023-03-31"],
      ["31 Dec 2022", "2022-12-31"],
      ["06/30/2023", "2023-06-30"],
      ["June 2023", "2023-06"]
    ])("normalizes %s", (raw, expected) => {
      expect(normalizeMetricValue("date", raw, null)).toEqual({ ok: true, value: { type: "date", value: expected } });
    });

    it("rejects impossible and non-calendar dates", () => {
      expect(normalizeMetricValue("date", "2023-02-30", null)).toEqual({
        ok: false,
        reason: '"2023-02-30" is not a valid calendar date'
      });
      expect(normalizeMetricValue("date", "Q3", null)).toEqual({ ok: false, reason: '"Q3" is not a calendar date' });
    });
  });

  it("rejects empty values", () => {
    expect(normalizeMetricValue("currency", "   ", null)).toEqual({ ok: false, reason: "empty value" });
  });
});

describe("checkBounds", () => {
  it("applies a zero floor to counts", () => {
    expect(checkBounds("count", { type: "number", value: -5, unit: "" })).toBe("-5 is below the minimum 0");
  });

  it("checks explicit bounds", () => {
    expect(checkBounds("percentage", { type: "number", value: 14.5, unit: "%" }, { max: 10 })).toBe(
      "14.5 is above the maximum 10"
    );
    expect(checkBounds("percentage", { type: "number", value: 4, unit: "%" }, { min: 0, max: 10 })).toBeNull();
    expect(checkBounds("date", { type: "date", value: "2023-01-01" }, { max: 0 })).toBeNull();
  });
});

describe("sameNormalizedValue", () => {
  it("compares numbers by unit and relative tolerance", () => {
    expect(
      sameNormalizedValue({ type: "number", value: 4.2e9, unit: "USD" }, { type: "number", value: 4.2e9 + 1, unit: "USD" })
    ).toBe(true);
    expect(
      sameNormalizedValue({ type: "number", value: 4.2e9, unit: "USD" }, { type: "number", value: 4.2e9, unit: "EUR" })
    ).toBe(false);
    expect(sameNormalizedValue({ type: "date", value: "2023-06" }, { type: "string", value: "2023-06" })).toBe(false);
  });
});
