import { describe, it, expect } from "vitest";
import { InvalidParameterError, MissingParameterError } from "../errors.js";
import {
  parseDateRange,
  parseFilters,
  parseGroupBy,
  parseLimit,
  parseMinReceivable,
  parseSoldOnly,
  requireParam,
} from "../reports/params.js";

describe("parseDateRange", () => {
  it("requires both from and to", () => {
    expect(() => parseDateRange({ from: "2024-01-01" })).toThrow(MissingParameterError);
    expect(() => parseDateRange({ to: "2024-01-31", from: "" })).toThrow(
      "Missing required query params: from, to (YYYY-MM-DD)"
    );
  });

  it("checks presence only", () => {
    expect(parseDateRange({ from: "2024-02-30", to: "yesterday" })).toEqual({ from: "2024-02-30", to: "yesterday" });
  });

  it("rejects a parameter given twice", () => {
    expect(() => parseDateRange({ from: ["2024-01-01", "2024-02-01"], to: "2024-03-01" })).toThrow(
      InvalidParameterError
    );
  });
});

describe("parseLimit", () => {
  it("defaults to 200", () => {
    expect(parseLimit({})).toBe(200);
  });

  it("clamps to 1..1000", () => {
    expect(parseLimit({ limit: "0" })).toBe(1);
    expect(parseLimit({ limit: "-5" })).toBe(1);
    expect(parseLimit({ limit: "5000" })).toBe(1000);
    expect(parseLimit({ limit: "25" })).toBe(25);
  });

  it("rejects non-integers", () => {
    expect(() => parseLimit({ limit: "ten" })).toThrow("limit must be an integer between 1 and 1000");
    expect(() => parseLimit({ limit: "2.5" })).toThrow(InvalidParameterError);
  });
});

describe("parseMinReceivable", () => {
  it("defaults to 1 and accepts decimals", () => {
    expect(parseMinReceivable({})).toBe(1);
    expect(parseMinReceivable({ min_receivable: "500.5" })).toBe(500.5);
  });

  it("rejects non-numeric thresholds", () => {
    expect(() => parseMinReceivable({ min_receivable: "lots" })).toThrow("min_receivable must be a number");
  });

  it("rejects blank and hexadecimal thresholds", () => {
    expect(() => parseMinReceivable({ min_receivable: " " })).toThrow(InvalidParameterError);
    expect(() => parseMinReceivable({ min_receivable: "0x1F4" })).toThrow("min_receivable must be a number");
  });
});

describe("parseSoldOnly", () => {
  it("defaults to true", () => {
    expect(parseSoldOnly({})).toBe(true);
  });

  it("accepts boolean-like strings in any case", () => {
    expect(parseSoldOnly({ sold_only: "YES" })).toBe(true);
    expect(parseSoldOnly({ sold_only: "0" })).toBe(false);
    expect(parseSoldOnly({ sold_only: "False" })).toBe(false);
  });

  it("rejects anything else", () => {
    expect(() => parseSoldOnly({ sold_only: "maybe" })).toThrow(InvalidParameterError);
  });
});

describe("parseGroupBy", () => {
  it("returns the canonical dimension regardless of case", () => {
    expect(parseGroupBy({ group_by: "cluster" })).toBe("Cluster");
    expect(parseGroupBy({ group_by: "loan_status" })).toBe("LOAN_STATUS");
  });

  it("rejects unknown dimensions", () => {
    expect(() => parseGroupBy({ group_by: "CITY" })).toThrow(
      "Invalid group_by. Use one of Cluster, UNIT_TYPE, SOURCE, SALE_AGREEMENT_STATUS, LOAN_STATUS"
    );
  });

  it("requires group_by", () => {
    expect(() => parseGroupBy({})).toThrow("Missing query param: group_by");
  });
});

describe("parseFilters", () => {
  it("keeps known, non-empty filters only", () => {
    expect(parseFilters({ cluster: "north", source: "", city: "Pune", unit_no: "U-1" })).toEqual({
      cluster: "north",
      unit_no: "U-1",
    });
  });
});

describe("requireParam", () => {
  it("names the missing parameter", () => {
    expect(() => requireParam({}, "unit_no")).toThrow("Missing query param: unit_no");
  });
});
