import { describe, expect, it } from "vitest";
import { cleanText, dedupe, isSentinel, smartTitleCase } from "./text.js";

describe("cleanText", () => {
  it("trims and collapses whitespace runs", () => {
    expect(cleanText("  Example\n\t  University  ")).toBe("Example University");
  });

  it("maps absent and blank input to the sentinel", () => {
    expect(cleanText(null)).toBe("N/A");
    expect(cleanText(undefined)).toBe("N/A");
    expect(cleanText("")).toBe("N/A");
    expect(cleanText(" \n ")).toBe("N/A");
  });

  it("drops control and zero-width artifacts and turns NBSP into a space", () => {
    expect(cleanText("Hyder\u200Babad\u0007")).toBe("Hyderabad");
    expect(cleanText("\uFEFFIIT\u00A0Mandi")).toBe("IIT Mandi");
    expect(cleanText("\u200B\u0000")).toBe("N/A");
  });

  it("stringifies non-string values", () => {
    expect(cleanText(42)).toBe("42");
  });
});

describe("smartTitleCase", () => {
  it("capitalizes words and lowercases connectors after the first word", () => {
    expect(smartTitleCase("university OF hyderabad")).toBe("University OF Hyderabad");
    expect(smartTitleCase("university of hyderabad")).toBe("University of Hyderabad");
    expect(smartTitleCase("the university of madras")).toBe("The University of Madras");
  });

  it("keeps short acronyms", () => {
    expect(smartTitleCase("IIT mandi")).toBe("IIT Mandi");
  });

  it("maps country aliases", () => {
    expect(smartTitleCase("usa")).toBe("United States");
    expect(smartTitleCase("U.S.")).toBe("United States");
    expect(smartTitleCase("england")).toBe("United Kingdom");
    expect(smartTitleCase("INDIA")).toBe("INDIA");
    expect(smartTitleCase("india")).toBe("India");
  });

  it("passes the sentinel through", () => {
    expect(smartTitleCase("")).toBe("N/A");
    expect(isSentinel(smartTitleCase(undefined))).toBe(true);
  });
});

describe("dedupe", () => {
  const rows = [
    { id: 1, name: "MBA" },
    { id: 2, name: "BTech" },
    { id: 3, name: "mba" },
    { id: 4, name: "PhD" },
  ];
  const key = (r: { name: string }) => r.name.toLowerCase();

  it("keeps the first occurrence per key in encounter order", () => {
    expect(dedupe(rows, key).map(r => r.id)).toEqual([1, 2, 4]);
  });

  it("is idempotent", () => {
    const once = dedupe(rows, key);
    expect(dedupe(once, key)).toEqual(once);
  });

  it("does not mutate its input", () => {
    dedupe(rows, key);
    expect(rows).toHaveLength(4);
  });
});
