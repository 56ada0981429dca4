/**
 * Unit tests for hh.ru response validation
 */

import { describe, it, expect } from "vitest";
import {
  MalformedResponseError,
  parsePageCount,
  parseVacancyDetail,
  parseVacancyPage,
} from "@/clients/hh";

const PAGE_URL = "https://api.test/vacancies";

describe("parsePageCount", () => {
  it("should accept non-negative numbers and digit strings", () => {
    expect(parsePageCount(3)).toBe(3);
    expect(parsePageCount(2.9)).toBe(2);
    expect(parsePageCount("12")).toBe(12);
  });

  it("should treat missing or invalid counts as zero", () => {
    expect(parsePageCount(undefined)).toBe(0);
    expect(parsePageCount(null)).toBe(0);
    expect(parsePageCount(-5)).toBe(0);
    expect(parsePageCount("many")).toBe(0);
    expect(parsePageCount(Number.NaN)).toBe(0);
  });
});

describe("parseVacancyPage", () => {
  it("should keep object items and drop the rest", () => {
    const page = parseVacancyPage({ items: [{ id: "1" }, "junk", null, { id: "2" }], pages: 1 }, PAGE_URL);

    expect(page).toEqual({ items: [{ id: "1" }, { id: "2" }], pages: 1 });
  });

  it("should still return items when the page count is unusable", () => {
    expect(parseVacancyPage({ items: [{ id: "1" }], pages: "?" }, PAGE_URL)).toEqual({
      items: [{ id: "1" }],
      pages: 0,
    });
  });

  it("should reject bodies that are not objects or lack an items array", () => {
    expect(() => parseVacancyPage(undefined, PAGE_URL)).toThrow(MalformedResponseError);
    expect(() => parseVacancyPage([], PAGE_URL)).toThrow(MalformedResponseError);
    expect(() => parseVacancyPage({ items: "none", pages: 1 }, PAGE_URL)).toThrow(
      "Vacancy list body has no items array - https://api.test/vacancies",
    );
  });
});

describe("parseVacancyDetail", () => {
  it("should accept objects only", () => {
    expect(parseVacancyDetail({ id: "1" }, PAGE_URL)).toEqual({ id: "1" });
    expect(() => parseVacancyDetail("text", PAGE_URL)).toThrow(MalformedResponseError);
  });
});
