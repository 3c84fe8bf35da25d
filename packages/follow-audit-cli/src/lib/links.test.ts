import { describe, it, expect } from "vitest";
import { extractLinks, filterByDomain, toLinkSet, DEFAULT_PROFILE_DOMAIN } from "./links.js";

describe("links", () => {
  describe("extractLinks", () => {
    it("returns href values in order of appearance", () => {
      const html =
        '<a href="https://www.instagram.com/alice/">a</a>' +
        '<a href="http://example.com/x">x</a>' +
        '<a href="https://www.instagram.com/bob/">b</a>';

      expect(extractLinks(html)).toEqual([
        "https://www.instagram.com/alice/",
        "http://example.com/x",
        "https://www.instagram.com/bob/",
      ]);
    });

    it("keeps duplicates", () => {
      const html =
        '<a href="https://www.instagram.com/bob/"></a>\n' +
        '<a href="https://www.instagram.com/alice/"></a>\n' +
        '<a href="https://www.instagram.com/bob/"></a>';

      expect(extractLinks(html)).toEqual([
        "https://www.instagram.com/bob/",
        "https://www.instagram.com/alice/",
        "https://www.instagram.com/bob/",
      ]);
    });

    it("ignores relative, single-quoted and non-http hrefs", () => {
      const html =
        '<a href="/settings">s</a>' +
        "<a href='https://www.instagram.com/quoted/'>q</a>" +
        '<a href="mailto:someone@example.com">m</a>';

      expect(extractLinks(html)).toEqual([]);
    });

    it("returns an empty list for empty text", () => {
      expect(extractLinks("")).toEqual([]);
    });

    it("can be called repeatedly on the same text", () => {
      const html = '<a href="https://www.instagram.com/alice/"></a>';

      expect(extractLinks(html)).toEqual(["https://www.instagram.com/alice/"]);
      expect(extractLinks(html)).toEqual(["https://www.instagram.com/alice/"]);
    });
  });

  describe("filterByDomain", () => {
    it("keeps only links containing the prefix", () => {
      const links = [
        "https://www.instagram.com/alice/",
        "https://twitter.com/carol",
        "https://www.instagram.com/bob/",
      ];

      expect(filterByDomain(links, DEFAULT_PROFILE_DOMAIN)).toEqual([
        "https://www.instagram.com/alice/",
        "https://www.instagram.com/bob/",
      ]);
    });

    it("matches the prefix anywhere in the link", () => {
      const links = ["https://l.example.com/?u=https://www.instagram.com/dave/"];

      expect(filterByDomain(links, DEFAULT_PROFILE_DOMAIN)).toEqual(links);
    });
  });

  describe("toLinkSet", () => {
    it("deduplicates for membership tests", () => {
      const set = toLinkSet(["a", "b", "a"]);

      expect(set.size).toBe(2);
      expect(set.has("a")).toBe(true);
      expect(set.has("c")).toBe(false);
    });
  });
});
