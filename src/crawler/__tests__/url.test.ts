import { describe, expect, it } from "vitest";
import { canonicalizeUrl, filterLinks, isSameDomain, siteKey, validateUrl } from "../url.js";

describe("validateUrl", () => {
  it("resolves relative links against the page", () => {
    expect(validateUrl("../b?x=1#top", "https://a.example/docs/a/")).toEqual({
      ok: true,
      url: "https://a.example/docs/b?x=1",
    });
  });

  it.each([
    ["", "empty"],
    ["   ", "empty"],
    ["#section", "fragment-only"],
    ["mailto:someone@a.example", "unsupported-scheme"],
    ["javascript:void(0)", "unsupported-scheme"],
    ["ftp://a.example/file", "unsupported-scheme"],
    ["http://", "malformed"],
    ["not a url", "malformed"],
  ])("rejects %j as %s", (raw, reason) => {
    expect(validateUrl(raw)).toEqual({ ok: false, reason });
  });
});

describe("canonicalizeUrl", () => {
  it("lower-cases the host and drops default ports and fragments", () => {
    expect(canonicalizeUrl("HTTPS://A.Example:443/Path#frag")).toBe("https://a.example/Path");
  });

  it("removes a trailing slash except at the root", () => {
    expect(canonicalizeUrl("https://a.example/docs/")).toBe("https://a.example/docs");
    expect(canonicalizeUrl("https://a.example")).toBe("https://a.example/");
    expect(canonicalizeUrl("https://a.example/")).toBe("https://a.example/");
  });

  it("keeps the query in order and drops an empty one", () => {
    expect(canonicalizeUrl("https://a.example/s?b=2&a=1")).toBe("https://a.example/s?b=2&a=1");
    expect(canonicalizeUrl("https://a.example/s?")).toBe("https://a.example/s");
  });

  it("is idempotent", () => {
    const once = canonicalizeUrl("http://A.example:80/x/y/?q=1#z");
    expect(canonicalizeUrl(once)).toBe(once);
  });

  it("throws for URLs that can never be fetched", () => {
    expect(() => canonicalizeUrl("mailto:x@a.example")).toThrow(TypeError);
  });
});

describe("isSameDomain", () => {
  it("treats the www. prefix as the same site, in both directions", () => {
    expect(isSameDomain("www.a.example", "a.example")).toBe(true);
    expect(isSameDomain("a.example", "www.a.example")).toBe(true);
    expect(isSameDomain("A.EXAMPLE", "a.example")).toBe(true);
  });

  it("rejects other hosts and subdomains", () => {
    expect(isSameDomain("b.example", "a.example")).toBe(false);
    expect(isSameDomain("blog.a.example", "a.example")).toBe(false);
  });
});

describe("filterLinks", () => {
  const page = "https://a.example/docs/";

  it("keeps same-domain links in first-seen order without duplicates", () => {
    const links = [
      "intro",
      "https://a.example/docs/intro#part",
      "https://other.example/x",
      "mailto:x@a.example",
      "#top",
      "https://www.a.example/about/",
      "/",
    ];
    expect(filterLinks(links, page, "a.example")).toEqual([
      "https://a.example/docs/intro",
      "https://www.a.example/about",
      "https://a.example/",
    ]);
  });

  it("applies the extra predicate last", () => {
    const links = ["/private/x", "/public"];
    const kept = filterLinks(links, page, "a.example", (url) => !url.includes("/private"));
    expect(kept).toEqual(["https://a.example/public"]);
  });
});

describe("siteKey", () => {
  it("folds the www. host onto the reference host", () => {
    expect(siteKey("https://www.a.example/p?q=1", "a.example")).toBe("https://a.example/p?q=1");
    expect(siteKey("https://a.example/p", "www.a.example")).toBe("https://www.a.example/p");
  });

  it("leaves the reference host and other hosts alone", () => {
    expect(siteKey("https://a.example/p", "a.example")).toBe("https://a.example/p");
    expect(siteKey("https://blog.a.example/p", "a.example")).toBe("https://blog.a.example/p");
  });
});
