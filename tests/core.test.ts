import { describe, expect, test } from "vitest";
import { parseArgs } from "../src/args";
import { buildCrawlConfig, parseExcludeList } from "../src/config";
import { DEFAULT_OPTIONS } from "../src/constants";
import {
  FetchError,
  FrontierStateError,
  InvalidUrlError,
  hasErrorCode,
} from "../src/errors";
import {
  extractResources,
  isHtmlContentType,
  splitSrcset,
} from "../src/extract";
import { Frontier } from "../src/frontier";
import { classify, isFetchEligible, type ScopeConfig } from "../src/scope";
import type { CliOptions } from "../src/types";
import { normalizeUrl, tryNormalizeUrl } from "../src/url";
import {
  formatDuration,
  parseNonNegativeInt,
  parsePositiveInt,
} from "../src/utils";

const scopeConfig = (overrides: Partial<ScopeConfig> = {}): ScopeConfig => ({
  maxUrlLength: 300,
  exclude: [],
  crawlExternal: false,
  ...overrides,
});

const cliOptions = (overrides: Partial<CliOptions> = {}): CliOptions => ({
  ...DEFAULT_OPTIONS,
  exclude: [],
  ...overrides,
});

describe("utility helpers", () => {
  test("parsePositiveInt falls back on invalid input", () => {
    expect(parsePositiveInt(undefined, 3)).toBe(3);
    expect(parsePositiveInt("abc", 4)).toBe(4);
    expect(parsePositiveInt("0", 5)).toBe(5);
    expect(parsePositiveInt("10", 1)).toBe(10);
  });

  test("parseNonNegativeInt accepts zero", () => {
    expect(parseNonNegativeInt("0", 100)).toBe(0);
    expect(parseNonNegativeInt("-5", 100)).toBe(100);
    expect(parseNonNegativeInt(undefined, 100)).toBe(100);
  });

  test("formatDuration picks a readable unit", () => {
    expect(formatDuration(250)).toBe("250ms");
    expect(formatDuration(4500)).toBe("4s");
    expect(formatDuration(125_000)).toBe("2m 5s");
  });
});

describe("url normalization", () => {
  const base = normalizeUrl("http://example.com/docs/guide/intro");

  test("lower-cases scheme and host, drops default port and fragment", () => {
    const url = normalizeUrl("HTTP://Example.COM:80/Docs/Page?Q=1#frag");
    expect(url.href).toBe("http://example.com/Docs/Page?Q=1");
    expect(url.hostname).toBe("example.com");
    expect(url.pathname).toBe("/Docs/Page");
    expect(url.search).toBe("?Q=1");
  });

  test("keeps non-default ports in host", () => {
    const url = normalizeUrl("https://example.com:8443/a");
    expect(url.host).toBe("example.com:8443");
    expect(url.hostname).toBe("example.com");
    expect(url.port).toBe("8443");
  });

  test("resolves relative references against the base", () => {
    expect(normalizeUrl("./x", base).href).toBe(
      "http://example.com/docs/guide/x"
    );
    expect(normalizeUrl("x", base).href).toBe(
      "http://example.com/docs/guide/x"
    );
    expect(normalizeUrl("/x", base).href).toBe("http://example.com/x");
    expect(normalizeUrl("../up", base).href).toBe("http://example.com/docs/up");
    expect(normalizeUrl("?page=2", base).href).toBe(
      "http://example.com/docs/guide/intro?page=2"
    );
    expect(normalizeUrl("//cdn.example.net/lib.js", base).href).toBe(
      "http://cdn.example.net/lib.js"
    );
  });

  test("absolute references ignore the base", () => {
    expect(normalizeUrl("https://other.com/y", base).href).toBe(
      "https://other.com/y"
    );
  });

  test("references differing only in fragment share one key", () => {
    expect(normalizeUrl("http://example.com/a#one").href).toBe(
      normalizeUrl("http://example.com/a#two").href
    );
    expect(normalizeUrl("#section", base).href).toBe(base.href);
  });

  test("fragment contents are not validated", () => {
    expect(normalizeUrl("/page#100%", base).href).toBe(
      normalizeUrl("/page", base).href
    );
    expect(normalizeUrl("/page#100%", base).href).toBe(
      "http://example.com/page"
    );
    expect(() => normalizeUrl("/bad%zz#ok", base)).toThrow(InvalidUrlError);
  });

  test("normalized values are frozen", () => {
    expect(Object.isFrozen(base)).toBe(true);
  });

  test.each([
    ["relative without base", "/relative"],
    ["empty", ""],
    ["blank", "   "],
    ["mailto", "mailto:someone@example.com"],
    ["ftp", "ftp://example.com/file"],
    ["file", "file:///tmp/x"],
    ["malformed percent-encoding", "http://example.com/bad%zzpath"],
    ["truncated percent-encoding", "http://example.com/end%2"],
    ["unparsable", "http://"],
  ])("rejects %s", (_label, raw) => {
    expect(() => normalizeUrl(raw)).toThrow(InvalidUrlError);
  });

  test("tryNormalizeUrl returns null instead of throwing", () => {
    expect(tryNormalizeUrl("javascript:void(0)", base)).toBeNull();
    expect(tryNormalizeUrl("/ok", base)?.href).toBe("http://example.com/ok");
  });

  test("valid percent-encoding is kept as is", () => {
    expect(normalizeUrl("http://example.com/a%20b").pathname).toBe("/a%20b");
  });
});

describe("error codes", () => {
  test("crawler errors carry a stable code and class name", () => {
    const invalid = new InvalidUrlError("ftp://x", "unsupported scheme ftp:");
    expect(invalid.code).toBe("INVALID_URL");
    expect(invalid.name).toBe("InvalidUrlError");
    expect(invalid.message).toBe(
      'Invalid URL "ftp://x": unsupported scheme ftp:'
    );
    expect(new FetchError("http://example.com/", "HTTP 500", 500).code).toBe(
      "FETCH_FAILED"
    );
  });

  test("hasErrorCode matches crawler and system errors alike", () => {
    expect(hasErrorCode(new InvalidUrlError("x", "bad"), "INVALID_URL")).toBe(
      true
    );
    expect(hasErrorCode(new InvalidUrlError("x", "bad"), "FETCH_FAILED")).toBe(
      false
    );
    expect(hasErrorCode({ code: "EEXIST" }, "EEXIST")).toBe(true);
    expect(hasErrorCode(new Error("plain"), "INVALID_URL")).toBe(false);
    expect(hasErrorCode(null, "INVALID_URL")).toBe(false);
  });
});

describe("scope classification", () => {
  const seedHost = "example.com";

  test("same host is internal, any other host is external", () => {
    expect(
      classify(normalizeUrl("http://example.com/about"), seedHost, scopeConfig())
    ).toEqual({ kind: "internal" });
    expect(
      classify(normalizeUrl("http://other.com/x"), seedHost, scopeConfig())
    ).toEqual({ kind: "external" });
    expect(
      classify(normalizeUrl("http://www.example.com/"), seedHost, scopeConfig())
    ).toEqual({ kind: "external" });
  });

  test("a URL exactly maxUrlLength long is excluded, one shorter is not", () => {
    const config = scopeConfig({ maxUrlLength: 30 });
    const atLimit = normalizeUrl(`http://example.com/${"a".repeat(11)}`);
    const belowLimit = normalizeUrl(`http://example.com/${"a".repeat(10)}`);
    expect(atLimit.href.length).toBe(30);
    expect(belowLimit.href.length).toBe(29);

    expect(classify(atLimit, seedHost, config)).toEqual({
      kind: "excluded",
      reason: "length",
    });
    expect(classify(belowLimit, seedHost, config)).toEqual({
      kind: "internal",
    });
  });

  test("exclusion prefixes match the start of the path, case-sensitively", () => {
    const config = scopeConfig({ exclude: ["/img"] });
    expect(
      classify(normalizeUrl("http://example.com/img/logo.png"), seedHost, config)
    ).toEqual({ kind: "excluded", reason: "prefix", prefix: "/img" });
    expect(
      classify(normalizeUrl("http://example.com/IMG/logo.png"), seedHost, config)
    ).toEqual({ kind: "internal" });
    expect(
      classify(normalizeUrl("http://example.com/docs/img"), seedHost, config)
    ).toEqual({ kind: "internal" });
  });

  test("exclusion applies before the host check", () => {
    const config = scopeConfig({ exclude: ["/img"], crawlExternal: true });
    expect(
      classify(normalizeUrl("http://other.com/img/x.png"), seedHost, config)
    ).toEqual({ kind: "excluded", reason: "prefix", prefix: "/img" });
  });

  test("length is checked before exclusion prefixes", () => {
    const config = scopeConfig({ maxUrlLength: 20, exclude: ["/img"] });
    expect(
      classify(normalizeUrl("http://example.com/img/logo.png"), seedHost, config)
    ).toEqual({ kind: "excluded", reason: "length" });
  });

  test("empty prefixes never match", () => {
    const config = scopeConfig({ exclude: [""] });
    expect(
      classify(normalizeUrl("http://example.com/a"), seedHost, config)
    ).toEqual({ kind: "internal" });
  });

  test("classification is deterministic", () => {
    const url = normalizeUrl("http://example.com/img/a.png");
    const config = scopeConfig({ exclude: ["/img"] });
    expect(classify(url, seedHost, config)).toEqual(
      classify(url, seedHost, config)
    );
  });

  test("fetch eligibility follows the crawl-external flag", () => {
    expect(isFetchEligible({ kind: "internal" }, { crawlExternal: false })).toBe(
      true
    );
    expect(isFetchEligible({ kind: "external" }, { crawlExternal: false })).toBe(
      false
    );
    expect(isFetchEligible({ kind: "external" }, { crawlExternal: true })).toBe(
      true
    );
    expect(
      isFetchEligible(
        { kind: "excluded", reason: "length" },
        { crawlExternal: true }
      )
    ).toBe(false);
  });
});

describe("resource extraction", () => {
  const page = normalizeUrl("http://example.com/docs/");

  test("yields anchors, images, scripts and links in document order", () => {
    const html = [
      "<html><head>",
      '<link rel="stylesheet" href="/style.css">',
      '<script src="app.js"></script>',
      "</head><body>",
      '<a href="/about">About</a>',
      '<a href="http://other.com/x">Other</a>',
      '<img src="/img/logo.png" srcset="/img/logo-2x.png 2x, /img/logo-3x.png 3x">',
      '<a href="#top">Top</a>',
      '<a href="mailto:someone@example.com">Mail</a>',
      '<a href="javascript:void(0)">Click</a>',
      '<a href="">Empty</a>',
      "<a>No target</a>",
      "</body></html>",
    ].join("");

    const references = Array.from(extractResources(html, page));
    expect(references.map((reference) => reference.raw)).toEqual([
      "/style.css",
      "app.js",
      "/about",
      "http://other.com/x",
      "/img/logo.png",
      "/img/logo-2x.png",
      "/img/logo-3x.png",
    ]);
    expect(references[1]).toMatchObject({
      raw: "app.js",
      tag: "script",
      attribute: "src",
    });
    expect(references.every((reference) => reference.base === page)).toBe(
      true
    );
  });

  test("uses the document base element when present", () => {
    const html =
      '<html><head><base href="https://cdn.example.com/assets/"></head><body><img src="a.png"></body></html>';
    const [reference] = Array.from(extractResources(html, page));
    expect(reference?.base.href).toBe("https://cdn.example.com/assets/");
    expect(
      reference ? normalizeUrl(reference.raw, reference.base).href : null
    ).toBe("https://cdn.example.com/assets/a.png");
  });

  test("tolerates malformed markup", () => {
    const html =
      "<div><a href=\"/one\">one</a><p>unclosed <a href='/two'>two</a></div></table><img src=/three.png>";
    const raws = Array.from(extractResources(html, page), (r) => r.raw);
    expect(raws).toEqual(["/one", "/two", "/three.png"]);
  });

  test("yields nothing for non-markup bodies", () => {
    expect(Array.from(extractResources("just some text <<<", page))).toEqual(
      []
    );
  });

  test("does not run inline scripts", () => {
    const html =
      '<script>document.write("<a href=\\"/injected\\">x</a>")</script><a href="/real">r</a>';
    const raws = Array.from(extractResources(html, page), (r) => r.raw);
    expect(raws).toEqual(["/real"]);
  });

  test("isHtmlContentType only accepts HTML media types", () => {
    expect(isHtmlContentType("text/html; charset=utf-8")).toBe(true);
    expect(isHtmlContentType("TEXT/HTML")).toBe(true);
    expect(isHtmlContentType("application/xhtml+xml")).toBe(true);
    expect(isHtmlContentType("image/png")).toBe(false);
    expect(isHtmlContentType(null)).toBe(false);
  });

  test("splitSrcset keeps only the candidate URLs", () => {
    expect(splitSrcset("a.png 1x, b.png 2x")).toEqual(["a.png", "b.png"]);
    expect(splitSrcset("c.png")).toEqual(["c.png"]);
    expect(splitSrcset(" , ")).toEqual([]);
  });
});

describe("frontier", () => {
  const url = (path: string) => normalizeUrl(`http://example.com${path}`);

  test("offer is idempotent", () => {
    const frontier = new Frontier();
    expect(frontier.offer(url("/a"))).toBe(true);
    expect(frontier.offer(url("/a"))).toBe(false);
    expect(frontier.offer(url("/a#frag"))).toBe(false);
    expect(frontier.size).toBe(1);
    expect(frontier.pendingCount).toBe(1);
    expect(frontier.statusOf(url("/a"))).toBe("pending");
  });

  test("offer never re-queues a URL that has already finished", () => {
    const frontier = new Frontier();
    frontier.offer(url("/a"));
    const claimed = frontier.tryClaim();
    expect(claimed?.href).toBe("http://example.com/a");
    if (claimed) {
      frontier.markVisited(claimed);
    }
    expect(frontier.offer(url("/a"))).toBe(false);
    expect(frontier.tryClaim()).toBeNull();
  });

  test("trySeed only takes effect once", () => {
    const frontier = new Frontier();
    expect(frontier.trySeed(url("/"))).toBe(true);
    expect(frontier.seedHost).toBe("example.com");
    expect(frontier.trySeed(normalizeUrl("http://other.com/"))).toBe(false);
    expect(frontier.seedHost).toBe("example.com");
    expect(frontier.seedUrl?.href).toBe("http://example.com/");
  });

  test("tryClaim hands out pending URLs in discovery order", () => {
    const frontier = new Frontier();
    frontier.offer(url("/a"));
    frontier.offer(url("/b"));
    expect(frontier.tryClaim()?.href).toBe("http://example.com/a");
    expect(frontier.tryClaim()?.href).toBe("http://example.com/b");
    expect(frontier.tryClaim()).toBeNull();
    expect(frontier.inFlightCount).toBe(2);
    expect(frontier.statusOf(url("/a"))).toBe("in-flight");
  });

  test("concurrent claimers never receive the same URL", async () => {
    const frontier = new Frontier();
    for (let i = 0; i < 50; i += 1) {
      frontier.offer(url(`/page/${i}`));
    }

    const claimed: string[] = [];
    const claimer = async (): Promise<void> => {
      for (;;) {
        const next = frontier.tryClaim();
        if (!next) {
          return;
        }
        claimed.push(next.href);
        await Promise.resolve();
      }
    };
    await Promise.all(Array.from({ length: 8 }, () => claimer()));

    expect(claimed).toHaveLength(50);
    expect(new Set(claimed).size).toBe(50);
  });

  test("rejected entries are recorded but never claimed", () => {
    const frontier = new Frontier();
    expect(frontier.offer(url("/skip"), "rejected")).toBe(true);
    expect(frontier.statusOf(url("/skip"))).toBe("rejected");
    expect(frontier.pendingCount).toBe(0);
    expect(frontier.tryClaim()).toBeNull();
    expect(frontier.offer(url("/skip"))).toBe(false);
  });

  test("terminal transitions require an in-flight entry", () => {
    const frontier = new Frontier();
    frontier.offer(url("/a"));
    expect(() => frontier.markVisited(url("/a"))).toThrow(FrontierStateError);

    const claimed = frontier.tryClaim();
    expect(claimed).not.toBeNull();
    if (!claimed) {
      return;
    }
    frontier.markRejected(claimed);
    expect(frontier.statusOf(claimed)).toBe("rejected");
    expect(() => frontier.markVisited(claimed)).toThrow(FrontierStateError);
    expect(() => frontier.markRejected(url("/unknown"))).toThrow(
      FrontierStateError
    );
  });

  test("tracks quiescence and per-status counts", () => {
    const frontier = new Frontier();
    expect(frontier.isQuiescent).toBe(true);

    frontier.offer(url("/a"));
    frontier.offer(url("/b"), "rejected");
    expect(frontier.isQuiescent).toBe(false);

    const claimed = frontier.tryClaim();
    expect(frontier.isQuiescent).toBe(false);
    if (claimed) {
      frontier.markVisited(claimed);
    }
    expect(frontier.isQuiescent).toBe(true);
    expect(frontier.visitedCount).toBe(1);
    expect(frontier.counts()).toEqual({
      pending: 0,
      "in-flight": 0,
      visited: 1,
      rejected: 1,
    });
    expect(
      frontier.snapshot().map((entry) => [entry.url.href, entry.status])
    ).toEqual([
      ["http://example.com/a", "visited"],
      ["http://example.com/b", "rejected"],
    ]);
  });
});

describe("argument parsing", () => {
  test("takes the seed from the first positional argument", () => {
    const { options, showHelp, showVersion } = parseArgs([
      "https://example.com",
    ]);
    expect(showHelp).toBe(false);
    expect(showVersion).toBe(false);
    expect(options.url).toBe("https://example.com");
    expect(options.maxUrlLength).toBe(300);
    expect(options.intervalMs).toBe(100);
    expect(options.download).toBe(false);
    expect(options.crawlExternal).toBe(false);
    expect(options.exclude).toEqual([]);
  });

  test("supports the short flags", () => {
    const { options } = parseArgs([
      "-d",
      "-c",
      "-m",
      "120",
      "-e",
      "/img,/tmp",
      "-t",
      "0",
      "-j",
      "2",
      "-o",
      "mirror",
      "-v",
      "https://example.com",
    ]);
    expect(options.download).toBe(true);
    expect(options.crawlExternal).toBe(true);
    expect(options.maxUrlLength).toBe(120);
    expect(options.exclude).toEqual(["/img,/tmp"]);
    expect(options.intervalMs).toBe(0);
    expect(options.concurrency).toBe(2);
    expect(options.outDir).toBe("mirror");
    expect(options.verbose).toBe(true);
  });

  test("accepts --flag=value and --flag value forms", () => {
    const { options } = parseArgs([
      "https://example.com",
      "--export=all.txt",
      "--export-internal",
      "internal.txt",
      "--export-external=external.txt",
      "--timeout=250",
      "--exclude=/a",
      "--exclude",
      "/b",
      "--no-list",
      "--no-progress",
    ]);
    expect(options.exportAll).toBe("all.txt");
    expect(options.exportInternal).toBe("internal.txt");
    expect(options.exportExternal).toBe("external.txt");
    expect(options.intervalMs).toBe(250);
    expect(options.exclude).toEqual(["/a", "/b"]);
    expect(options.list).toBe(false);
    expect(options.progress).toBe(false);
  });

  test("falls back to defaults for invalid numbers", () => {
    const { options } = parseArgs(["-m", "abc", "https://example.com"]);
    expect(options.maxUrlLength).toBe(300);
  });

  test("returns help when no seed is given", () => {
    expect(parseArgs([]).showHelp).toBe(true);
    expect(parseArgs(["--help"]).showHelp).toBe(true);
  });

  test("version flag does not also request help", () => {
    const result = parseArgs(["-V"]);
    expect(result.showVersion).toBe(true);
    expect(result.showHelp).toBe(false);
  });

  test("rejects unknown options and missing values", () => {
    expect(() => parseArgs(["--bogus", "https://example.com"])).toThrow(
      "Unknown option: --bogus"
    );
    expect(() => parseArgs(["https://example.com", "--export"])).toThrow(
      "Missing value for --export"
    );
  });
});

describe("crawl configuration", () => {
  test("splits and trims exclusion prefixes", () => {
    expect(parseExcludeList(["/img, /tmp", " ,/a"])).toEqual([
      "/img",
      "/tmp",
      "/a",
    ]);
  });

  test("normalizes the seed and freezes the result", () => {
    const config = buildCrawlConfig(
      cliOptions({ url: "HTTP://Example.com/#top", exclude: ["/img"] })
    );
    expect(config.seed.href).toBe("http://example.com/");
    expect(config.exclude).toEqual(["/img"]);
    expect(config.maxUrlLength).toBe(300);
    expect(config.intervalMs).toBe(100);
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.exclude)).toBe(true);
  });

  test("maps export targets", () => {
    const config = buildCrawlConfig(
      cliOptions({
        url: "https://example.com",
        exportAll: "all.txt",
        exportExternal: "external.txt",
      })
    );
    expect(config.exports).toEqual({
      all: "all.txt",
      internal: undefined,
      external: "external.txt",
    });
  });

  test("an unusable seed is a configuration error", () => {
    expect(() => buildCrawlConfig(cliOptions({ url: "not a url" }))).toThrow(
      InvalidUrlError
    );
    expect(() => buildCrawlConfig(cliOptions())).toThrow(InvalidUrlError);
  });
});
