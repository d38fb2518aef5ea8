import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import { runCli, USAGE, type CliIo } from "../src/cli/run.js";

const ARTICLE =
  '<html><head><title>Test Story</title><meta name="author" content="Jane Doe">' +
  '<meta property="article:published_time" content="2020-02-03T04:05:06Z"></head><body>' +
  '<div id="content"><h1>Test Story</h1><p>First paragraph of the story.</p></div></body></html>';

type FakeIo = CliIo & { out: string[]; err: string[]; written: Map<string, string> };

function fakeIo(files: Record<string, string> = {}, stdin = ""): FakeIo {
  const out: string[] = [];
  const err: string[] = [];
  const written = new Map<string, string>();
  return {
    out,
    err,
    written,
    readFile: async (path) => {
      const content = files[path];
      if (content === undefined) throw new Error(`ENOENT: ${path}`);
      return content;
    },
    readStdin: async () => stdin,
    writeFile: async (path, content) => {
      written.set(path, content);
    },
    stdout: (text) => out.push(text),
    stderr: (text) => err.push(text),
    env: {},
    now: () => 1_000,
  };
}

function parseLines(text: string): unknown[] {
  return text
    .split("\n")
    .filter((line) => line.length > 0)
    .map((line): unknown => JSON.parse(line));
}

beforeEach(() => {
  vi.spyOn(console, "log").mockImplementation(() => undefined);
  vi.spyOn(console, "error").mockImplementation(() => undefined);
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe("runCli", () => {
  test("prints usage", async () => {
    const io = fakeIo();
    expect(await runCli(["--help"], io)).toBe(0);
    expect(io.out).toEqual([`${USAGE}\n`]);
  });

  test("rejects unknown options and formats", async () => {
    const unknownOption = fakeIo();
    expect(await runCli(["--bogus"], unknownOption)).toBe(2);
    expect(unknownOption.err[0]).toContain(USAGE);

    const unknownFormat = fakeIo();
    expect(await runCli(["--format", "xml"], unknownFormat)).toBe(2);
    expect(unknownFormat.err[0]?.startsWith("unknown format: xml\n")).toBe(true);
  });

  test("writes one JSON envelope per file", async () => {
    const io = fakeIo({ "a.html": ARTICLE });
    expect(await runCli(["a.html", "missing.html"], io)).toBe(1);

    expect(io.out).toHaveLength(1);
    const [success, failure] = parseLines(io.out[0] ?? "");
    expect(success).toMatchObject({
      ok: true,
      data: { title: "Test Story", byline: "Jane Doe", mainContentTier: "candidate" },
      meta: { durationMs: 0 },
    });
    expect(failure).toMatchObject({
      ok: false,
      error: { code: "internal_error", message: "ENOENT: missing.html" },
    });
  });

  test("renders plain text from stdin", async () => {
    const io = fakeIo({}, ARTICLE);
    expect(await runCli(["--format", "text"], io)).toBe(0);
    expect(io.out).toEqual(["Test Story\n\nFirst paragraph of the story.\n"]);
  });

  test("writes html to the output file", async () => {
    const io = fakeIo({ "a.html": ARTICLE });
    expect(await runCli(["--format=html", "-o", "out.html", "a.html"], io)).toBe(0);
    expect(io.out).toEqual([]);
    expect(io.written.get("out.html")).toBe(
      "<html><head></head><body><div><h1>Test Story</h1><p>First paragraph of the story.</p></div></body></html>\n"
    );
  });

  test("sends errors to stderr outside JSON mode", async () => {
    const io = fakeIo();
    expect(await runCli(["--format", "text", "missing.html"], io)).toBe(1);
    expect(io.out).toEqual([""]);
    expect(parseLines(io.err[0] ?? "")).toEqual([
      {
        ok: false,
        error: { code: "internal_error", message: "ENOENT: missing.html" },
        meta: { requestId: expect.any(String), durationMs: 0 },
      },
    ]);
  });
});
