import { parseArgs } from "node:util";
import { ExtractionCaches } from "../cache/extraction-caches.js";
import { readCacheConfigFromEnv, readExtractionConfigFromEnv } from "../config/extraction.js";
import { toError } from "../errors.js";
import { extractArticle, type Article } from "../extract/article.js";
import { plainTextOf } from "../extract/plain-text.js";
import { buildExtractionContext } from "../observability/request-context.js";
import { buildErrorJson, buildSuccessJson } from "./output.js";

export type CliFormat = "json" | "html" | "text";

export type CliIo = {
  readFile: (path: string) => Promise<string>;
  readStdin: () => Promise<string>;
  writeFile: (path: string, content: string) => Promise<void>;
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  env?: NodeJS.ProcessEnv;
  now?: () => number;
};

export const USAGE = `Usage: readable-distill [options] [file ...]

Reads HTML from each file, or from stdin when no file (or "-") is given.

Options:
  --format <json|html|text>  output format (default: json)
  --url <url>                source URL; enables site-specific rules
  --digests                  stamp data-content-digest attributes
  --indexes                  stamp data-node-index attributes
  --lists-as-text            render lists as single "* item" blocks
  --timeout <ms>             per-document timeout
  --output <file>            write to a file instead of stdout
  -h, --help                 show this help`;

function isFormat(value: string): value is CliFormat {
  return value === "json" || value === "html" || value === "text";
}

function render(format: CliFormat, article: Article): unknown {
  if (format === "html") return article.content;
  if (format === "text") return plainTextOf(article.plainText);
  return article;
}

/** Returns the process exit code: 0 when every input succeeded, 1 otherwise, 2 on bad usage. */
export async function runCli(argv: string[], io: CliIo): Promise<number> {
  let parsed: ReturnType<typeof parseCliArgs>;
  try {
    parsed = parseCliArgs(argv);
  } catch (error) {
    io.stderr(`${toError(error).message}\n\n${USAGE}\n`);
    return 2;
  }
  const { values, positionals } = parsed;
  if (values.help) {
    io.stdout(`${USAGE}\n`);
    return 0;
  }
  const format = values.format ?? "json";
  if (!isFormat(format)) {
    io.stderr(`unknown format: ${format}\n\n${USAGE}\n`);
    return 2;
  }

  const env = io.env ?? process.env;
  const now = io.now ?? (() => Date.now());
  const defaults = readExtractionConfigFromEnv(env);
  const timeoutMs = values.timeout === undefined ? defaults.timeoutMs : Number(values.timeout);
  const options = {
    ...defaults,
    timeoutMs: Number.isFinite(timeoutMs) && timeoutMs > 0 ? Math.floor(timeoutMs) : defaults.timeoutMs,
    addContentDigests: values.digests ?? defaults.addContentDigests,
    addNodeIndexes: values.indexes ?? defaults.addNodeIndexes,
    listsAsText: values["lists-as-text"] ?? defaults.listsAsText,
  };
  const caches = new ExtractionCaches({ ...readCacheConfigFromEnv(env), sweepIntervalMs: 0 });

  const sources = positionals.length > 0 ? positionals : ["-"];
  const outputs: string[] = [];
  let failed = false;
  try {
    for (const source of sources) {
      const startedAt = now();
      const context = buildExtractionContext({ url: values.url });
      try {
        const html = source === "-" ? await io.readStdin() : await io.readFile(source);
        const article = await extractArticle({ html, url: values.url }, options, { caches, context });
        const rendered = render(format, article);
        outputs.push(
          format === "json"
            ? buildSuccessJson(rendered, { startedAt, context, now: now() })
            : String(rendered)
        );
      } catch (error) {
        failed = true;
        const message = buildErrorJson(toError(error), { startedAt, context, now: now() });
        if (format === "json") {
          outputs.push(message);
        } else {
          io.stderr(`${message}\n`);
        }
      }
    }
  } finally {
    caches.close();
  }

  const text = outputs.length > 0 ? `${outputs.join("\n")}\n` : "";
  if (values.output) {
    await io.writeFile(values.output, text);
  } else {
    io.stdout(text);
  }
  return failed ? 1 : 0;
}

function parseCliArgs(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      format: { type: "string" },
      url: { type: "string" },
      digests: { type: "boolean" },
      indexes: { type: "boolean" },
      "lists-as-text": { type: "boolean" },
      timeout: { type: "string" },
      output: { type: "string", short: "o" },
      help: { type: "boolean", short: "h" },
    },
  });
}
