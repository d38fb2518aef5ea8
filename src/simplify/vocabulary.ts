// Elements deleted together with their contents.
export const ELEMENTS_TO_DELETE = [
  // forms
  "button",
  "datalist",
  "fieldset",
  "form",
  "input",
  "label",
  "legend",
  "meter",
  "optgroup",
  "option",
  "output",
  "progress",
  "select",
  "textarea",
  // images
  "area",
  "img",
  "map",
  "picture",
  "source",
  // media
  "audio",
  "track",
  "video",
  // embedded
  "embed",
  "iframe",
  "math",
  "object",
  "param",
  "svg",
  // interactive
  "details",
  "dialog",
  "summary",
  // scripting
  "canvas",
  "noscript",
  "script",
  "template",
  // data
  "data",
  "link",
  // formatting
  "style",
  // navigation
  "nav",
] as const;

// Inline and formatting elements whose tags are dropped but whose contents are kept.
export const ELEMENTS_TO_UNWRAP = [
  "a",
  "abbr",
  "address",
  "b",
  "bdi",
  "bdo",
  "center",
  "cite",
  "code",
  "del",
  "dfn",
  "em",
  "font",
  "i",
  "ins",
  "kbd",
  "mark",
  "rb",
  "ruby",
  "rp",
  "rt",
  "rtc",
  "s",
  "samp",
  "small",
  "span",
  "strong",
  "time",
  "u",
  "var",
  "wbr",
] as const;

export const SPECIAL_ELEMENTS = ["q", "sub", "sup"] as const;

export const BLOCK_LEVEL_WHITELIST = [
  "article",
  "aside",
  "blockquote",
  "caption",
  "colgroup",
  "col",
  "div",
  "dl",
  "dt",
  "dd",
  "figure",
  "figcaption",
  "footer",
  "h1",
  "h2",
  "h3",
  "h4",
  "h5",
  "h6",
  "header",
  "li",
  "main",
  "ol",
  "p",
  "pre",
  "section",
  "table",
  "tbody",
  "thead",
  "tfoot",
  "tr",
  "td",
  "th",
  "ul",
] as const;

export const STRUCTURAL_ELEMENTS = ["html", "head", "body"] as const;

export const METADATA_ELEMENTS = ["meta", "link", "base", "title"] as const;

export const LINEBREAK_ELEMENTS = ["br", "hr"] as const;

// Block containers whose direct text children get wrapped in paragraphs.
export const BARE_TEXT_CONTAINERS = [
  "body",
  "div",
  "article",
  "section",
  "main",
  "aside",
  "header",
  "footer",
  "blockquote",
] as const;

// Block-level elements that may not appear inside a paragraph, in the order they are split out.
export const ILLEGAL_IN_PARAGRAPH = [
  "address",
  "article",
  "aside",
  "blockquote",
  "canvas",
  "dd",
  "div",
  "dl",
  "dt",
  "fieldset",
  "figcaption",
  "figure",
  "footer",
  "form",
  "h1",
  "h2",
  "h3",
  "h4",
  "h5",
  "h6",
  "header",
  "hr",
  "li",
  "main",
  "nav",
  "noscript",
  "ol",
  "p",
  "pre",
  "section",
  "table",
  "tfoot",
  "ul",
  "video",
] as const;

export const KNOWN_ELEMENTS: ReadonlySet<string> = new Set<string>([
  ...STRUCTURAL_ELEMENTS,
  ...METADATA_ELEMENTS,
  ...LINEBREAK_ELEMENTS,
  ...ELEMENTS_TO_DELETE,
  ...ELEMENTS_TO_UNWRAP,
  ...SPECIAL_ELEMENTS,
  ...BLOCK_LEVEL_WHITELIST,
]);

export const DEFAULT_ATTRIBUTE_ALLOWLIST = [
  "colspan",
  "rowspan",
  "headers",
  "scope",
  "start",
  "reversed",
  "lang",
  "dir",
] as const;
