export const CONTENT_PATTERNS = [
  "article",
  "content",
  "entry",
  "hentry",
  "main",
  "page",
  "pagination",
  "post",
  "text",
  "blog",
  "story",
  "body",
  "section",
  "readable",
] as const;

export const NON_CONTENT_PATTERNS = [
  "combx",
  "comment",
  "com-",
  "contact",
  "foot",
  "footer",
  "footnote",
  "masthead",
  "media",
  "meta",
  "outbrain",
  "promo",
  "related",
  "scroll",
  "shoutbox",
  "sidebar",
  "sponsor",
  "shopping",
  "tags",
  "tool",
  "widget",
  "nav",
  "menu",
  "header",
  "ad",
  "advertisement",
  "banner",
  "social",
  "share",
  "sharing",
  "login",
  "signup",
] as const;

export type TagBonus = readonly [tags: readonly string[], weight: number];

export const TAG_BONUSES: readonly TagBonus[] = [
  [["article", "section", "div", "main"], 10],
  [["p", "pre", "td"], 5],
  [["blockquote", "address", "ol", "ul", "dl", "dd", "dt", "li"], 3],
  [["form", "aside", "footer", "header", "nav"], -10],
];

/** Case-insensitive substring match against any pattern. */
export function matchesAnyPattern(value: string, patterns: readonly string[]): boolean {
  const lower = value.toLowerCase();
  return patterns.some((pattern) => lower.includes(pattern));
}

export function tagBonus(tag: string, bonuses: readonly TagBonus[] = TAG_BONUSES): number {
  for (const [tags, weight] of bonuses) {
    if (tags.includes(tag)) return weight;
  }
  return 0;
}
