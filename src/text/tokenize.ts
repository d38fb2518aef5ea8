const ABBREVIATIONS = ["Dr.", "Mr.", "Mrs.", "Ms.", "Prof.", "St.", "Jr.", "Sr."];
const WORD_CHAR_RE = /[\p{L}\p{N}]/u;
const TERMINATORS = new Set([".", "!", "?"]);

function stripAbbreviationPeriods(text: string): string {
  let out = text;
  for (const abbr of ABBREVIATIONS) {
    out = out.split(abbr).join(abbr.slice(0, -1));
  }
  return out;
}

/** Counts punctuation-terminated runs; a trailing unterminated run counts as one sentence. */
export function countSentences(text: string): number {
  let count = 0;
  let inSentence = false;
  for (const ch of stripAbbreviationPeriods(text)) {
    if (WORD_CHAR_RE.test(ch)) {
      inSentence = true;
    } else if (inSentence && TERMINATORS.has(ch)) {
      count += 1;
      inSentence = false;
    }
  }
  return inSentence ? count + 1 : count;
}

export function countWords(text: string): number {
  return text.split(/\s+/).filter((word) => word.length > 0).length;
}

function isVowel(ch: string | undefined): boolean {
  return ch !== undefined && "aeiouy".includes(ch);
}

function countSyllables(word: string): number {
  const lower = word.toLowerCase();
  let count = 0;
  let prevVowel = false;
  for (const ch of lower) {
    const vowel = isVowel(ch);
    if (vowel && !prevVowel) count += 1;
    prevVowel = vowel;
  }
  if (lower.length > 2 && lower.endsWith("e") && !isVowel(lower[lower.length - 2])) {
    count -= 1;
  }
  return Math.max(1, count);
}

/** Flesch-Kincaid grade level; 0 when the text has no words or no sentences. */
export function readingLevel(text: string): number {
  const words = countWords(text);
  const sentences = countSentences(text);
  if (words === 0 || sentences === 0) return 0;
  const syllables = text
    .split(/\s+/)
    .filter((word) => word.length > 0)
    .reduce((acc, word) => acc + countSyllables(word), 0);
  return 0.39 * (words / sentences) + 11.8 * (syllables / words) - 15.59;
}
