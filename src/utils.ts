// Presentation Analyzer - Sentence and word splitting for the content-structure
// scorer.

// ─── Abbreviations ──────────────────────────────────────────────────────────────

/**
 * Lowercase abbreviations (without their trailing period) that do not end a
 * sentence. Titles are almost always followed by a capitalized name, so they
 * never split; the rest split only when the next word is capitalized.
 */
const TITLE_ABBREVIATIONS = new Set([
  "mr", "mrs", "ms", "dr", "prof", "rev", "sr", "jr", "st",
]);

const OTHER_ABBREVIATIONS = new Set([
  "vs", "etc", "approx", "ca", "dept", "ave", "blvd", "rd", "e.g", "i.e",
]);

// ─── splitSentences ─────────────────────────────────────────────────────────────

/**
 * Splits text at `.`, `!` and `?` followed by whitespace or end of text. The
 * punctuation stays with its sentence. Runs such as "?!" and "..." count as
 * one boundary. Decimals and known abbreviations do not split.
 */
export function splitSentences(text: string): string[] {
  const sentences: string[] = [];
  let start = 0;

  for (let i = 0; i < text.length; i++) {
    if (!isTerminal(text[i])) continue;

    let end = i + 1;
    while (end < text.length && isTerminal(text[end])) end++;

    const atEnd = end >= text.length;
    if (!atEnd && !/\s/.test(text[end])) {
      i = end - 1;
      continue;
    }

    if (text[i] === "." && end === i + 1 && !atEnd) {
      const word = wordBefore(text, i).toLowerCase();
      if (TITLE_ABBREVIATIONS.has(word)) continue;
      if (OTHER_ABBREVIATIONS.has(word) && !nextWordCapitalized(text, end)) continue;
    }

    const sentence = text.slice(start, end).trim();
    if (sentence.length > 0) sentences.push(sentence);
    start = end;
    i = end - 1;
  }

  const rest = text.slice(start).trim();
  if (rest.length > 0) sentences.push(rest);
  return sentences;
}

/** Word tokens of a sentence, ignoring punctuation-only tokens. */
export function tokenizeWords(sentence: string): string[] {
  return sentence.split(/\s+/).filter((t) => /[\p{L}\p{N}]/u.test(t));
}

function isTerminal(ch: string): boolean {
  return ch === "." || ch === "!" || ch === "?";
}

/** The run of non-space characters ending just before index `i`. */
function wordBefore(text: string, i: number): string {
  let j = i;
  while (j > 0 && !/\s/.test(text[j - 1])) j--;
  return text.slice(j, i);
}

function nextWordCapitalized(text: string, from: number): boolean {
  const match = /\S/.exec(text.slice(from));
  if (!match) return false;
  const ch = match[0];
  return ch === ch.toUpperCase() && ch !== ch.toLowerCase();
}
