const MARKUP_PATTERN = /[*_#`]/g;
const BULLET_PATTERN = /^\s*[-•*]+\s+/;
const NUMBERING_PATTERN = /^\s*\d{1,3}[.)]\s+/;
const RULE_PATTERN = /^\s*[-*_]{3,}\s*$/;

/**
 * Flatten model output into a single line of spoken prose: markdown emphasis,
 * headers, code ticks, bullets, list numbering and horizontal rules are
 * removed; a leading sign such as `-5%` stays. Whitespace is collapsed.
 */
export const cleanForSpeech = (text: string): string =>
  text
    .split(/\r?\n/)
    .filter((line) => !RULE_PATTERN.test(line))
    .map((line) => line.replace(BULLET_PATTERN, "").replace(NUMBERING_PATTERN, ""))
    .map((line) => line.replace(MARKUP_PATTERN, "").trim())
    .filter((line) => line.length > 0)
    .join(" ")
    .replace(/\s+/g, " ")
    .trim();
