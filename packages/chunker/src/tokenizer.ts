export interface Token {
  start: number;
  end: number;
}

/** A run of tokens `[start, end)` that should stay together when possible. */
export interface TokenRange {
  start: number;
  end: number;
}

const TOKEN_REGEX = /\S+/g;
const SENTENCE_END_REGEX = /[.!?]["')\]]*$/;
const PARAGRAPH_BREAK_REGEX = /\n[ \t]*\n/;

/**
 * Whitespace tokenizer. Tokens are maximal runs of non-whitespace characters
 * with their character offsets into the source text.
 */
export function tokenize(text: string): Token[] {
  const tokens: Token[] = [];
  for (const match of text.matchAll(TOKEN_REGEX)) {
    const start = match.index ?? 0;
    tokens.push({ start, end: start + match[0].length });
  }
  return tokens;
}

/**
 * Groups tokens into sentences. A sentence ends at a token closing with
 * `.`, `!` or `?` (closing quotes and brackets allowed), or where a blank
 * line separates two tokens.
 */
export function sentenceRanges(text: string, tokens: Token[]): TokenRange[] {
  const ranges: TokenRange[] = [];
  let start = 0;

  for (let i = 0; i < tokens.length; i++) {
    const token = tokens[i];
    if (!token) continue;

    const next = tokens[i + 1];
    const endsSentence = SENTENCE_END_REGEX.test(text.slice(token.start, token.end));
    const paragraphFollows =
      next !== undefined && PARAGRAPH_BREAK_REGEX.test(text.slice(token.end, next.start));

    if (endsSentence || paragraphFollows || next === undefined) {
      ranges.push({ start, end: i + 1 });
      start = i + 1;
    }
  }

  return ranges;
}

/** One range per token. */
export function tokenRanges(tokens: Token[]): TokenRange[] {
  return tokens.map((_, i) => ({ start: i, end: i + 1 }));
}
