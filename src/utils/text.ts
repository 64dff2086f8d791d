const MIN_TOKENS = 256;

export function estimateTokens(text: string) {
  if (!text.trim()) {
    return 0;
  }
  return Math.ceil(
    text
      .split(/\s+/)
      .filter(Boolean)
      .length * 1.3,
  );
}

/**
 * Cuts `text` down to roughly `tokenLimit` tokens, keeping line breaks of the
 * retained part. Text already inside the budget is returned unchanged.
 */
export function clampToTokenBudget(text: string, tokenLimit: number) {
  const limit = Math.max(MIN_TOKENS, Math.floor(tokenLimit));
  if (estimateTokens(text) <= limit) {
    return text;
  }
  const maxWords = Math.floor(limit / 1.3);
  let seen = 0;
  let cut = text.length;
  const wordPattern = /\S+/g;
  let match: RegExpExecArray | null;
  while ((match = wordPattern.exec(text)) !== null) {
    seen += 1;
    if (seen > maxWords) {
      cut = match.index;
      break;
    }
  }
  return `${text.slice(0, cut).trimEnd()}\n[document truncated]`;
}
