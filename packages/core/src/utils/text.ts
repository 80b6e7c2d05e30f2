const ASSISTANT_MARKER = 'Assistant:';

/** Whitespace word count; the gateway's token estimate when the server reports none. */
export function estimateTokens(text: string): number {
  const trimmed = text.trim();
  return trimmed.length === 0 ? 0 : trimmed.split(/\s+/).length;
}

/**
 * Trims the model output and keeps only what follows the last
 * `Assistant:` marker, which chat-style prompts sometimes echo back.
 */
export function cleanCompletionText(raw: string): string {
  const trimmed = raw.trim();
  const markerAt = trimmed.lastIndexOf(ASSISTANT_MARKER);
  if (markerAt === -1) {
    return trimmed;
  }
  return trimmed.slice(markerAt + ASSISTANT_MARKER.length).trim();
}
