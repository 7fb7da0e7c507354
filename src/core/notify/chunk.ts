const limitOf = (maxLength: number) => Math.max(1, Math.floor(maxLength) || 1);

/**
 * Packs entries into messages joined by line breaks, each at most
 * `maxLength` characters (at least 1). An entry stays in one message unless
 * it alone exceeds the limit; then it is broken on its own lines, and a
 * single line longer than the limit is cut hard.
 */
export function packEntries(
  entries: readonly string[],
  maxLength: number,
): string[] {
  const limit = limitOf(maxLength);
  const parts: string[] = [];
  let current = "";

  const flush = () => {
    if (current.trim()) parts.push(current.replace(/\n+$/, ""));
    current = "";
  };

  const add = (piece: string) => {
    const candidate = current ? `${current}\n${piece}` : piece;
    if (candidate.length <= limit) {
      current = candidate;
      return true;
    }
    return false;
  };

  for (const entry of entries) {
    if (add(entry)) continue;
    flush();
    if (add(entry)) continue;

    for (const line of entry.split("\n")) {
      if (add(line)) continue;
      flush();
      let rest = line;
      while (rest.length > limit) {
        parts.push(rest.slice(0, limit));
        rest = rest.slice(limit);
      }
      current = rest;
    }
  }
  flush();

  return parts;
}

/**
 * Splits long text on line boundaries so each part fits a chat message.
 */
export function splitMessage(text: string, maxLength: number): string[] {
  if (text.length <= limitOf(maxLength)) return [text];
  return packEntries(text.split("\n"), maxLength);
}
