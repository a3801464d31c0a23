const MENTION_PATTERN = /<@[^>]+>/g;

/**
 * Strips every `<@ID>` mention token from the text, then trims it.
 *
 * Stripping repeats until nothing matches, since removing one token can
 * splice its neighbours into a new one (`<<@A>@B>`).
 */
export function normalizeQuery(rawText: string): string {
  let text = rawText;
  let previous: string;
  do {
    previous = text;
    text = text.replace(MENTION_PATTERN, '');
  } while (text !== previous);
  return text.trim();
}
