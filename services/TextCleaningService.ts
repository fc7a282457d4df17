export class TextCleaningService {
  /**
   * Line-level cleanup: unify line endings, drop page furniture and boilerplate
   * headers, collapse runs of blank lines. Keeps line structure.
   */
  cleanText(text: string): string {
    let cleaned = text;

    cleaned = cleaned.replace(/\r\n/g, '\n');
    cleaned = cleaned.replace(/\r/g, '\n');
    cleaned = cleaned.replace(/[ \t\u00a0]+/g, ' ');
    cleaned = cleaned.replace(/[ \t]+$/gm, '');

    cleaned = cleaned.replace(/^ *Page +\d+( +of +\d+)? *$/gim, '');
    cleaned = cleaned.replace(/^ *\d+ *\/ *\d+ *$/gm, '');
    cleaned = cleaned.replace(/^ *- *\d+ *- *$/gm, '');
    cleaned = cleaned.replace(/^ *\d+ *$/gm, '');

    cleaned = cleaned.replace(/^ *(resume|résumé|curriculum vitae|cv) *$/gim, '');
    cleaned = cleaned.replace(/^.*\bConfidential\b.*$/gim, '');
    cleaned = cleaned.replace(/^ *references (are )?available (up)?on request\.? *$/gim, '');

    cleaned = cleaned.replace(/\n{3,}/g, '\n\n');
    cleaned = cleaned.trim();

    return cleaned;
  }

  /**
   * Comparable form: cleaned, lowercased, all whitespace collapsed to single spaces.
   */
  normalizeText(text: string): string {
    return this.cleanText(text).toLowerCase().replace(/\s+/g, ' ').trim();
  }

  /**
   * Splits normalized text into tokens. `+`, `#` and inner dots stay part of a
   * token so terms like "c++", "c#" and "node.js" survive; trailing dots go.
   */
  tokenize(normalized: string): string[] {
    return normalized
      .toLowerCase()
      .split(/[^a-z0-9+#.]+/)
      .map(token => token.replace(/\.+$/, ''))
      .filter(token => token.length > 0);
  }
}
