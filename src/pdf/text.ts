import type { PDFFont } from 'pdf-lib';

const charsets = new WeakMap<PDFFont, Set<number>>();

function charsetOf(font: PDFFont): Set<number> {
  let set = charsets.get(font);
  if (!set) {
    set = new Set(font.getCharacterSet());
    charsets.set(font, set);
  }
  return set;
}

/**
 * Replace characters the font cannot encode (standard fonts are WinAnsi
 * only) so drawing never throws on user-supplied names.
 */
export function encodable(font: PDFFont, text: string): string {
  const set = charsetOf(font);
  let out = '';
  for (const char of text.replace(/[\r\n\t]+/g, ' ')) {
    const code = char.codePointAt(0);
    out += code !== undefined && set.has(code) ? char : '?';
  }
  return out;
}

/**
 * Greedy word wrap against the rendered width.
 */
export function wrapText(font: PDFFont, text: string, size: number, maxWidth: number): string[] {
  const lines: string[] = [];
  let current = '';

  for (const word of text.split(' ').filter(w => w !== '')) {
    const candidate = current === '' ? word : `${current} ${word}`;
    if (current !== '' && font.widthOfTextAtSize(candidate, size) > maxWidth) {
      lines.push(current);
      current = word;
    } else {
      current = candidate;
    }
  }
  if (current !== '') lines.push(current);

  return lines.length > 0 ? lines : [''];
}

/**
 * Shorten `text` with a trailing "..." until it fits `maxWidth`.
 */
export function truncateToWidth(font: PDFFont, text: string, size: number, maxWidth: number): string {
  if (font.widthOfTextAtSize(text, size) <= maxWidth) return text;

  const ellipsis = '...';
  let out = text;
  while (out.length > 0 && font.widthOfTextAtSize(`${out}${ellipsis}`, size) > maxWidth) {
    out = out.slice(0, -1);
  }
  return `${out.trimEnd()}${ellipsis}`;
}

/**
 * Lines of a table cell: word-wrapped to the column, with any single word
 * wider than the column truncated.
 */
export function fitToColumn(font: PDFFont, text: string, size: number, maxWidth: number): string[] {
  return wrapText(font, text, size, maxWidth).map(line => truncateToWidth(font, line, size, maxWidth));
}
