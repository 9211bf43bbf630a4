/**
 * Parser for the paragraph markup subset: `<b>`, `<i>`, `<br/>` and the
 * `&amp;` / `&lt;` / `&gt;` entities. Unknown tags are kept as literal text.
 */

export type TextSpan = {
  kind: 'text';
  text: string;
  bold: boolean;
  italic: boolean;
};

export type BreakSpan = { kind: 'break' };

export type Span = TextSpan | BreakSpan;

const TOKEN_PATTERN = /<(\/?)(b|i)>|<br\s*\/?>/gi;

const ENTITIES: Record<string, string> = { '&amp;': '&', '&lt;': '<', '&gt;': '>' };

const decodeEntities = (text: string): string => text.replace(/&(?:amp|lt|gt);/g, (entity) => ENTITIES[entity]);

export function parseMarkup(markup: string, transform?: 'uppercase'): Span[] {
  const spans: Span[] = [];
  let bold = 0;
  let italic = 0;
  let cursor = 0;

  const pushText = (raw: string) => {
    if (raw.length === 0) return;
    const decoded = decodeEntities(raw);
    const text = transform === 'uppercase' ? decoded.toUpperCase() : decoded;
    const last = spans[spans.length - 1];
    if (last?.kind === 'text' && last.bold === (bold > 0) && last.italic === (italic > 0)) {
      last.text += text;
      return;
    }
    spans.push({ kind: 'text', text, bold: bold > 0, italic: italic > 0 });
  };

  for (const match of markup.matchAll(TOKEN_PATTERN)) {
    const index = match.index ?? 0;
    pushText(markup.slice(cursor, index));
    cursor = index + match[0].length;

    const tag = match[2]?.toLowerCase();
    const closing = match[1] === '/';
    if (tag === 'b') {
      bold = Math.max(0, bold + (closing ? -1 : 1));
    } else if (tag === 'i') {
      italic = Math.max(0, italic + (closing ? -1 : 1));
    } else {
      spans.push({ kind: 'break' });
    }
  }
  pushText(markup.slice(cursor));

  return spans;
}

/** Text content of a markup string with all tags removed. */
export function plainText(markup: string): string {
  return parseMarkup(markup)
    .map((span) => (span.kind === 'text' ? span.text : '\n'))
    .join('');
}
