const NAMED_ENTITIES: Record<string, string> = {
  nbsp: ' ',
  lt: '<',
  gt: '>',
  amp: '&',
  quot: '"',
  apos: "'",
  mdash: '—',
  ndash: '–',
  hellip: '...',
  copy: '©',
  reg: '®',
  trade: '™',
};

const MAX_CODE_POINT = 0x10ffff;

// Out-of-range and NUL references become U+FFFD, as browsers render them
function fromCodePoint(code: number): string {
  return code > 0 && code <= MAX_CODE_POINT ? String.fromCodePoint(code) : '\uFFFD';
}

function decodeEntities(text: string): string {
  return text
    .replace(/&#(\d+);/g, (_, code: string) => fromCodePoint(Number(code)))
    .replace(/&#x([0-9a-fA-F]+);/g, (_, code: string) => fromCodePoint(parseInt(code, 16)))
    .replace(/&([a-z]+);/g, (entity: string, name: string) => NAMED_ENTITIES[name] ?? entity);
}

// Moodle returns page bodies, summaries and label descriptions as HTML
export function htmlToText(html: string): string {
  if (!html) {
    return '';
  }

  const withoutMarkup = html
    .replace(/<script[^>]*>[\s\S]*?<\/script>/gi, '')
    .replace(/<style[^>]*>[\s\S]*?<\/style>/gi, '')
    .replace(/<!--[\s\S]*?-->/g, '')
    .replace(/<[^>]+>/g, ' ');

  return decodeEntities(withoutMarkup).replace(/\s+/g, ' ').trim();
}
