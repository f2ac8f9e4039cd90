import MarkdownIt from 'markdown-it';

// Only the escaping and link detection are used; nothing is parsed as Markdown.
const md = new MarkdownIt({ linkify: true });

/** Entity-escape `& < > "` for text and attribute values. */
export function escapeHtml(text: string): string {
  return md.utils.escapeHtml(text);
}

/**
 * Raw text as HTML with bare URLs wrapped in anchors. Links are matched
 * on the raw text; everything taken from it is escaped piecewise.
 */
export function linkify(raw: string): string {
  const matches = md.linkify.match(raw);
  if (!matches) return escapeHtml(raw);

  let out = '';
  let last = 0;
  for (const match of matches) {
    out += escapeHtml(raw.slice(last, match.index));
    out += `<a href="${escapeHtml(match.url)}" rel="noopener noreferrer">${escapeHtml(match.text)}</a>`;
    last = match.lastIndex;
  }
  return out + escapeHtml(raw.slice(last));
}

/** Message text as HTML, one `<br>` per line break. */
export function formatText(text: string): string {
  return text.split('\n').map(linkify).join('<br>\n');
}

export interface PageOptions {
  title: string;
  /** Relative URLs, already URL-safe. */
  stylesheets: string[];
  body: string;
  /** Inline scripts first, then external ones. */
  inlineScripts?: string[];
  scripts?: string[];
}

export function renderPage(options: PageOptions): string {
  const head = [
    '<!DOCTYPE html>',
    '<html lang="en">',
    '<head>',
    '    <meta charset="UTF-8">',
    '    <meta name="viewport" content="width=device-width, initial-scale=1.0">',
    `    <title>${escapeHtml(options.title)}</title>`,
    ...options.stylesheets.map((href) => `    <link rel="stylesheet" href="${escapeHtml(href)}">`),
    '</head>',
    '<body>',
  ];
  const tail = [
    ...(options.inlineScripts ?? []).map((code) => `<script>\n${code}\n</script>`),
    ...(options.scripts ?? []).map((src) => `<script src="${escapeHtml(src)}"></script>`),
    '</body>',
    '</html>',
    '',
  ];
  return [...head, options.body, ...tail].join('\n');
}

/** JSON that is safe inside an inline `<script>` element. */
export function scriptJson(value: unknown): string {
  return JSON.stringify(value)
    .replace(/</g, '\\u003c')
    .replace(/\u2028/g, '\\u2028')
    .replace(/\u2029/g, '\\u2029');
}
