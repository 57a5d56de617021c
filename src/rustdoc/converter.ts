/**
 * Rustdoc HTML to Markdown Converter
 * Converts pages produced by `cargo doc` (locally or on docs.rs) to Markdown
 * and collects the items they link to
 */

import { ConversionError, toError } from '../errors/index.js';
import type { ConversionResult, RustdocItem } from '../types/docs.js';
import { isItemKind } from './item.js';

const utf8 = new TextDecoder('utf-8', { fatal: true });

/**
 * Convert a rustdoc page to Markdown
 */
export function convertRustdocToMarkdown(html: Uint8Array | string): ConversionResult {
  const source = typeof html === 'string' ? html : decodeUtf8(html);
  const main = extractMainContent(source);

  return {
    markdown: htmlToMarkdown(stripChrome(main)),
    items: extractItems(main),
  };
}

function decodeUtf8(bytes: Uint8Array): string {
  try {
    return utf8.decode(bytes);
  } catch (error) {
    throw new ConversionError('rustdoc page is not valid UTF-8', { bytes: bytes.length }, toError(error));
  }
}

/**
 * Narrow a page to `<section id="main-content">`, dropping sidebar and header
 */
export function extractMainContent(html: string): string {
  const start = html.search(/<section[^>]*\bid=["']main-content["'][^>]*>/i);
  if (start === -1) {
    return html;
  }

  const end = html.indexOf('</main>', start);
  return end === -1 ? html.slice(start) : html.slice(start, end);
}

/**
 * Remove interactive rustdoc elements that carry no documentation
 */
function stripChrome(html: string): string {
  let stripped = html;

  stripped = stripped.replace(/<script\b[^<]*(?:(?!<\/script>)<[^<]*)*<\/script>/gi, '');
  stripped = stripped.replace(/<style\b[^<]*(?:(?!<\/style>)<[^<]*)*<\/style>/gi, '');
  stripped = stripped.replace(/<noscript\b.*?<\/noscript>/gis, '');
  stripped = stripped.replace(/<rustdoc-toolbar\b.*?<\/rustdoc-toolbar>/gis, '');
  stripped = stripped.replace(/<button\b.*?<\/button>/gis, '');
  stripped = stripped.replace(/<a\b[^>]*class=["'](?:src|anchor)["'][^>]*>.*?<\/a>/gis, '');
  stripped = stripped.replace(/<summary\b[^>]*class=["']hideme["'][^>]*>.*?<\/summary>/gis, '');
  stripped = stripped.replace(/<wbr\s*\/?>/gi, '');

  return stripped;
}

/**
 * Items linked from the page's item tables. Only links into the page's own
 * module count, which keeps sidebar, parent and external links out.
 */
export function extractItems(html: string): RustdocItem[] {
  const items: RustdocItem[] = [];
  const seen = new Set<string>();
  const anchor = /<a\s+class=["']([a-z]+)["']\s+href=["']([^"']+)["'][^>]*>(.*?)<\/a>/gis;

  for (const match of html.matchAll(anchor)) {
    const [, kind = '', href = '', inner = ''] = match;
    if (!isItemKind(kind)) continue;

    const name = inner.replace(/<[^>]+>/g, '').trim();
    if (!name) continue;

    const expectedHref = kind === 'mod' ? `${name}/index.html` : `${kind}.${name}.html`;
    if (href !== expectedHref) continue;

    const key = `${kind}:${name}`;
    if (seen.has(key)) continue;
    seen.add(key);

    items.push({ kind, name, path: [] });
  }

  return items;
}

/**
 * Convert HTML to Markdown
 */
export function htmlToMarkdown(html: string): string {
  let markdown = html;

  // Convert headings
  markdown = markdown.replace(/<h1[^>]*>(.*?)<\/h1>/gis, '# $1\n\n');
  markdown = markdown.replace(/<h2[^>]*>(.*?)<\/h2>/gis, '## $1\n\n');
  markdown = markdown.replace(/<h3[^>]*>(.*?)<\/h3>/gis, '### $1\n\n');
  markdown = markdown.replace(/<h4[^>]*>(.*?)<\/h4>/gis, '#### $1\n\n');
  markdown = markdown.replace(/<h5[^>]*>(.*?)<\/h5>/gis, '##### $1\n\n');
  markdown = markdown.replace(/<h6[^>]*>(.*?)<\/h6>/gis, '###### $1\n\n');

  // Convert code blocks; rustdoc marks Rust examples and declarations with class "rust"
  markdown = markdown.replace(
    /<pre[^>]*class=["'][^"']*\brust\b[^"']*["'][^>]*>(?:<code[^>]*>)?(.*?)(?:<\/code>)?<\/pre>/gis,
    (_match, code: string) => `\`\`\`rust\n${stripTags(code)}\n\`\`\`\n\n`
  );
  markdown = markdown.replace(
    /<pre[^>]*>(?:<code[^>]*>)?(.*?)(?:<\/code>)?<\/pre>/gis,
    (_match, code: string) => `\`\`\`\n${stripTags(code)}\n\`\`\`\n\n`
  );
  markdown = markdown.replace(/<code[^>]*>(.*?)<\/code>/gis, '`$1`');

  // Convert bold and italic
  markdown = markdown.replace(/<strong[^>]*>(.*?)<\/strong>/gis, '**$1**');
  markdown = markdown.replace(/<b(?:\s[^>]*)?>(.*?)<\/b>/gis, '**$1**');
  markdown = markdown.replace(/<em[^>]*>(.*?)<\/em>/gis, '*$1*');
  markdown = markdown.replace(/<i(?:\s[^>]*)?>(.*?)<\/i>/gis, '*$1*');

  // Convert links
  markdown = markdown.replace(/<a\s+href=["']([^"']+)["'][^>]*>(.*?)<\/a>/gis, '[$2]($1)');

  // Convert lists
  markdown = markdown.replace(/<ul[^>]*>(.*?)<\/ul>/gis, (match: string, content: string) => {
    const items = content.match(/<li[^>]*>(.*?)<\/li>/gis);
    if (!items) return match;
    return items.map(item => `- ${stripTags(item).trim()}`).join('\n') + '\n\n';
  });

  markdown = markdown.replace(/<ol[^>]*>(.*?)<\/ol>/gis, (match: string, content: string) => {
    const items = content.match(/<li[^>]*>(.*?)<\/li>/gis);
    if (!items) return match;
    return items.map((item, index) => `${index + 1}. ${stripTags(item).trim()}`).join('\n') + '\n\n';
  });

  // Convert blockquotes
  markdown = markdown.replace(/<blockquote[^>]*>(.*?)<\/blockquote>/gis, (_match, content: string) => {
    const lines = content.trim().split('\n');
    return lines.map(line => `> ${line.trim()}`).join('\n') + '\n\n';
  });

  markdown = markdown.replace(/<hr[^>]*>/gi, '\n---\n\n');
  markdown = markdown.replace(/<p(?:\s[^>]*)?>(.*?)<\/p>/gis, '$1\n\n');
  markdown = markdown.replace(/<br\s*\/?>/gi, '\n');

  // Remove remaining HTML tags
  markdown = stripTags(markdown);

  markdown = decodeHtmlEntities(markdown);

  markdown = markdown.replace(/\n{3,}/g, '\n\n');
  return markdown.trim();
}

function stripTags(html: string): string {
  return html.replace(/<[^>]+>/g, '');
}

/**
 * Decode HTML entities
 */
export function decodeHtmlEntities(text: string): string {
  const entities: Record<string, string> = {
    '&lt;': '<',
    '&gt;': '>',
    '&quot;': '"',
    '&#39;': "'",
    '&nbsp;': ' ',
  };

  let decoded = text;
  for (const [entity, char] of Object.entries(entities)) {
    decoded = decoded.split(entity).join(char);
  }

  decoded = decoded.replace(/&#(\d+);/g, (_match, dec: string) => fromCodePoint(parseInt(dec, 10)));
  decoded = decoded.replace(/&#x([0-9a-f]+);/gi, (_match, hex: string) => fromCodePoint(parseInt(hex, 16)));

  // Last, so `&amp;lt;` stays `&lt;`
  return decoded.split('&amp;').join('&');
}

/**
 * Numeric references outside Unicode scalar values render as U+FFFD
 */
function fromCodePoint(codePoint: number): string {
  if (codePoint > 0x10ffff || (codePoint >= 0xd800 && codePoint <= 0xdfff)) {
    return '\uFFFD';
  }
  return String.fromCodePoint(codePoint);
}
