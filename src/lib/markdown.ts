import { Marked, type Token, type Tokens } from 'marked';
import { measureImage } from './images';
import { escapeHtml } from './escape';

function isLink(token: Token): token is Tokens.Link {
  return token.type === 'link';
}

function isImage(token: Token): token is Tokens.Image {
  return token.type === 'image';
}

const scanner = new Marked({ gfm: true });

// Everything before the first marker is the excerpt shown in listings.
export const MORE_MARKER = /<!--\s*more\s*-->/;
const MORE_MARKER_GLOBAL = new RegExp(MORE_MARKER.source, 'g');

export type MoreSplit = {
  excerpt?: string;
  body: string;
  markerCount: number;
};

type Span = { start: number; end: number };

/** Source ranges of fenced, indented and inline code, in document order. */
function codeSpans(text: string): Span[] {
  const spans: Span[] = [];
  let cursor = 0;
  scanner.walkTokens(scanner.lexer(text), (token) => {
    if (token.type !== 'code' && token.type !== 'codespan') return;
    // nested code (inside lists or quotes) is de-indented by the lexer and may not match verbatim
    const start = text.indexOf(token.raw, cursor);
    if (start < 0) return;
    cursor = start + token.raw.length;
    spans.push({ start, end: cursor });
  });
  return spans;
}

function findMarkers(text: string): Span[] {
  if (!MORE_MARKER.test(text)) return [];
  const code = codeSpans(text);
  const markers: Span[] = [];
  for (const match of text.matchAll(MORE_MARKER_GLOBAL)) {
    const start = match.index ?? 0;
    if (code.some((span) => start >= span.start && start < span.end)) continue;
    markers.push({ start, end: start + match[0].length });
  }
  return markers;
}

/** Markers shown inside code samples are content, not split points. */
export function splitMore(content: string): MoreSplit {
  const text = content.replace(/\r\n?/g, '\n');
  const markers = findMarkers(text);
  const [first] = markers;
  if (!first) return { body: content, markerCount: 0 };
  let body = '';
  let last = 0;
  for (const marker of markers) {
    body += text.slice(last, marker.start);
    last = marker.end;
  }
  body += text.slice(last);
  return { excerpt: text.slice(0, first.start).trim(), body, markerCount: markers.length };
}

export type MarkdownReference = { href: string; text: string };

/** Links and images in document order. Code spans and fences are not scanned. */
export function extractReferences(source: string): { links: MarkdownReference[]; images: MarkdownReference[] } {
  const links: MarkdownReference[] = [];
  const images: MarkdownReference[] = [];
  scanner.walkTokens(scanner.lexer(source), (token) => {
    if (isLink(token)) links.push({ href: token.href, text: token.text });
    else if (isImage(token)) images.push({ href: token.href, text: token.text });
  });
  return { links, images };
}

export interface MarkdownRendererOptions {
  /** Root that local image paths resolve against; enables width/height attributes. */
  publicDir?: string;
  /** Rewrites link hrefs; return undefined to keep the original. */
  resolveHref?: (href: string) => string | undefined;
}

export interface MarkdownRenderer {
  render(source: string): string;
}

export function createMarkdownRenderer(options: MarkdownRendererOptions = {}): MarkdownRenderer {
  const { publicDir, resolveHref } = options;
  const marked = new Marked({ gfm: true });
  if (publicDir) {
    marked.use({
      renderer: {
        image(href: string, title: string | null, text: string) {
          const size = measureImage(publicDir, href);
          if (!size) return false; // default renderer
          // text and title arrive escaped from the lexer
          const titleAttr = title ? ` title="${title}"` : '';
          return `<img src="${escapeHtml(href)}" alt="${text}" width="${size.width}" height="${size.height}"${titleAttr}>`;
        },
      },
    });
  }
  return {
    render(source: string): string {
      const tokens = marked.lexer(source);
      if (resolveHref) {
        marked.walkTokens(tokens, (token) => {
          if (!isLink(token)) return;
          const resolved = resolveHref(token.href);
          if (resolved !== undefined) token.href = resolved;
        });
      }
      return marked.parser(tokens);
    },
  };
}

const WORDS_PER_MINUTE = 200;

export function readingMinutes(content: string): number {
  const words = content.split(/\s+/).filter(Boolean).length;
  return Math.max(1, Math.ceil(words / WORDS_PER_MINUTE));
}
