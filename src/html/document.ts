import * as cheerio from 'cheerio';
import type { CheerioAPI, Cheerio } from 'cheerio';
import type { AnyNode, Element } from 'domhandler';

export type { CheerioAPI };
export type Nodes = Cheerio<AnyNode>;
export type Elements = Cheerio<Element>;

export function loadHtml(html: string): CheerioAPI {
  return cheerio.load(html);
}

export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

export function textOf(node: Nodes): string {
  return collapseWhitespace(node.text());
}

/** Run a selector that may come from a profile; invalid selectors match nothing. */
export function safeSelect($: CheerioAPI, selector: string, scope?: Nodes): Elements {
  try {
    return scope ? scope.find(selector) : $.root().find(selector);
  } catch {
    const none: Element[] = [];
    return $(none);
  }
}

/**
 * Reduce a page to something a language model can read: no scripts, styles
 * or comments, whitespace collapsed, cut at `maxChars`.
 */
export function pageSnapshot(html: string, maxChars: number): string {
  const $ = loadHtml(html);
  $('script, style, noscript, svg').remove();
  $('*')
    .contents()
    .filter((_, node) => node.nodeType === 8)
    .remove();

  const body = $('body');
  const cleaned = (body.length > 0 ? body.html() : $.html()) ?? '';
  const collapsed = cleaned.replace(/\s+/g, ' ').trim();
  return collapsed.length > maxChars ? collapsed.slice(0, maxChars) : collapsed;
}
