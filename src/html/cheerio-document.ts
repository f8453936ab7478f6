import * as cheerio from 'cheerio';
import type { Cheerio, CheerioAPI } from 'cheerio';
import type { AnyNode } from 'domhandler';
import type { HtmlParser, ParsedDocument, ParsedElement } from '../crawl/types';

function selectorFor(tag: string, className?: string): string {
  if (!className) return tag;
  const classes = className.trim().split(/\s+/).map(c => `.${c}`).join('');
  return `${tag}${classes}`;
}

class CheerioElement implements ParsedElement {
  constructor(protected readonly $: CheerioAPI, protected readonly node: Cheerio<AnyNode>) {}

  find(tag: string, className?: string): ParsedElement | null {
    const match = this.node.find(selectorFor(tag, className)).first();
    return match.length > 0 ? new CheerioElement(this.$, match) : null;
  }

  findAll(tag: string, className?: string): ParsedElement[] {
    return this.node
      .find(selectorFor(tag, className))
      .toArray()
      .map(el => new CheerioElement(this.$, this.$(el)));
  }

  text(): string {
    return this.node.text();
  }

  attr(name: string): string | undefined {
    return this.node.attr(name);
  }
}

class CheerioDocument extends CheerioElement implements ParsedDocument {
  byId(id: string): ParsedElement | null {
    const match = this.$(`[id="${id.replace(/"/g, '\\"')}"]`).first();
    return match.length > 0 ? new CheerioElement(this.$, match) : null;
  }
}

export function parseHtml(body: string): ParsedDocument {
  const $ = cheerio.load(body);
  return new CheerioDocument($, $.root());
}

export const cheerioParser: HtmlParser = { parse: parseHtml };
