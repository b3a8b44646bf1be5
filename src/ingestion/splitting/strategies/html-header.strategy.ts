/**
 * HTML Header Strategy
 * Walks the DOM in document order; <h1>-<h3> open a new section and the text
 * of everything else accumulates under the current heading trail.
 */

import { Injectable, Logger } from '@nestjs/common';
import { load } from 'cheerio';
import { isTag, isText, type AnyNode } from 'domhandler';
import type { LoadedDocument } from '../../types/document.types';
import type { HeaderTrail, SplitSection } from '../../types/chunk.types';
import type { SplitStrategy } from './split-strategy';
import { HeadingLevel, enterHeading } from './header-trail';

const HEADING_TAGS = new Map<string, HeadingLevel>([
  ['h1', 1],
  ['h2', 2],
  ['h3', 3],
]);

const SKIPPED_TAGS = new Set(['head', 'script', 'style', 'noscript', 'template']);

const BLOCK_TAGS = new Set([
  'address', 'article', 'aside', 'blockquote', 'br', 'dd', 'div', 'dl', 'dt',
  'figcaption', 'figure', 'footer', 'form', 'h4', 'h5', 'h6', 'header', 'hr',
  'li', 'main', 'nav', 'ol', 'p', 'pre', 'section', 'table', 'td', 'th', 'tr',
  'ul',
]);

@Injectable()
export class HtmlHeaderStrategy implements SplitStrategy {
  private readonly logger = new Logger(HtmlHeaderStrategy.name);

  async split(document: LoadedDocument): Promise<SplitSection[]> {
    const sections = document.pages.flatMap((page) => splitHtml(page.content));

    this.logger.log(
      `Split ${document.source} into ${sections.length} header sections`,
    );

    return sections;
  }
}

export function splitHtml(html: string): SplitSection[] {
  const $ = load(html);
  const sections: SplitSection[] = [];
  let trail: HeaderTrail = {};
  let buffer = '';

  const flush = (): void => {
    const content = normalizeLines(buffer);
    if (content.length > 0) {
      sections.push({ content, headers: { ...trail } });
    }
    buffer = '';
  };

  const walk = (nodes: readonly AnyNode[]): void => {
    for (const node of nodes) {
      if (isText(node)) {
        buffer += node.data.replace(/\s+/g, ' ');
        continue;
      }
      if (!isTag(node)) {
        continue;
      }

      const tag = node.tagName.toLowerCase();
      if (SKIPPED_TAGS.has(tag)) {
        continue;
      }

      const level = HEADING_TAGS.get(tag);
      if (level !== undefined) {
        flush();
        trail = enterHeading(trail, level, collapseWhitespace($(node).text()));
        continue;
      }

      const block = BLOCK_TAGS.has(tag);
      if (block) buffer += '\n';
      walk(node.children);
      if (block) buffer += '\n';
    }
  };

  walk($.root().contents().toArray());
  flush();

  return sections;
}

function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

function normalizeLines(text: string): string {
  return text
    .split('\n')
    .map(collapseWhitespace)
    .filter((line) => line.length > 0)
    .join('\n');
}
