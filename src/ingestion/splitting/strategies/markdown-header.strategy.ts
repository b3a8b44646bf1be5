/**
 * Markdown Header Strategy
 * One section per heading path (levels 1-3). Heading lines move into the
 * `headers` trail; deeper headings stay in the body. Fenced code blocks are
 * copied verbatim and never read as headings.
 */

import { Injectable, Logger } from '@nestjs/common';
import type { LoadedDocument } from '../../types/document.types';
import type { HeaderTrail, SplitSection } from '../../types/chunk.types';
import type { SplitStrategy } from './split-strategy';
import { enterHeading, toHeadingLevel } from './header-trail';

// Pattern: ## Heading Text
const HEADING_PATTERN = /^(#{1,3})(?:[ \t]+(.*))?$/;
const FENCE_PATTERN = /^(`{3,}|~{3,})/;

@Injectable()
export class MarkdownHeaderStrategy implements SplitStrategy {
  private readonly logger = new Logger(MarkdownHeaderStrategy.name);

  async split(document: LoadedDocument): Promise<SplitSection[]> {
    const sections = document.pages.flatMap((page) =>
      splitMarkdown(page.content),
    );

    this.logger.log(
      `Split ${document.source} into ${sections.length} header sections`,
    );

    return sections;
  }
}

export function splitMarkdown(text: string): SplitSection[] {
  const sections: SplitSection[] = [];
  let trail: HeaderTrail = {};
  let paragraphs: string[] = [];
  let paragraph: string[] = [];
  let fence: string | null = null;

  const closeParagraph = (): void => {
    if (paragraph.length > 0) {
      paragraphs.push(paragraph.join('\n'));
      paragraph = [];
    }
  };

  const closeSection = (): void => {
    closeParagraph();
    if (paragraphs.length > 0) {
      sections.push({ content: paragraphs.join('\n\n'), headers: { ...trail } });
      paragraphs = [];
    }
  };

  for (const rawLine of text.split('\n')) {
    const line = rawLine.trimEnd();
    const stripped = line.trim();

    if (fence !== null) {
      paragraph.push(line);
      if (stripped.startsWith(fence)) {
        fence = null;
      }
      continue;
    }

    const fenceMatch = FENCE_PATTERN.exec(stripped);
    if (fenceMatch) {
      fence = fenceMatch[1];
      paragraph.push(line);
      continue;
    }

    const heading = HEADING_PATTERN.exec(stripped);
    const level = heading ? toHeadingLevel(heading[1].length) : null;
    if (heading && level !== null) {
      closeSection();
      trail = enterHeading(trail, level, (heading[2] ?? '').trim());
      continue;
    }

    if (stripped === '') {
      closeParagraph();
      continue;
    }

    paragraph.push(line);
  }

  closeSection();
  return sections;
}
