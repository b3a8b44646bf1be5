import { ChunkSplitterService } from './chunk-splitter.service';
import { RecursiveTextStrategy } from './strategies/recursive-text.strategy';
import { MarkdownHeaderStrategy } from './strategies/markdown-header.strategy';
import { HtmlHeaderStrategy } from './strategies/html-header.strategy';
import { CodeStrategy } from './strategies/code.strategy';
import type { LoadedDocument } from '../types/document.types';
import type { RagSettings } from '../../config/rag-settings';
import { createTestSettings } from '../../../test/fakes/test-settings';

/** Length of the longest suffix of `previous` that starts `next` */
function sharedBoundary(previous: string, next: string): number {
  for (let length = Math.min(previous.length, next.length); length > 0; length--) {
    if (previous.endsWith(next.slice(0, length))) {
      return length;
    }
  }
  return 0;
}

// Equal-width tokens: a word plus its separator takes five characters
const TOKEN_WIDTH = 5;
const tokens = Array.from(
  { length: 80 },
  (_, i) => `w${String(i).padStart(3, '0')}`,
);

function createSplitter(settings: RagSettings): ChunkSplitterService {
  return new ChunkSplitterService(
    new RecursiveTextStrategy(settings),
    new MarkdownHeaderStrategy(),
    new HtmlHeaderStrategy(),
    new CodeStrategy(settings),
  );
}

describe('ChunkSplitterService', () => {
  describe('text', () => {
    const settings = createTestSettings({
      chunking: { chunkSize: 40, chunkOverlap: 10 },
    });
    const splitter = createSplitter(settings);
    const words = Array.from({ length: 60 }, (_, i) => `word${i}`);
    const document: LoadedDocument = {
      source: 'notes.txt',
      format: { kind: 'text' },
      pages: [{ content: words.join(' ') }],
    };

    it('keeps every chunk within the chunk size', async () => {
      const chunks = await splitter.split(document);

      expect(chunks.length).toBeGreaterThan(1);
      for (const chunk of chunks) {
        expect(chunk.content.length).toBeLessThanOrEqual(40);
      }
    });

    it('loses no text', async () => {
      const chunks = await splitter.split(document);
      const seen = new Set(chunks.flatMap((c) => c.content.split(' ')));

      expect(words.every((word) => seen.has(word))).toBe(true);
    });

    it('numbers chunks from zero and stamps the source', async () => {
      const chunks = await splitter.split(document);

      chunks.forEach((chunk, index) => {
        expect(chunk.metadata).toEqual({
          source: 'notes.txt',
          format: 'text',
          chunkIndex: index,
        });
      });
    });
  });

  describe.each([
    [30, 5],
    [40, 10],
    [60, 15],
    [100, 10],
  ])('chunk size %i with overlap %i', (chunkSize, chunkOverlap) => {
    const splitter = createSplitter(
      createTestSettings({ chunking: { chunkSize, chunkOverlap } }),
    );

    async function splitAs(
      format: LoadedDocument['format'],
    ): Promise<string[]> {
      const chunks = await splitter.split({
        source: 'tokens',
        format,
        pages: [{ content: tokens.join(' ') }],
      });
      return chunks.map((chunk) => chunk.content);
    }

    it.each([
      ['text', { kind: 'text' }],
      ['code', { kind: 'code', language: 'python' }],
    ] as const)(
      'overlaps adjacent %s chunks by about the configured amount',
      async (_name, format) => {
        const contents = await splitAs(format);

        expect(contents.length).toBeGreaterThan(2);
        for (let i = 1; i < contents.length; i++) {
          const shared = sharedBoundary(contents[i - 1], contents[i]);
          expect(shared).toBeLessThanOrEqual(chunkOverlap);
          expect(shared).toBeGreaterThanOrEqual(chunkOverlap - TOKEN_WIDTH);
        }
      },
    );

    it.each([
      ['text', { kind: 'text' }],
      ['code', { kind: 'code', language: 'python' }],
    ] as const)('keeps %s chunks within the chunk size', async (_name, format) => {
      const contents = await splitAs(format);

      for (const content of contents) {
        expect(content.length).toBeLessThanOrEqual(chunkSize);
      }
      expect(contents[0].startsWith('w000')).toBe(true);
      expect(contents[contents.length - 1].endsWith('w079')).toBe(true);
    });
  });

  it('carries page numbers for PDF pages', async () => {
    const splitter = createSplitter(createTestSettings());

    const chunks = await splitter.split({
      source: 'manual.pdf',
      format: { kind: 'pdf' },
      pages: [
        { content: 'first page text', pageNumber: 1 },
        { content: 'third page text', pageNumber: 3 },
      ],
    });

    expect(chunks).toEqual([
      {
        content: 'first page text',
        metadata: { source: 'manual.pdf', format: 'pdf', chunkIndex: 0, pageNumber: 1 },
      },
      {
        content: 'third page text',
        metadata: { source: 'manual.pdf', format: 'pdf', chunkIndex: 1, pageNumber: 3 },
      },
    ]);
  });

  it('splits markdown by header path', async () => {
    const splitter = createSplitter(createTestSettings());

    const chunks = await splitter.split({
      source: 'guide.md',
      format: { kind: 'markdown' },
      pages: [
        { content: '# A\nalpha apples orchard\n## B\nbanana boats harbor\n' },
      ],
    });

    expect(chunks).toEqual([
      {
        content: 'alpha apples orchard',
        metadata: {
          source: 'guide.md',
          format: 'markdown',
          chunkIndex: 0,
          headers: { H1: 'A' },
        },
      },
      {
        content: 'banana boats harbor',
        metadata: {
          source: 'guide.md',
          format: 'markdown',
          chunkIndex: 1,
          headers: { H1: 'A', H2: 'B' },
        },
      },
    ]);
  });

  it('splits html by heading tags', async () => {
    const splitter = createSplitter(createTestSettings());

    const chunks = await splitter.split({
      source: 'page.html',
      format: { kind: 'html' },
      pages: [
        {
          content:
            '<html><head><title>ignored</title></head><body>' +
            '<h1>Guide</h1><p>Intro text</p><script>var a = 1;</script>' +
            '<h2>Setup</h2><p>Install   the\n tool</p><ul><li>one</li><li>two</li></ul>' +
            '<h1>Other</h1><p>End</p>' +
            '</body></html>',
        },
      ],
    });

    expect(chunks.map((c) => [c.content, c.metadata.headers])).toEqual([
      ['Intro text', { H1: 'Guide' }],
      ['Install the tool\none\ntwo', { H1: 'Guide', H2: 'Setup' }],
      ['End', { H1: 'Other' }],
    ]);
  });

  it('splits source code on grammar boundaries', async () => {
    const settings = createTestSettings({
      chunking: { chunkSize: 40, chunkOverlap: 0 },
    });
    const splitter = createSplitter(settings);
    const source = [
      'package main',
      '',
      'func alpha() {',
      '\treturn',
      '}',
      '',
      'func beta() {',
      '\treturn',
      '}',
      '',
    ].join('\n');

    const chunks = await splitter.split({
      source: 'tool.go',
      format: { kind: 'code', language: 'go' },
      pages: [{ content: source }],
    });

    expect(chunks.length).toBeGreaterThan(1);
    expect(chunks.some((c) => c.content.startsWith('func beta()'))).toBe(true);
    for (const chunk of chunks) {
      expect(chunk.content.length).toBeLessThanOrEqual(40);
      expect(chunk.metadata.format).toBe('code');
      expect(chunk.metadata.language).toBe('go');
    }
  });
});
