/**
 * Document formats and extension dispatch.
 *
 * The set of formats is closed: every variant has exactly one split strategy
 * (see ChunkSplitterService), so adding a format means adding a variant here
 * and a strategy there.
 */

import * as path from 'path';
import type { SupportedTextSplitterLanguage } from '@langchain/textsplitters';

export type DocumentFormat =
  | { kind: 'text' }
  | { kind: 'pdf' }
  | { kind: 'markdown' }
  | { kind: 'html' }
  | { kind: 'code'; language: SupportedTextSplitterLanguage };

export type DocumentFormatKind = DocumentFormat['kind'];

export const DOCUMENT_FORMAT_KINDS = [
  'text',
  'pdf',
  'markdown',
  'html',
  'code',
] as const satisfies readonly DocumentFormatKind[];

/** Grammar used for code extensions that have no grammar of their own */
export const DEFAULT_CODE_GRAMMAR: SupportedTextSplitterLanguage = 'python';

const DOCUMENT_EXTENSIONS = new Map<string, DocumentFormat>([
  ['.pdf', { kind: 'pdf' }],
  ['.md', { kind: 'markdown' }],
  ['.markdown', { kind: 'markdown' }],
  ['.html', { kind: 'html' }],
  ['.htm', { kind: 'html' }],
  ['.txt', { kind: 'text' }],
]);

/**
 * Source-code extensions. `null` means the extension is recognised as code
 * but the splitter has no grammar for it.
 */
const CODE_EXTENSIONS = new Map<string, SupportedTextSplitterLanguage | null>([
  ['.py', 'python'],
  ['.js', 'js'],
  ['.ts', 'js'],
  ['.java', 'java'],
  ['.cs', null],
  ['.cpp', 'cpp'],
  ['.c', 'cpp'],
  ['.h', 'cpp'],
  ['.hpp', 'cpp'],
  ['.go', 'go'],
  ['.rb', 'ruby'],
  ['.php', 'php'],
  ['.swift', 'swift'],
  ['.kt', null],
  ['.scala', 'scala'],
  ['.rs', 'rust'],
]);

export function extensionOf(filePath: string): string {
  return path.extname(filePath).toLowerCase();
}

/**
 * @returns the format for the file's extension, or null when unsupported
 */
export function detectFormat(filePath: string): DocumentFormat | null {
  const extension = extensionOf(filePath);

  const documentFormat = DOCUMENT_EXTENSIONS.get(extension);
  if (documentFormat) {
    return documentFormat;
  }

  if (CODE_EXTENSIONS.has(extension)) {
    return {
      kind: 'code',
      language: CODE_EXTENSIONS.get(extension) ?? DEFAULT_CODE_GRAMMAR,
    };
  }

  return null;
}

export function describeFormat(format: DocumentFormat): string {
  return format.kind === 'code' ? `code (${format.language})` : format.kind;
}
