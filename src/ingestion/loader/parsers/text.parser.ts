/**
 * Text Parser
 * Reads Markdown, HTML, plain text and source files with LangChain's
 * TextLoader, falling back to encoding detection when the file is not UTF-8.
 */

import { Injectable, Logger } from '@nestjs/common';
import { TextLoader } from '@langchain/classic/document_loaders/fs/text';
import * as chardet from 'chardet';
import * as iconv from 'iconv-lite';
import * as fs from 'fs/promises';
import { CorruptedFileError } from '../../errors/ingestion-errors';
import { toError } from '../../../shared/errors/rag-error';

const REPLACEMENT_CHARACTER = '\uFFFD';

@Injectable()
export class TextParser {
  private readonly logger = new Logger(TextParser.name);

  /**
   * @returns file content with BOM removed and LF line endings
   * @throws CorruptedFileError if the file cannot be read or decoded
   */
  async parse(filePath: string): Promise<string> {
    let content: string;

    try {
      const documents = await new TextLoader(filePath).load();
      content = documents.map((doc) => doc.pageContent).join('\n');

      if (content.includes(REPLACEMENT_CHARACTER)) {
        this.logger.log(
          `File is not valid UTF-8, detecting encoding: ${filePath}`,
        );
        content = await this.decodeWithDetectedEncoding(filePath);
      }
    } catch (error) {
      throw new CorruptedFileError(
        filePath,
        'Failed to read text file',
        toError(error),
      );
    }

    return normalizeText(content);
  }

  private async decodeWithDetectedEncoding(filePath: string): Promise<string> {
    const buffer = await fs.readFile(filePath);
    const detected = chardet.detect(buffer);
    const encoding =
      detected && iconv.encodingExists(detected) ? detected : 'utf-8';

    this.logger.log(`Detected encoding: ${encoding} for file: ${filePath}`);

    return iconv.decode(buffer, encoding);
  }
}

/**
 * Strip a leading BOM and normalise CRLF/CR line endings to LF.
 */
export function normalizeText(content: string): string {
  const withoutBom =
    content.charCodeAt(0) === 0xfeff ? content.slice(1) : content;
  return withoutBom.replace(/\r\n?/g, '\n');
}
