import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import * as iconv from 'iconv-lite';
import { TextParser, normalizeText } from './text.parser';

describe('TextParser', () => {
  let workDir: string;
  const parser = new TextParser();

  beforeEach(async () => {
    workDir = await fs.mkdtemp(path.join(os.tmpdir(), 'text-parser-spec-'));
  });

  afterEach(async () => {
    await fs.rm(workDir, { recursive: true, force: true });
  });

  it('decodes a Latin-1 file through encoding detection', async () => {
    const text = 'Die Größe der Äpfel überrascht. Müller aß süße Brötchen.\n'.repeat(
      20,
    );
    const filePath = path.join(workDir, 'notes.txt');
    await fs.writeFile(filePath, iconv.encode(text, 'latin1'));

    await expect(parser.parse(filePath)).resolves.toBe(text);
  });
});

describe('normalizeText', () => {
  it('turns lone carriage returns into newlines', () => {
    expect(normalizeText('a\rb\r\nc')).toBe('a\nb\nc');
  });
});
