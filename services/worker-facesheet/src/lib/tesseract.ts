/**
 * Tesseract Token Source
 *
 * Runs the Tesseract CLI against a page image and turns its TSV output
 * into tokens. The engine binary is a constructor argument.
 */

import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import {
  logger,
  config,
  ocrDurationHistogram,
  tokensFromOcrData,
  TokenDataError,
  OcrError,
  type OcrData,
  type Token,
  type TokenSource,
} from '@facesheet/shared';

const execFileAsync = promisify(execFile);

const NUMERIC_COLUMNS = ['left', 'top', 'width', 'height'] as const;

/**
 * Parse Tesseract TSV output (`tesseract <image> stdout tsv`) into the
 * parallel-array shape. Rows whose geometry is not numeric are skipped.
 *
 * @throws TokenDataError if the header lacks a required column
 */
export function parseTesseractTsv(tsv: string): OcrData {
  const lines = tsv.split(/\r?\n/).filter(line => line.length > 0);
  const data: OcrData = { text: [], left: [], top: [], width: [], height: [], conf: [] };

  if (lines.length === 0) return data;

  const header = lines[0].split('\t');
  const columnIndex = (name: string): number => {
    const index = header.indexOf(name);
    if (index === -1) {
      throw new TokenDataError(`Tesseract TSV header is missing column "${name}"`);
    }
    return index;
  };

  const indices = {
    left: columnIndex('left'),
    top: columnIndex('top'),
    width: columnIndex('width'),
    height: columnIndex('height'),
    conf: columnIndex('conf'),
    text: columnIndex('text'),
  };

  for (const line of lines.slice(1)) {
    const cells = line.split('\t');
    if (cells.length < indices.text) continue;

    const geometry = NUMERIC_COLUMNS.map(column => Number(cells[indices[column]]));
    if (geometry.some(value => !Number.isFinite(value))) continue;

    const [left, top, width, height] = geometry;
    data.left.push(left);
    data.top.push(top);
    data.width.push(width);
    data.height.push(height);
    data.conf.push(cells[indices.conf] ?? '-1');
    data.text.push(cells[indices.text] ?? '');
  }

  return data;
}

export interface TesseractOptions {
  /** Path to the tesseract executable */
  tesseractPath?: string;
  /** Tesseract language code(s), e.g. "eng" */
  language?: string;
  timeoutMs?: number;
}

export class TesseractTokenSource implements TokenSource {
  readonly name = 'tesseract';
  private readonly tesseractPath: string;
  private readonly language: string;
  private readonly timeoutMs: number;

  constructor(options: TesseractOptions = {}) {
    this.tesseractPath = options.tesseractPath ?? config.tesseractPath;
    this.language = options.language ?? config.tesseractLanguage;
    this.timeoutMs = options.timeoutMs ?? config.ocrTimeoutMs;
  }

  async readTokens(imagePath: string): Promise<Token[]> {
    const startTime = Date.now();

    logger.info('Running OCR', {
      engine: this.name,
      imagePath,
      language: this.language,
    });

    let stdout: string;
    try {
      const output = await execFileAsync(
        this.tesseractPath,
        [imagePath, 'stdout', '-l', this.language, 'tsv'],
        { timeout: this.timeoutMs, maxBuffer: 32 * 1024 * 1024 }
      );
      stdout = output.stdout;
    } catch (error) {
      ocrDurationHistogram.observe(
        { engine: this.name, status: 'failed' },
        (Date.now() - startTime) / 1000
      );
      throw new OcrError(
        `Tesseract failed for ${imagePath}: ${error instanceof Error ? error.message : String(error)}`,
        imagePath,
        { cause: error }
      );
    }

    const tokens = tokensFromOcrData(parseTesseractTsv(stdout));
    const duration = (Date.now() - startTime) / 1000;
    ocrDurationHistogram.observe({ engine: this.name, status: 'success' }, duration);

    logger.info('OCR complete', {
      engine: this.name,
      token_count: tokens.length,
      duration_ms: Math.round(duration * 1000),
    });

    return tokens;
  }
}
