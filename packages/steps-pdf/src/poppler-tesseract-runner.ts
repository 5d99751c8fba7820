import { spawn } from 'node:child_process';
import { mkdtemp, readdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ExtractionError, TimeoutError, createSafeLogger, type Logger } from '@nfe-ledger/shared';
import type { OcrPageResult, OcrResult, OcrRunner, OcrRunnerConfig } from './types.js';

/**
 * Default configuration
 */
const DEFAULT_CONFIG: Required<Omit<OcrRunnerConfig, 'logger'>> = {
  language: 'por',
  dpi: 144,
  timeoutMs: 60000,
};

interface CommandOutput {
  stdout: string;
  stderr: string;
}

/**
 * Check whether a command can be spawned and exits cleanly.
 */
export async function isCommandAvailable(command: string, args: string[]): Promise<boolean> {
  return new Promise((resolve) => {
    const proc = spawn(command, args, {
      stdio: 'ignore',
    });

    proc.on('close', (code) => {
      resolve(code === 0);
    });

    proc.on('error', () => {
      resolve(false);
    });
  });
}

/**
 * OCR runner backed by the Poppler and Tesseract command-line tools.
 *
 * Each page is rasterized to PNG with `pdftoppm` in a private temporary
 * directory, then read with `tesseract <page.png> stdout -l <language>`.
 * The directory is removed whatever the outcome.
 *
 * @example
 * ```typescript
 * const runner = new PopplerTesseractRunner({ language: 'por' });
 * const { text } = await runner.recognize(pdfBytes);
 * ```
 */
export class PopplerTesseractRunner implements OcrRunner {
  private readonly config: Required<Omit<OcrRunnerConfig, 'logger'>>;
  private readonly logger: Logger;

  constructor(config: OcrRunnerConfig = {}) {
    this.config = {
      language: config.language ?? DEFAULT_CONFIG.language,
      dpi: config.dpi ?? DEFAULT_CONFIG.dpi,
      timeoutMs: config.timeoutMs ?? DEFAULT_CONFIG.timeoutMs,
    };
    this.logger = config.logger ?? createSafeLogger({ prefix: 'nfe-ledger:ocr' });
  }

  async recognize(pdf: Uint8Array): Promise<OcrResult> {
    const startTime = Date.now();
    const workDir = await mkdtemp(join(tmpdir(), 'nfe-ledger-ocr-'));

    try {
      const inputPath = join(workDir, 'input.pdf');
      await writeFile(inputPath, pdf);

      await this.run('pdftoppm', ['-png', '-r', String(this.config.dpi), inputPath, join(workDir, 'page')]);

      const images = (await readdir(workDir))
        .filter((file) => file.endsWith('.png'))
        .sort((a, b) => a.localeCompare(b, undefined, { numeric: true }));
      if (images.length === 0) {
        throw new ExtractionError('OCR rasterization produced no page images', 'ocr', { reason: 'failed' });
      }

      const pages: OcrPageResult[] = [];
      for (const [index, image] of images.entries()) {
        const { stdout } = await this.run('tesseract', [
          join(workDir, image),
          'stdout',
          '-l',
          this.config.language,
        ]);
        pages.push({ page: index + 1, text: stdout.trim() });
      }

      const text = pages
        .map((page) => page.text)
        .filter((pageText) => pageText.length > 0)
        .join('\n')
        .trim();
      if (text.length === 0) {
        throw new ExtractionError('OCR returned no text', 'ocr', { reason: 'empty', pages: pages.length });
      }

      this.logger.debug('OCR completed', { pages: pages.length, characters: text.length });
      return { text, pages, durationMs: Date.now() - startTime };
    } finally {
      await rm(workDir, { recursive: true, force: true });
    }
  }

  async healthCheck(): Promise<boolean> {
    const [poppler, tesseract] = await Promise.all([
      isCommandAvailable('pdftoppm', ['-v']),
      isCommandAvailable('tesseract', ['--version']),
    ]);
    return poppler && tesseract;
  }

  private run(command: string, args: string[]): Promise<CommandOutput> {
    return new Promise((resolve, reject) => {
      let stdout = '';
      let stderr = '';

      const proc = spawn(command, args, {
        stdio: ['ignore', 'pipe', 'pipe'],
      });

      proc.stdout.on('data', (data: Buffer) => {
        stdout += data.toString('utf-8');
      });

      proc.stderr.on('data', (data: Buffer) => {
        stderr += data.toString('utf-8');
      });

      // Timeout handling
      const timeoutId = setTimeout(() => {
        proc.kill('SIGKILL');
        reject(
          new TimeoutError(`${command} timed out after ${String(this.config.timeoutMs)}ms`, this.config.timeoutMs, {
            stage: 'ocr',
            reason: 'timeout',
          }),
        );
      }, this.config.timeoutMs);

      proc.on('close', (code) => {
        clearTimeout(timeoutId);

        if (code !== 0) {
          reject(
            new ExtractionError(
              `${command} failed with exit code ${String(code ?? 'unknown')}: ${stderr.substring(0, 200)}`,
              'ocr',
              { reason: 'failed' },
            ),
          );
          return;
        }

        resolve({ stdout, stderr });
      });

      proc.on('error', (error: NodeJS.ErrnoException) => {
        clearTimeout(timeoutId);
        reject(
          error.code === 'ENOENT'
            ? new ExtractionError(`OCR engine unavailable: '${command}' is not installed`, 'ocr', {
                reason: 'unavailable',
              })
            : new ExtractionError(`Failed to spawn ${command}: ${error.message}`, 'ocr', { reason: 'failed' }),
        );
      });
    });
  }
}
