/**
 * PDF renderer backed by the wkhtmltopdf command-line tool
 *
 * Markup goes in on stdin, the PDF comes back on stdout. A non-zero exit,
 * a failed spawn or a timeout raises an ExternalToolError carrying whatever
 * the tool wrote to stderr.
 */
import { spawn, ChildProcess } from 'child_process';
import { ExternalToolError } from '../errors';
import { createLogger } from '../utils/logger';

const logger = createLogger('RENDER');

const TOOL_NAME = 'wkhtmltopdf';

/** Stderr kept for diagnostics is capped so a chatty tool cannot grow memory */
const MAX_DIAGNOSTIC_CHARS = 4000;

export interface HtmlRenderer {
  render(html: string): Promise<Buffer>;
}

export interface PdfRendererOptions {
  binaryPath?: string;
  timeoutMs?: number;
  extraArgs?: string[];
}

export class PdfRenderer implements HtmlRenderer {
  private readonly binaryPath: string;
  private readonly timeoutMs: number;
  private readonly extraArgs: string[];

  constructor(options: PdfRendererOptions = {}) {
    this.binaryPath = options.binaryPath || TOOL_NAME;
    this.timeoutMs = options.timeoutMs || 60000;
    this.extraArgs = options.extraArgs || ['--encoding', 'utf-8'];
  }

  /**
   * Render HTML to PDF
   * @returns Raw PDF bytes
   */
  render(html: string): Promise<Buffer> {
    const args = ['--quiet', ...this.extraArgs, '-', '-'];
    const startTime = Date.now();

    logger.debug(`Spawning ${this.binaryPath} ${args.join(' ')}`);

    return new Promise((resolve, reject) => {
      let settled = false;
      const stdout: Buffer[] = [];
      let stderr = '';

      const finish = (error: ExternalToolError | null, pdf?: Buffer): void => {
        if (settled) return;
        settled = true;
        clearTimeout(timeoutHandle);
        if (error) reject(error);
        else resolve(pdf ?? Buffer.alloc(0));
      };

      const child: ChildProcess = spawn(this.binaryPath, args, {
        stdio: ['pipe', 'pipe', 'pipe']
      });

      const timeoutHandle = setTimeout(() => {
        logger.warn(`Timeout reached after ${this.timeoutMs}ms, killing renderer`);
        child.kill('SIGKILL');
        finish(new ExternalToolError(TOOL_NAME, `timed out after ${this.timeoutMs}ms`, trimDiagnostic(stderr)));
      }, this.timeoutMs);

      child.stdout?.on('data', (data: Buffer) => {
        stdout.push(data);
      });

      child.stderr?.on('data', (data: Buffer) => {
        if (stderr.length < MAX_DIAGNOSTIC_CHARS) {
          stderr += data.toString();
        }
      });

      child.on('error', (error: Error) => {
        logger.error('Failed to spawn renderer', error);
        finish(new ExternalToolError(TOOL_NAME, `failed to start: ${error.message}`));
      });

      child.on('close', (code: number | null) => {
        const duration = Date.now() - startTime;
        if (code !== 0) {
          logger.error(`Renderer exited with code ${code} after ${duration}ms`);
          finish(new ExternalToolError(TOOL_NAME, `exited with code ${code}`, trimDiagnostic(stderr)));
          return;
        }

        const pdf = Buffer.concat(stdout);
        if (pdf.length === 0) {
          finish(new ExternalToolError(TOOL_NAME, 'produced no output', trimDiagnostic(stderr)));
          return;
        }

        logger.debug('Renderer finished', { bytes: pdf.length, durationMs: duration });
        finish(null, pdf);
      });

      // EPIPE when the tool dies before reading all input; 'close' reports the real failure
      child.stdin?.on('error', (error: Error) => {
        logger.debug('Renderer stdin closed early', { error: error.message });
      });
      child.stdin?.end(html, 'utf8');
    });
  }
}

function trimDiagnostic(stderr: string): string {
  return stderr.trim().slice(0, MAX_DIAGNOSTIC_CHARS);
}
