import { spawn } from 'child_process';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { createLogger } from './logger';

const log = createLogger('libreoffice');

/** LibreOffice filter names for `--convert-to`, keyed by target format. */
export const LIBREOFFICE_FILTERS: Record<string, string> = {
  doc: 'doc:MS Word 97',
  pdf: 'pdf:writer_pdf_Export',
  rtf: 'rtf:Rich Text Format',
  epub: 'epub:EPUB',
  odt: 'odt:writer8',
};

/** Converts `sourcePath` into `outputPath` in the given target format. */
export interface OfficeConverter {
  convert(sourcePath: string, format: string, outputPath: string): Promise<void>;
}

/**
 * Runs `soffice --headless --convert-to` in a scratch directory and moves the result
 * into place. Each call gets its own user profile so parallel conversions do not
 * fight over LibreOffice's profile lock.
 */
export class LibreOfficeRunner implements OfficeConverter {
  constructor(
    private readonly _command: string,
    private readonly _timeoutMs: number,
  ) {}

  async convert(sourcePath: string, format: string, outputPath: string): Promise<void> {
    const filter = LIBREOFFICE_FILTERS[format];
    if (!filter) throw new Error(`LibreOffice cannot produce ${format}`);

    const workDir = fs.mkdtempSync(path.join(os.tmpdir(), 'docx-mcp-convert-'));
    try {
      const profile = `file://${path.join(workDir, 'profile').replace(/\\/g, '/')}`;
      await this.run([
        `-env:UserInstallation=${profile}`,
        '--headless',
        '--convert-to', filter,
        '--outdir', workDir,
        sourcePath,
      ]);

      const produced = path.join(workDir, `${path.parse(sourcePath).name}.${format}`);
      if (!fs.existsSync(produced)) {
        throw new Error(`LibreOffice finished without producing ${path.basename(produced)}`);
      }
      fs.copyFileSync(produced, outputPath);
    } finally {
      fs.rmSync(workDir, { recursive: true, force: true });
    }
  }

  private run(args: string[]): Promise<void> {
    log.debug(`${this._command} ${args.join(' ')}`);
    return new Promise((resolve, reject) => {
      const child = spawn(this._command, args, { stdio: ['ignore', 'pipe', 'pipe'] });
      let output = '';
      child.stdout.on('data', chunk => { output += String(chunk); });
      child.stderr.on('data', chunk => { output += String(chunk); });

      const timer = setTimeout(() => {
        child.kill('SIGKILL');
        reject(new Error(`LibreOffice conversion timed out after ${this._timeoutMs} ms`));
      }, this._timeoutMs);

      child.on('error', err => {
        clearTimeout(timer);
        reject(new Error(`Failed to start LibreOffice (${this._command}): ${err.message}`));
      });
      child.on('close', code => {
        clearTimeout(timer);
        if (code === 0) {
          resolve();
        } else {
          reject(new Error(output.trim() || `LibreOffice convert failed (exit ${code})`));
        }
      });
    });
  }
}
