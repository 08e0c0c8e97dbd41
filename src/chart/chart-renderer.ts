import fs from 'fs';
import path from 'path';
import type { CycleReport, RenderContext, Renderer } from '../contracts';
import { log } from '../utils/logger';
import { errorMessage } from '../application/errors';
import { CHART_FILE, generateHTML } from './plot-html';

/**
 * Rewrites the HTML chart after every cycle. The page is written beside its
 * final name and renamed over it, so a reloading browser never sees half a file.
 */
export class ChartRenderer implements Renderer {
  readonly name = 'chart';
  readonly file: string;

  constructor(private readonly dir: string, fileName: string = CHART_FILE) {
    this.file = path.resolve(dir, fileName);
  }

  async render(report: CycleReport, ctx: RenderContext): Promise<void> {
    const html = generateHTML(report, ctx.spikes, ctx.refreshSec);
    const tmp = `${this.file}.tmp`;
    try {
      await fs.promises.mkdir(path.dirname(this.file), { recursive: true });
      await fs.promises.writeFile(tmp, html, 'utf8');
      await fs.promises.rename(tmp, this.file);
      log('DEBUG', 'CHART', 'written', { file: this.file, pairs: report.statuses.length, cycle: report.cycle });
    } catch (err) {
      log('ERROR', 'CHART', 'write failed', { file: this.file, error: errorMessage(err) });
    }
  }
}
