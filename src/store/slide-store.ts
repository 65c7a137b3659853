import { mkdir, rename, stat, writeFile } from 'node:fs/promises';
import { basename, dirname, extname, join, resolve } from 'node:path';

/**
 * Where rendered slides live: `<outputRoot>/<stem>_slides/<stem>_slide.png`.
 */
export class SlideStore {
  readonly outputRoot: string;

  constructor(outputRoot: string) {
    this.outputRoot = resolve(outputRoot);
  }

  pathFor(htmlPath: string): string {
    const stem = basename(htmlPath, extname(htmlPath));
    return join(this.outputRoot, `${stem}_slides`, `${stem}_slide.png`);
  }

  async exists(outputPath: string): Promise<boolean> {
    try {
      return (await stat(outputPath)).isFile();
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return false;
      throw err;
    }
  }

  /** Writes to a temp file beside the target, then renames into place. */
  async save(outputPath: string, png: Uint8Array): Promise<void> {
    await mkdir(dirname(outputPath), { recursive: true });
    const tmp = `${outputPath}.${process.pid}.tmp`;
    await writeFile(tmp, png);
    await rename(tmp, outputPath);
  }
}
