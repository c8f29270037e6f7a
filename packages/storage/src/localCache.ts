import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';

import { isMissingFileError } from '@pinrelay/shared';

/** Content-addressed byte cache: one `<id>.dat` file per content id. */
export class LocalContentCache {
  constructor(readonly dir: string) {}

  pathFor(contentId: string): string {
    return join(this.dir, `${contentId}.dat`);
  }

  async write(contentId: string, bytes: Uint8Array): Promise<string> {
    const path = this.pathFor(contentId);
    await mkdir(this.dir, { recursive: true });
    await writeFile(path, bytes);
    return path;
  }

  async read(contentId: string): Promise<Uint8Array | null> {
    try {
      return new Uint8Array(await readFile(this.pathFor(contentId)));
    } catch (err) {
      if (isMissingFileError(err)) return null;
      throw err;
    }
  }
}
