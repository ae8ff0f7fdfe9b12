import * as fs from 'node:fs';
import * as path from 'node:path';
import { randomUUID } from 'node:crypto';

/**
 * Write `bytes` to `finalPath` so readers only ever see the old file or the
 * complete new one. The data goes to a temp file in the same directory and is
 * renamed into place; the temp file is removed on every failure path.
 * Concurrent publishes to one path are last-writer-wins.
 */
export async function publishAtomic(finalPath: string, bytes: Uint8Array | string): Promise<void> {
  const dir = path.dirname(finalPath);
  await fs.promises.mkdir(dir, { recursive: true, mode: 0o755 });

  const tmpPath = path.join(dir, `.${path.basename(finalPath)}.${randomUUID()}.tmp`);
  let published = false;

  try {
    const handle = await fs.promises.open(tmpPath, 'wx', 0o644);
    try {
      await handle.writeFile(bytes);
      await handle.sync();
    } finally {
      await handle.close();
    }
    await fs.promises.rename(tmpPath, finalPath);
    published = true;
  } finally {
    if (!published) {
      await fs.promises.rm(tmpPath, { force: true });
    }
  }
}
