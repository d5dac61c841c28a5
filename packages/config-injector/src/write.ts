import { mkdirSync, renameSync, rmSync, writeFileSync } from 'node:fs';
import { basename, dirname, join } from 'node:path';
import { ConfigError, errorMessage } from './lib/errors';

/**
 * Replace a file atomically: write a sibling temp file, then rename over the
 * target. Readers watching the path never see a partial config.
 */
export function writeFileAtomic(filePath: string, content: string, mode = 0o600): void {
  const dir = dirname(filePath);
  const tempPath = join(dir, `.${basename(filePath)}.${process.pid}.tmp`);

  try {
    mkdirSync(dir, { recursive: true });
    writeFileSync(tempPath, content, { encoding: 'utf-8', mode });
    renameSync(tempPath, filePath);
  } catch (err) {
    rmSync(tempPath, { force: true });
    throw new ConfigError(`Failed to write ${filePath}: ${errorMessage(err)}`, 'WRITE_FAILED', {
      path: filePath,
    });
  }
}
