import fs from 'fs/promises';
import path from 'path';

let tempCounter = 0;

/**
 * Write via a temp file in the target directory followed by a rename, so a
 * concurrent reader sees either the old file or the complete new one.
 */
export async function writeFileAtomic(target: string, data: string): Promise<void> {
  const dir = path.dirname(target);
  await fs.mkdir(dir, { recursive: true });
  tempCounter += 1;
  const temp = path.join(dir, `.${path.basename(target)}.${process.pid}.${tempCounter}.tmp`);
  try {
    await fs.writeFile(temp, data, 'utf-8');
    await fs.rename(temp, target);
  } catch (error) {
    await fs.rm(temp, { force: true });
    throw error;
  }
}
