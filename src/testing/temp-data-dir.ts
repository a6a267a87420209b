import { mkdtemp, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';

export async function createTempDataDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), 'registros-test-'));
}

export async function removeTempDataDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}
