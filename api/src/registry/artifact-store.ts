import { randomUUID } from 'node:crypto';
import { mkdir, readFile, readdir, rename, rm, writeFile } from 'node:fs/promises';
import { dirname, join, normalize, sep } from 'node:path';

// fs errors may come from another realm (jest's vm sandbox), so no instanceof
function isErrno(e: unknown, code: string): boolean {
  return typeof e === 'object' && e !== null && 'code' in e && e.code === code;
}

/**
 * JSON documents under a root directory, addressed by relative refs
 * ("PETR4/v3/model.json"). Writes go to a temp file and are renamed into
 * place, so a reader never sees a half-written document.
 */
export class FsArtifactStore {
  constructor(private readonly root: string) {}

  async writeJson(ref: string, value: unknown): Promise<void> {
    const target = this.resolve(ref);
    await mkdir(dirname(target), { recursive: true });
    const tmp = `${target}.${randomUUID()}.tmp`;
    try {
      await writeFile(tmp, `${JSON.stringify(value, null, 2)}\n`, 'utf8');
      await rename(tmp, target);
    } catch (e) {
      await rm(tmp, { force: true });
      throw e;
    }
  }

  /** Parsed document, or undefined when it does not exist. */
  async readJson(ref: string): Promise<unknown> {
    let text: string;
    try {
      text = await readFile(this.resolve(ref), 'utf8');
    } catch (e) {
      if (isErrno(e, 'ENOENT')) return undefined;
      throw e;
    }
    return JSON.parse(text);
  }

  /** Names of the sub-directories of `ref` (empty when it does not exist). */
  async listDirs(ref: string): Promise<string[]> {
    try {
      const entries = await readdir(this.resolve(ref), { withFileTypes: true });
      return entries.filter((e) => e.isDirectory()).map((e) => e.name);
    } catch (e) {
      if (isErrno(e, 'ENOENT')) return [];
      throw e;
    }
  }

  private resolve(ref: string): string {
    const rel = normalize(ref);
    if (rel.startsWith('..') || rel.startsWith(sep)) {
      throw new Error(`Artifact ref escapes the store: ${ref}`);
    }
    return join(this.root, rel);
  }
}
