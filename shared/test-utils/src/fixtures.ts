import { mkdtemp, mkdir, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { dirname, join } from "path";

/**
 * A throwaway directory populated with files, removed by `cleanup`.
 */
export interface TempSite {
  root: string;
  cleanup: () => Promise<void>;
}

/**
 * Write `files` (relative path -> contents) into a fresh temp directory.
 */
export async function createTempSite(
  files: Record<string, string | Uint8Array>,
): Promise<TempSite> {
  const root = await mkdtemp(join(tmpdir(), "coi-serve-"));

  for (const [relativePath, contents] of Object.entries(files)) {
    const target = join(root, relativePath);
    await mkdir(dirname(target), { recursive: true });
    await writeFile(target, contents);
  }

  return {
    root,
    cleanup: () => rm(root, { recursive: true, force: true }),
  };
}
