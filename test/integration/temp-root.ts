import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";

/** A fresh folder under the OS temp dir, and the function that removes it. */
export async function makeTempRoot(label: string): Promise<{ root: string; cleanup: () => Promise<void> }> {
  const root = await fs.mkdtemp(path.join(os.tmpdir(), `vaultfile-${label}-`));
  return {
    root,
    cleanup: () => fs.rm(root, { recursive: true, force: true }),
  };
}
