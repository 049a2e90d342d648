import { mkdtemp, rm, writeFile } from "fs/promises";
import os from "os";
import path from "path";

/**
 * Write a rendered manifest to a private temporary directory, hand its path to
 * `use`, and remove the directory on every exit path.
 */
export async function withManifestFile<T>(
  content: string,
  use: (manifestPath: string) => Promise<T>,
): Promise<T> {
  const dir = await mkdtemp(path.join(os.tmpdir(), "netdevice-manifest-"));
  try {
    const manifestPath = path.join(dir, "manifest.yaml");
    await writeFile(manifestPath, content, "utf-8");
    return await use(manifestPath);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}
