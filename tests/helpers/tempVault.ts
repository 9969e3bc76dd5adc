import { promises as fs } from "node:fs";
import path from "node:path";

export async function createTempVault(
  name: string,
  files: Record<string, string | Buffer>,
): Promise<string> {
  const root = path.resolve(`.tmp-tests-${name}`);
  await fs.rm(root, { recursive: true, force: true });
  await fs.mkdir(root, { recursive: true });

  for (const [relativePath, content] of Object.entries(files)) {
    const target = path.join(root, relativePath);
    await fs.mkdir(path.dirname(target), { recursive: true });
    await fs.writeFile(target, content);
  }
  return root;
}

export async function removeTempVault(root: string): Promise<void> {
  await fs.rm(root, { recursive: true, force: true });
}
