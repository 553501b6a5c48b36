import * as fs from "node:fs/promises";
import * as path from "node:path";

/** Write a string to a file, creating directories as needed */
export async function writeFile(filePath: string, content: string | Buffer): Promise<void> {
  const dir = path.dirname(filePath);
  await fs.mkdir(dir, { recursive: true });
  await fs.writeFile(filePath, content);
}
