import * as fsPromises from "node:fs/promises";

export interface FileSystem {
  readFile(path: string, encoding: "utf8"): Promise<string>;
  stat(path: string): Promise<{ isFile(): boolean }>;
}

export const nodeFileSystem: FileSystem = {
  readFile: (path, encoding) => fsPromises.readFile(path, encoding),
  stat: (path) => fsPromises.stat(path)
};

export function isNotFound(error: unknown): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    error.code === "ENOENT"
  );
}

export async function isFile(fs: FileSystem, path: string): Promise<boolean> {
  try {
    const stats = await fs.stat(path);
    return stats.isFile();
  } catch (error) {
    if (isNotFound(error)) {
      return false;
    }
    throw error;
  }
}
