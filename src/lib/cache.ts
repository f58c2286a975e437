import { mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import type { VersionedData } from "./VersionedData";

export async function readCache<T>(
  path: string,
): Promise<VersionedData<T> | null> {
  let text: string;
  try {
    text = await readFile(path, "utf-8");
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") {
      return null;
    }
    throw err;
  }
  return JSON.parse(text);
}

export async function writeCache<T>(path: string, data: VersionedData<T>) {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, JSON.stringify(data, null, 2));
}
