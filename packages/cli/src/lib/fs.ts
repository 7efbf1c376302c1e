import { readFile } from "fs/promises";

type NodeError = Error & { code?: string };

export function isNodeError(error: unknown): error is NodeError {
  return (
    error instanceof Error && typeof (error as NodeError).code === "string"
  );
}

/**
 * Reads a UTF-8 text file, returning null when it does not exist.
 */
export async function readTextFile(path: string): Promise<string | null> {
  try {
    return await readFile(path, "utf8");
  } catch (error) {
    if (isNodeError(error) && error.code === "ENOENT") {
      return null;
    }
    throw error;
  }
}

/**
 * Reads a registry file that has to exist.
 */
export async function readRegistryFile(path: string): Promise<string> {
  const text = await readTextFile(path);
  if (text === null) {
    throw new Error(`Registry file not found: ${path}`);
  }
  return text;
}
