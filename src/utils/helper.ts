import { stat } from "node:fs/promises";
import os from "node:os";
import path from "node:path";

export function expandHome(p: string) {
  if (p.startsWith("~/")) return path.join(os.homedir(), p.slice(2));
  return p;
}

export async function exists(p: string) {
  try {
    await stat(p);
    return true;
  } catch {
    return false;
  }
}

export async function isDirectory(p: string) {
  try {
    return (await stat(p)).isDirectory();
  } catch {
    return false;
  }
}

export function errorMessage(error: unknown) {
  return error instanceof Error ? error.message : String(error);
}
