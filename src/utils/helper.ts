import { lstat } from "node:fs/promises";
import os from "node:os";
import path from "node:path";

export function expandHome(p: string) {
  if (p.startsWith("~/")) return path.join(os.homedir(), p.slice(2));
  return p;
}

/** 路徑上是否有任何項目（包含壞掉的 symlink） */
export async function exists(p: string) {
  try {
    await lstat(p);
    return true;
  } catch {
    return false;
  }
}

/** 只接受十進位整數，`1.5`、`abc`、空字串都回傳 undefined */
export function parseInteger(v: number | string): number | undefined {
  if (typeof v === "number") return Number.isSafeInteger(v) ? v : undefined;
  const trimmed = v.trim();
  if (!/^[+-]?\d+$/.test(trimmed)) return undefined;
  const n = Number(trimmed);
  return Number.isSafeInteger(n) ? n : undefined;
}

export function errorMessage(e: unknown) {
  return e instanceof Error ? e.message : String(e);
}

export function hasErrorCode(e: unknown, code: string) {
  return e instanceof Error && "code" in e && e.code === code;
}
