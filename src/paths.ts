import fs from "node:fs/promises";

export function sanitizeName(input: string): string {
  const safe = input
    .toLowerCase()
    .replace(/[^a-z0-9._-]+/g, "-")
    .replace(/-+/g, "-")
    .replace(/^-|-$/g, "")
    .slice(0, 80);
  if (!safe) {
    throw new Error("name cannot be empty after sanitization");
  }
  return safe;
}

export async function ensureDir(dirPath: string): Promise<void> {
  await fs.mkdir(dirPath, { recursive: true });
}

export function toPosixRemotePath(...parts: string[]): string {
  const cleaned = parts
    .filter((part) => part.trim().length > 0)
    .map((part) => part.replace(/\\/g, "/"));
  const joined = cleaned.join("/").replace(/\/+/g, "/");
  return joined;
}

export function timestampSlug(date: Date): string {
  const y = date.getUTCFullYear();
  const m = String(date.getUTCMonth() + 1).padStart(2, "0");
  const day = String(date.getUTCDate()).padStart(2, "0");
  const hh = String(date.getUTCHours()).padStart(2, "0");
  const mm = String(date.getUTCMinutes()).padStart(2, "0");
  const ss = String(date.getUTCSeconds()).padStart(2, "0");
  const ms = String(date.getUTCMilliseconds()).padStart(3, "0");
  return `${y}${m}${day}-${hh}${mm}${ss}${ms}`;
}
