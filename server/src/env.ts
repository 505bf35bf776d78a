import { existsSync, readFileSync } from "node:fs";
import { dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";

const baseDir = dirname(fileURLToPath(import.meta.url));
const candidates = [
  process.env.RELAY_ENV_PATH,
  resolve(baseDir, "..", ".env.local"),
  resolve(baseDir, "..", ".env"),
];

for (const candidate of candidates) {
  if (!candidate) {
    continue;
  }
  if (existsSync(candidate)) {
    applyEnv(readFileSync(candidate, "utf8"));
    break;
  }
}

function applyEnv(contents: string) {
  for (const line of contents.split(/\r?\n/u)) {
    const parsed = parseEnvLine(line);
    // real environment wins over the file
    if (!parsed || process.env[parsed.key] !== undefined) {
      continue;
    }
    process.env[parsed.key] = parsed.value;
  }
}

export function parseEnvLine(line: string): { key: string; value: string } | null {
  const trimmed = line.trim();
  if (!trimmed || trimmed.startsWith("#")) {
    return null;
  }
  const sanitized = trimmed.startsWith("export ") ? trimmed.slice(7) : trimmed;
  const equalsIndex = sanitized.indexOf("=");
  if (equalsIndex <= 0) {
    return null;
  }
  const key = sanitized.slice(0, equalsIndex).trim();
  const value = stripQuotes(sanitized.slice(equalsIndex + 1).trim());
  return key ? { key, value } : null;
}

function stripQuotes(value: string): string {
  if (
    value.length >= 2 &&
    ((value.startsWith('"') && value.endsWith('"')) ||
      (value.startsWith("'") && value.endsWith("'")))
  ) {
    return value.slice(1, -1);
  }
  return value;
}
