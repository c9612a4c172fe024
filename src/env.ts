import dotenv from "dotenv";
import fs from "node:fs";
import path from "node:path";

export const REPORTS_DIR_ENV = "TIMING_REPORTS_DIR";
export const FFMPEG_PATH_ENV = "FFMPEG_PATH";
export const DEFAULT_REPORTS_DIR = "reports";

function loadEnvFile(filePath: string): void {
  if (!fs.existsSync(filePath)) {
    return;
  }
  const parsed = dotenv.parse(fs.readFileSync(filePath, "utf-8"));
  for (const [key, value] of Object.entries(parsed)) {
    if (process.env[key] === undefined) {
      process.env[key] = value;
    }
  }
}

export function candidateEnvPaths(extraPaths?: string[]): string[] {
  const seen = new Set<string>();
  const add = (p: string): void => {
    seen.add(path.resolve(p));
  };

  for (const p of extraPaths ?? []) {
    add(p);
  }
  add(path.join(process.cwd(), ".env"));

  const packageRoot = path.resolve(__dirname, "..");
  add(path.join(packageRoot, ".env"));

  return Array.from(seen);
}

/**
 * Fill in unset variables from the first `.env` files found. Variables that
 * are already present in the environment always win.
 */
export function loadEnvironment(searchPaths?: string[]): void {
  for (const envPath of candidateEnvPaths(searchPaths)) {
    loadEnvFile(envPath);
  }
}

export function readEnv(name: string, searchPaths?: string[]): string | undefined {
  if (!process.env[name]) {
    loadEnvironment(searchPaths);
  }
  const value = process.env[name];
  return value ? value : undefined;
}

export function resolveReportsDir(explicit?: string, searchPaths?: string[]): string {
  return path.resolve(explicit ?? readEnv(REPORTS_DIR_ENV, searchPaths) ?? DEFAULT_REPORTS_DIR);
}
