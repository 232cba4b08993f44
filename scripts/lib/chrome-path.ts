import { existsSync } from "node:fs";
import { spawnSync } from "node:child_process";

export type ChromeLookup = {
  env?: NodeJS.ProcessEnv;
  platform?: NodeJS.Platform;
  exists?: (path: string) => boolean;
  which?: (names: string[]) => string[];
};

export const CHROME_PATH_ENV_KEYS = ["BROADSHEET_CHROME_PATH", "CHROME_PATH", "PUPPETEER_EXECUTABLE_PATH"] as const;

function unique<T>(items: T[]): T[] {
  return Array.from(new Set(items));
}

function fileExists(path: string): boolean {
  try {
    return Boolean(path) && existsSync(path);
  } catch {
    return false;
  }
}

function commandOutputLines(command: string, args: string[]): string[] {
  const res = spawnSync(command, args, { encoding: "utf-8" });
  if (res.error || res.status !== 0) return [];
  return String(res.stdout ?? "")
    .split(/\r?\n/g)
    .map((s) => s.trim())
    .filter(Boolean);
}

function whichAll(names: string[], platform: NodeJS.Platform): string[] {
  const finder = platform === "win32" ? "where.exe" : "which";
  return names.flatMap((name) => commandOutputLines(finder, [name]));
}

function defaultInstallPaths(env: NodeJS.ProcessEnv, platform: NodeJS.Platform): string[] {
  if (platform === "win32") {
    const roots = [env.ProgramFiles, env["ProgramFiles(x86)"], env.LocalAppData].filter(
      (x): x is string => Boolean(x)
    );
    return roots.flatMap((root) => [
      `${root}\\Google\\Chrome\\Application\\chrome.exe`,
      `${root}\\Microsoft\\Edge\\Application\\msedge.exe`
    ]);
  }

  if (platform === "darwin") {
    return [
      "/Applications/Google Chrome.app/Contents/MacOS/Google Chrome",
      "/Applications/Chromium.app/Contents/MacOS/Chromium",
      "/Applications/Microsoft Edge.app/Contents/MacOS/Microsoft Edge"
    ];
  }

  return [
    "/usr/bin/chromium",
    "/usr/bin/chromium-browser",
    "/usr/bin/google-chrome",
    "/usr/bin/google-chrome-stable",
    "/snap/bin/chromium"
  ];
}

/** Environment overrides first, then `PATH`, then the usual install locations. */
export function findChromePath(lookup: ChromeLookup = {}): string | null {
  const env = lookup.env ?? process.env;
  const platform = lookup.platform ?? process.platform;
  const exists = lookup.exists ?? fileExists;
  const which = lookup.which ?? ((names: string[]) => whichAll(names, platform));

  const fromEnv = CHROME_PATH_ENV_KEYS.map((key) => env[key]?.trim()).filter((x): x is string => Boolean(x));
  for (const p of unique(fromEnv)) {
    if (exists(p)) return p;
  }

  const onPath = which(["chromium", "chromium-browser", "google-chrome", "google-chrome-stable", "chrome", "msedge"]);
  for (const p of unique(onPath)) {
    if (exists(p)) return p;
  }

  for (const p of defaultInstallPaths(env, platform)) {
    if (exists(p)) return p;
  }

  return null;
}
