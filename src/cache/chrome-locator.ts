import { access, constants } from "fs/promises";
import { delimiter, join } from "path";

export type ChromeLocatorOptions = {
  overridePath?: string;
  env?: NodeJS.ProcessEnv;
  platform?: NodeJS.Platform;
};

async function isExecutable(path: string): Promise<boolean> {
  try {
    await access(path, process.platform === "win32" ? constants.F_OK : constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

function installCandidates(platform: NodeJS.Platform, env: NodeJS.ProcessEnv): string[] {
  if (platform === "darwin") {
    return [
      "/Applications/Google Chrome.app/Contents/MacOS/Google Chrome",
      "/Applications/Chromium.app/Contents/MacOS/Chromium",
      "/Applications/Google Chrome Canary.app/Contents/MacOS/Google Chrome Canary"
    ];
  }

  if (platform === "win32") {
    const programFiles = env.PROGRAMFILES || "C:\\Program Files";
    const programFilesX86 = env["PROGRAMFILES(X86)"] || "C:\\Program Files (x86)";
    const localAppData = env.LOCALAPPDATA || "";

    return [
      join(programFiles, "Google", "Chrome", "Application", "chrome.exe"),
      join(programFilesX86, "Google", "Chrome", "Application", "chrome.exe"),
      join(localAppData, "Google", "Chrome", "Application", "chrome.exe")
    ];
  }

  if (platform !== "linux") {
    return [];
  }

  return [
    "/usr/bin/google-chrome",
    "/usr/bin/google-chrome-stable",
    "/usr/bin/chromium",
    "/usr/bin/chromium-browser"
  ];
}

const PATH_BINARIES = [
  "google-chrome",
  "google-chrome-stable",
  "chromium",
  "chromium-browser"
];

async function findInPath(binary: string, env: NodeJS.ProcessEnv, platform: NodeJS.Platform): Promise<string | null> {
  const pathValue = env.PATH;
  if (!pathValue) return null;

  const names = platform === "win32" ? [binary, `${binary}.exe`] : [binary];
  for (const dir of pathValue.split(delimiter)) {
    if (!dir) continue;
    for (const name of names) {
      const fullPath = join(dir, name);
      if (await isExecutable(fullPath)) return fullPath;
    }
  }

  return null;
}

/**
 * Resolves the browser binary: explicit override, then `CDP_CHROME_PATH`, then
 * well-known install locations, then `PATH`.
 */
export async function findChromeExecutable(options: ChromeLocatorOptions = {}): Promise<string | null> {
  const env = options.env ?? process.env;
  const platform = options.platform ?? process.platform;

  for (const explicit of [options.overridePath, env.CDP_CHROME_PATH?.trim()]) {
    if (explicit && await isExecutable(explicit)) {
      return explicit;
    }
  }

  for (const candidate of installCandidates(platform, env)) {
    if (await isExecutable(candidate)) return candidate;
  }

  for (const binary of PATH_BINARIES) {
    const found = await findInPath(binary, env, platform);
    if (found) return found;
  }

  return null;
}
