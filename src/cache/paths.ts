import { mkdir, mkdtemp, rm } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";

const PROFILE_PREFIX = "cdp-pilot-profile-";

export function profileRoot(env: NodeJS.ProcessEnv = process.env): string {
  return env.CDP_PILOT_PROFILE_DIR ?? tmpdir();
}

/** Creates a fresh, empty user-data directory for one browser instance. */
export async function createProfileDir(port: number, env: NodeJS.ProcessEnv = process.env): Promise<string> {
  const root = profileRoot(env);
  await mkdir(root, { recursive: true });
  return await mkdtemp(join(root, `${PROFILE_PREFIX}${port}-`));
}

export async function removeProfileDir(path: string): Promise<void> {
  await rm(path, { recursive: true, force: true, maxRetries: 3, retryDelay: 100 });
}
