import { resolve } from "path";

/** Repo root, whether the process runs from the root or from apps/web (next dev). */
export function getProjectRoot(cwd: string = process.cwd()): string {
  if (cwd.endsWith("apps\\web") || cwd.endsWith("apps/web")) {
    return resolve(cwd, "../..");
  }
  return cwd;
}
