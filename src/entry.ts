import { realpathSync } from "node:fs";
import { fileURLToPath } from "node:url";

// True when the module at `moduleUrl` is the script node was started with,
// including through an npm bin symlink
export function isEntryPoint(moduleUrl: string): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    return realpathSync(entry) === realpathSync(fileURLToPath(moduleUrl));
  } catch {
    return false;
  }
}
