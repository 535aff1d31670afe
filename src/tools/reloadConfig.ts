import type { ConfigChanges } from "../config.js";
import type { DatabaseManager } from "../db.js";

/**
 * Re-read the configuration file. A file that fails validation leaves the
 * running configuration untouched.
 */
export async function reloadConfig(manager: DatabaseManager, path?: string): Promise<ConfigChanges> {
  const changes = await manager.reload(path);
  console.error(
    `[sqlgate] Reloaded config: ${changes.added.length} added, ${changes.removed.length} removed, ${changes.modified.length} modified`
  );
  return changes;
}

export function formatConfigChanges(changes: ConfigChanges): string {
  const lines: string[] = [];
  if (changes.added.length > 0) lines.push(`Added: ${changes.added.join(", ")}`);
  if (changes.removed.length > 0) lines.push(`Removed: ${changes.removed.join(", ")}`);
  if (changes.modified.length > 0) lines.push(`Modified: ${changes.modified.join(", ")}`);
  return lines.length > 0 ? lines.join("\n") : "No changes detected";
}
