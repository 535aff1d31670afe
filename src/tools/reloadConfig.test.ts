import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { loadConfig } from "../config.js";
import { DatabaseManager } from "../db.js";
import { ConfigurationError } from "../errors.js";
import { formatConfigChanges, reloadConfig } from "./reloadConfig.js";

describe("reloadConfig", () => {
  let tmpDir: string;
  let file: string;

  const write = (databases: Record<string, unknown>) =>
    fs.writeFileSync(file, JSON.stringify({ databases }));

  beforeEach(() => {
    vi.spyOn(console, "error").mockImplementation(() => {});
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "sqlgate-reload-test-"));
    file = path.join(tmpDir, "sqlgate.json");
    write({
      app: { type: "sqlite", database: "/tmp/app.db" },
      old: { type: "sqlite", database: "/tmp/old.db" },
    });
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("swaps in the new file and reports the differences", async () => {
    const manager = new DatabaseManager(loadConfig(file, {}));
    write({
      app: { type: "sqlite", database: "/tmp/app-v2.db" },
      fresh: { type: "sqlite", database: "/tmp/fresh.db" },
    });

    const changes = await reloadConfig(manager);
    expect(changes).toEqual({ added: ["fresh"], removed: ["old"], modified: ["app"] });
    expect(manager.databaseNames()).toEqual(["app", "fresh"]);
  });

  it("keeps the running configuration when the file is invalid", async () => {
    const manager = new DatabaseManager(loadConfig(file, {}));
    write({ app: { type: "oracle", host: "db" } });

    await expect(reloadConfig(manager)).rejects.toThrow(ConfigurationError);
    expect(manager.databaseNames()).toEqual(["app", "old"]);
  });
});

describe("formatConfigChanges", () => {
  it("lists each kind of change", () => {
    expect(formatConfigChanges({ added: ["a", "b"], removed: [], modified: ["c"] })).toBe(
      "Added: a, b\nModified: c"
    );
  });

  it("says when nothing changed", () => {
    expect(formatConfigChanges({ added: [], removed: [], modified: [] })).toBe(
      "No changes detected"
    );
  });
});
