import assert from "node:assert/strict";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import test from "node:test";

import {
  CONFIG_FILE_NAME,
  ConfigManager,
  DirectoryProvider,
} from "../source/config.ts";
import { ConfigError } from "../source/errors.ts";

// Helper to create and cleanup a temp directory
async function withTempDir<T>(fn: (dir: string) => Promise<T>) {
  const tmp = await fs.mkdtemp(path.join(os.tmpdir(), "prompt-path-test-"));
  try {
    return await fn(tmp);
  } finally {
    await fs.rm(tmp, { recursive: true, force: true });
  }
}

async function writeConfig(dir: string, contents: string): Promise<void> {
  const cfgDir = path.join(dir, ".prompt-path");
  await fs.mkdir(cfgDir, { recursive: true });
  await fs.writeFile(path.join(cfgDir, CONFIG_FILE_NAME), contents, "utf8");
}

function managerFor(tmp: string, env: NodeJS.ProcessEnv = {}): ConfigManager {
  return new ConfigManager({
    cwd: path.join(tmp, "proj"),
    home: path.join(tmp, "home"),
    env,
  });
}

test("DirectoryProvider resolves and creates subdirectories", async () => {
  await withTempDir(async (tmp) => {
    const dp = new DirectoryProvider(path.join(tmp, ".prompt-path"));
    assert.equal(dp.getPath(), path.join(tmp, ".prompt-path"));

    const logs = dp.ensurePathSync("logs");
    assert.equal(logs, path.join(tmp, ".prompt-path", "logs"));
    assert.equal((await fs.stat(logs)).isDirectory(), true);
  });
});

test("readPathConfig returns {} when no config files exist", async () => {
  await withTempDir(async (tmp) => {
    const mgr = managerFor(tmp);
    assert.deepEqual(await mgr.readPathConfig(), {});

    const props = await mgr.readProperties();
    assert.equal(props.getString("style", "agnoster"), "agnoster");
  });
});

test("readPathConfig merges app and project configs with project precedence", async () => {
  await withTempDir(async (tmp) => {
    await writeConfig(
      path.join(tmp, "home"),
      JSON.stringify({ style: "short", home_icon: "H" }),
    );
    await writeConfig(
      path.join(tmp, "proj"),
      JSON.stringify({ home_icon: "P" }),
    );

    const merged = await managerFor(tmp).readPathConfig();
    assert.deepEqual(merged, { style: "short", home_icon: "P" });
  });
});

test("PROMPT_PATH_STYLE overrides the configured style", async () => {
  await withTempDir(async (tmp) => {
    await writeConfig(
      path.join(tmp, "home"),
      JSON.stringify({ style: "short" }),
    );

    const props = await managerFor(tmp, {
      PROMPT_PATH_STYLE: "folder",
    }).readProperties();
    assert.equal(props.getString("style", "agnoster"), "folder");
  });
});

test("an unknown cwd skips the project config", async () => {
  await withTempDir(async (tmp) => {
    await writeConfig(
      path.join(tmp, "home"),
      JSON.stringify({ folder_icon: "…" }),
    );
    const mgr = new ConfigManager({
      cwd: null,
      home: path.join(tmp, "home"),
      env: {},
    });
    assert.equal(mgr.project, null);
    assert.deepEqual(await mgr.readPathConfig(), { folder_icon: "…" });
  });
});

test("malformed JSON raises ConfigError", async () => {
  await withTempDir(async (tmp) => {
    await writeConfig(path.join(tmp, "home"), "{ invalid json");
    await assert.rejects(managerFor(tmp).readPathConfig(), ConfigError);
  });
});

test("unknown keys and non-string values raise ConfigError", async () => {
  await withTempDir(async (tmp) => {
    await writeConfig(
      path.join(tmp, "home"),
      JSON.stringify({ colour: "red" }),
    );
    await assert.rejects(managerFor(tmp).readPathConfig(), /Unrecognized key/);

    await writeConfig(path.join(tmp, "home"), JSON.stringify({ style: 3 }));
    await assert.rejects(managerFor(tmp).readPathConfig(), (error) => {
      assert(error instanceof ConfigError);
      assert.equal(
        error.path,
        path.join(tmp, "home", ".prompt-path", CONFIG_FILE_NAME),
      );
      assert.match(error.message, /style: Expected string, received number$/);
      return true;
    });
  });
});

test("an unreadable config file raises ConfigError", async () => {
  await withTempDir(async (tmp) => {
    // A directory where the file should be.
    await fs.mkdir(
      path.join(tmp, "home", ".prompt-path", CONFIG_FILE_NAME),
      { recursive: true },
    );
    await assert.rejects(
      managerFor(tmp).readPathConfig(),
      /unable to read file/,
    );
  });
});
