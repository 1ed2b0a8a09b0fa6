import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";

import { describe, expect, it } from "vitest";

import { loadConfig, readConfigFile, resolveSettings, validateConfig } from "../src/config.js";
import { ConfigError } from "../src/errors.js";
import { createTempDir } from "./helpers.js";

async function writeConfig(dir: string, value: unknown): Promise<string> {
  const configPath = path.join(dir, "drive_config.json");
  await writeFile(configPath, typeof value === "string" ? value : JSON.stringify(value), "utf8");
  return configPath;
}

describe("validateConfig", () => {
  it("accepts a complete config", () => {
    expect(
      validateConfig({
        FOLDERS_TO_COPY: ["Reports", "Invoices"],
        SOURCE_PARENT_FOLDER_ID: "src-parent",
        DESTINATION_PARENT_FOLDER_ID: "dst-parent",
        NEW_BATCH_FOLDER_NAME: "Archive",
      }),
    ).toEqual({ ok: true, errors: [], warnings: [] });
  });

  it("requires folder names and a source parent", () => {
    expect(validateConfig({ FOLDERS_TO_COPY: [] }).errors).toEqual([
      "FOLDERS_TO_COPY must be a non-empty array of folder names",
      "SOURCE_PARENT_FOLDER_ID must be a non-empty string",
    ]);
  });

  it("separates errors from warnings", () => {
    const result = validateConfig({
      FOLDERS_TO_COPY: ["Reports", 3, "Reports"],
      SOURCE_PARENT_FOLDER_ID: "src-parent",
      DESTINATION_PARENT_FOLDER_ID: [],
      NEW_BATCH_FOLDER_NAME: "",
      EXTRA: true,
    });

    expect(result.ok).toBe(false);
    expect(result.errors).toEqual([
      "FOLDERS_TO_COPY[1] must be a non-empty string",
      "DESTINATION_PARENT_FOLDER_ID must list at least one non-empty folder id",
      "NEW_BATCH_FOLDER_NAME must be a non-empty string when set",
    ]);
    expect(result.warnings).toEqual(['FOLDERS_TO_COPY lists "Reports" more than once', "unknown key: EXTRA"]);
  });

  it("rejects a non-object root", () => {
    expect(validateConfig(["Reports"]).errors).toEqual(["config root must be an object"]);
  });
});

describe("readConfigFile", () => {
  it("reports a missing file without throwing", async () => {
    const dir = await createTempDir();

    const result = await readConfigFile(path.join(dir, "drive_config.json"));

    expect(result.exists).toBe(false);
    expect(result.ok).toBe(false);
    expect(result.batch).toBeNull();
  });

  it("fills defaults for the batch folder and destination", async () => {
    const dir = await createTempDir();
    const configPath = await writeConfig(dir, {
      FOLDERS_TO_COPY: ["Reports", "Invoices", "Reports"],
      SOURCE_PARENT_FOLDER_ID: "src-parent",
    });

    const result = await readConfigFile(configPath);

    expect(result.ok).toBe(true);
    expect(result.batch).toEqual({
      folderNames: ["Reports", "Invoices"],
      sourceParentId: "src-parent",
      destinationParentIds: ["root"],
      batchFolderName: "Copied Folders",
    });
  });

  it("accepts a list of destination parents", async () => {
    const dir = await createTempDir();
    const configPath = await writeConfig(dir, {
      FOLDERS_TO_COPY: ["Reports"],
      SOURCE_PARENT_FOLDER_ID: "src-parent",
      DESTINATION_PARENT_FOLDER_ID: ["dst-1", "dst-2", "dst-1"],
    });

    const result = await readConfigFile(configPath);

    expect(result.batch?.destinationParentIds).toEqual(["dst-1", "dst-2"]);
  });

  it("reports unparsable JSON", async () => {
    const dir = await createTempDir();
    const configPath = await writeConfig(dir, "{ FOLDERS_TO_COPY: ");

    const result = await readConfigFile(configPath);

    expect(result.exists).toBe(true);
    expect(result.errors).toHaveLength(1);
    expect(result.errors[0]?.startsWith("config read/parse failed:")).toBe(true);
  });
});

describe("resolveSettings", () => {
  it("uses defaults relative to the working directory", async () => {
    const dir = await createTempDir();

    const settings = await resolveSettings({ cwd: dir, env: {} });

    expect(settings).toEqual({
      cwd: path.resolve(dir),
      configPath: path.join(path.resolve(dir), "drive_config.json"),
      credentialsPath: path.join(path.resolve(dir), "credentials.json"),
      tokenPath: path.join(path.resolve(dir), "token_drive.json"),
      concurrency: 1,
      maxRetries: 4,
    });
  });

  it("reads .env and lets the process environment win", async () => {
    const dir = await createTempDir();
    await writeFile(
      path.join(dir, ".env"),
      "DRIVE_TOKEN_PATH=secrets/token.json\nDRIVE_DUPLICATE_CONCURRENCY=2\n",
      "utf8",
    );

    const settings = await resolveSettings({ cwd: dir, env: { DRIVE_DUPLICATE_CONCURRENCY: "3" } });

    expect(settings.tokenPath).toBe(path.join(path.resolve(dir), "secrets", "token.json"));
    expect(settings.concurrency).toBe(3);
  });

  it("rejects a bad number", async () => {
    const dir = await createTempDir();

    await expect(resolveSettings({ cwd: dir, env: { DRIVE_DUPLICATE_CONCURRENCY: "0" } })).rejects.toThrow(
      new ConfigError('DRIVE_DUPLICATE_CONCURRENCY must be an integer >= 1, got "0"'),
    );
  });
});

describe("loadConfig", () => {
  it("allows a missing config file", async () => {
    const dir = await createTempDir();

    const config = await loadConfig({ cwd: dir, env: {} });

    expect(config.batch).toBeNull();
    expect(config.warnings).toEqual([]);
  });

  it("throws ConfigError for an invalid file", async () => {
    const dir = await createTempDir();
    await writeConfig(dir, { FOLDERS_TO_COPY: "Reports" });

    await expect(loadConfig({ cwd: dir, env: {} })).rejects.toBeInstanceOf(ConfigError);
  });

  it("honours a config path from the environment", async () => {
    const dir = await createTempDir();
    await mkdir(path.join(dir, "conf"));
    await writeFile(
      path.join(dir, "conf", "batch.json"),
      JSON.stringify({ FOLDERS_TO_COPY: ["Reports"], SOURCE_PARENT_FOLDER_ID: "src-parent", EXTRA: 1 }),
      "utf8",
    );

    const config = await loadConfig({ cwd: dir, env: { DRIVE_DUPLICATE_CONFIG: "conf/batch.json" } });

    expect(config.batch?.folderNames).toEqual(["Reports"]);
    expect(config.warnings).toEqual(["unknown key: EXTRA"]);
  });
});
