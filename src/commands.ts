import { GoogleAuth } from "./auth.js";
import { loadConfig, readConfigFile, resolveSettings, type DuplicateConfig, type RuntimeSettings } from "./config.js";
import { runDoctor } from "./doctor.js";
import { DriveGateway } from "./drive.js";
import { DuplicationDriver, type DestinationResult, type DestinationTarget } from "./duplicate.js";
import { ConfigError, errorCode, errorMessage } from "./errors.js";
import type { StorageGateway } from "./gateway.js";
import { ManifestStore, parseManifest, validateManifestDocument } from "./manifest.js";
import type { SyncEvent } from "./types.js";

export type OutputMode = "text" | "json";

export interface CommandContext {
  cwd: string;
  env: NodeJS.ProcessEnv;
  stdout: (line: string) => void;
  stderr: (line: string) => void;
  createGateway?: (settings: RuntimeSettings) => StorageGateway;
  authenticate?: (settings: RuntimeSettings, onAuthUrl: (url: string) => void) => Promise<void>;
}

function defaultGateway(settings: RuntimeSettings): StorageGateway {
  const auth = new GoogleAuth({ credentialsPath: settings.credentialsPath, tokenPath: settings.tokenPath });
  return new DriveGateway(auth, { maxRetries: settings.maxRetries });
}

async function defaultAuthenticate(settings: RuntimeSettings, onAuthUrl: (url: string) => void): Promise<void> {
  const auth = new GoogleAuth({ credentialsPath: settings.credentialsPath, tokenPath: settings.tokenPath });
  await auth.authenticate(onAuthUrl);
}

export function readFlag(argv: string[], name: string): string | undefined {
  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    if (arg === `--${name}`) {
      const value = argv[i + 1];
      if (!value || value.startsWith("--")) throw new Error(`--${name} requires a value`);
      return value;
    }
    if (arg.startsWith(`--${name}=`)) {
      const value = arg.slice(name.length + 3);
      if (!value) throw new Error(`--${name} requires a value`);
      return value;
    }
  }
  return undefined;
}

export function parseOutputMode(argv: string[]): OutputMode {
  if (argv.includes("--json")) return "json";
  const value = readFlag(argv, "output");
  if (value === undefined) return "text";
  if (value !== "text" && value !== "json") throw new Error(`Unsupported output mode: ${value}`);
  return value;
}

function parseConcurrency(argv: string[], fallback: number): number {
  const value = readFlag(argv, "concurrency");
  if (value === undefined) return fallback;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) throw new Error(`--concurrency must be a positive integer, got ${value}`);
  return parsed;
}

export function usage(): string {
  return [
    "Usage: drive-duplicate <command> [--cwd PATH] [--output text|json]",
    "",
    "Commands:",
    "  duplicate  Duplicate or merge folders listed in drive_config.json, or one folder with",
    "             --source ID [--dest-parent ID] [--name NAME | --into ID] [--concurrency N].",
    "  auth       Sign in with Google and save a token for later runs.",
    "  inspect    Show the manifest of a duplicated folder: --folder ID.",
    "  validate   Validate drive_config.json.",
    "  doctor     Check credentials, config and saved token.",
  ].join("\n");
}

function printResult(ctx: CommandContext, payload: unknown): void {
  ctx.stdout(JSON.stringify(payload, null, 2));
}

function progressPrinter(ctx: CommandContext): (event: SyncEvent) => void {
  return (event) => {
    const indent = "  ".repeat(event.depth);
    if (event.type === "created") {
      const suffix = event.source.kind === "container" ? "/" : "";
      ctx.stdout(`${indent}+ ${event.source.name}${suffix}`);
    } else if (event.type === "failed") {
      ctx.stderr(`${indent}! ${event.source.name}: ${event.error.message}`);
    }
  };
}

function printDestination(ctx: CommandContext, result: DestinationResult): void {
  const { report } = result;
  ctx.stdout(`Done! Duplicated folders are in: ${result.root_id}${result.created_root ? " (new)" : ""}`);
  ctx.stdout(
    `created=${String(report.created)} skipped=${String(report.skipped)} descended=${String(report.descended)} errors=${String(report.errors.length)}`,
  );
}

function exitCodeFor(results: DestinationResult[]): number {
  return results.some((result) => result.report.errors.length > 0) ? 2 : 0;
}

function singleTarget(argv: string[]): DestinationTarget {
  const into = readFlag(argv, "into");
  const name = readFlag(argv, "name");
  if (into && name) throw new Error("--into and --name cannot be combined");
  if (into) return { id: into };
  return { parentId: readFlag(argv, "dest-parent"), name };
}

async function duplicateCommand(ctx: CommandContext, config: DuplicateConfig, argv: string[], output: OutputMode): Promise<number> {
  const gateway = (ctx.createGateway ?? defaultGateway)(config);
  const driver = new DuplicationDriver(gateway, {
    concurrency: parseConcurrency(argv, config.concurrency),
    onEvent: output === "text" ? progressPrinter(ctx) : undefined,
  });

  const sourceId = readFlag(argv, "source");
  if (sourceId) {
    const result = await driver.duplicateFolder({ sourceId, target: singleTarget(argv) });
    if (output === "json") {
      printResult(ctx, { status: "ok", command: "duplicate", ...result });
    } else {
      printDestination(ctx, result);
    }
    return exitCodeFor([result]);
  }

  if (!config.batch) {
    throw new ConfigError(`No config file at ${config.configPath}; create one or pass --source ID`);
  }

  for (const warning of config.warnings) ctx.stderr(`warn: ${warning}`);
  const result = await driver.duplicateBatch(config.batch);
  if (output === "json") {
    printResult(ctx, { status: "ok", command: "duplicate", ...result });
  } else {
    if (result.missing.length > 0) {
      ctx.stderr(`Warning: These folders were not found: ${result.missing.join(", ")}`);
    }
    for (const destination of result.destinations) printDestination(ctx, destination);
  }
  return exitCodeFor(result.destinations);
}

async function inspectCommand(ctx: CommandContext, settings: RuntimeSettings, argv: string[], output: OutputMode): Promise<number> {
  const folderId = readFlag(argv, "folder");
  if (!folderId) throw new Error("inspect requires --folder ID");

  const store = new ManifestStore((ctx.createGateway ?? defaultGateway)(settings));
  const raw = await store.loadRaw(folderId);
  if (!raw) {
    const payload = { status: "error", command: "inspect", folder_id: folderId, managed: false };
    if (output === "json") printResult(ctx, payload);
    else ctx.stderr(`Folder ${folderId} has no manifest; it was not created by drive-duplicate.`);
    return 1;
  }

  let document: unknown;
  try {
    document = JSON.parse(new TextDecoder().decode(raw)) as unknown;
  } catch (error) {
    document = null;
    ctx.stderr(`manifest read/parse failed: ${String(error)}`);
  }
  const validation = validateManifestDocument(document);
  const payload = { status: validation.ok ? "ok" : "error", command: "inspect", folder_id: folderId, managed: true, ...validation, manifest: document };

  if (output === "json") {
    printResult(ctx, payload);
  } else if (!validation.ok) {
    ctx.stderr(`Manifest invalid: ${String(validation.errors.length)} error(s)`);
    for (const error of validation.errors) ctx.stderr(`error: ${error}`);
  } else {
    const manifest = parseManifest(raw, folderId);
    ctx.stdout(`Origin: ${manifest.originName} (${manifest.originId})`);
    ctx.stdout(`Created: ${manifest.createdAt}  Updated: ${manifest.updatedAt}`);
    ctx.stdout(`Entries: ${String(manifest.size)}`);
    for (const entry of manifest.listEntries()) {
      ctx.stdout(`  ${entry.source_id} -> ${entry.destination_id}`);
    }
    for (const warning of validation.warnings) ctx.stdout(`warn: ${warning}`);
  }
  return validation.ok ? 0 : 1;
}

async function validateCommand(ctx: CommandContext, settings: RuntimeSettings, output: OutputMode): Promise<number> {
  const result = await readConfigFile(settings.configPath);
  const payload = {
    status: result.ok ? "ok" : "error",
    command: "validate",
    config_path: settings.configPath,
    ok: result.ok,
    errors: result.errors,
    warnings: result.warnings,
  };
  if (output === "json") {
    printResult(ctx, payload);
  } else if (result.ok) {
    ctx.stdout(`Config valid: folders=${String(result.batch?.folderNames.length ?? 0)}`);
    for (const warning of result.warnings) ctx.stdout(`warn: ${warning}`);
  } else {
    ctx.stderr(`Config invalid: ${String(result.errors.length)} error(s)`);
    for (const error of result.errors) ctx.stderr(`error: ${error}`);
    for (const warning of result.warnings) ctx.stderr(`warn: ${warning}`);
  }
  return result.ok ? 0 : 1;
}

async function doctorCommand(ctx: CommandContext, settings: RuntimeSettings, output: OutputMode): Promise<number> {
  const report = await runDoctor(settings);
  const ok = report.summary.required_failed === 0;
  if (output === "json") {
    printResult(ctx, { status: ok ? "ok" : "error", command: "doctor", ...report });
    return ok ? 0 : 1;
  }

  for (const level of ["required", "optional"] as const) {
    ctx.stdout(level === "required" ? "Required Checks:" : "Optional Checks:");
    for (const check of report.checks.filter((item) => item.level === level)) {
      ctx.stdout(`  [${check.ok ? "ok" : "fail"}] ${check.id}: ${check.message}`);
    }
  }
  ctx.stdout("Summary:");
  ctx.stdout(
    `  required failed=${String(report.summary.required_failed)}/${String(report.summary.required_total)} optional failed=${String(report.summary.optional_failed)}/${String(report.summary.optional_total)}`,
  );
  return ok ? 0 : 1;
}

async function authCommand(ctx: CommandContext, settings: RuntimeSettings, output: OutputMode): Promise<number> {
  await (ctx.authenticate ?? defaultAuthenticate)(settings, (url) => {
    ctx.stderr("Open this URL in your browser to grant Drive access:");
    ctx.stderr(url);
  });
  if (output === "json") {
    printResult(ctx, { status: "ok", command: "auth", token_path: settings.tokenPath });
  } else {
    ctx.stdout(`Saved token to ${settings.tokenPath}`);
  }
  return 0;
}

/** Run one CLI invocation; `argv` excludes the node binary and script path. */
export async function runCommand(argv: string[], ctx: CommandContext): Promise<number> {
  const [command, ...rest] = argv;
  if (!command || command === "help" || command === "--help") {
    (command ? ctx.stdout : ctx.stderr)(usage());
    return command ? 0 : 1;
  }
  if (rest.includes("--help")) {
    ctx.stdout(usage());
    return 0;
  }

  let output: OutputMode = "text";
  try {
    output = parseOutputMode(rest);
    const cwd = readFlag(rest, "cwd") ?? ctx.cwd;

    switch (command) {
      case "duplicate":
        return await duplicateCommand(ctx, await loadConfig({ cwd, env: ctx.env }), rest, output);
      case "inspect":
        return await inspectCommand(ctx, await resolveSettings({ cwd, env: ctx.env }), rest, output);
      case "validate":
        return await validateCommand(ctx, await resolveSettings({ cwd, env: ctx.env }), output);
      case "doctor":
        return await doctorCommand(ctx, await resolveSettings({ cwd, env: ctx.env }), output);
      case "auth":
        return await authCommand(ctx, await resolveSettings({ cwd, env: ctx.env }), output);
      default:
        ctx.stderr(`Unknown command: ${command}`);
        ctx.stderr(usage());
        return 1;
    }
  } catch (error) {
    if (output === "json") {
      printResult(ctx, { status: "error", command, code: errorCode(error), message: errorMessage(error) });
    } else {
      ctx.stderr(errorMessage(error));
    }
    return 1;
  }
}
