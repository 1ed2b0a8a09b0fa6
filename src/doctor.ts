import { readOAuthClient, readStoredToken } from "./auth.js";
import { readConfigFile, type RuntimeSettings } from "./config.js";
import { errorMessage } from "./errors.js";

type CheckLevel = "required" | "optional";

export interface DoctorCheck {
  id: string;
  level: CheckLevel;
  ok: boolean;
  message: string;
}

export interface DoctorReport {
  checks: DoctorCheck[];
  summary: {
    required_total: number;
    required_failed: number;
    optional_total: number;
    optional_failed: number;
  };
}

function summarizeChecks(checks: DoctorCheck[]): DoctorReport["summary"] {
  const required = checks.filter((check) => check.level === "required");
  const optional = checks.filter((check) => check.level === "optional");

  return {
    required_total: required.length,
    required_failed: required.filter((check) => !check.ok).length,
    optional_total: optional.length,
    optional_failed: optional.filter((check) => !check.ok).length,
  };
}

export async function runDoctor(settings: RuntimeSettings): Promise<DoctorReport> {
  const checks: DoctorCheck[] = [];

  try {
    const client = await readOAuthClient(settings.credentialsPath);
    checks.push({
      id: "credentials_valid",
      level: "required",
      ok: true,
      message: `OAuth client ${client.client_id} found in ${settings.credentialsPath}`,
    });
  } catch (error) {
    checks.push({ id: "credentials_valid", level: "required", ok: false, message: errorMessage(error) });
  }

  const config = await readConfigFile(settings.configPath);
  if (!config.exists) {
    checks.push({
      id: "config_present",
      level: "optional",
      ok: false,
      message: `${settings.configPath} is missing; only --source runs are possible`,
    });
  } else {
    checks.push({
      id: "config_valid",
      level: "required",
      ok: config.ok,
      message: config.ok
        ? `${settings.configPath} is valid (folders=${String(config.batch?.folderNames.length ?? 0)})`
        : `config invalid: ${config.errors.join("; ")}`,
    });
  }

  const token = await readStoredToken(settings.tokenPath);
  checks.push({
    id: "token_present",
    level: "optional",
    ok: token !== null,
    message: token ? `saved token found at ${settings.tokenPath}` : "no saved token; run `drive-duplicate auth`",
  });

  return { checks, summary: summarizeChecks(checks) };
}
