import fs from "node:fs";
import path from "node:path";
import { CONFIG_DIR, loadConfigDocument } from "../config/loader.js";
import { validateConfig } from "../config/validator.js";
import type { RegenConfig } from "../types/config.js";

export type Diagnostic = {
  level: "error" | "warn" | "info";
  code: string;
  message: string;
  path?: string;
};

export type ValidateResult = { ok: true; config: RegenConfig; warnings: Diagnostic[] } | { ok: false; errors: Diagnostic[] };

function diag(level: Diagnostic["level"], code: string, message: string, filePath?: string): Diagnostic {
  return filePath === undefined ? { level, code, message } : { level, code, message, path: filePath };
}

/**
 * Validate the layered configuration, and warn about workspace inputs the
 * run will need (requirements file) when a workspace is given.
 */
export async function validateAll(opts: {
  configDir?: string;
  envName?: string;
  workspace?: string;
  env?: NodeJS.ProcessEnv;
}): Promise<ValidateResult> {
  const configDir = path.resolve(opts.configDir ?? CONFIG_DIR);

  if (!fs.existsSync(configDir)) {
    return { ok: false, errors: [diag("error", "CONFIG_DIR_MISSING", `Config directory not found: ${configDir}`)] };
  }

  let doc: Record<string, unknown>;
  try {
    doc = loadConfigDocument({ configDir, envName: opts.envName, env: opts.env });
  } catch (e) {
    return {
      ok: false,
      errors: [diag("error", "CONFIG_READ_FAILED", e instanceof Error ? e.message : String(e), configDir)],
    };
  }

  const res = await validateConfig(doc);
  if (!res.valid) {
    return { ok: false, errors: [diag("error", "CONFIG_INVALID", `Config invalid: ${res.errors}`, configDir)] };
  }

  const warnings: Diagnostic[] = [];
  if (opts.workspace) {
    const requirements = path.resolve(opts.workspace, res.config.install.requirements);
    if (!fs.existsSync(requirements)) {
      warnings.push(diag("warn", "REQUIREMENTS_MISSING", `Requirements file not found: ${requirements}`, requirements));
    }
  }

  return { ok: true, config: res.config, warnings };
}
