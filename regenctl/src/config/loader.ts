import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import YAML from "yaml";

export const CONFIG_DIR = fileURLToPath(new URL("../../config", import.meta.url));

export const CONFIG_SCHEMA_PATH = fileURLToPath(new URL("../../schemas/config.schema.json", import.meta.url));

const ENV_PREFIX = "REGEN_";

type ConfigDoc = Record<string, unknown>;

function isPlainObject(val: unknown): val is ConfigDoc {
  return val !== null && typeof val === "object" && !Array.isArray(val);
}

/**
 * Deep merge two objects. `override` values take precedence.
 * Arrays are replaced, not concatenated.
 */
export function deepMerge(base: ConfigDoc, override: ConfigDoc): ConfigDoc {
  const result: ConfigDoc = { ...base };
  for (const [key, val] of Object.entries(override)) {
    if (isPlainObject(val)) {
      const current = result[key];
      result[key] = deepMerge(isPlainObject(current) ? current : {}, val);
    } else if (val !== undefined) {
      result[key] = val;
    }
  }
  return result;
}

/** Load a YAML file and return parsed object, or empty object if not found. */
function loadYaml(filePath: string): ConfigDoc {
  if (!fs.existsSync(filePath)) return {};
  const raw = fs.readFileSync(filePath, "utf8");
  const doc: unknown = YAML.parse(raw);
  if (doc === null || doc === undefined) return {};
  if (!isPlainObject(doc)) {
    throw new Error(`Config file must contain a mapping: ${filePath}`);
  }
  return doc;
}

/** Top-level keys the config schema declares. */
function schemaKeys(schemaPath: string): Set<string> {
  const schema: unknown = JSON.parse(fs.readFileSync(schemaPath, "utf8"));
  if (!isPlainObject(schema) || !isPlainObject(schema.properties)) return new Set();
  return new Set(Object.keys(schema.properties));
}

/**
 * Apply REGEN_ prefixed environment variable overrides to top-level keys.
 * Values are read as YAML scalars, so "2" becomes a number and "false" a boolean.
 * Variables that name no config key (REGEN_TOKEN and the like) are left alone.
 */
function applyEnvOverrides(config: ConfigDoc, env: NodeJS.ProcessEnv, known: Set<string>): ConfigDoc {
  const result: ConfigDoc = { ...config };
  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(ENV_PREFIX) || value === undefined) continue;
    // REGEN_RUNS_ROOT → runs_root
    const configKey = key.slice(ENV_PREFIX.length).toLowerCase();
    if (!known.has(configKey)) continue;
    const parsed: unknown = YAML.parse(value);
    result[configKey] = isPlainObject(parsed) || Array.isArray(parsed) ? value : parsed;
  }
  return result;
}

export type LoadConfigOptions = {
  /** Environment name, e.g. "local". Loads `{configDir}/{envName}.yaml` as an override layer. */
  envName?: string;
  configDir?: string;
  env?: NodeJS.ProcessEnv;
  /** Schema whose top-level keys environment overrides may set. */
  schemaPath?: string;
};

/**
 * Load the raw layered config document: base.yaml ← {env}.yaml ← environment variables.
 * The result is unvalidated; see {@link validateConfig}.
 */
export function loadConfigDocument(opts: LoadConfigOptions = {}): ConfigDoc {
  const dir = opts.configDir ?? CONFIG_DIR;
  const basePath = path.join(dir, "base.yaml");
  if (!fs.existsSync(basePath)) {
    throw new Error(`Base config not found: ${basePath}`);
  }

  let merged = loadYaml(basePath);

  if (opts.envName) {
    const envPath = path.join(dir, `${opts.envName}.yaml`);
    if (!fs.existsSync(envPath)) {
      throw new Error(`Environment config not found: ${envPath}`);
    }
    merged = deepMerge(merged, loadYaml(envPath));
  }

  return applyEnvOverrides(merged, opts.env ?? process.env, schemaKeys(opts.schemaPath ?? CONFIG_SCHEMA_PATH));
}
