import fs from "node:fs";
import Ajv2020 from "ajv/dist/2020.js";
import addFormats from "ajv-formats";
import type { RegenConfig } from "../types/config.js";
import { CONFIG_SCHEMA_PATH, loadConfigDocument, type LoadConfigOptions } from "./loader.js";

export type ConfigValidationResult =
  | { valid: true; config: RegenConfig; errors: null }
  | { valid: false; errors: string };

type SchemaValidator = ((data: unknown) => boolean) & { errors?: unknown };

type ConfigAjv = {
  compile: (schema: unknown) => SchemaValidator;
  errorsText: (errors: unknown) => string;
};

function createAjv(): ConfigAjv {
  // ajv's default export does not line up under NodeNext resolution
  const AjvCtor = Ajv2020 as unknown as { new (opts: unknown): ConfigAjv };
  const add = addFormats as unknown as (ajv: ConfigAjv) => void;
  // nullable fields are declared as ["string", "null"]
  const ajv = new AjvCtor({ allErrors: true, strict: true, allowUnionTypes: true });
  add(ajv);
  return ajv;
}

function readSchema(schemaPath: string): unknown {
  return JSON.parse(fs.readFileSync(schemaPath, "utf8"));
}

/** Validate a loaded config document against the config schema. */
export async function validateConfig(
  doc: unknown,
  schemaPath: string = CONFIG_SCHEMA_PATH,
): Promise<ConfigValidationResult> {
  const ajv = createAjv();
  const validate = ajv.compile(readSchema(schemaPath));
  if (!isRegenConfig(doc, validate)) {
    return { valid: false, errors: ajv.errorsText(validate.errors) };
  }
  return { valid: true, config: doc, errors: null };
}

function isRegenConfig(doc: unknown, validate: (data: unknown) => boolean): doc is RegenConfig {
  return validate(doc);
}

export type LoadedConfig = { ok: true; config: RegenConfig } | { ok: false; error: string };

/** Load the layered config and validate it in one go. */
export async function loadConfig(opts: LoadConfigOptions = {}): Promise<LoadedConfig> {
  let doc: Record<string, unknown>;
  try {
    doc = loadConfigDocument(opts);
  } catch (e) {
    return { ok: false, error: e instanceof Error ? e.message : String(e) };
  }

  const res = await validateConfig(doc, opts.schemaPath);
  if (!res.valid) {
    return { ok: false, error: `Config invalid: ${res.errors}` };
  }
  return { ok: true, config: res.config };
}
