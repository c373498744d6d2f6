// ─── App Config Loader ──────────────────────────────────────────────────────
//
// Reads piecewise-midi.config.json (or $PIECEWISE_MIDI_CONFIG), validates it
// with zod, and resolves the soundfont directory against the config file.
// A missing file means defaults.
// ─────────────────────────────────────────────────────────────────────────────

import { existsSync, readFileSync } from "node:fs";
import { dirname, isAbsolute, resolve } from "node:path";
import { ContainerParseError, InvalidParametersError, wrapIoError } from "../errors.js";
import { AppConfigSchema, type AppConfig } from "./schema.js";

export const CONFIG_FILE_NAME = "piecewise-midi.config.json";
export const CONFIG_ENV_VAR = "PIECEWISE_MIDI_CONFIG";

/** Where the config is looked up: the env override, else the working directory. */
export function configPath(cwd: string = process.cwd(), env: NodeJS.ProcessEnv = process.env): string {
  const override = env[CONFIG_ENV_VAR];
  return override ? resolve(cwd, override) : resolve(cwd, CONFIG_FILE_NAME);
}

/**
 * Load and validate the config. `soundfontsDir` comes back absolute.
 *
 * @throws InvalidParametersError listing every invalid field.
 */
export function loadConfig(path: string = configPath()): AppConfig {
  if (!existsSync(path)) {
    return resolveDirs(AppConfigSchema.parse({}), process.cwd());
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf8"));
  } catch (err) {
    if (err instanceof SyntaxError) {
      throw new ContainerParseError("config", `Invalid JSON in ${path}: ${err.message}`, path, { cause: err });
    }
    throw wrapIoError(err, path, "Config file");
  }

  return resolveDirs(parseConfig(raw, path), dirname(path));
}

/** Validate a config object. */
export function parseConfig(raw: unknown, source = CONFIG_FILE_NAME): AppConfig {
  const result = AppConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `  ${i.path.join(".") || "root"}: ${i.message}`)
      .join("\n");
    throw new InvalidParametersError("config", `Invalid config ${source}:\n${issues}`);
  }
  return result.data;
}

function resolveDirs(config: AppConfig, baseDir: string): AppConfig {
  const soundfontsDir = isAbsolute(config.soundfontsDir)
    ? config.soundfontsDir
    : resolve(baseDir, config.soundfontsDir);
  return { ...config, soundfontsDir };
}
