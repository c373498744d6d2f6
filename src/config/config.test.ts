import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join, resolve } from "node:path";
import { ContainerParseError, InvalidParametersError } from "../errors.js";
import { CONFIG_ENV_VAR, CONFIG_FILE_NAME, configPath, loadConfig, parseConfig } from "./loader.js";
import { clampAnalysisConfig } from "./schema.js";

let dir: string;

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), "config-"));
});

afterEach(() => {
  rmSync(dir, { recursive: true, force: true });
});

describe("parseConfig", () => {
  it("fills every default from an empty object", () => {
    const config = parseConfig({});
    expect(config.soundfontsDir).toBe("soundfonts");
    expect(config.analysis.defaults).toEqual({
      sampleCount: 8192,
      startTimeSeconds: 0,
      baseFrequencyHz: 440,
      harmonicCount: 16,
      boost: 1,
    });
    expect(config.analysis.limits).toEqual({
      minSamples: 64,
      maxSamples: 65536,
      minStartTime: 0,
      maxStartTime: 300,
      minBaseFreq: 1,
      maxBaseFreq: 20000,
      minHarmonics: 1,
      maxHarmonics: 256,
      minBoost: 0.5,
      maxBoost: 2,
    });
  });

  it("keeps partial overrides", () => {
    const config = parseConfig({ analysis: { defaults: { harmonicCount: 8 } } });
    expect(config.analysis.defaults.harmonicCount).toBe(8);
    expect(config.analysis.defaults.sampleCount).toBe(8192);
  });

  it("lists invalid fields", () => {
    expect(() => parseConfig({ analysis: { defaults: { sampleCount: "many" } } }, "test.json")).toThrow(
      InvalidParametersError,
    );
    expect(() => parseConfig({ analysis: { defaults: { sampleCount: "many" } } }, "test.json")).toThrow(
      /^Invalid config test\.json:\n {2}analysis\.defaults\.sampleCount: /,
    );
  });

  it("rejects limit ranges that are upside down", () => {
    expect(() => parseConfig({ analysis: { limits: { minSamples: 100, maxSamples: 50 } } })).toThrow(
      /minSamples must not exceed maxSamples/,
    );
  });
});

describe("loadConfig", () => {
  it("returns defaults when the file does not exist", () => {
    const config = loadConfig(join(dir, CONFIG_FILE_NAME));
    expect(config.soundfontsDir).toBe(resolve(process.cwd(), "soundfonts"));
  });

  it("resolves the soundfont directory against the config file", () => {
    const path = join(dir, CONFIG_FILE_NAME);
    writeFileSync(path, JSON.stringify({ soundfontsDir: "fonts" }));
    expect(loadConfig(path).soundfontsDir).toBe(join(dir, "fonts"));
  });

  it("keeps absolute soundfont directories", () => {
    const path = join(dir, CONFIG_FILE_NAME);
    const absolute = join(dir, "elsewhere");
    writeFileSync(path, JSON.stringify({ soundfontsDir: absolute }));
    expect(loadConfig(path).soundfontsDir).toBe(absolute);
  });

  it("reports malformed JSON as a parse error", () => {
    const path = join(dir, CONFIG_FILE_NAME);
    writeFileSync(path, "{ not json");
    expect(() => loadConfig(path)).toThrow(ContainerParseError);
  });
});

describe("configPath", () => {
  it("uses the working directory by default", () => {
    expect(configPath(dir, {})).toBe(join(dir, CONFIG_FILE_NAME));
  });

  it("honours the environment override", () => {
    expect(configPath(dir, { [CONFIG_ENV_VAR]: "custom.json" })).toBe(join(dir, "custom.json"));
  });
});

describe("clampAnalysisConfig", () => {
  const { defaults, limits } = parseConfig({}).analysis;

  it("fills missing fields from defaults", () => {
    expect(clampAnalysisConfig({}, defaults, limits)).toEqual({
      sampleCount: 8192,
      startTimeSeconds: 0,
      baseFrequencyHz: 440,
      harmonicCount: 16,
      boost: 1,
    });
  });

  it("clamps every field into its range and rounds counts", () => {
    expect(
      clampAnalysisConfig(
        { sampleCount: 10, startTimeSeconds: 900, baseFrequencyHz: 0.1, harmonicCount: 2.6, boost: 5 },
        defaults,
        limits,
      ),
    ).toEqual({
      sampleCount: 64,
      startTimeSeconds: 300,
      baseFrequencyHz: 1,
      harmonicCount: 3,
      boost: 2,
    });
  });
});
