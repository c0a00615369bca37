/**
 * Tests for configuration loading and resolution
 */

import { describe, it, beforeEach, afterEach } from "mocha";
import { expect } from "chai";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import {
  expandPlaceholders,
  findConfig,
  loadConfig,
  resolveConfig,
  scanCompilerFlags,
} from "./config.js";
import type { ProjectConfigFile, VariableSources } from "./types.js";

const noSources: VariableSources = {
  environment: {},
  assignments: {},
  compilerFlags: [],
};

const resolved = (
  config: ProjectConfigFile,
  sources: Partial<VariableSources> = {},
  configPath = "/work/lib/mpbind.json"
) => {
  const result = resolveConfig(config, configPath, {}, { ...noSources, ...sources }, "/cwd");
  if (!result.ok) throw new Error(result.error.message);
  return result.value;
};

describe("Config", () => {
  describe("loadConfig", () => {
    let tempDir: string;

    beforeEach(() => {
      tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "mpbind-config-"));
    });

    afterEach(() => {
      fs.rmSync(tempDir, { recursive: true, force: true });
    });

    it("should report a missing file", () => {
      const result = loadConfig(path.join(tempDir, "mpbind.json"));
      expect(result.ok).to.be.false;
      if (!result.ok) expect(result.error.code).to.equal("MPB5001");
    });

    it("should report malformed JSON", () => {
      const configPath = path.join(tempDir, "mpbind.json");
      fs.writeFileSync(configPath, "{ not json");
      const result = loadConfig(configPath);
      expect(result.ok).to.be.false;
      if (!result.ok) expect(result.error.code).to.equal("MPB5002");
    });

    it("should reject fields of the wrong type", () => {
      const configPath = path.join(tempDir, "mpbind.json");
      fs.writeFileSync(configPath, JSON.stringify({ includePaths: "include" }));
      const result = loadConfig(configPath);
      expect(result.ok).to.be.false;
      if (!result.ok) {
        expect(result.error.message).to.equal(
          `${configPath}: 'includePaths' must be an array of strings`
        );
      }
    });

    it("should read a valid config", () => {
      const configPath = path.join(tempDir, "mpbind.json");
      fs.writeFileSync(
        configPath,
        JSON.stringify({ targetPath: "build/glue", variables: { BOARD: "pico" } })
      );
      const result = loadConfig(configPath);
      expect(result.ok).to.be.true;
      if (result.ok) {
        expect(result.value.targetPath).to.equal("build/glue");
        expect(result.value.variables).to.deep.equal({ BOARD: "pico" });
      }
    });

    it("should find the nearest config upwards", () => {
      const nested = path.join(tempDir, "a", "b");
      fs.mkdirSync(nested, { recursive: true });
      fs.writeFileSync(path.join(tempDir, "mpbind.json"), "{}");
      expect(findConfig(nested)).to.equal(path.join(tempDir, "mpbind.json"));
    });
  });

  describe("scanCompilerFlags", () => {
    it("should read include paths and defines in both spellings", () => {
      const flags = scanCompilerFlags(["-Iinc", "-I", "vendor", "-DDEBUG", "-D", "LEVEL=3", "-O2"]);
      expect(flags.includePaths).to.deep.equal(["inc", "vendor"]);
      expect(flags.defines).to.deep.equal({ DEBUG: "1", LEVEL: "3" });
    });
  });

  describe("expandPlaceholders", () => {
    it("should substitute known names", () => {
      const result = expandPlaceholders("${ROOT}/include", { ROOT: "/opt" }, "mpbind.json");
      expect(result).to.deep.equal({ ok: true, value: "/opt/include" });
    });

    it("should name the unresolved placeholder", () => {
      const result = expandPlaceholders("${MISSING}/x", {}, "mpbind.json");
      expect(result.ok).to.be.false;
      if (!result.ok) {
        expect(result.error.code).to.equal("MPB5003");
        expect(result.error.message).to.equal(
          "mpbind.json: unresolved placeholder ${MISSING}"
        );
      }
    });
  });

  describe("resolveConfig", () => {
    it("should default the base directory to the config directory", () => {
      const config = resolved({});
      expect(config.baseDirectory).to.equal("/work/lib");
      expect(config.targetPath).to.be.undefined;
      expect(config.configPath).to.equal("/work/lib/mpbind.json");
    });

    it("should resolve config paths against the config directory", () => {
      const config = resolved({
        baseDirectory: "src",
        dependencies: ["../core/mpbind.json"],
        includePaths: ["include"],
        targetPath: "build/glue",
      });
      expect(config.baseDirectory).to.equal("/work/lib/src");
      expect(config.dependencies).to.deep.equal(["/work/core/mpbind.json"]);
      expect(config.includePaths).to.deep.equal(["/work/lib/include"]);
      expect(config.targetPath).to.equal("/work/lib/build/glue");
    });

    it("should write to stdout for a target of -", () => {
      expect(resolved({ targetPath: "-" }).targetPath).to.be.undefined;
    });

    it("should let assignments win over the environment and config variables", () => {
      const config = resolved(
        { variables: { BOARD: "config", PORT: "config" }, targetPath: "${BOARD}/${PORT}" },
        { environment: { BOARD: "env", PORT: "env" }, assignments: { BOARD: "cli" } }
      );
      expect(config.targetPath).to.equal("/work/lib/cli/env");
    });

    it("should honour include paths and defines from CFLAGS and flags after --", () => {
      const config = resolved(
        {},
        { environment: { CFLAGS: "-Ifrom_env -DFAST" }, compilerFlags: ["-I/abs/inc"] }
      );
      expect(config.includePaths).to.deep.equal(["/cwd/from_env", "/abs/inc"]);
      expect(config.variables.FAST).to.equal("1");
    });

    it("should prefer CLI target and tags, resolved against the working directory", () => {
      const result = resolveConfig(
        { targetPath: "build/glue", tags: "tags.yaml" },
        "/work/lib/mpbind.json",
        { target: "out/glue", tags: "my-tags.yaml", includePaths: ["inc"] },
        noSources,
        "/cwd"
      );
      expect(result.ok).to.be.true;
      if (result.ok) {
        expect(result.value.targetPath).to.equal("/cwd/out/glue");
        expect(result.value.tagsPath).to.equal("/cwd/my-tags.yaml");
        expect(result.value.includePaths).to.deep.equal(["/cwd/inc"]);
      }
    });

    it("should fail on an unresolved placeholder", () => {
      const result = resolveConfig(
        { includePaths: ["${SDK}/include"] },
        "/work/lib/mpbind.json",
        {},
        noSources,
        "/cwd"
      );
      expect(result.ok).to.be.false;
      if (!result.ok) expect(result.error.code).to.equal("MPB5003");
    });
  });
});
