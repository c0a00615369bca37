/**
 * Tests for the generate command pipeline
 */

import { describe, it, beforeEach, afterEach } from "mocha";
import { expect } from "chai";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { loadDependencies, loadProject, type LoadedProject } from "../project.js";
import type { VariableSources } from "../types.js";
import { generateBindings, writeArtifacts } from "./generate.js";

const sources: VariableSources = {
  environment: {},
  assignments: {},
  compilerFlags: [],
};

const writeFile = (file: string, lines: readonly string[]): void => {
  fs.mkdirSync(path.dirname(file), { recursive: true });
  fs.writeFileSync(file, lines.join("\n"));
};

const GEO_HEADER = [
  "#pragma once",
  "",
  "MPyModule(geo)",
  "",
  "namespace geo {",
  "",
  "MPyClass(TypeOwned, ExportPublic)",
  "class Point {",
  "public:",
  "    MPyProperty()",
  "    float x = 0;",
  "};",
  "",
  "}",
];

describe("generate", () => {
  let tempDir: string;

  const project = (configDir: string): LoadedProject => {
    const result = loadProject(path.join(configDir, "mpbind.json"), {}, sources);
    if (!result.ok) throw new Error(result.error.message);
    return result.value;
  };

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "mpbind-generate-"));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it("should write both artifacts beside the target", () => {
    writeFile(path.join(tempDir, "mpbind.json"), [
      JSON.stringify({ baseDirectory: "src", targetPath: "build/glue" }),
    ]);
    writeFile(path.join(tempDir, "src", "geo.h"), GEO_HEADER);

    const loaded = project(tempDir);
    const result = generateBindings(loaded, []);
    if (!result.ok) throw new Error(result.error.diagnostics.map((d) => d.message).join("; "));

    const output = writeArtifacts(result.value.artifacts, loaded.config.targetPath);
    expect(output).to.be.undefined;

    const header = fs.readFileSync(path.join(tempDir, "build", "glue.h"), "utf-8");
    const source = fs.readFileSync(path.join(tempDir, "build", "glue.cpp"), "utf-8");
    expect(header).to.include('#include "../src/geo.h"');
    expect(source).to.include('#include "glue.h"');
    expect(source).to.include("    MP_REGISTER_MODULE(MP_QSTR_geo, PyGeoModule);");
  });

  it("should return both artifacts for stdout without a target", () => {
    writeFile(path.join(tempDir, "mpbind.json"), ["{}"]);
    writeFile(path.join(tempDir, "geo.h"), GEO_HEADER);

    const loaded = project(tempDir);
    const result = generateBindings(loaded, [], tempDir);
    if (!result.ok) throw new Error("generation failed");

    const output = writeArtifacts(result.value.artifacts, undefined);
    expect(output).to.equal(
      `${result.value.artifacts.header}\n\n${result.value.artifacts.source}\n`
    );
    expect(fs.existsSync(path.join(tempDir, "glue.h"))).to.be.false;
  });

  it("should stop with exit code 2 on validation errors", () => {
    writeFile(path.join(tempDir, "mpbind.json"), ["{}"]);
    writeFile(path.join(tempDir, "tool.h"), [
      "MPyModule(tools)",
      "MPyFunction()",
      "void Use(Widget w);",
    ]);

    const result = generateBindings(project(tempDir), [], tempDir);
    expect(result.ok).to.be.false;
    if (!result.ok) {
      expect(result.error.exitCode).to.equal(2);
      expect(result.error.diagnostics.map((d) => d.code)).to.deep.equal(["MPB2001"]);
    }
  });

  it("should stop with exit code 3 on an unresolved quoted header", () => {
    writeFile(path.join(tempDir, "mpbind.json"), ["{}"]);
    writeFile(path.join(tempDir, "geo.h"), ['#include "missing.h"', ...GEO_HEADER]);

    const result = generateBindings(project(tempDir), [], tempDir);
    expect(result.ok).to.be.false;
    if (!result.ok) {
      expect(result.error.exitCode).to.equal(3);
      expect(result.error.diagnostics.map((d) => d.code)).to.deep.equal(["MPB3001"]);
    }
  });

  it("should stop with exit code 4 on generator-fatal problems", () => {
    writeFile(path.join(tempDir, "mpbind.json"), ["{}"]);
    writeFile(path.join(tempDir, "loose.h"), [
      "MPyStruct()",
      "struct Loose {",
      "    MPyProperty()",
      "    int count = 0;",
      "};",
    ]);

    const result = generateBindings(project(tempDir), [], tempDir);
    expect(result.ok).to.be.false;
    if (!result.ok) {
      expect(result.error.exitCode).to.equal(4);
      expect(result.error.diagnostics.map((d) => d.code)).to.deep.equal(["MPB4004"]);
    }
  });

  describe("with dependencies", () => {
    const coreDir = () => path.join(tempDir, "core");
    const libDir = () => path.join(tempDir, "lib");

    beforeEach(() => {
      writeFile(path.join(coreDir(), "mpbind.json"), [
        JSON.stringify({ baseDirectory: "src", targetPath: "build/core" }),
      ]);
      writeFile(path.join(coreDir(), "src", "core.h"), [
        "MPyModule(core)",
        "namespace core {",
        "MPyClass(TypeOwned, ExportPublic)",
        "class Base {",
        "public:",
        "    MPyFunction()",
        "    int Id() const;",
        "};",
        "}",
      ]);
      writeFile(path.join(libDir(), "mpbind.json"), [
        JSON.stringify({
          baseDirectory: "src",
          targetPath: "build/extra",
          dependencies: ["../core/mpbind.json"],
        }),
      ]);
      writeFile(path.join(libDir(), "src", "extra.h"), [
        "MPyModule(core.extra)",
        "namespace extra {",
        "MPyFunction()",
        "int Describe(const core::Base& base);",
        "}",
      ]);
    });

    it("should include the dependency's header and extend its module", () => {
      const loaded = project(libDir());
      const dependencies = loadDependencies(loaded.config, sources);
      if (!dependencies.ok) throw new Error(dependencies.error.message);
      expect(dependencies.value.map((unit) => unit.configPath)).to.deep.equal([
        path.join(coreDir(), "mpbind.json"),
      ]);

      const result = generateBindings(loaded, dependencies.value);
      if (!result.ok) throw new Error(result.error.diagnostics.map((d) => d.message).join("; "));
      const { header, source } = result.value.artifacts;

      expect(header).to.include('#include "../../core/build/core.h"');
      expect(source).to.include(
        "    MP_REGISTER_MODULE(MP_QSTR_core_dot_extra, PyCoreExtraModule);"
      );
      expect(source).to.include("    extern const mp_obj_module_t PyCoreModule;");
    });

    it("should report a dependency cycle", () => {
      writeFile(path.join(coreDir(), "mpbind.json"), [
        JSON.stringify({ baseDirectory: "src", dependencies: ["../lib/mpbind.json"] }),
      ]);

      const result = loadDependencies(project(libDir()).config, sources);
      expect(result.ok).to.be.false;
      if (!result.ok) expect(result.error.code).to.equal("MPB3003");
    });

    it("should report an unreadable dependency", () => {
      fs.writeFileSync(path.join(coreDir(), "mpbind.json"), "{ broken");

      const result = loadDependencies(project(libDir()).config, sources);
      expect(result.ok).to.be.false;
      if (!result.ok) expect(result.error.code).to.equal("MPB3004");
    });
  });
});
