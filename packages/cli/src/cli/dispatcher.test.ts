/**
 * Tests for CLI command dispatch
 */

import { describe, it, beforeEach, afterEach } from "mocha";
import { expect } from "chai";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { runCli } from "./dispatcher.js";

describe("runCli", () => {
  let tempDir: string;
  let logged: string[];
  let errors: string[];
  const originalLog = console.log;
  const originalError = console.error;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "mpbind-cli-"));
    logged = [];
    errors = [];
    console.log = (...parts: unknown[]) => {
      logged.push(parts.map(String).join(" "));
    };
    console.error = (...parts: unknown[]) => {
      errors.push(parts.map(String).join(" "));
    };
  });

  afterEach(() => {
    console.log = originalLog;
    console.error = originalError;
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it("should print the version", () => {
    expect(runCli(["version"], {}, tempDir)).to.equal(0);
    expect(logged[0]).to.match(/^mpbind v\d+\.\d+\.\d+$/);
  });

  it("should reject unknown commands with exit code 1", () => {
    expect(runCli(["bogus"], {}, tempDir)).to.equal(1);
    expect(errors[0]).to.equal("Error: Unknown command 'bogus'");
  });

  it("should fail with exit code 1 when no config is found", () => {
    const isolated = path.join(tempDir, "nowhere");
    fs.mkdirSync(isolated);
    expect(runCli(["generate"], {}, isolated)).to.equal(1);
    expect(errors[0]).to.equal("Error: No mpbind.json found");
  });

  it("should print resolved paths with placeholders expanded", () => {
    fs.writeFileSync(
      path.join(tempDir, "mpbind.json"),
      JSON.stringify({ baseDirectory: "src", targetPath: "build/${BOARD}" })
    );

    expect(runCli(["target-path", "BOARD=pico"], {}, tempDir)).to.equal(0);
    expect(runCli(["base-path"], { BOARD: "x" }, tempDir)).to.equal(0);
    expect(logged).to.deep.equal([
      path.join(tempDir, "build", "pico"),
      path.join(tempDir, "src"),
    ]);
  });

  it("should report config errors with exit code 1", () => {
    fs.writeFileSync(
      path.join(tempDir, "mpbind.json"),
      JSON.stringify({ targetPath: "${UNSET}" })
    );

    expect(runCli(["target-path"], {}, tempDir)).to.equal(1);
    expect(errors[0]).to.equal(
      `Error: ${path.join(tempDir, "mpbind.json")}: unresolved placeholder \${UNSET}\n  Hint: Define UNSET in 'variables', the environment or as UNSET=value`
    );
  });

  it("should list scanned sources in sorted order", () => {
    fs.writeFileSync(path.join(tempDir, "mpbind.json"), "{}");
    fs.writeFileSync(path.join(tempDir, "b.h"), "");
    fs.writeFileSync(path.join(tempDir, "a.hpp"), "");
    fs.writeFileSync(path.join(tempDir, "notes.txt"), "");

    expect(runCli(["sources"], {}, tempDir)).to.equal(0);
    expect(logged).to.deep.equal([
      [path.join(tempDir, "a.hpp"), path.join(tempDir, "b.h")].join("\n"),
    ]);
  });
});
