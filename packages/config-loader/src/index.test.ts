import { mkdirSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { randomUUID } from "node:crypto";

import { afterEach, beforeEach, describe, expect, test } from "vitest";

import {
  DEFAULT_SOCRATIC_CHECK_CONFIG,
  loadSocraticCheckConfig,
  SocraticCheckConfigParseError,
  SocraticCheckConfigValidationError,
} from "./index";

function createTempDirectory(): string {
  const path = join(tmpdir(), `socratic-check-config-loader-test-${randomUUID()}`);
  mkdirSync(path, { recursive: true });
  return path;
}

describe("config-loader", () => {
  let tempDirectory: string;

  beforeEach(() => {
    tempDirectory = createTempDirectory();
  });

  afterEach(() => {
    rmSync(tempDirectory, { recursive: true, force: true });
  });

  function writeConfig(lines: readonly string[], fileName = ".socratic-check.yml"): void {
    writeFileSync(join(tempDirectory, fileName), lines.join("\n"), "utf8");
  }

  function expectValidationError(message: string): void {
    try {
      loadSocraticCheckConfig({ workingDirectory: tempDirectory });
      throw new Error("expected loadSocraticCheckConfig to throw");
    } catch (error) {
      expect(error).toBeInstanceOf(SocraticCheckConfigValidationError);
      expect(error instanceof Error ? error.message : "").toContain(message);
    }
  }

  test("returns defaults when .socratic-check.yml is missing", () => {
    const config = loadSocraticCheckConfig({ workingDirectory: tempDirectory });

    expect(config).toEqual(DEFAULT_SOCRATIC_CHECK_CONFIG);
    expect(config).not.toBe(DEFAULT_SOCRATIC_CHECK_CONFIG);
  });

  test("returns defaults for an empty file", () => {
    writeConfig([""]);

    expect(loadSocraticCheckConfig({ workingDirectory: tempDirectory })).toEqual(
      DEFAULT_SOCRATIC_CHECK_CONFIG,
    );
  });

  test("loads classifier options, pattern overrides and question bank entries", () => {
    writeConfig([
      "classifier:",
      "  codeBlockLineThreshold: 12",
      "patterns:",
      "  - id: socratic/finished-code-block",
      "    severity: medium",
      "    thresholds:",
      "      codeBlockLineThreshold: 20",
      "  - id: socratic/handed-over-tests",
      "    enabled: false",
      "questionBank:",
      "  other:",
      '    - "  What would you try first?  "',
    ]);

    const config = loadSocraticCheckConfig({ workingDirectory: tempDirectory });

    expect(config).toEqual({
      classifier: { codeBlockLineThreshold: 12 },
      patterns: [
        {
          id: "socratic/finished-code-block",
          severity: "medium",
          thresholds: { codeBlockLineThreshold: 20 },
        },
        { id: "socratic/handed-over-tests", enabled: false },
      ],
      questionBank: { other: ["What would you try first?"] },
    });
  });

  test("resolves a custom file name", () => {
    writeConfig(["classifier:", "  maxInputLength: 500"], "strict.yml");

    const config = loadSocraticCheckConfig({
      workingDirectory: tempDirectory,
      fileName: "strict.yml",
    });

    expect(config.classifier).toEqual({ maxInputLength: 500 });
  });

  test("throws parse error for invalid yaml", () => {
    writeConfig(["classifier:", "  maxInputLength: ["]);

    expect(() => loadSocraticCheckConfig({ workingDirectory: tempDirectory })).toThrow(
      SocraticCheckConfigParseError,
    );

    try {
      loadSocraticCheckConfig({ workingDirectory: tempDirectory });
      throw new Error("expected loadSocraticCheckConfig to throw");
    } catch (error) {
      expect(error).toBeInstanceOf(SocraticCheckConfigParseError);
      expect(error instanceof Error ? error.message : "").toContain(
        "Invalid socratic-check YAML",
      );
    }
  });

  test("throws schema error for a top-level list", () => {
    writeConfig(["- classifier"]);

    expectValidationError("top-level config must be an object");
  });

  test("throws schema error for an out-of-range classifier option", () => {
    writeConfig(["classifier:", "  maxInputLength: 0"]);

    expectValidationError("classifier.maxInputLength must be an integer greater than or equal to 1");
  });

  test("throws schema error for an unknown classifier option", () => {
    writeConfig(["classifier:", "  strict: true"]);

    expectValidationError("classifier.strict is not a recognized option");
  });

  test("throws schema error for an unknown category in a pattern override", () => {
    writeConfig(["patterns:", "  - id: socratic/finished-code-block", "    category: rude"]);

    expectValidationError("patterns[0].category must be one of gave-finished-code");
  });

  test("throws schema error for an unknown threshold", () => {
    writeConfig([
      "patterns:",
      "  - id: socratic/finished-code-block",
      "    thresholds:",
      "      lineCount: 3",
    ]);

    expectValidationError("patterns[0].thresholds.lineCount is not a recognized threshold");
  });

  test("throws schema error for a pattern override without an id", () => {
    writeConfig(["patterns:", "  - severity: low"]);

    expectValidationError("patterns[0].id must be a non-empty string");
  });

  test("throws schema error for an unknown question bank category", () => {
    writeConfig(["questionBank:", "  rudeness:", "    - Why?"]);

    expectValidationError("questionBank.rudeness is not a known category");
  });

  test("throws schema error for non-string questions", () => {
    writeConfig(["questionBank:", "  other:", "    - What next?", "    - 42"]);

    expectValidationError("questionBank.other[1] must be a non-empty string");
  });
});
