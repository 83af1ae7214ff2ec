import { existsSync, readFileSync } from "node:fs";
import { resolve } from "node:path";

import type {
  ClassifierConfig,
  PatternOverride,
  ThresholdKey,
  ViolationCategory,
} from "@socratic-check/shared-types";
import {
  isSeverity,
  isThresholdKey,
  isViolationCategory,
  SEVERITY_LEVELS,
  VIOLATION_CATEGORIES,
} from "@socratic-check/shared-types";
import { parseDocument } from "yaml";

/**
 * Filename used for project-level socratic-check configuration.
 */
export const DEFAULT_CONFIG_FILE_NAME = ".socratic-check.yml";

/**
 * Normalized configuration file contents.
 *
 * @remarks
 * Only the classifier fields present in the file are set, so callers can layer
 * command-line flags on top and let the engine fill in its own defaults.
 */
export interface SocraticCheckConfig {
  /**
   * Classifier options set by the file.
   */
  classifier: Partial<ClassifierConfig>;
  /**
   * Per-pattern overrides in file order.
   */
  patterns: PatternOverride[];
  /**
   * Question lists replacing the defaults for the named categories.
   */
  questionBank: Partial<Record<ViolationCategory, string[]>>;
}

/**
 * Optional loader arguments for resolving config location.
 */
export interface LoadSocraticCheckConfigOptions {
  /**
   * Base directory where the config file is resolved.
   */
  workingDirectory?: string;
  /**
   * Override for config filename, relative to the working directory or absolute.
   */
  fileName?: string;
}

/**
 * Error raised when reading the config file fails.
 */
export class SocraticCheckConfigReadError extends Error {
  /**
   * Absolute path to the config file.
   */
  filePath: string;

  /**
   * Creates a read error with location context.
   *
   * @param filePath - Absolute path to config file.
   * @param details - Read failure details.
   * @param cause - Optional underlying error.
   */
  constructor(filePath: string, details: string, cause?: unknown) {
    super(`Unable to read socratic-check config in ${filePath}: ${details}`, { cause });
    this.name = "SocraticCheckConfigReadError";
    this.filePath = filePath;
  }
}

/**
 * Error raised when YAML parsing fails.
 */
export class SocraticCheckConfigParseError extends Error {
  /**
   * Absolute path to the config file.
   */
  filePath: string;

  /**
   * Creates a parse error with location context.
   *
   * @param filePath - Absolute path to config file.
   * @param details - Parse failure details.
   */
  constructor(filePath: string, details: string) {
    super(`Invalid socratic-check YAML in ${filePath}: ${details}`);
    this.name = "SocraticCheckConfigParseError";
    this.filePath = filePath;
  }
}

/**
 * Error raised when parsed config does not satisfy schema constraints.
 */
export class SocraticCheckConfigValidationError extends Error {
  /**
   * Absolute path to the config file.
   */
  filePath: string;

  /**
   * Creates a schema validation error.
   *
   * @param filePath - Absolute path to config file.
   * @param details - Validation details.
   */
  constructor(filePath: string, details: string) {
    super(`Invalid socratic-check config in ${filePath}: ${details}`);
    this.name = "SocraticCheckConfigValidationError";
    this.filePath = filePath;
  }
}

/**
 * Configuration applied when the file is missing or sections are omitted.
 */
export const DEFAULT_SOCRATIC_CHECK_CONFIG: SocraticCheckConfig = {
  classifier: {},
  patterns: [],
  questionBank: {},
};

const CLASSIFIER_FIELD_MINIMUMS: Readonly<Record<keyof ClassifierConfig, number>> = {
  codeBlockLineThreshold: 0,
  proseSentenceThreshold: 0,
  maxInputLength: 1,
};

type ClassifierOptions = {
  -readonly [Field in keyof ClassifierConfig]?: ClassifierConfig[Field];
};

const PATTERN_OVERRIDE_FIELDS = ["id", "enabled", "category", "severity", "thresholds"];

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isClassifierField(value: string): value is keyof ClassifierConfig {
  return Object.keys(CLASSIFIER_FIELD_MINIMUMS).includes(value);
}

function cloneDefaults(): SocraticCheckConfig {
  return {
    classifier: { ...DEFAULT_SOCRATIC_CHECK_CONFIG.classifier },
    patterns: [...DEFAULT_SOCRATIC_CHECK_CONFIG.patterns],
    questionBank: { ...DEFAULT_SOCRATIC_CHECK_CONFIG.questionBank },
  };
}

function toInteger(value: unknown, minimum: number, fieldPath: string, filePath: string): number {
  if (typeof value !== "number" || !Number.isInteger(value) || value < minimum) {
    throw new SocraticCheckConfigValidationError(
      filePath,
      `${fieldPath} must be an integer greater than or equal to ${minimum}`,
    );
  }

  return value;
}

function toQuestionList(value: unknown, fieldPath: string, filePath: string): string[] {
  if (!Array.isArray(value) || value.length === 0) {
    throw new SocraticCheckConfigValidationError(
      filePath,
      `${fieldPath} must be a non-empty array of strings`,
    );
  }

  return value.map((entry, index) => {
    if (typeof entry !== "string" || !entry.trim()) {
      throw new SocraticCheckConfigValidationError(
        filePath,
        `${fieldPath}[${index}] must be a non-empty string`,
      );
    }

    return entry.trim();
  });
}

function applyClassifier(
  rawValue: unknown,
  normalizedConfig: SocraticCheckConfig,
  filePath: string,
): void {
  if (rawValue === undefined) {
    return;
  }

  if (!isPlainObject(rawValue)) {
    throw new SocraticCheckConfigValidationError(filePath, "classifier must be an object");
  }

  const classifier: ClassifierOptions = {};
  for (const [field, value] of Object.entries(rawValue)) {
    if (!isClassifierField(field)) {
      throw new SocraticCheckConfigValidationError(
        filePath,
        `classifier.${field} is not a recognized option`,
      );
    }

    classifier[field] = toInteger(
      value,
      CLASSIFIER_FIELD_MINIMUMS[field],
      `classifier.${field}`,
      filePath,
    );
  }

  normalizedConfig.classifier = classifier;
}

function toThresholdOverrides(
  rawValue: unknown,
  fieldPath: string,
  filePath: string,
): Partial<Record<ThresholdKey, number>> {
  if (!isPlainObject(rawValue)) {
    throw new SocraticCheckConfigValidationError(filePath, `${fieldPath} must be an object`);
  }

  const thresholds: Partial<Record<ThresholdKey, number>> = {};
  for (const [key, value] of Object.entries(rawValue)) {
    if (!isThresholdKey(key)) {
      throw new SocraticCheckConfigValidationError(
        filePath,
        `${fieldPath}.${key} is not a recognized threshold`,
      );
    }

    thresholds[key] = toInteger(value, 0, `${fieldPath}.${key}`, filePath);
  }

  return thresholds;
}

function toPatternOverride(
  rawValue: unknown,
  fieldPath: string,
  filePath: string,
): PatternOverride {
  if (!isPlainObject(rawValue)) {
    throw new SocraticCheckConfigValidationError(filePath, `${fieldPath} must be an object`);
  }

  const unknownField = Object.keys(rawValue).find(
    (field) => !PATTERN_OVERRIDE_FIELDS.includes(field),
  );
  if (unknownField !== undefined) {
    throw new SocraticCheckConfigValidationError(
      filePath,
      `${fieldPath}.${unknownField} is not a recognized field`,
    );
  }

  const { id, enabled, category, severity, thresholds } = rawValue;
  if (typeof id !== "string" || !id.trim()) {
    throw new SocraticCheckConfigValidationError(
      filePath,
      `${fieldPath}.id must be a non-empty string`,
    );
  }

  if (enabled !== undefined && typeof enabled !== "boolean") {
    throw new SocraticCheckConfigValidationError(filePath, `${fieldPath}.enabled must be a boolean`);
  }

  if (category !== undefined && !isViolationCategory(category)) {
    throw new SocraticCheckConfigValidationError(
      filePath,
      `${fieldPath}.category must be one of ${VIOLATION_CATEGORIES.join(", ")}`,
    );
  }

  if (severity !== undefined && !isSeverity(severity)) {
    throw new SocraticCheckConfigValidationError(
      filePath,
      `${fieldPath}.severity must be one of ${SEVERITY_LEVELS.join(", ")}`,
    );
  }

  return {
    id: id.trim(),
    ...(enabled === undefined ? {} : { enabled }),
    ...(category === undefined ? {} : { category }),
    ...(severity === undefined ? {} : { severity }),
    ...(thresholds === undefined
      ? {}
      : { thresholds: toThresholdOverrides(thresholds, `${fieldPath}.thresholds`, filePath) }),
  };
}

function applyPatterns(
  rawValue: unknown,
  normalizedConfig: SocraticCheckConfig,
  filePath: string,
): void {
  if (rawValue === undefined) {
    return;
  }

  if (!Array.isArray(rawValue)) {
    throw new SocraticCheckConfigValidationError(filePath, "patterns must be an array");
  }

  normalizedConfig.patterns = rawValue.map((entry, index) =>
    toPatternOverride(entry, `patterns[${index}]`, filePath),
  );
}

function applyQuestionBank(
  rawValue: unknown,
  normalizedConfig: SocraticCheckConfig,
  filePath: string,
): void {
  if (rawValue === undefined) {
    return;
  }

  if (!isPlainObject(rawValue)) {
    throw new SocraticCheckConfigValidationError(filePath, "questionBank must be an object");
  }

  for (const [category, questions] of Object.entries(rawValue)) {
    if (!isViolationCategory(category)) {
      throw new SocraticCheckConfigValidationError(
        filePath,
        `questionBank.${category} is not a known category`,
      );
    }

    normalizedConfig.questionBank[category] = toQuestionList(
      questions,
      `questionBank.${category}`,
      filePath,
    );
  }
}

function parseRawConfig(filePath: string): unknown {
  let rawYaml = "";
  try {
    rawYaml = readFileSync(filePath, "utf8");
  } catch (caughtError) {
    const details =
      caughtError instanceof Error ? caughtError.message : String(caughtError);
    throw new SocraticCheckConfigReadError(filePath, details, caughtError);
  }

  const yamlDocument = parseDocument(rawYaml);

  if (yamlDocument.errors.length > 0) {
    const details = yamlDocument.errors.map((yamlError) => yamlError.message).join("; ");
    throw new SocraticCheckConfigParseError(filePath, details);
  }

  return yamlDocument.toJSON();
}

function normalizeConfig(rawValue: unknown, filePath: string): SocraticCheckConfig {
  if (rawValue === null || rawValue === undefined) {
    return cloneDefaults();
  }

  if (!isPlainObject(rawValue)) {
    throw new SocraticCheckConfigValidationError(filePath, "top-level config must be an object");
  }

  const normalizedConfig = cloneDefaults();

  applyClassifier(rawValue.classifier, normalizedConfig, filePath);
  applyPatterns(rawValue.patterns, normalizedConfig, filePath);
  applyQuestionBank(rawValue.questionBank, normalizedConfig, filePath);

  return normalizedConfig;
}

/**
 * Loads and validates `.socratic-check.yml` from disk.
 *
 * @remarks
 * When the config file does not exist, defaults are returned. An empty file
 * also yields defaults. Parse and schema errors throw explicit typed errors.
 * Pattern ids are checked later, when the pattern library is built.
 *
 * @param options - Optional location overrides.
 * @returns Normalized config.
 */
export function loadSocraticCheckConfig(
  options: LoadSocraticCheckConfigOptions = {},
): SocraticCheckConfig {
  const workingDirectory = options.workingDirectory ?? process.cwd();
  const fileName = options.fileName ?? DEFAULT_CONFIG_FILE_NAME;
  const filePath = resolve(workingDirectory, fileName);

  if (!existsSync(filePath)) {
    return cloneDefaults();
  }

  const rawConfig = parseRawConfig(filePath);
  return normalizeConfig(rawConfig, filePath);
}
