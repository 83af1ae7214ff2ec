import { existsSync, readFileSync } from "node:fs";
import { resolve } from "node:path";

import {
  createComplianceEngine,
  createQuestionBank,
} from "@socratic-check/classifier";
import { loadSocraticCheckConfig } from "@socratic-check/config-loader";
import type { ClassifierConfig, ComplianceReport } from "@socratic-check/shared-types";
import { VIOLATION_CATEGORIES } from "@socratic-check/shared-types";

/** Exit code for a compliant response. */
export const EXIT_CODE_COMPLIANT = 0;
/** Exit code for a non-compliant response. */
export const EXIT_CODE_NON_COMPLIANT = 1;
/** Exit code for usage, config and input failures. */
export const EXIT_CODE_ERROR = 2;

/**
 * Environment variable naming the config file when `--config` is absent.
 */
export const CONFIG_PATH_ENV_VAR = "SOCRATIC_CHECK_CONFIG";

/**
 * Report rendering selected with `--format`.
 */
export type OutputFormat = "text" | "json";

/**
 * Parsed command-line options.
 */
export interface CliOptions {
  /**
   * Response file path, `-` for stdin, or `null` when omitted.
   */
  readonly inputPath: string | null;
  /**
   * Config file path from `--config`.
   */
  readonly configPath: string | null;
  readonly format: OutputFormat;
  /**
   * Classifier options set by flags. Only flags that were passed are present.
   */
  readonly classifier: Partial<ClassifierConfig>;
  readonly help: boolean;
}

/**
 * Error raised for malformed command-line arguments.
 */
export class CliUsageError extends Error {
  /**
   * Creates a usage error.
   *
   * @param message - Description of the argument problem.
   */
  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

/**
 * Usage text printed by `--help`.
 */
export const USAGE = `Usage:
  socratic-check [file|-] [options]

Reads a candidate assistant response from a file or stdin and reports whether
it follows the Socratic interaction policy.

Options:
  --config <path>              config file (default .socratic-check.yml, or $${CONFIG_PATH_ENV_VAR})
  --code-block-lines <n>       code block line threshold
  --sentence-threshold <n>     prose sentence threshold
  --max-input-length <n>       maximum input length in characters
  --format text|json           report format (default text)
  --help                       show this message

Exit codes:
  0 compliant, 1 non_compliant, 2 error`;

const CLASSIFIER_FLAGS: Readonly<Record<string, keyof ClassifierConfig>> = {
  "--code-block-lines": "codeBlockLineThreshold",
  "--sentence-threshold": "proseSentenceThreshold",
  "--max-input-length": "maxInputLength",
};

type ClassifierFlagValues = {
  -readonly [Field in keyof ClassifierConfig]?: ClassifierConfig[Field];
};

function isOutputFormat(value: string): value is OutputFormat {
  return value === "text" || value === "json";
}

function parseFlagInteger(flag: string, value: string): number {
  if (!/^\d+$/.test(value)) {
    throw new CliUsageError(`${flag} expects a non-negative integer, received "${value}"`);
  }

  return Number(value);
}

/**
 * Parses command-line arguments.
 *
 * @remarks
 * Value flags accept both `--flag value` and `--flag=value`. Range checks on
 * classifier options happen when the engine is built.
 *
 * @param argv - Arguments after the executable and script path.
 * @returns Parsed options.
 * @throws {@link CliUsageError} For unknown flags, missing values or extra positionals.
 */
export function parseCliArguments(argv: readonly string[]): CliOptions {
  let inputPath: string | null = null;
  let configPath: string | null = null;
  let format: OutputFormat = "text";
  let help = false;
  const classifier: ClassifierFlagValues = {};

  for (let index = 0; index < argv.length; index += 1) {
    const argument = argv[index] ?? "";

    if (argument === "--help" || argument === "-h") {
      help = true;
      continue;
    }

    if (argument === "-" || !argument.startsWith("-")) {
      if (inputPath !== null) {
        throw new CliUsageError(`unexpected argument "${argument}": only one input may be given`);
      }
      inputPath = argument;
      continue;
    }

    const separatorIndex = argument.indexOf("=");
    const flag = separatorIndex === -1 ? argument : argument.slice(0, separatorIndex);
    let value: string;
    if (separatorIndex === -1) {
      const nextArgument = argv[index + 1];
      if (nextArgument === undefined) {
        throw new CliUsageError(`${flag} requires a value`);
      }
      value = nextArgument;
      index += 1;
    } else {
      value = argument.slice(separatorIndex + 1);
    }

    if (flag === "--config") {
      configPath = value;
      continue;
    }

    if (flag === "--format") {
      if (!isOutputFormat(value)) {
        throw new CliUsageError(`--format must be text or json, received "${value}"`);
      }
      format = value;
      continue;
    }

    const field = CLASSIFIER_FLAGS[flag];
    if (field === undefined) {
      throw new CliUsageError(`unknown option ${flag}`);
    }
    classifier[field] = parseFlagInteger(flag, value);
  }

  return { inputPath, configPath, format, classifier, help };
}

/**
 * Renders a report as plain text.
 *
 * @param report - Report to render.
 * @returns Multi-line text without a trailing newline.
 */
export function formatReport(report: ComplianceReport): string {
  const lines = report.matches.map(
    (match) =>
      `[${match.severity}] ${match.category} ${match.patternId} segment=${match.segmentIndex}: ${match.explanation}`,
  );

  const matchCount = report.matches.length;
  const matchLabel = matchCount === 1 ? "match" : "matches";
  const severityLabel =
    report.maxSeverity === null ? "" : `, highest severity ${report.maxSeverity}`;
  lines.push(`verdict: ${report.verdict} (${matchCount} ${matchLabel}${severityLabel})`);

  const counts = VIOLATION_CATEGORIES.map(
    (category) => `${category}=${report.categoryCounts[category]}`,
  );
  lines.push(`categories: ${counts.join(" ")}`);

  if (report.suggestedQuestions.length > 0) {
    lines.push("suggested questions:");
    for (const question of report.suggestedQuestions) {
      lines.push(`  - ${question}`);
    }
  }

  return lines.join("\n");
}

/**
 * Reads stdin to the end as UTF-8 text.
 */
async function readStandardInput(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }

  return Buffer.concat(chunks).toString("utf8");
}

/**
 * Optional dependency overrides for {@link runCli}.
 */
export interface CliDependencies {
  /**
   * Reads a response file given its absolute path.
   */
  readonly readFile?: (filePath: string) => string;
  /**
   * Reads the response from stdin.
   */
  readonly readStdin?: () => Promise<string>;
  /**
   * Writes the rendered report.
   */
  readonly writeOutput?: (text: string) => void;
  /**
   * Error logger for failures.
   */
  readonly logError?: (message: string) => void;
  /**
   * Directory used to resolve relative input and config paths.
   */
  readonly workingDirectory?: string;
  /**
   * Environment consulted for {@link CONFIG_PATH_ENV_VAR}.
   */
  readonly environment?: Readonly<Record<string, string | undefined>>;
}

/**
 * Runs the classifier command once.
 *
 * @remarks
 * Classifier options are layered as defaults, then the config file, then
 * flags. Every failure is logged with a `[cli]` prefix and mapped to
 * {@link EXIT_CODE_ERROR}.
 *
 * @param argv - Arguments after the executable and script path.
 * @param dependencies - Optional dependency overrides.
 * @returns Process exit code.
 */
export async function runCli(
  argv: readonly string[],
  dependencies: CliDependencies = {},
): Promise<number> {
  const writeOutput = dependencies.writeOutput ?? console.log;
  const errorLogger = dependencies.logError ?? console.error;
  const readFile = dependencies.readFile ?? ((filePath: string) => readFileSync(filePath, "utf8"));
  const readStdin = dependencies.readStdin ?? readStandardInput;
  const workingDirectory = dependencies.workingDirectory ?? process.cwd();
  const environment = dependencies.environment ?? process.env;

  try {
    const options = parseCliArguments(argv);
    if (options.help) {
      writeOutput(USAGE);
      return EXIT_CODE_COMPLIANT;
    }

    const configPath = options.configPath ?? environment[CONFIG_PATH_ENV_VAR] ?? null;
    if (configPath !== null && !existsSync(resolve(workingDirectory, configPath))) {
      throw new CliUsageError(`config file not found: ${resolve(workingDirectory, configPath)}`);
    }

    const fileConfig = loadSocraticCheckConfig({
      workingDirectory,
      ...(configPath === null ? {} : { fileName: configPath }),
    });

    const engine = createComplianceEngine({
      config: { ...fileConfig.classifier, ...options.classifier },
      patternOverrides: fileConfig.patterns,
      questionBank: createQuestionBank(fileConfig.questionBank),
    });

    const rawText =
      options.inputPath === null || options.inputPath === "-"
        ? await readStdin()
        : readFile(resolve(workingDirectory, options.inputPath));

    const report = engine.classify(rawText);
    writeOutput(
      options.format === "json" ? JSON.stringify(report, null, 2) : formatReport(report),
    );

    return report.verdict === "compliant" ? EXIT_CODE_COMPLIANT : EXIT_CODE_NON_COMPLIANT;
  } catch (error) {
    const detail = error instanceof Error ? `${error.name}: ${error.message}` : String(error);
    errorLogger(`[cli] ${detail}`);
    return EXIT_CODE_ERROR;
  }
}
