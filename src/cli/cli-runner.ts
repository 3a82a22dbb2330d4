import { Command } from "commander";
import { promises as fs } from "fs";
import chalk from "chalk";
import { CLIConfig, CommandOptions } from "./cli-interface";
import { ResultDisplayManager } from "./result-display";
import {
  ExportFormat,
  OutputFormat,
  TestResult,
  deserializeTestResult,
} from "../types";
import {
  DEFAULT_LOOKUP_CONFIG,
  resolveParameter,
  resolveSignal,
} from "../lookup";

const OUTPUT_FORMATS: readonly OutputFormat[] = ["table", "json", "csv"];

function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

export class CLIRunner {
  private program: Command;
  private display: ResultDisplayManager;

  constructor(display: ResultDisplayManager = new ResultDisplayManager()) {
    this.program = new Command();
    this.display = display;
    this.setupCommands();
  }

  private setupCommands(): void {
    this.program
      .name("simlookup")
      .description(
        "Recover overridden parameters and logged signals from simulation test results"
      )
      .version("1.0.0");

    this.program
      .command("param <name> <file>")
      .description("Print the value of an overridden parameter")
      .option("-f, --format <format>", "Output format (table|json|csv)", "table")
      .option("-q, --quiet", "Suppress iteration fallback warnings", false)
      .action(async (name: string, file: string, options: CommandOptions) => {
        await this.runParameter(name, file, options);
      });

    this.program
      .command("signal <name> <file>")
      .description("Print or export a logged signal")
      .option("-f, --format <format>", "Output format (table|json|csv)", "table")
      .option("-o, --output <path>", "Export the signal to a file instead")
      .option("--max-bus-depth <depth>", "Deepest bus nesting to follow", "32")
      .action(async (name: string, file: string, options: CommandOptions) => {
        await this.runSignal(name, file, options);
      });
  }

  private buildConfig(options: CommandOptions): CLIConfig {
    if (!isOutputFormat(options.format)) {
      throw new Error(
        `Unsupported output format: ${options.format} (expected ${OUTPUT_FORMATS.join("|")})`
      );
    }

    return {
      outputFormat: options.format,
      quiet: options.quiet ?? false,
      maxBusDepth:
        options.maxBusDepth === undefined
          ? DEFAULT_LOOKUP_CONFIG.maxBusDepth
          : Number(options.maxBusDepth),
      outputFile: options.output,
    };
  }

  async loadTestResult(file: string): Promise<TestResult> {
    const content = await fs.readFile(file, "utf-8");
    const { result, validation } = deserializeTestResult(content);

    if (!validation.isValid || !result) {
      throw new Error(
        `Invalid test result in ${file}: ${validation.errors.join(", ")}`
      );
    }

    this.display.displayWarnings(validation.warnings);
    return result;
  }

  private async runParameter(
    name: string,
    file: string,
    options: CommandOptions
  ): Promise<void> {
    try {
      const config = this.buildConfig(options);
      const result = await this.loadTestResult(file);
      const value = resolveParameter(name, result, {
        warnOnIterationFallback: !config.quiet,
        onWarning: (message) => this.display.displayWarnings([message]),
      });
      this.display.displayParameter(name, value, config.outputFormat);
    } catch (error) {
      this.display.displayError(error);
      process.exitCode = 1;
    }
  }

  private async runSignal(
    name: string,
    file: string,
    options: CommandOptions
  ): Promise<void> {
    try {
      const config = this.buildConfig(options);
      const result = await this.loadTestResult(file);
      const signal = resolveSignal(name, result, {
        maxBusDepth: config.maxBusDepth,
      });

      if (config.outputFile) {
        const exportFormat: ExportFormat =
          config.outputFormat === "csv" ? "csv" : "json";
        await this.display.exportSignal(
          name,
          signal,
          exportFormat,
          config.outputFile
        );
        return;
      }

      this.display.displaySignal(name, signal, config.outputFormat);
    } catch (error) {
      this.display.displayError(error);
      process.exitCode = 1;
    }
  }

  async run(args: string[] = process.argv): Promise<void> {
    try {
      await this.program.parseAsync(args);
    } catch (error) {
      console.error(chalk.red(`❌ CLI Error: ${error}`));
      process.exitCode = 1;
    }
  }
}
