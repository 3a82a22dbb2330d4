import chalk from "chalk";
import Table from "cli-table3";
import { promises as fs } from "fs";
import {
  ExportFormat,
  OutputFormat,
  ResolvedSignal,
  calculateSignalStats,
} from "../types";
import { isResultLookupError } from "../lookup";

export class ResultDisplayManager {
  displayParameter(name: string, value: number, format: OutputFormat): void {
    switch (format) {
      case "json":
        console.log(JSON.stringify({ name, value }));
        return;
      case "csv":
        console.log("name,value");
        console.log(`${this.escapeCSV(name)},${value}`);
        return;
      case "table": {
        const table = new Table({
          head: [chalk.blue.bold("Parameter"), chalk.blue.bold("Value")],
          colWidths: [30, 20],
          style: { head: [], border: [] },
        });
        table.push([name, this.formatNumber(value)]);
        console.log(table.toString());
        return;
      }
    }
  }

  displaySignal(
    name: string,
    signal: ResolvedSignal,
    format: OutputFormat
  ): void {
    switch (format) {
      case "json":
        console.log(this.convertToJSON(name, signal));
        return;
      case "csv":
        console.log(this.convertToCSV(signal));
        return;
      case "table":
        this.displaySignalSummary(name, signal);
        return;
    }
  }

  private displaySignalSummary(name: string, signal: ResolvedSignal): void {
    const stats = calculateSignalStats(signal);
    const summaryTable = new Table({
      head: [chalk.blue.bold(`Signal ${name}`), chalk.blue.bold("Value")],
      colWidths: [25, 20],
      style: { head: [], border: [] },
    });

    summaryTable.push(
      ["Samples", stats.count.toString()],
      ["Start Time", this.formatNumber(stats.startTime)],
      ["End Time", this.formatNumber(stats.endTime)],
      ["Initial Value", this.formatNumber(stats.initial)],
      ["Final Value", this.formatNumber(stats.final)],
      ["Minimum", this.formatNumber(stats.min)],
      ["Maximum", this.formatNumber(stats.max)],
      ["Average", this.formatNumber(stats.avg)]
    );

    console.log(summaryTable.toString());

    if (signal.values.length !== signal.times.length) {
      console.log(
        chalk.yellow(
          `⚠️  ${signal.values.length} values but ${signal.times.length} time samples`
        )
      );
    }
  }

  displayWarnings(warnings: string[]): void {
    warnings.forEach((warning) => {
      console.warn(chalk.yellow(`⚠️  ${warning}`));
    });
  }

  displayError(error: unknown): void {
    if (isResultLookupError(error)) {
      console.error(chalk.red(`❌ ${error.message}`));
      return;
    }
    const message = error instanceof Error ? error.message : String(error);
    console.error(chalk.red(`❌ ${message}`));
  }

  async exportSignal(
    name: string,
    signal: ResolvedSignal,
    format: ExportFormat,
    filename?: string
  ): Promise<string> {
    const timestamp = new Date().toISOString().replace(/[:.]/g, "-");
    const safeName = name.replace(/[^A-Za-z0-9_-]/g, "_");
    const outputFile = filename || `signal-${safeName}-${timestamp}.${format}`;

    const content =
      format === "json"
        ? this.convertToJSON(name, signal)
        : this.convertToCSV(signal);

    try {
      await fs.writeFile(outputFile, content, "utf-8");
      console.log(chalk.green(`✅ Signal exported to: ${outputFile}`));
      return outputFile;
    } catch (error) {
      console.error(chalk.red(`❌ Export failed: ${error}`));
      throw error;
    }
  }

  convertToJSON(name: string, signal: ResolvedSignal): string {
    return JSON.stringify(
      { name, values: signal.values, times: signal.times },
      null,
      2
    );
  }

  /**
   * One row per sample; rows beyond the shorter sequence are dropped.
   */
  convertToCSV(signal: ResolvedSignal): string {
    const rowCount = Math.min(signal.values.length, signal.times.length);
    const rows = ["time,value"];

    for (let i = 0; i < rowCount; i++) {
      rows.push(`${signal.times[i]},${signal.values[i]}`);
    }

    return rows.join("\n");
  }

  private escapeCSV(cell: string): string {
    return /[",\n]/.test(cell) ? `"${cell.replace(/"/g, '""')}"` : cell;
  }

  private formatNumber(value: number): string {
    if (Number.isInteger(value)) {
      return value.toString();
    }
    return Number.isFinite(value)
      ? String(Number(value.toPrecision(6)))
      : String(value);
  }
}
