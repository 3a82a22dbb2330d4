import { OutputFormat } from "../types";

export interface CLIConfig {
  outputFormat: OutputFormat;
  quiet: boolean;
  maxBusDepth: number;
  outputFile?: string;
}

export interface CommandOptions {
  format: string;
  quiet?: boolean;
  maxBusDepth?: string;
  output?: string;
}
