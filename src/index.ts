// Main entry point for simresult-lookup
export * from "./types";
export * from "./lookup";
export * from "./cli";

// Version information
export const VERSION = "1.0.0";
export const APP_NAME = "simresult-lookup";
