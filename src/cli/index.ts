export * from "./cli-interface";
export * from "./cli-runner";
export * from "./result-display";
