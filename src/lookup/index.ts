export * from "./lookup-errors";
export * from "./lookup-config";
export * from "./numeric-coercion";
export * from "./parameter-resolver";
export * from "./signal-resolver";
