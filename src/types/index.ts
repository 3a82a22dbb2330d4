// Core data model interfaces
export * from "./common";
export * from "./test-result";
export * from "./validation";
export * from "./serialization";
export * from "./statistics";
