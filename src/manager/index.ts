/**
 * Manager Module
 */

export * from "./store";
export * from "./codec";
export * from "./manager";
export * from "./file";
