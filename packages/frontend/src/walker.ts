/**
 * Source tree enumeration
 * Main dispatcher - re-exports from walker/ subdirectory
 */

export * from "./walker/index.js";
