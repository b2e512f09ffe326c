/**
 * Declaration mapping
 * Main dispatcher - re-exports from mapping/ subdirectory
 */

export * from "./mapping/index.js";
