/**
 * Lexical declaration scanning
 * Main dispatcher - re-exports from scanner/ subdirectory
 */

export * from "./scanner/index.js";
