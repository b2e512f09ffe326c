/**
 * Module loading through Node's CommonJS loader
 *
 * `require` keeps every loaded file in its module cache, so each file is
 * evaluated at most once per process however often it is asked for.
 */

import { createRequire } from "node:module";
import type { ModuleLoader } from "./types.js";

const require = createRequire(import.meta.url);

export const requireModule: ModuleLoader = (file) => {
  require(file);
};
