/**
 * CLI help message
 */

import { VERSION } from "./constants.js";

/**
 * Show help message
 */
export const showHelp = (): void => {
  console.log(`
declmap - map declared types to their source files v${VERSION}

USAGE:
  declmap <command> [directory] [options]

COMMANDS:
  init                      Write a starter declmap.json
  map [dir]                 Print the identifier-to-file table as JSON
  generate [dir]            Render a standalone loader module

GLOBAL OPTIONS:
  -h, --help                Show help
  -v, --version             Show version
  -V, --verbose             Verbose output
  -q, --quiet               Suppress output
  -c, --config <file>       Config file path (default: declmap.json)

MAP/GENERATE OPTIONS:
  -o, --out <file>          Write to a file instead of stdout
  -e, --ext <list>          Comma-separated extensions (default: ts)
  -x, --exclude <pattern>   gitignore-style exclude pattern (repeatable)
  --case-sensitive          Exact-case lookups
  --follow-symlinks         Descend into symlinked directories
  --prepend                 Register ahead of existing resolvers
  --include-static          Load declaration-free files eagerly
  --absolute                Write absolute paths into the loader
  -n, --namespace <ns>      Namespace recorded in the loader marker
  --class-name <name>       Loader class name (default: Autoloader)

EXAMPLES:
  declmap init
  declmap map src --ext ts,tsx
  declmap generate lib -o lib/autoload.cjs --ext cjs --include-static
`);
};
