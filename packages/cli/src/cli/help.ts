/**
 * CLI help message
 */

import { VERSION } from "./constants.js";

export const showHelp = (): void => {
  console.log(`
mpbind - MicroPython bindings from annotated C++ headers v${VERSION}

USAGE:
  mpbind <command> [config] [NAME=value...] [options] [-- compiler flags]

COMMANDS:
  generate [config]         Scan, validate and write <target>.h and <target>.cpp
  components [config]       Print the scanned components
  sources [config]          Print the scanned source files
  target-path [config]      Print the resolved target path
  base-path [config]        Print the resolved base directory
  help                      Show help
  version                   Show version

OPTIONS:
  -h, --help                Show help
  -v, --version             Show version
  -V, --verbose             Verbose output
  -q, --quiet               Suppress warnings
  -o, --target <path>       Artifact base path ('-' for stdout)
  -t, --tags <file>         Tag vocabulary file (YAML or JSON)
  -I, --include <dir>       Add an include search directory

Without a config argument, mpbind.json is searched for from the working
directory upwards. NAME=value arguments override config variables and the
environment. -I and -D in the flags after -- and in CFLAGS, CXXFLAGS and
CPPFLAGS are honoured.

EXIT CODES:
  0  success
  1  usage or configuration error
  2  validation failed
  3  header or dependency resolution failed
  4  generation failed

EXAMPLES:
  mpbind generate
  mpbind generate lib/mpbind.json -o build/bindings
  mpbind generate BOARD=pico -- -Iinclude -DUSE_FLOAT=1
  mpbind components
`);
};
