/**
 * CLI help message
 */

import { VERSION } from "./constants.js";

/**
 * Show help message
 */
export const showHelp = (): void => {
  console.log(`
asmprobe - namespace / assembly file resolver v${VERSION}

USAGE:
  asmprobe <command> [options]

COMMANDS:
  resolve <name>            Resolve against search directories, then the shared location
  probe <name> <dir>        Probe a single directory
  shared <name>             Probe the shared location only
  classify <name>           Report whether <name> is a literal path or a symbolic name

GLOBAL OPTIONS:
  -h, --help                Show help
  -v, --version             Show version
  -V, --verbose             Trace every probe
  -q, --quiet               No matches or misses printed, exit code only
  -c, --config <file>       Config file path (default: nearest asmprobe.json/.yaml)

RESOLVE OPTIONS:
  -L, --lib <dir>           Search directory (repeatable, probed in order)
  -i, --ignore <file>       File name that is never returned
  --shared-dir <dir>        Shared location (default: the Node.js executable's directory)
  --json                    Print matches as a JSON array

EXIT CODES:
  0  match found            3  config file not found
  1  invalid arguments      4  nothing resolved
  2  unknown command

EXAMPLES:
  asmprobe resolve Acme.Widget -L ./lib -L ./bin
  asmprobe resolve plugins/Acme.Widget.dll --ignore host.dll
  asmprobe probe Acme.Widget ./lib --json
  asmprobe classify "C:\\libs\\Acme.Widget.dll"
`);
};
