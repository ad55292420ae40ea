import { FileBackend } from "../../backend/FileBackend";
import { die, parseArgs, printJson, stringFlag } from "../utils";

const KINDS = ["symbol", "footprint"] as const;

/**
 * lib: Look up library symbols and footprints, and manage project libraries.
 */
export async function cmdLib(backend: FileBackend, args: string[]): Promise<void> {
  const [action, ...rest] = args;
  const { positional, flags } = parseArgs(rest);
  const projectDir = stringFlag(flags, "project");
  const subject = positional[0];
  if (!subject) die("Usage: lib <action> <subject> [--project dir]");

  switch (action) {
    case "symbol":
      return printJson(backend.resolveLibrarySymbol(subject, projectDir));
    case "search":
      return printJson(backend.searchSymbols(subject, projectDir));
    case "footprints":
      return printJson(backend.suggestFootprints(subject, projectDir));
    case "search-footprints":
      return printJson(backend.searchFootprints(subject, projectDir));
    case "footprint":
      return printJson(backend.getFootprintInfo(subject, projectDir));
    case "create": {
      const kindFlag = stringFlag(flags, "kind");
      const kind = KINDS.find(k => k === kindFlag);
      if (kindFlag !== undefined && !kind) die("--kind must be symbol or footprint");
      return printJson(backend.createProjectLibrary(projectDir ?? ".", subject, kind ? [kind] : undefined));
    }
    case "register": {
      const [, libraryPath] = positional;
      const kind = KINDS.find(k => k === stringFlag(flags, "kind"));
      if (!libraryPath || !kind) die("Usage: lib register <name> <path> --kind symbol|footprint [--project dir]");
      return printJson(backend.registerProjectLibrary(projectDir ?? ".", subject, libraryPath, kind));
    }
    case "import-symbol": {
      const target = positional[1];
      if (!target) die("Usage: lib import-symbol <Lib:Symbol> <target.kicad_sym> [--project dir]");
      return printJson(backend.importSymbol(subject, target, projectDir));
    }
    case "import-footprint": {
      const target = positional[1];
      if (!target) die("Usage: lib import-footprint <Lib:Footprint> <target.pretty> [--project dir]");
      return printJson(backend.importFootprint(subject, target, projectDir));
    }
    default:
      die(`Unknown lib action: ${action}`);
  }
}
