#!/usr/bin/env node

/**
 * KiCad file backend CLI
 */

import { FileBackend } from "../backend/FileBackend";
import { getConfig } from "./config";
import { cmdSchematic } from "./commands/schematic";
import { cmdBoard } from "./commands/board";
import { cmdLib } from "./commands/lib";
import { reportError } from "./utils";

function printHelp(): void {
  console.log(`
KiCad file backend CLI

Usage:
  eda-files <command> <action> [args] [options]

Commands:
  sch read|create <file>           Read a schematic as JSON, or create an empty one
  sch add-symbol <file> <Lib:Sym> <Ref> [Value] --at x,y [--rotation deg] [--unit n]
  sch remove-symbol|move-symbol <file> <Ref> [--at x,y]
  sch add-wire <file> x1,y1 x2,y2
  sch add-label <file> <text> --at x,y [--kind label|global_label|hierarchical_label]
  sch add-power <file> <name> --at x,y
  sch add-junction|add-no-connect <file> x,y
  sch pins <file> <Ref>            Pin positions on the sheet
  sch net <file> <Ref> <pin>       Net a pin is on
  sch members|nets <file> [net]    Net membership
  sch validate|hierarchy <file>
  pcb read|create|validate|info|rules <file>
  pcb place <file> <Lib:Footprint> <Ref> [Value] --x n --y n [--layer F.Cu|B.Cu]
  pcb compare|sync <board> <schematic>
  lib symbol|search|footprints <query> [--project dir]
  lib search-footprints|footprint <query|Lib:Footprint> [--project dir]
  lib create <name> [--kind symbol|footprint] [--project dir]
  lib register <name> <path> --kind symbol|footprint [--project dir]
  lib import-symbol|import-footprint <Lib:Name> <target> [--project dir]

Configuration:
  eda-files.yml in the working directory, or EDA_FILES_CONFIG.
  EDA_FILES_SYMBOL_DIRS and EDA_FILES_FOOTPRINT_DIRS add library directories.
`);
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  const command = args[0];
  const commandArgs = args.slice(1);

  const config = getConfig();
  const backend = new FileBackend({
    symbolDirs: config.symbolDirs,
    footprintDirs: config.footprintDirs,
    includeSystemLibraries: config.includeSystemLibraries,
    variables: config.variables,
    paper: config.paper,
    generator: config.generator,
  });

  switch (command) {
    case "sch":
      return cmdSchematic(backend, commandArgs);
    case "pcb":
      return cmdBoard(backend, commandArgs);
    case "lib":
      return cmdLib(backend, commandArgs);
    case "--help":
    case "-h":
    case "help":
      printHelp();
      break;
    default:
      if (command) {
        console.error(`Unknown command: ${command}\n`);
      }
      printHelp();
      process.exit(command ? 1 : 0);
  }
}

main().catch((err) => {
  reportError(err);
});
