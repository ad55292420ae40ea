import { FileBackend } from "../../backend/FileBackend";
import { die, numberFlag, parseArgs, printJson, stringFlag } from "../utils";

const LAYERS = ["F.Cu", "B.Cu"] as const;

/**
 * pcb: Read and edit a board file, or reconcile it with a schematic.
 */
export async function cmdBoard(backend: FileBackend, args: string[]): Promise<void> {
  const [action, file, ...rest] = args;
  if (!action || !file) die("Usage: pcb <action> <file.kicad_pcb> [options]");
  const { positional, flags } = parseArgs(rest);

  switch (action) {
    case "read":
      return printJson(backend.readBoard(file));
    case "create":
      return printJson(backend.createBoard(file));
    case "place": {
      const [footprintId, reference, value] = positional;
      if (!footprintId || !reference) die("Usage: pcb place <file> <Lib:Footprint> <Ref> [Value] --x n --y n");
      const layerFlag = stringFlag(flags, "layer");
      const layer = LAYERS.find(l => l === layerFlag);
      if (layerFlag !== undefined && !layer) die("--layer must be F.Cu or B.Cu");
      return printJson(
        backend.placeFootprint(file, {
          footprintId,
          reference,
          value: value ?? "",
          x: numberFlag(flags, "x") ?? 0,
          y: numberFlag(flags, "y") ?? 0,
          rotation: numberFlag(flags, "rotation"),
          layer,
        }),
      );
    }
    case "info":
      return printJson(backend.getBoardInfo(file));
    case "rules":
      return printJson(backend.getDesignRules(file));
    case "validate":
      return printJson(backend.validateBoard(file));
    case "compare": {
      const schematic = positional[0];
      if (!schematic) die("Usage: pcb compare <file.kicad_pcb> <file.kicad_sch>");
      return printJson(backend.compareSchematicBoard(schematic, file));
    }
    case "sync": {
      const schematic = positional[0];
      if (!schematic) die("Usage: pcb sync <file.kicad_pcb> <file.kicad_sch>");
      console.log(`\n🔄  Syncing ${schematic} → ${file}`);
      const result = backend.syncSchematicToBoard(schematic, file);
      for (const placed of result.placed) console.log(`  ✅ placed ${placed.reference} (${placed.footprint})`);
      for (const warning of result.warnings) console.log(`  ⚠️  ${warning.message}`);
      return;
    }
    default:
      die(`Unknown pcb action: ${action}`);
  }
}
