import { FileBackend } from "../../backend/FileBackend";
import { LabelKind } from "../../kicad/types";
import { die, numberFlag, parseArgs, printJson, stringFlag } from "../utils";

const LABEL_KINDS: LabelKind[] = ["label", "global_label", "hierarchical_label"];

function point(value: string | undefined, what: string): { x: number; y: number } {
  const parts = (value ?? "").split(",").map(Number);
  if (parts.length !== 2 || parts.some(n => !Number.isFinite(n))) die(`${what} must look like x,y`);
  return { x: parts[0], y: parts[1] };
}

/**
 * sch: Read, edit and query a schematic file.
 */
export async function cmdSchematic(backend: FileBackend, args: string[]): Promise<void> {
  const [action, file, ...rest] = args;
  if (!action || !file) die("Usage: sch <action> <file.kicad_sch> [options]");
  const { positional, flags } = parseArgs(rest);

  switch (action) {
    case "read":
      return printJson(backend.readSchematic(file));
    case "create":
      console.log(`\n📄  Creating ${file}`);
      return printJson(backend.createSchematic(file, { title: stringFlag(flags, "title"), paper: stringFlag(flags, "paper") }));
    case "add-symbol": {
      const [libId, reference, value] = positional;
      if (!libId || !reference) die("Usage: sch add-symbol <file> <Lib:Symbol> <Ref> [Value] --at x,y");
      const at = point(stringFlag(flags, "at"), "--at");
      return printJson(
        backend.addSymbol(file, {
          libId,
          reference,
          value: value ?? libId.slice(libId.indexOf(":") + 1),
          x: at.x,
          y: at.y,
          rotation: numberFlag(flags, "rotation"),
          unit: numberFlag(flags, "unit"),
          footprint: stringFlag(flags, "footprint"),
        }),
      );
    }
    case "remove-symbol":
      if (!positional[0]) die("Usage: sch remove-symbol <file> <Ref>");
      return printJson(backend.removeSymbol(file, positional[0], numberFlag(flags, "unit")));
    case "move-symbol": {
      if (!positional[0]) die("Usage: sch move-symbol <file> <Ref> --at x,y");
      const at = point(stringFlag(flags, "at"), "--at");
      return printJson(backend.moveSymbol(file, positional[0], { ...at, rotation: numberFlag(flags, "rotation") }, numberFlag(flags, "unit")));
    }
    case "add-wire":
      return printJson(backend.addWire(file, point(positional[0], "start"), point(positional[1], "end")));
    case "add-label": {
      const kind = stringFlag(flags, "kind") ?? "label";
      const labelKind = LABEL_KINDS.find(k => k === kind);
      if (!labelKind) die(`--kind must be one of ${LABEL_KINDS.join(", ")}`);
      const at = point(stringFlag(flags, "at"), "--at");
      if (!positional[0]) die("Usage: sch add-label <file> <text> --at x,y");
      return printJson(backend.addLabel(file, { text: positional[0], ...at, kind: labelKind, rotation: numberFlag(flags, "rotation") }));
    }
    case "add-power": {
      if (!positional[0]) die("Usage: sch add-power <file> <name> --at x,y");
      const at = point(stringFlag(flags, "at"), "--at");
      return printJson(backend.addPowerSymbol(file, { name: positional[0], ...at, rotation: numberFlag(flags, "rotation") }));
    }
    case "add-junction":
      return printJson(backend.addJunction(file, point(positional[0], "position")));
    case "add-no-connect":
      return printJson(backend.addNoConnect(file, point(positional[0], "position")));
    case "pins":
      if (!positional[0]) die("Usage: sch pins <file> <Ref>");
      return printJson(backend.getPinPositions(file, positional[0]));
    case "net":
      if (!positional[0] || !positional[1]) die("Usage: sch net <file> <Ref> <pin>");
      return printJson(backend.getPinNet(file, positional[0], positional[1]));
    case "members":
      if (!positional[0]) die("Usage: sch members <file> <net>");
      return printJson(backend.getNetMembers(file, positional[0]));
    case "nets":
      return printJson(backend.listNets(file));
    case "hierarchy":
      return printJson(backend.getSheetHierarchy(file));
    case "validate": {
      console.log(`\n🔍  Validating ${file}...`);
      const result = backend.validateSchematic(file);
      for (const issue of result.errors) console.log(`  ❌ ${issue.rule}: ${issue.message}`);
      for (const issue of result.warnings) console.log(`  ⚠️  ${issue.rule}: ${issue.message}`);
      if (!result.valid) {
        console.log(`\n❌  Schematic validation failed.\n`);
        process.exit(1);
      }
      console.log(`\n✨  Schematic is valid.\n`);
      return;
    }
    default:
      die(`Unknown sch action: ${action}`);
  }
}
