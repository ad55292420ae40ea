import * as path from "path";
import * as fs from "fs";
import * as yaml from "js-yaml";
import { z } from "zod";
import { ValidationError } from "../kicad/errors";

export const CONFIG_FILE = "eda-files.yml";

const ConfigFileSchema = z
  .object({
    symbolDirs: z.array(z.string()).default([]),
    footprintDirs: z.array(z.string()).default([]),
    variables: z.record(z.string()).default({}),
    includeSystemLibraries: z.boolean().default(true),
    paper: z.string().min(1).default("A4"),
    generator: z.string().min(1).default("eeschema"),
  })
  .strict();

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

export interface Config extends ConfigFile {
  projectRoot: string;
  /** Config file that was read, if any. */
  configPath?: string;
}

let configCache: Config | null = null;

function splitDirs(value: string | undefined, cwd: string): string[] {
  if (!value) return [];
  return value
    .split(path.delimiter)
    .filter(dir => dir.length > 0)
    .map(dir => path.resolve(cwd, dir));
}

/**
 * Parse and validate an `eda-files.yml` document. Relative directories are
 * taken relative to `baseDir`.
 */
export function parseConfigFile(text: string, baseDir: string, source = CONFIG_FILE): ConfigFile {
  const raw: unknown = yaml.load(text) ?? {};
  const parsed = ConfigFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
    throw new ValidationError(`Invalid ${source}: ${issues.join("; ")}`, { path: source, issues });
  }
  return {
    ...parsed.data,
    symbolDirs: parsed.data.symbolDirs.map(dir => path.resolve(baseDir, dir)),
    footprintDirs: parsed.data.footprintDirs.map(dir => path.resolve(baseDir, dir)),
  };
}

/**
 * Build the configuration from defaults, the optional config file and the
 * environment, later sources taking priority.
 */
export function loadConfig(cwd: string, env: NodeJS.ProcessEnv = process.env): Config {
  const configPath = env.EDA_FILES_CONFIG ? path.resolve(cwd, env.EDA_FILES_CONFIG) : path.join(cwd, CONFIG_FILE);
  let fileConfig = parseConfigFile("", cwd);
  let usedPath: string | undefined;

  if (fs.existsSync(configPath)) {
    fileConfig = parseConfigFile(fs.readFileSync(configPath, "utf-8"), path.dirname(configPath), configPath);
    usedPath = configPath;
  } else if (env.EDA_FILES_CONFIG) {
    console.warn(`⚠️  Config file ${configPath} does not exist, using defaults`);
  }

  return {
    ...fileConfig,
    projectRoot: cwd,
    configPath: usedPath,
    symbolDirs: [...splitDirs(env.EDA_FILES_SYMBOL_DIRS, cwd), ...fileConfig.symbolDirs],
    footprintDirs: [...splitDirs(env.EDA_FILES_FOOTPRINT_DIRS, cwd), ...fileConfig.footprintDirs],
  };
}

export function getConfig(): Config {
  if (configCache) return configCache;
  configCache = loadConfig(process.env.INIT_CWD || process.cwd());
  return configCache;
}
