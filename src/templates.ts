import path from "path";
import { fileURLToPath } from "url";
import yaml from "js-yaml";
import { ConfigurationError, SramError } from "./errors.js";
import { isRecord, readText } from "./util.js";

export type TemplateDoc = {
  example_configs: Record<string, Record<string, unknown>>;
};

export type ConfigSource = {
  /** Template name, or the file's base name without extension. */
  name: string;
  raw: unknown;
};

export const DEFAULT_TEMPLATES_PATH = fileURLToPath(new URL("../config/sram_configs.yaml", import.meta.url));

const CONFIG_FILE = /\.(json|ya?ml)$/i;

/** Reads a `.json` file with JSON.parse and anything else as YAML. */
export function readStructuredFile(file: string): unknown {
  let text: string;
  try {
    text = readText(file);
  } catch (e) {
    throw new SramError(`Cannot read ${file}`, { cause: e });
  }
  try {
    return /\.json$/i.test(file) ? JSON.parse(text) : yaml.load(text);
  } catch (e) {
    throw new SramError(`Cannot parse ${file}: ${e instanceof Error ? e.message : String(e)}`, { cause: e });
  }
}

export function parseTemplates(doc: unknown, source = "templates"): TemplateDoc {
  const configs = isRecord(doc) ? doc.example_configs : undefined;
  if (!isRecord(configs)) {
    throw new SramError(`${source}: expected a top-level 'example_configs' mapping`);
  }
  const out: Record<string, Record<string, unknown>> = {};
  for (const [name, entry] of Object.entries(configs)) {
    if (!isRecord(entry)) throw new SramError(`${source}: template '${name}' is not a mapping`);
    out[name] = entry;
  }
  return { example_configs: out };
}

export function loadTemplates(file: string = DEFAULT_TEMPLATES_PATH): TemplateDoc {
  return parseTemplates(readStructuredFile(file), file);
}

/** One `name: DEPTHxWIDTH, N banks, Pnm` line per template, in file order. */
export function listTemplates(doc: TemplateDoc): string[] {
  return Object.entries(doc.example_configs).map(
    ([name, c]) => `${name}: ${String(c.depth)}x${String(c.width)}, ${String(c.banks)} banks, ${String(c.process_node)}nm`,
  );
}

/**
 * A reference ending in .json, .yaml or .yml is a configuration file; anything
 * else names a template in the templates document.
 */
export function resolveConfigSource(ref: string, templatesPath: string = DEFAULT_TEMPLATES_PATH): ConfigSource {
  if (CONFIG_FILE.test(ref)) {
    return { name: path.basename(ref).replace(CONFIG_FILE, ""), raw: readStructuredFile(ref) };
  }
  const doc = loadTemplates(templatesPath);
  const entry = doc.example_configs[ref];
  if (!entry) {
    const names = Object.keys(doc.example_configs);
    throw new ConfigurationError("config", ref, `a configuration file or one of: ${names.join(", ")}`);
  }
  return { name: ref, raw: entry };
}
