import fs from "fs";
import path from "path";
import type { SramConfig } from "./config.js";
import { ArtifactWriteError } from "./errors.js";
import { createLogger } from "./logger.js";
import { renderDesign, type VerilogArtifact } from "./rtl_render.js";
import { describeDesign } from "./rtl_structure.js";

const log = createLogger("rtl");

function stage(parent: string, target: string, artifacts: VerilogArtifact[]): string {
  let staging: string;
  try {
    staging = fs.mkdtempSync(path.join(parent, `.${path.basename(target)}.staging-`));
  } catch (e) {
    throw new ArtifactWriteError(target, "cannot create staging directory", e);
  }
  try {
    for (const a of artifacts) {
      fs.writeFileSync(path.join(staging, a.name), a.text, "utf8");
    }
  } catch (e) {
    fs.rmSync(staging, { recursive: true, force: true });
    throw new ArtifactWriteError(target, "cannot write staged artifact", e);
  }
  log.debug(`staged ${artifacts.length} artifact(s) in ${staging}`);
  return staging;
}

/**
 * Moves the staged directory into place. An existing destination is set aside
 * first and only removed once the new set is in; if the swap fails it is put
 * back, so the destination always holds one complete generation. When another
 * writer published in between, its set stays and the retired copy is dropped.
 */
function publish(staging: string, target: string): void {
  if (!fs.existsSync(target)) {
    fs.renameSync(staging, target);
    return;
  }
  if (!fs.statSync(target).isDirectory()) {
    throw new ArtifactWriteError(target, "destination exists and is not a directory");
  }
  const retired = `${staging}.retired`;
  fs.renameSync(target, retired);
  try {
    fs.renameSync(staging, target);
  } catch (e) {
    try {
      fs.renameSync(retired, target);
    } catch (restoreError) {
      log.warn(`cannot restore ${target}, keeping the set now in place:`, restoreError);
      fs.rmSync(retired, { recursive: true, force: true });
    }
    throw new ArtifactWriteError(target, "cannot publish staged artifacts", e);
  }
  fs.rmSync(retired, { recursive: true, force: true });
}

export function writeArtifacts(destination: string, artifacts: VerilogArtifact[]): string[] {
  const target = path.resolve(destination);
  const parent = path.dirname(target);
  try {
    fs.mkdirSync(parent, { recursive: true });
  } catch (e) {
    throw new ArtifactWriteError(target, "cannot create parent directory", e);
  }
  const staging = stage(parent, target, artifacts);
  try {
    publish(staging, target);
  } catch (e) {
    fs.rmSync(staging, { recursive: true, force: true });
    if (e instanceof ArtifactWriteError) throw e;
    throw new ArtifactWriteError(target, "cannot publish staged artifacts", e);
  }
  log.debug(`published ${artifacts.length} artifact(s) to ${target}`);
  return artifacts.map((a) => a.name);
}

/** Renders every module of the configured macro and writes them all-or-nothing under `destination`. */
export function generateVerilog(config: SramConfig, destination: string): string[] {
  return writeArtifacts(destination, renderDesign(describeDesign(config)));
}
