import path from "node:path";
import { cfg } from "./config/env.js";

export function getDataRoot(): string {
  return path.resolve(cfg.data.root);
}

export function resolveDbPath(): string {
  return path.join(getDataRoot(), cfg.data.dbFilename);
}

export function resolveClipsDir(): string {
  return path.resolve(cfg.data.clipsDir);
}
