import { existsSync } from "node:fs";
import { dirname, join, resolve } from "node:path";
import { fileURLToPath } from "node:url";

// Sources run from src/, builds from dist/src/; the schemas sit beside package.json.
const detectAssetRoot = (): string => {
  let dir = dirname(fileURLToPath(import.meta.url));
  for (;;) {
    if (existsSync(join(dir, "package.json")) && existsSync(join(dir, "schemas"))) {
      return dir;
    }
    const parent = resolve(dir, "..");
    if (parent === dir) {
      return process.cwd();
    }
    dir = parent;
  }
};

const ASSET_ROOT = detectAssetRoot();

export const getAssetRoot = (): string => ASSET_ROOT;

export const getSchemaPath = (fileName: string): string => join(ASSET_ROOT, "schemas", fileName);
