/**
 * Resolve the configured viewer identifier to a callable viewer
 */

import { isAbsolute, resolve } from "node:path";
import { pathToFileURL } from "node:url";
import { createConsoleViewer } from "./console.js";
import type { Viewer } from "./types.js";

export const BUILTIN_VIEWER = "console";

function isViewer(value: unknown): value is Viewer {
  return typeof value === "function";
}

/** Relative or absolute file paths load from disk; anything else is a package specifier */
function toSpecifier(id: string): string {
  if (id.startsWith(".") || isAbsolute(id)) {
    return pathToFileURL(resolve(id)).href;
  }
  return id;
}

/**
 * Load a viewer. The module must export a function as `default` or `view`.
 */
export async function loadViewer(id: string): Promise<Viewer> {
  if (id === BUILTIN_VIEWER) {
    return createConsoleViewer();
  }

  let mod: Record<string, unknown>;
  try {
    mod = await import(toSpecifier(id));
  } catch (err) {
    throw new Error(`Failed to load viewer module "${id}": ${err instanceof Error ? err.message : String(err)}`);
  }

  const candidate = isViewer(mod.default) ? mod.default : mod.view;
  if (!isViewer(candidate)) {
    throw new Error(`Viewer module "${id}" exports no "default" or "view" function`);
  }
  return candidate;
}
