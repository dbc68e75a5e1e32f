import { homedir } from "os";
import { dirname, isAbsolute, join, resolve } from "path";

const APP_DIR = "converge";

export function expandPath(pathValue: string): string {
  if (pathValue === "~") return homedir();
  if (pathValue.startsWith("~/")) return join(homedir(), pathValue.slice(2));
  return pathValue;
}

export function getConfigDir(): string {
  const xdgConfig = process.env.XDG_CONFIG_HOME;
  const base = xdgConfig || join(homedir(), ".config");
  return join(base, APP_DIR);
}

export function getCacheDir(): string {
  const xdgCache = process.env.XDG_CACHE_HOME;
  const base = xdgCache || join(homedir(), ".cache");
  return join(base, APP_DIR);
}

export function getDefaultDocumentPath(): string {
  return join(getConfigDir(), "host.yaml");
}

/** `host.yaml` -> `host.local.yaml`, next to the document. */
export function getLocalOverridePath(documentPath: string): string {
  const match = documentPath.match(/^(.*)\.(ya?ml)$/);
  if (!match) return `${documentPath}.local`;
  return `${match[1]}.local.${match[2]}`;
}

/**
 * Resolve a file unit's `source`. Supports:
 * - Absolute paths (start with /)
 * - Home-relative paths (start with ~)
 * - Relative paths (resolved against the document's directory)
 */
export function resolveSourcePath(source: string, documentPath: string): string {
  const expanded = expandPath(source);
  if (isAbsolute(expanded)) return expanded;
  return resolve(dirname(documentPath), expanded);
}
