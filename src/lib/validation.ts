import { isAbsolute, normalize } from "path";

const SAFE_UNIT_NAME_PATTERN = /^[a-zA-Z0-9._@-]+$/;
const SAFE_PACKAGE_PATTERN = /^[a-zA-Z0-9._+:~-]+$/;
const SAFE_VERSION_PATTERN = /^[a-zA-Z0-9._+:~-]+$/;

// Returns a message instead of throwing so the loader can collect every problem.

export function checkUnitName(name: string): string | null {
  if (!SAFE_UNIT_NAME_PATTERN.test(name) || name === "." || name === "..") {
    return `Invalid unit name: ${name}`;
  }
  return null;
}

export function checkPackageName(name: string): string | null {
  if (!SAFE_PACKAGE_PATTERN.test(name) || name.startsWith("-")) {
    return `Invalid package name: ${name}`;
  }
  return null;
}

export function checkVersion(version: string): string | null {
  if (!SAFE_VERSION_PATTERN.test(version) || version.startsWith("-")) {
    return `Invalid version: ${version}`;
  }
  return null;
}

export function checkServiceName(name: string): string | null {
  if (!SAFE_UNIT_NAME_PATTERN.test(name) || name.startsWith("-")) {
    return `Invalid service name: ${name}`;
  }
  return null;
}

export function checkTargetPath(path: string): string | null {
  if (!isAbsolute(path)) {
    return `File path must be absolute: ${path}`;
  }
  if (path.includes("\0")) {
    return `Invalid file path: ${path}`;
  }
  if (normalize(path) === "/") {
    return `Refusing to manage the filesystem root`;
  }
  return null;
}

export function parseMode(mode: string): number {
  return parseInt(mode, 8);
}
