import { existsSync } from "fs";
import { loadDocument, resolveSourcePath, type DesiredDocument, type UnitDefinition } from "./config/index.js";
import { CyclicDependencyError, MalformedSpecError, type SpecIssue } from "./errors.js";
import { findCycle, topologicalSort } from "./graph.js";
import {
  checkPackageName,
  checkServiceName,
  checkTargetPath,
  checkUnitName,
  checkVersion,
  parseMode,
} from "./validation.js";
import type { DesiredState, DesiredUnit, ReconcileSettings } from "./types.js";

function toSettings(document: DesiredDocument): ReconcileSettings {
  const { settings } = document;
  return {
    packageManager: settings.package_manager,
    commandTimeoutMs: settings.command_timeout_ms,
    concurrency: settings.concurrency,
    rollback: settings.rollback,
    backupRetention: settings.backup_retention,
  };
}

function toUnit(name: string, definition: UnitDefinition, documentPath: string): DesiredUnit {
  const dependencies = [...new Set(definition.depends_on)].sort();
  const base = { name, dependencies, description: definition.description };

  switch (definition.kind) {
    case "package":
      return {
        ...base,
        kind: "package",
        packageName: definition.package ?? name,
        state: definition.state,
        version: definition.version,
      };
    case "service":
      return {
        ...base,
        kind: "service",
        serviceName: definition.unit ?? name,
        state: definition.state,
        enabled: definition.enabled,
        restartOn: [...new Set(definition.restart_on)].sort(),
      };
    case "file":
      return {
        ...base,
        kind: "file",
        path: definition.path,
        state: definition.state,
        content: definition.content,
        sourcePath: definition.source ? resolveSourcePath(definition.source, documentPath) : undefined,
        mode: definition.mode ? parseMode(definition.mode) : undefined,
        pause: [...new Set(definition.pause)].sort(),
      };
  }
}

function checkUnit(unit: DesiredUnit, units: Map<string, DesiredUnit>, source: string): SpecIssue[] {
  const issues: SpecIssue[] = [];
  const at = (field: string, message: string) => issues.push({ source, path: ["units", unit.name, field], message });

  const nameIssue = checkUnitName(unit.name);
  if (nameIssue) issues.push({ source, path: ["units", unit.name], message: nameIssue });

  for (const dependency of unit.dependencies) {
    if (!units.has(dependency)) at("depends_on", `Unknown unit: ${dependency}`);
  }

  switch (unit.kind) {
    case "package": {
      const packageIssue = checkPackageName(unit.packageName);
      if (packageIssue) at("package", packageIssue);
      if (unit.version) {
        const versionIssue = checkVersion(unit.version);
        if (versionIssue) at("version", versionIssue);
        if (unit.state === "absent") at("version", "A version cannot be pinned on an absent package");
      }
      break;
    }
    case "service": {
      const serviceIssue = checkServiceName(unit.serviceName);
      if (serviceIssue) at("unit", serviceIssue);
      for (const ref of unit.restartOn) {
        const target = units.get(ref);
        if (!target) at("restart_on", `Unknown unit: ${ref}`);
        else if (target.kind !== "file") at("restart_on", `restart_on must name a file unit: ${ref} is a ${target.kind}`);
      }
      break;
    }
    case "file": {
      const pathIssue = checkTargetPath(unit.path);
      if (pathIssue) at("path", pathIssue);
      if (unit.state === "present") {
        const hasContent = unit.content !== undefined;
        const hasSource = unit.sourcePath !== undefined;
        if (hasContent === hasSource) {
          at("content", "A present file needs exactly one of content or source");
        }
        if (unit.sourcePath && !existsSync(unit.sourcePath)) {
          at("source", `Source not found: ${unit.sourcePath}`);
        }
      }
      for (const ref of unit.pause) {
        const target = units.get(ref);
        if (!target) at("pause", `Unknown unit: ${ref}`);
        else if (target.kind !== "service") at("pause", `pause must name a service unit: ${ref} is a ${target.kind}`);
      }
      break;
    }
  }

  return issues;
}

export function prerequisitesOf(units: ReadonlyMap<string, DesiredUnit>): Map<string, string[]> {
  const prerequisites = new Map<string, string[]>();
  for (const unit of units.values()) {
    prerequisites.set(unit.name, unit.dependencies);
  }
  return prerequisites;
}

/**
 * Turn a validated document into the unit graph.
 * Throws MalformedSpecError for dangling references and invalid fields,
 * CyclicDependencyError when depends_on forms a cycle.
 */
export function buildDesiredState(document: DesiredDocument, documentPath: string): DesiredState {
  const units = new Map<string, DesiredUnit>();
  for (const name of Object.keys(document.units).sort()) {
    units.set(name, toUnit(name, document.units[name], documentPath));
  }

  const issues: SpecIssue[] = [];
  for (const unit of units.values()) {
    issues.push(...checkUnit(unit, units, documentPath));
  }
  if (issues.length > 0) {
    throw new MalformedSpecError(issues);
  }

  const cycle = findCycle(prerequisitesOf(units));
  if (cycle) {
    throw new CyclicDependencyError(cycle);
  }

  return { sourcePath: documentPath, settings: toSettings(document), units };
}

export function loadDesiredState(documentPath?: string): DesiredState {
  const { document, documentPath: resolvedPath } = loadDocument(documentPath);
  return buildDesiredState(document, resolvedPath);
}

/** Units in an order where every unit follows its dependencies. */
export function dependencyOrder(state: DesiredState): string[] {
  return topologicalSort(state.units.keys(), prerequisitesOf(state.units)).order;
}
