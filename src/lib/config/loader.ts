import { readFileSync, existsSync } from "fs";
import { parse as parseYaml } from "yaml";
import { DocumentSchema, type DesiredDocument } from "./schema.js";
import { isDocumentMap, mergeOverrides, type DocumentMap } from "./merge.js";
import { getDefaultDocumentPath, getLocalOverridePath } from "./path.js";
import { MalformedSpecError, errorMessage, type SpecIssue } from "../errors.js";

export interface LoadDocumentResult {
  document: DesiredDocument;
  documentPath: string;
  /** Files that contributed to the document, base first. */
  sources: string[];
}

function parseYamlFile(filePath: string): { data: DocumentMap; issues: SpecIssue[] } {
  const issues: SpecIssue[] = [];
  try {
    const content = readFileSync(filePath, "utf-8");
    const data: unknown = parseYaml(content);
    if (data === null || data === undefined) {
      return { data: {}, issues };
    }
    if (!isDocumentMap(data)) {
      issues.push({
        source: filePath,
        message: "Desired state must be a YAML mapping (object), not a scalar or sequence",
      });
      return { data: {}, issues };
    }
    return { data, issues };
  } catch (error) {
    issues.push({ source: filePath, message: errorMessage(error) });
    return { data: {}, issues };
  }
}

/**
 * Load and validate a desired-state document.
 * 1. Parse the document (default: $XDG_CONFIG_HOME/converge/host.yaml)
 * 2. If <name>.local.yaml exists beside it, overlay it
 * 3. Validate with the zod schema
 *
 * Every problem found is collected into one MalformedSpecError.
 */
export function loadDocument(documentPath?: string): LoadDocumentResult {
  const path = documentPath || getDefaultDocumentPath();

  if (!existsSync(path)) {
    throw new MalformedSpecError([{ source: path, message: "Desired-state document not found" }]);
  }

  const issues: SpecIssue[] = [];
  const sources = [path];

  const base = parseYamlFile(path);
  issues.push(...base.issues);
  let merged = base.data;

  const localPath = getLocalOverridePath(path);
  if (existsSync(localPath)) {
    const local = parseYamlFile(localPath);
    issues.push(...local.issues);
    sources.push(localPath);
    if (Object.keys(local.data).length > 0) {
      merged = mergeOverrides(merged, local.data);
    }
  }

  if (issues.length > 0) {
    throw new MalformedSpecError(issues);
  }

  const result = DocumentSchema.safeParse(merged);
  if (!result.success) {
    throw new MalformedSpecError(
      result.error.issues.map((issue) => ({
        source: path,
        message: issue.message,
        path: issue.path.map(String),
      })),
    );
  }

  return { document: result.data, documentPath: path, sources };
}
