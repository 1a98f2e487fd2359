/**
 * Loads workflows from a user module. The module may export, by name or as
 * default, a HandlerSet, an array of HandlerSets, or an array of workflow
 * descriptors (grouped into one set at the module's `version`, else "0.0.0").
 */

import { resolve } from "node:path";
import { pathToFileURL } from "node:url";
import { FatalSupervisorError } from "@flowhost/core";
import type { HandlerSet, WorkflowDescriptor } from "./define.js";
import type { Logger } from "./logger.js";

const LOG_PREFIX = "flowhost-worker:loader";
const UNVERSIONED = "0.0.0";

function isRecord(x: unknown): x is Record<string, unknown> {
  return typeof x === "object" && x !== null;
}

function isSchema(x: unknown): boolean {
  return isRecord(x) && typeof x.safeParse === "function";
}

export function isWorkflowDescriptor(x: unknown): x is WorkflowDescriptor {
  return (
    isRecord(x) &&
    typeof x.name === "string" &&
    typeof x.handler === "function" &&
    isSchema(x.input) &&
    isSchema(x.output)
  );
}

export function isHandlerSet(x: unknown): x is HandlerSet {
  return (
    isRecord(x) &&
    typeof x.version === "string" &&
    Array.isArray(x.workflows) &&
    x.workflows.every(isWorkflowDescriptor)
  );
}

/**
 * Collect handler sets from a module's exports.
 */
export function collectHandlerSets(mod: unknown): HandlerSet[] {
  if (!isRecord(mod)) return [];
  const sets: HandlerSet[] = [];
  const loose: WorkflowDescriptor[] = [];
  for (const key of ["handlerSets", "workflows", "default"]) {
    const value = mod[key];
    if (isHandlerSet(value)) {
      sets.push(value);
    } else if (Array.isArray(value)) {
      for (const item of value) {
        if (isHandlerSet(item)) sets.push(item);
        else if (isWorkflowDescriptor(item)) loose.push(item);
      }
    }
  }
  if (loose.length > 0) {
    const version = typeof mod.version === "string" ? mod.version : UNVERSIONED;
    sets.push({ version, workflows: loose });
  }
  return sets;
}

/**
 * Import a workflow module by file path and return its handler sets.
 * Import failures and modules without workflows are fatal.
 */
export async function loadWorkflowModule(path: string, log?: Logger): Promise<HandlerSet[]> {
  const url = pathToFileURL(resolve(path)).href;
  let mod: unknown;
  try {
    mod = await import(url);
  } catch (err) {
    throw new FatalSupervisorError(
      `${LOG_PREFIX}:loadWorkflowModule - Failed to import ${path}: ${err instanceof Error ? err.message : String(err)}`,
      err
    );
  }
  const sets = collectHandlerSets(mod);
  if (sets.length === 0) {
    throw new FatalSupervisorError(`${LOG_PREFIX}:loadWorkflowModule - ${path} exports no workflows`);
  }
  log?.info(
    { path, sets: sets.map((s) => ({ version: s.version, workflows: s.workflows.length })) },
    `${LOG_PREFIX}:loadWorkflowModule - Loaded workflows`
  );
  return sets;
}
