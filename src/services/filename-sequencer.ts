import * as fs from "node:fs/promises";
import type { Dirent } from "node:fs";
import * as path from "node:path";
import { randomUUID } from "node:crypto";
import { LOG_PREFIX } from "../constants.js";
import type { SequenceAction } from "../constants.js";
import { StitchError, errorMessage, invalidInput, toIoError } from "../errors.js";
import {
  compareBytes,
  hasExtension,
  readNumberPrefix,
  renameExclusive,
  stripNumberPrefix,
} from "../utils.js";
import type { RenameEntry, RenamePlan, RenameReport } from "../types.js";

export interface SequenceTarget {
  directory: string;
  filenames: string[];
}

async function isDirectory(p: string): Promise<boolean> {
  try {
    return (await fs.stat(p)).isDirectory();
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === "ENOENT") {
      throw invalidInput(`Path not found: ${p}`);
    }
    throw toIoError(error, `inspect ${p}`);
  }
}

/**
 * Resolves the batch to one directory: a single folder argument takes every
 * regular file in it with a matching extension; otherwise the arguments are
 * files that must share a parent directory.
 */
export async function resolveSequenceTarget(
  paths: string[],
  extensions: readonly string[]
): Promise<SequenceTarget> {
  if (paths.length === 0) {
    throw invalidInput("No files provided");
  }

  const resolved = paths.map((p) => path.resolve(p));

  if (resolved.length === 1 && (await isDirectory(resolved[0]))) {
    const directory = resolved[0];
    let entries: Dirent[];
    try {
      entries = await fs.readdir(directory, { withFileTypes: true });
    } catch (error) {
      throw toIoError(error, `list ${directory}`);
    }
    const filenames = entries
      .filter((e) => e.isFile() && hasExtension(e.name, extensions))
      .map((e) => e.name);
    if (filenames.length === 0) {
      throw invalidInput(
        `No files with extensions ${extensions.join(", ")} found in ${directory}`
      );
    }
    return { directory, filenames };
  }

  const directories = new Set(resolved.map((p) => path.dirname(p)));
  if (directories.size > 1) {
    throw invalidInput(
      `All files must be in the same directory, got ${directories.size} directories`
    );
  }

  for (const p of resolved) {
    if (await isDirectory(p)) {
      throw invalidInput(`Expected a file but got a directory: ${p}`);
    }
  }

  const filenames = [...new Set(resolved.map((p) => path.basename(p)))];
  return { directory: path.dirname(resolved[0]), filenames };
}

export function computeTarget(filename: string, action: SequenceAction, index: number): string {
  const bare = stripNumberPrefix(filename);
  return action === "number" ? `${index + 1} ${bare}` : bare;
}

/**
 * Computes every rename of the batch and validates the whole target set.
 * `existing` is the current directory listing; a target already present
 * there that is not itself being renamed away is a conflict.
 */
export function planRenames(
  directory: string,
  filenames: string[],
  action: SequenceAction,
  existing: string[]
): RenamePlan {
  const sorted = [...filenames].sort(compareBytes);

  const entries: RenameEntry[] = sorted.map((source, index) => ({
    source,
    prefix: readNumberPrefix(source),
    target: computeTarget(source, action, index),
  }));

  const conflicts: string[] = [];

  for (const entry of entries) {
    if (entry.target.length === 0) {
      conflicts.push(`"${entry.source}" would be renamed to an empty name`);
    }
  }

  const byTarget = new Map<string, string[]>();
  for (const entry of entries) {
    const sources = byTarget.get(entry.target) ?? [];
    sources.push(entry.source);
    byTarget.set(entry.target, sources);
  }
  for (const [target, sources] of byTarget) {
    if (sources.length > 1) {
      conflicts.push(`${sources.map((s) => `"${s}"`).join(", ")} would all become "${target}"`);
    }
  }

  const batchSources = new Set(sorted);
  const onDisk = new Set(existing);
  for (const entry of entries) {
    if (entry.target !== entry.source && onDisk.has(entry.target) && !batchSources.has(entry.target)) {
      conflicts.push(`"${entry.target}" already exists`);
    }
  }

  if (conflicts.length > 0) {
    throw new StitchError(`Rename aborted, no files were changed: ${conflicts.join("; ")}`, {
      code: "RENAME_CONFLICT",
      details: { directory, conflicts },
    });
  }

  return {
    directory,
    changes: entries.filter((e) => e.target !== e.source),
    unchanged: entries.filter((e) => e.target === e.source),
  };
}

function partialFailure(
  plan: RenamePlan,
  applied: RenameEntry[],
  failed: RenameEntry,
  error: unknown,
  staged: Map<RenameEntry, string>
): StitchError {
  const pending = plan.changes.filter((e) => !applied.includes(e));
  const lines = [
    `Rename of "${failed.source}" → "${failed.target}" failed: ${errorMessage(error)}`,
    `Renamed: ${applied.length === 0 ? "none" : applied.map((e) => `"${e.source}" → "${e.target}"`).join(", ")}`,
    `Not renamed: ${pending.map((e) => {
      const temp = staged.get(e);
      return temp ? `"${e.source}" (currently "${temp}")` : `"${e.source}"`;
    }).join(", ")}`,
  ];
  return new StitchError(lines.join("\n"), {
    code: "PARTIAL_RENAME_FAILURE",
    details: {
      directory: plan.directory,
      renamed: applied.map((e) => ({ ...e })),
      pending: pending.map((e) => ({ ...e, current: staged.get(e) ?? e.source })),
    },
    cause: error,
  });
}

/**
 * Moves parked files back to their original names where those are still
 * free. Entries that stay parked remain in `staged`.
 */
async function restoreStaged(directory: string, staged: Map<RenameEntry, string>): Promise<void> {
  for (const [entry, temp] of [...staged]) {
    try {
      await renameExclusive(path.join(directory, temp), path.join(directory, entry.source));
      staged.delete(entry);
    } catch (error) {
      console.warn(
        `${LOG_PREFIX} Could not move "${temp}" back to "${entry.source}": ${errorMessage(error)}`
      );
    }
  }
}

/**
 * Applies a validated plan one file at a time, each rename taken once its
 * target is no longer another pending file's name. Only a cycle of targets
 * parks a file under a temporary name. A failure stops the batch: renames
 * already applied stay applied, parked files go back to their own names.
 */
export async function applyRenamePlan(plan: RenamePlan): Promise<RenameReport> {
  const { directory } = plan;
  const token = randomUUID().slice(0, 8);
  const pending = [...plan.changes];
  const applied: RenameEntry[] = [];
  const staged = new Map<RenameEntry, string>();
  const at = (name: string) => path.join(directory, name);

  const fail = async (entry: RenameEntry, error: unknown): Promise<StitchError> => {
    await restoreStaged(directory, staged);
    return partialFailure(plan, applied, entry, error, staged);
  };

  while (pending.length > 0) {
    const held = new Set(pending.map((e) => staged.get(e) ?? e.source));
    const index = pending.findIndex((e) => !held.has(e.target));

    if (index === -1) {
      // every remaining target is held by another pending file
      const entry = pending.find((e) => !staged.has(e)) ?? pending[0];
      const temp = `.renaming-${token}-${plan.changes.indexOf(entry)}`;
      try {
        await fs.rename(at(staged.get(entry) ?? entry.source), at(temp));
      } catch (error) {
        throw await fail(entry, error);
      }
      staged.set(entry, temp);
      continue;
    }

    const [entry] = pending.splice(index, 1);
    try {
      await fs.rename(at(staged.get(entry) ?? entry.source), at(entry.target));
    } catch (error) {
      throw await fail(entry, error);
    }
    staged.delete(entry);
    applied.push(entry);
  }

  return { directory, renamed: applied, unchanged: plan.unchanged };
}

export async function sequenceFiles(
  paths: string[],
  action: SequenceAction,
  extensions: readonly string[]
): Promise<RenameReport> {
  const { directory, filenames } = await resolveSequenceTarget(paths, extensions);

  let existing: string[];
  try {
    existing = await fs.readdir(directory);
  } catch (error) {
    throw toIoError(error, `list ${directory}`);
  }

  const plan = planRenames(directory, filenames, action, existing);
  return applyRenamePlan(plan);
}
