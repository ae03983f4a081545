/**
 * Source Collector Service
 *
 * Turns command-line paths into the (name, text) units the grader
 * consumes. Directories are walked for .py files; files are taken as
 * given when they are Python sources.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { Errors, type SourceUnit } from 'gradekit-core';

export interface CollectedSources {
  units: SourceUnit[];
  /** Paths given explicitly that are not Python sources */
  skipped: string[];
}

const PYTHON_EXTENSION = '.py';

/** Directories never descended into */
const IGNORED_DIRECTORIES = new Set(['__pycache__', 'node_modules', 'venv', '.venv']);

function isPythonFile(filePath: string): boolean {
  return path.extname(filePath).toLowerCase() === PYTHON_EXTENSION;
}

async function readSource(filePath: string): Promise<string> {
  const text = await fs.readFile(filePath, 'utf-8');
  return text.replace(/^\uFEFF/, '');
}

async function walk(root: string, dir: string, found: Map<string, string>): Promise<void> {
  const entries = await fs.readdir(dir, { withFileTypes: true });
  entries.sort((a, b) => a.name.localeCompare(b.name));

  for (const entry of entries) {
    if (entry.name.startsWith('.')) continue;
    const fullPath = path.join(dir, entry.name);

    if (entry.isDirectory()) {
      if (!IGNORED_DIRECTORIES.has(entry.name)) {
        await walk(root, fullPath, found);
      }
    } else if (entry.isFile() && isPythonFile(entry.name)) {
      const name = path.relative(root, fullPath).split(path.sep).join('/');
      found.set(path.resolve(fullPath), name);
    }
  }
}

/**
 * Collect Python sources from files and directories.
 *
 * @throws GradeKitError INVALID_ARGUMENT when a path does not exist
 */
export async function collectSourceUnits(paths: string[]): Promise<CollectedSources> {
  // absolute path -> unit name, in discovery order
  const found = new Map<string, string>();
  const skipped: string[] = [];

  for (const given of paths) {
    const stat = await fs.stat(given).catch(() => null);
    if (!stat) {
      throw Errors.invalidArgument('paths', `'${given}' does not exist`);
    }

    if (stat.isDirectory()) {
      await walk(given, given, found);
    } else if (isPythonFile(given)) {
      found.set(path.resolve(given), path.basename(given));
    } else {
      skipped.push(given);
    }
  }

  const units: SourceUnit[] = [];
  for (const [filePath, name] of found) {
    units.push({ name, text: await readSource(filePath) });
  }
  return { units, skipped };
}
