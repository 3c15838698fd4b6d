/**
 * luavm-bridge: Module path resolution
 *
 * Expands `package.path` / `package.cpath` templates for a module name and
 * probes the file system for the first existing candidate.
 */

import { statSync } from 'node:fs';
import { resolve, sep } from 'node:path';

/** Separates templates in a search path. */
const TEMPLATE_SEPARATOR = ';';
/** Replaced by the module name in each template. */
const NAME_PLACEHOLDER = '?';

/** Outcome of probing one search path. */
interface Resolution {
  /** Absolute path of the first existing candidate, or null. */
  readonly path: string | null;
  /** Every candidate tried before `path`, in order. */
  readonly probed: readonly string[];
}

/** Whether `candidate` names a regular file. */
type FileProbe = (candidate: string) => boolean;

const isRegularFile: FileProbe = (candidate) => {
  try {
    return statSync(candidate).isFile();
  } catch {
    return false;
  }
};

/**
 * Candidate file names for `name` under `searchPath`.
 * Dots in the module name become directory separators.
 */
export function expandTemplates(name: string, searchPath: string): string[] {
  const fileName = name.split('.').join(sep);
  return searchPath
    .split(TEMPLATE_SEPARATOR)
    .filter((template) => template.length > 0)
    .map((template) => template.split(NAME_PLACEHOLDER).join(fileName));
}

/** Probe the candidates for `name` in order. */
export function resolveModule(
  name: string,
  searchPath: string,
  probe: FileProbe = isRegularFile,
): Resolution {
  const probed: string[] = [];
  for (const candidate of expandTemplates(name, searchPath)) {
    if (probe(candidate)) {
      return { path: resolve(candidate), probed };
    }
    probed.push(candidate);
  }
  return { path: null, probed };
}
