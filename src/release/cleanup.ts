import * as fs from 'fs';
import * as path from 'path';
import { Logger } from '../utils/logger';
import { ReleaseError, StepResult, fail, ok } from './errors';

const NAME_PLACEHOLDER = '{name}';
const CONTENTS_SUFFIX = '/*';

/**
 * setuptools writes `<name>.egg-info` with separators folded to underscores.
 */
export function eggInfoName(packageName: string): string {
  return packageName.replace(/[-.]+/g, '_');
}

/**
 * Whether a cleanup path stays inside the working directory.
 */
export function isContainedPath(entry: string): boolean {
  if (path.isAbsolute(entry)) {
    return false;
  }
  const normalized = path.normalize(entry.endsWith(CONTENTS_SUFFIX) ? entry.slice(0, -CONTENTS_SUFFIX.length) : entry);
  return normalized !== '.' && normalized !== '..' && !normalized.startsWith(`..${path.sep}`);
}

/**
 * Deletes build artifacts left by previous releases. Missing paths are fine.
 *
 * `dist/*` empties `dist` but keeps the directory; `dist` removes it.
 */
export class ArtifactCleaner {
  private readonly root: string;
  private readonly logger: Logger;

  constructor(root: string, logger: Logger) {
    this.root = root;
    this.logger = logger;
  }

  public clean(entries: string[], packageName: string | null): StepResult<string[]> {
    const removed: string[] = [];

    for (const entry of entries) {
      let resolvedEntry = entry;
      if (entry.includes(NAME_PLACEHOLDER)) {
        if (!packageName) {
          this.logger.warn(`Skipping ${entry}: package name unknown`);
          continue;
        }
        resolvedEntry = entry.split(NAME_PLACEHOLDER).join(eggInfoName(packageName));
        if (!isContainedPath(resolvedEntry)) {
          return fail(
            new ReleaseError(
              `Refusing to remove ${resolvedEntry}: package name "${packageName}" leads outside the working directory`,
              'CLEANUP_FAILURE',
              'cleanup',
              1,
              { path: resolvedEntry },
            ),
          );
        }
      }

      try {
        removed.push(...this.remove(resolvedEntry));
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        return fail(
          new ReleaseError(`Failed to remove ${resolvedEntry}: ${message}`, 'CLEANUP_FAILURE', 'cleanup', 1, {
            path: resolvedEntry,
          }),
        );
      }
    }

    this.logger.debug(`Removed ${removed.length} path(s)`);
    return ok(removed);
  }

  private remove(entry: string): string[] {
    if (entry.endsWith(CONTENTS_SUFFIX)) {
      const dir = path.resolve(this.root, entry.slice(0, -CONTENTS_SUFFIX.length));
      if (!fs.existsSync(dir) || !fs.statSync(dir).isDirectory()) {
        return [];
      }

      return fs.readdirSync(dir).map((child) => {
        const target = path.join(dir, child);
        fs.rmSync(target, { recursive: true, force: true });
        this.logger.debug(`Removed ${target}`);
        return path.relative(this.root, target);
      });
    }

    const target = path.resolve(this.root, entry);
    // lstat, so a dangling symlink still counts as present
    if (!fs.lstatSync(target, { throwIfNoEntry: false })) {
      return [];
    }
    fs.rmSync(target, { recursive: true, force: true });
    this.logger.debug(`Removed ${target}`);
    return [path.relative(this.root, target)];
  }
}
