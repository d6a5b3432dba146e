import nodeFs from 'node:fs/promises';
import type { Dirent, Stats } from 'node:fs';
import path from 'node:path';
import { comparePaths, DiscoveryError, joinRelative, type CandidatePath } from '@codepack/shared';
import { matches, type IgnoreRuleSet } from '../ignore';
import type { WalkOptions } from './types';

export * from './types';
export { hasBinaryExtension } from './utils';

type Fs = Pick<typeof nodeFs, 'readdir' | 'stat' | 'realpath'>;

interface WalkState {
  readonly root: string;
  readonly ruleSet: IgnoreRuleSet;
  readonly options: WalkOptions;
  readonly exclude: ReadonlySet<string>;
  readonly visited: Set<string>;
  yielded: number;
  stopped: boolean;
}

/**
 * Lazily enumerates the files under a root that survive the ignore rules.
 *
 * Every call to {@link walk} starts a fresh traversal. Directory entries are
 * visited in sorted order; excluded directories are never opened.
 */
export class DirectoryWalker {
  private fs: Fs;

  constructor(fs: Fs = nodeFs) {
    this.fs = fs;
  }

  async *walk(root: string, ruleSet: IgnoreRuleSet, options: WalkOptions = {}): AsyncGenerator<CandidatePath> {
    const absoluteRoot = path.resolve(root);
    const state: WalkState = {
      root: absoluteRoot,
      ruleSet,
      options,
      exclude: new Set((options.exclude ?? []).map((p) => path.resolve(p))),
      visited: new Set([await this.fs.realpath(absoluteRoot)]),
      yielded: 0,
      stopped: options.limit === 0,
    };

    yield* this.walkDir(state, absoluteRoot, '');
  }

  private async *walkDir(state: WalkState, dir: string, relativeDir: string): AsyncGenerator<CandidatePath> {
    let entries: Dirent[];
    try {
      entries = await this.fs.readdir(dir, { withFileTypes: true });
    } catch (error) {
      this.report(state, relativeDir || '.', `Cannot list directory ${relativeDir || '.'}`, error);
      return;
    }

    entries.sort((a, b) => comparePaths(a.name, b.name));

    for (const entry of entries) {
      if (state.stopped || state.options.signal?.aborted) {
        state.stopped = true;
        return;
      }

      const absolutePath = path.join(dir, entry.name);
      const relativePath = joinRelative(relativeDir, entry.name);
      if (state.exclude.has(absolutePath)) continue;

      let isDirectory = entry.isDirectory();
      let isFile = entry.isFile();
      let stats: Stats | undefined;

      if (entry.isSymbolicLink()) {
        if (state.options.followSymlinks === false) continue;
        try {
          stats = await this.fs.stat(absolutePath);
        } catch (error) {
          this.report(state, relativePath, `Broken symbolic link ${relativePath}`, error);
          continue;
        }
        isDirectory = stats.isDirectory();
        isFile = stats.isFile();
      }

      if (isDirectory) {
        if (matches(state.ruleSet, relativePath, true)) continue;

        let realPath: string;
        try {
          realPath = await this.fs.realpath(absolutePath);
        } catch (error) {
          this.report(state, relativePath, `Cannot resolve directory ${relativePath}`, error);
          continue;
        }
        // Already entered through another link.
        if (state.visited.has(realPath)) continue;
        state.visited.add(realPath);

        yield* this.walkDir(state, absolutePath, relativePath);
        continue;
      }

      if (!isFile || matches(state.ruleSet, relativePath, false)) continue;

      if (!stats) {
        try {
          stats = await this.fs.stat(absolutePath);
        } catch (error) {
          this.report(state, relativePath, `Cannot stat ${relativePath}`, error);
          continue;
        }
      }

      yield { absolutePath, relativePath, sizeBytes: stats.size };
      state.yielded += 1;
      if (state.options.limit !== undefined && state.yielded >= state.options.limit) {
        state.stopped = true;
        return;
      }
    }
  }

  private report(state: WalkState, relativePath: string, message: string, cause: unknown): void {
    state.options.onError?.(relativePath, new DiscoveryError(message, { cause, details: { relativePath } }));
  }
}
