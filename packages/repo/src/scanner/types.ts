import type { DiscoveryError } from '@codepack/shared';

export interface WalkOptions {
  /** Stop after this many candidates */
  limit?: number;
  signal?: AbortSignal;
  /** Absolute paths never yielded, e.g. the output document */
  exclude?: readonly string[];
  /** Follow symbolic links. Cycles are broken by real path. Default true. */
  followSymlinks?: boolean;
  /** Called for each entry that could not be listed or stat'ed */
  onError?: (relativePath: string, error: DiscoveryError) => void;
}
