import { simpleGit, type SimpleGit } from 'simple-git';
import { RevisionResolutionError } from '../errors.js';
import type { Revision } from '../types.js';

export const SHORT_ID_LENGTH = 8;

export function shortId(id: string): string {
  return id.slice(0, SHORT_ID_LENGTH);
}

/**
 * Read-only git queries against the source tree.
 */
export class RevisionResolver {
  private readonly git: SimpleGit;

  constructor(private readonly repoPath: string) {
    this.git = simpleGit(repoPath);
  }

  /**
   * Resolve a branch, tag or abbreviated hash to its canonical commit id.
   */
  async resolve(ref: string): Promise<Revision> {
    let id: string;
    try {
      id = (await this.git.revparse(['--verify', `${ref}^{commit}`])).trim();
    } catch (err) {
      const reason = err instanceof Error ? err.message.trim() : String(err);
      throw new RevisionResolutionError(
        `Cannot resolve "${ref}" in ${this.repoPath}: ${reason}`,
        ref,
      );
    }
    if (!id) {
      throw new RevisionResolutionError(
        `Cannot resolve "${ref}" in ${this.repoPath}: git returned no commit id`,
        ref,
      );
    }
    return { id, shortId: shortId(id), ref };
  }

  /**
   * Author and subject of a commit, for display.
   */
  async summary(id: string): Promise<string> {
    const output = await this.git.raw(['log', '--format=%aN  %s', '-n', '1', id]);
    return output.trim();
  }

  /**
   * The before revision followed by every commit in before..after, oldest
   * first.
   */
  async listRange(before: Revision, after: Revision): Promise<Revision[]> {
    const output = await this.git.raw([
      'rev-list',
      '--reverse',
      `${before.id}..${after.id}`,
    ]);
    const ids = output
      .split('\n')
      .map((line) => line.trim())
      .filter((line) => line.length > 0);

    const revisions: Revision[] = [before];
    for (const id of ids) {
      revisions.push(id === after.id ? after : { id, shortId: shortId(id) });
    }
    return revisions;
  }
}
