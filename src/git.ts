/* --------------------------------------------------------------------------
 *  PatchDrift — Git integration (optional staging of applied files)
 * ----------------------------------------------------------------------- */

import { simpleGit, SimpleGit } from 'simple-git';
import { errorMessage, GitError } from './errors';
import { getGitOutputChannel } from './logger';

/**
 * Gets a Git instance for the root
 * @throws GitError when the root is not inside a repository
 */
async function getGitInstance(root: string): Promise<SimpleGit> {
  const git = simpleGit(root);

  const isRepo = await git.checkIsRepo();
  if (!isRepo) {
    throw new GitError(`Git repository not found at ${root}`);
  }

  return git;
}

/**
 * Checks whether `root` is inside a Git repository
 */
export async function isGitAvailable(root: string): Promise<boolean> {
  try {
    await getGitInstance(root);
    return true;
  } catch (error) {
    getGitOutputChannel().debug(`Git not available at ${root}: ${errorMessage(error)}`);
    return false;
  }
}

/**
 * Stages files written by a session
 * @param root Working tree root
 * @param filePaths Paths relative to the root
 * @returns The paths that were staged
 * @throws GitError when staging fails
 */
export async function autoStageFiles(root: string, filePaths: readonly string[]): Promise<string[]> {
  if (filePaths.length === 0) {
    return [];
  }

  try {
    const git = await getGitInstance(root);
    await git.add([...filePaths]);
    getGitOutputChannel().info(`Staged ${filePaths.length} file(s)`);
    return [...filePaths];
  } catch (error) {
    getGitOutputChannel().error(`Error staging files: ${errorMessage(error)}`);
    throw error instanceof GitError ? error : new GitError(`Failed to stage files: ${errorMessage(error)}`);
  }
}
