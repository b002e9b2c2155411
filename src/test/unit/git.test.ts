// src/test/unit/git.test.ts

import { autoStageFiles, isGitAvailable } from '../../git';
import { GitError } from '../../errors';

const mockGit = {
  checkIsRepo: jest.fn(),
  add: jest.fn(),
};

jest.mock('simple-git', () => ({
  simpleGit: jest.fn(() => mockGit),
}));

describe('Git Integration', () => {
  beforeEach(() => {
    mockGit.checkIsRepo.mockResolvedValue(true);
    mockGit.add.mockResolvedValue(undefined);
  });

  describe('isGitAvailable', () => {
    it('should return true inside a repository', async () => {
      await expect(isGitAvailable('/work')).resolves.toBe(true);
    });

    it('should return false outside a repository', async () => {
      mockGit.checkIsRepo.mockResolvedValue(false);
      await expect(isGitAvailable('/work')).resolves.toBe(false);
    });
  });

  describe('autoStageFiles', () => {
    it('should stage the given files', async () => {
      await expect(autoStageFiles('/work', ['a.txt', 'src/b.txt'])).resolves.toEqual(['a.txt', 'src/b.txt']);
      expect(mockGit.add).toHaveBeenCalledWith(['a.txt', 'src/b.txt']);
    });

    it('should not call git for an empty list', async () => {
      await expect(autoStageFiles('/work', [])).resolves.toEqual([]);
      expect(mockGit.checkIsRepo).not.toHaveBeenCalled();
    });

    it('should throw GitError outside a repository', async () => {
      mockGit.checkIsRepo.mockResolvedValue(false);
      await expect(autoStageFiles('/work', ['a.txt'])).rejects.toThrow('Git repository not found at /work');
    });

    it('should wrap failures from git', async () => {
      mockGit.add.mockRejectedValue(new Error('index.lock exists'));

      const staging = autoStageFiles('/work', ['a.txt']);
      await expect(staging).rejects.toBeInstanceOf(GitError);
      await expect(staging).rejects.toThrow('Failed to stage files: index.lock exists');
    });
  });
});
