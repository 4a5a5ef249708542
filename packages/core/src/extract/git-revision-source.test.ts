import { EventEmitter } from 'events';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { GitRevisionSource } from './git-revision-source.js';
import { RevisionRangeError } from '../errors.js';

const spawnMock = vi.hoisted(() => vi.fn());

vi.mock('child_process', () => ({ spawn: spawnMock }));

function fakeChild(stdout: string, code = 0, stderr = '') {
  const child = Object.assign(new EventEmitter(), {
    stdout: new EventEmitter(),
    stderr: new EventEmitter(),
  });
  setImmediate(() => {
    if (stdout) child.stdout.emit('data', Buffer.from(stdout));
    if (stderr) child.stderr.emit('data', Buffer.from(stderr));
    child.emit('close', code);
  });
  return child;
}

describe('GitRevisionSource', () => {
  afterEach(() => {
    spawnMock.mockReset();
  });

  it('lists commits with their parents', async () => {
    spawnMock.mockReturnValueOnce(fakeChild('c3 c2\nc2 c1 c0\nc1\n'));
    const source = new GitRevisionSource('/repo');

    expect(await source.listCommits('main..dev', 5)).toEqual([
      { hash: 'c3', parents: ['c2'] },
      { hash: 'c2', parents: ['c1', 'c0'] },
      { hash: 'c1', parents: [] },
    ]);
    expect(spawnMock).toHaveBeenCalledWith(
      'git',
      ['rev-list', '--parents', '--max-count=5', 'main..dev', '--'],
      expect.objectContaining({ cwd: '/repo' })
    );
  });

  it('treats an empty range as HEAD', async () => {
    spawnMock.mockReturnValueOnce(fakeChild(''));

    await new GitRevisionSource('/repo').listCommits('  ', 10);

    expect(spawnMock.mock.calls[0][1]).toEqual(['rev-list', '--parents', '--max-count=10', 'HEAD', '--']);
  });

  it('reports a range git rejects', async () => {
    spawnMock.mockReturnValueOnce(fakeChild('', 128, "fatal: bad revision 'nope'\n"));

    const result = new GitRevisionSource('/repo').listCommits('nope', 10);

    await expect(result).rejects.toBeInstanceOf(RevisionRangeError);
  });

  it('rejects a range that git would read as an option', async () => {
    const result = new GitRevisionSource('/repo').listCommits('--all', 10);

    await expect(result).rejects.toThrow('Invalid revision range "--all": a range must not start with "-"');
    expect(spawnMock).not.toHaveBeenCalled();
  });

  it('diffs against the first parent, or the empty tree for a root commit', async () => {
    spawnMock.mockReturnValueOnce(fakeChild('diff one')).mockReturnValueOnce(fakeChild('diff two'));
    const source = new GitRevisionSource('/repo');

    expect(await source.readDiff({ hash: 'c2', parents: ['c1', 'c0'] })).toBe('diff one');
    expect(await source.readDiff({ hash: 'c1', parents: [] })).toBe('diff two');

    expect(spawnMock.mock.calls[0][1]).toEqual(['diff', '--no-color', '--no-ext-diff', '--unified=0', 'c1', 'c2']);
    expect(spawnMock.mock.calls[1][1]).toEqual([
      'diff-tree',
      '--root',
      '-r',
      '-p',
      '--no-commit-id',
      '--no-color',
      '--no-ext-diff',
      '--unified=0',
      'c1',
    ]);
  });

  it('returns undefined for files that do not exist at a revision', async () => {
    spawnMock.mockReturnValueOnce(fakeChild('', 128, "fatal: path 'src/a.h' does not exist\n"));

    expect(await new GitRevisionSource('/repo').readFile('c1', 'src/a.h')).toBeUndefined();
    expect(spawnMock.mock.calls[0][1]).toEqual(['show', 'c1:src/a.h']);
  });
});
