import { execa, ExecaError } from 'execa';
import { ProcessError } from '@findfile/shared';
import { ShellSearchExecutor } from './shellSearch';

vi.mock('execa', () => {
  class ExecaError extends Error {
    shortMessage = 'Command failed with exit code 2: find /nope/';
    exitCode = 2;
    stderr = 'sort: invalid option\n';
  }
  return { execa: vi.fn(), ExecaError };
});

describe('ShellSearchExecutor', () => {
  beforeEach(() => {
    vi.mocked(execa).mockReset();
  });

  it('runs the command through the shell and returns stdout', async () => {
    vi.mocked(execa).mockResolvedValue({ stdout: '/srv/a.txt\n' } as never);

    const output = await new ShellSearchExecutor({ cwd: '/srv' }).run('find /srv/ -type f');

    expect(output).toBe('/srv/a.txt\n');
    expect(vi.mocked(execa)).toHaveBeenCalledWith(
      'find /srv/ -type f',
      expect.objectContaining({ shell: true, cwd: '/srv' }),
    );
  });

  it('wraps process failures in a ProcessError', async () => {
    vi.mocked(execa).mockRejectedValue(new ExecaError());

    const error = await new ShellSearchExecutor().run('find /nope/').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ProcessError);
    expect(error).toMatchObject({
      code: 'ProcessError',
      message: 'Search command failed: Command failed with exit code 2: find /nope/',
      exitCode: 2,
      details: { command: 'find /nope/', stderr: 'sort: invalid option' },
    });
  });

  it('rethrows anything that is not a process failure', async () => {
    const boom = new TypeError('boom');
    vi.mocked(execa).mockRejectedValue(boom);

    await expect(new ShellSearchExecutor().run('find /x/')).rejects.toBe(boom);
  });
});
