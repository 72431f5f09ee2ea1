import type { SearchExecutor } from '@findfile/exec';
import { BufferedOutput } from './output/console';
import { createProgram } from './program';
import { readVersion } from './version';

describe('createProgram', () => {
  function build(stdout = '') {
    const output = new BufferedOutput();
    const run = vi.fn<(command: string) => Promise<string>>().mockResolvedValue(stdout);
    const executor: SearchExecutor = { run };
    const program = createProgram({
      env: { FF_COLOR: 'never', XDG_CONFIG_HOME: '/nonexistent-findfile-config' },
      homeDir: '/home/tester',
      cwd: '/home/tester',
      output,
      executor,
    });
    return { program, output, run };
  }

  it('passes dash tokens through in order instead of parsing them as options', async () => {
    const { program, output, run } = build('/srv/a/notes.md\n/srv/b/notes.md\n');

    await program.parseAsync(['node', 'ff', '/srv', 'notes', '-draft', '-2'], { from: 'node' });

    expect(run).toHaveBeenCalledTimes(1);
    expect(run.mock.calls[0]?.[0]).toContain(' ! -ipath "*draft*"');
    expect(output.lines).toEqual(['[2] /srv/b/notes.md']);
  });

  it('prints help when called without tokens', async () => {
    const { program, output, run } = build();

    await program.parseAsync(['node', 'ff'], { from: 'node' });

    expect(run).not.toHaveBeenCalled();
    expect(output.lines[0]).toMatch(/^FindFile, a file search utility/);
  });

  it('prints the package version for --version', async () => {
    const { program } = build();
    const written: string[] = [];
    program.exitOverride().configureOutput({ writeOut: (text) => written.push(text) });

    await expect(
      program.parseAsync(['node', 'ff', '--version'], { from: 'node' }),
    ).rejects.toMatchObject({ code: 'commander.version' });
    expect(written).toEqual([`${readVersion()}\n`]);
  });
});
