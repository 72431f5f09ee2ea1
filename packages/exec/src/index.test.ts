import { name, SystemLauncher, ShellSearchExecutor, parseCommandLine } from './index';

describe('@findfile/exec', () => {
  it('exposes its public surface', () => {
    expect(name).toBe('@findfile/exec');
    expect(typeof SystemLauncher).toBe('function');
    expect(typeof ShellSearchExecutor).toBe('function');
    expect(parseCommandLine('open').bin).toBe('open');
  });
});
